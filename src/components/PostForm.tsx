import type { FormErrors, FormValues } from "../forms";
import { FieldError, invalid, NonFieldErrors } from "./FormErrors";

export interface PostFormProps {
  action: string;
  values?: Partial<FormValues<"title" | "content" | "tags">>;
  errors?: FormErrors;
  submitLabel: string;
}

export function PostForm(props: PostFormProps) {
  const { values, errors } = props;
  return (
    <form method="post" action={props.action}>
      <NonFieldErrors errors={errors} />
      <label>
        Title
        <input
          type="text"
          name="title"
          required
          value={values?.title}
          aria-invalid={invalid(errors, "title")}
        />
        <FieldError errors={errors} field="title" />
      </label>
      <label>
        Content
        <textarea
          name="content"
          rows={12}
          required
          aria-invalid={invalid(errors, "content")}
        >
          {values?.content}
        </textarea>
        <FieldError errors={errors} field="content" />
      </label>
      <label>
        Tags
        <input
          type="text"
          name="tags"
          value={values?.tags}
          placeholder="django, python"
          aria-invalid={invalid(errors, "tags")}
        />
        <FieldError errors={errors} field="tags" />
        <small>Separate tags with commas.</small>
      </label>
      <button type="submit">{props.submitLabel}</button>
    </form>
  );
}

import { type FormErrors, NON_FIELD_ERRORS } from "../forms";

export interface FieldErrorProps {
  errors?: FormErrors;
  field: string;
}

export function FieldError({ errors, field }: FieldErrorProps) {
  const messages = errors?.[field];
  if (messages == null || messages.length < 1) return null;
  return <small id={`${field}-error`}>{messages.join(" ")}</small>;
}

export function invalid(errors: FormErrors | undefined, field: string) {
  return errors?.[field] == null ? undefined : "true";
}

export interface NonFieldErrorsProps {
  errors?: FormErrors;
}

export function NonFieldErrors({ errors }: NonFieldErrorsProps) {
  const messages = errors?.[NON_FIELD_ERRORS];
  if (messages == null || messages.length < 1) return null;
  return (
    <article role="alert">
      <ul>
        {messages.map((message) => (
          <li>{message}</li>
        ))}
      </ul>
    </article>
  );
}

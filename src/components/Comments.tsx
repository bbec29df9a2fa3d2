import type { CommentWithAuthor } from "../comments";
import type { FormErrors } from "../forms";
import type { User } from "../schema";
import { FieldError, invalid } from "./FormErrors";

export interface CommentListProps {
  comments: CommentWithAuthor[];
  viewer: User | null;
}

export function CommentList({ comments, viewer }: CommentListProps) {
  if (comments.length < 1) return <p>No comments yet.</p>;
  return (
    <>
      {comments.map((comment) => (
        <article id={`comment-${comment.id}`}>
          <p>{comment.content}</p>
          <footer>
            <small>
              {comment.author.username} on{" "}
              <time datetime={comment.created.toISOString()}>
                {comment.created.toLocaleString("en", {
                  dateStyle: "medium",
                  timeStyle: "short",
                })}
              </time>
            </small>
            {viewer?.id === comment.authorId && (
              <>
                {" "}
                <a href={`/comment/${comment.id}/update`}>Edit</a>{" "}
                <a href={`/comment/${comment.id}/delete`}>Delete</a>
              </>
            )}
          </footer>
        </article>
      ))}
    </>
  );
}

export interface CommentFormProps {
  action: string;
  content?: string;
  errors?: FormErrors;
  submitLabel?: string;
}

export function CommentForm({
  action,
  content,
  errors,
  submitLabel,
}: CommentFormProps) {
  return (
    <form method="post" action={action}>
      <label>
        Comment
        <textarea
          name="content"
          rows={4}
          required
          aria-invalid={invalid(errors, "content")}
        >
          {content}
        </textarea>
        <FieldError errors={errors} field="content" />
      </label>
      <button type="submit">{submitLabel ?? "Add comment"}</button>
    </form>
  );
}

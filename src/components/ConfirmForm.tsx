export interface ConfirmFormProps {
  action: string;
  question: string;
  cancelUrl: string;
}

export function ConfirmForm({ action, question, cancelUrl }: ConfirmFormProps) {
  return (
    <form method="post" action={action}>
      <p>{question}</p>
      <div role="group">
        <button type="submit" class="contrast">
          Delete
        </button>
        <a href={cancelUrl} role="button" class="secondary">
          Cancel
        </a>
      </div>
    </form>
  );
}

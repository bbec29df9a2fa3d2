/**
 * Form validation.
 *
 * A form is declared as an ordered list of `(field, validator)` pairs plus
 * an optional cross-field check.  Validation reads every declared field
 * from the raw input, runs the validators in declaration order, and
 * collects the messages of every failing field instead of stopping at the
 * first one.  Within a single field the chain stops at its first failure,
 * so later validators (uniqueness lookups, for example) may assume the
 * earlier ones passed.  The cross-field check runs last, and sees the
 * errors collected so far.
 *
 * @example
 * ```typescript
 * const commentForm = defineForm({
 *   fields: ["content"],
 *   validators: [
 *     ["content", required("Comment cannot be empty.")],
 *     ["content", lengthBetween(3, 5000)],
 *   ],
 *   transform: (values) => ({ content: values.content }),
 * });
 * const result = await validateForm(commentForm, await c.req.parseBody());
 * ```
 *
 * @module
 */

import type { z } from "zod";

/**
 * Field name to messages.  Cross-field messages are stored under
 * {@link NON_FIELD_ERRORS}.
 */
export type FormErrors = Record<string, string[]>;

export const NON_FIELD_ERRORS = "__all__";

export type FormValues<K extends string> = Record<K, string>;

/**
 * Returns an error message, or `undefined` when the value is acceptable.
 */
export type FieldValidator<K extends string> = (
  value: string,
  values: FormValues<K>,
) => string | undefined | Promise<string | undefined>;

/**
 * Returns a non-field message, a `[field, message]` pair to attach the
 * message to one field, or `undefined`.
 */
export type CrossFieldValidator<K extends string> = (
  values: FormValues<K>,
  errors: FormErrors,
) => CrossFieldError<K> | Promise<CrossFieldError<K>>;

type CrossFieldError<K extends string> =
  | string
  | readonly [K, string]
  | undefined;

export interface FormDefinition<K extends string, T> {
  fields: readonly K[];
  /** Fields whose surrounding whitespace is significant (passwords). */
  untrimmed?: readonly K[];
  validators: readonly (readonly [K, FieldValidator<K>])[];
  clean?: CrossFieldValidator<K>;
  transform: (values: FormValues<K>) => T;
}

export type FormResult<K extends string, T> =
  | { success: true; data: T; values: FormValues<K> }
  | { success: false; errors: FormErrors; values: FormValues<K> };

export function defineForm<K extends string, T>(
  definition: FormDefinition<K, T>,
): FormDefinition<K, T> {
  return definition;
}

function readField(input: Record<string, unknown>, field: string): string {
  const raw = input[field];
  if (typeof raw === "string") return raw;
  if (typeof raw === "number" || typeof raw === "boolean") return String(raw);
  if (Array.isArray(raw)) {
    return raw.filter((item) => typeof item === "string").join(", ");
  }
  return "";
}

function isComplete<K extends string>(
  values: Partial<FormValues<K>>,
  fields: readonly K[],
): values is FormValues<K> {
  return fields.every((field) => typeof values[field] === "string");
}

export function readFormValues<K extends string, T>(
  form: FormDefinition<K, T>,
  input: Record<string, unknown>,
): FormValues<K> {
  const values: Partial<FormValues<K>> = {};
  for (const field of form.fields) {
    const value = readField(input, field);
    values[field] = form.untrimmed?.includes(field) ? value : value.trim();
  }
  if (!isComplete(values, form.fields)) {
    throw new TypeError("Form values are missing declared fields");
  }
  return values;
}

function addError(errors: FormErrors, field: string, message: string): void {
  (errors[field] ??= []).push(message);
}

export async function validateForm<K extends string, T>(
  form: FormDefinition<K, T>,
  input: Record<string, unknown>,
): Promise<FormResult<K, T>> {
  const values = readFormValues(form, input);
  const errors: FormErrors = {};
  for (const [field, validator] of form.validators) {
    if (errors[field] != null) continue;
    const message = await validator(values[field], values);
    if (message != null) addError(errors, field, message);
  }
  if (form.clean != null) {
    const error = await form.clean(values, errors);
    if (typeof error === "string") addError(errors, NON_FIELD_ERRORS, error);
    else if (error != null) addError(errors, error[0], error[1]);
  }
  if (Object.keys(errors).length > 0) {
    return { success: false, errors, values };
  }
  return { success: true, data: form.transform(values), values };
}

/**
 * The length of a value in characters (code points), as the database
 * counts `varchar` lengths.
 */
export function characterCount(value: string): number {
  return [...value].length;
}

export function required<K extends string>(
  message = "This field is required.",
): FieldValidator<K> {
  return (value) => (value === "" ? message : undefined);
}

export function lengthBetween<K extends string>(
  min: number,
  max: number,
  label = "This field",
): FieldValidator<K> {
  return (value) => {
    const length = characterCount(value);
    if (length < min) {
      return `${label} must be at least ${min} characters long.`;
    }
    if (length > max) {
      return `${label} must be at most ${max} characters long.`;
    }
    return undefined;
  };
}

export function maxLength<K extends string>(
  max: number,
  label = "This field",
): FieldValidator<K> {
  return (value) =>
    characterCount(value) > max
      ? `${label} must be at most ${max} characters long.`
      : undefined;
}

/**
 * Skips the wrapped validator when the value is empty.
 */
export function optional<K extends string>(
  validator: FieldValidator<K>,
): FieldValidator<K> {
  return (value, values) => (value === "" ? undefined : validator(value, values));
}

/**
 * Adapts a Zod schema into a field validator; the first issue's message
 * becomes the field error.
 */
export function fromSchema<K extends string>(
  schema: z.ZodType,
): FieldValidator<K> {
  return async (value) => {
    const result = await schema.safeParseAsync(value);
    if (result.success) return undefined;
    return result.error.issues[0]?.message ?? "Enter a valid value.";
  };
}

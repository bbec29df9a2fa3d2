import { z } from "zod";

export type Uuid = `${string}-${string}-${string}-${string}-${string}`;

const UUID_REGEXP =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): value is Uuid {
  return UUID_REGEXP.test(value);
}

export function newId(): Uuid {
  return crypto.randomUUID();
}

export const uuid = z.string().refine(isUuid, "Invalid UUID");

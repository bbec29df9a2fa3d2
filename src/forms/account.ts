import { and, eq, ne } from "drizzle-orm";
import { z } from "zod";
import type { Database } from "../db";
import { USERNAME_PATTERN } from "../patterns";
import { users } from "../schema";
import type { Uuid } from "../uuid";
import {
  characterCount,
  defineForm,
  type FieldValidator,
  fromSchema,
  maxLength,
  optional,
  required,
} from ".";

export const MIN_PASSWORD_LENGTH = 8;

export const USERNAME_TAKEN = "A user with that username already exists.";
export const EMAIL_REGISTERED = "This email address is already registered.";
export const EMAIL_IN_USE = "This email address is already in use.";

const email = z.email("Enter a valid email address.");
const webUrl = z.url({
  protocol: /^https?$/,
  error: "Enter a valid URL.",
});

/**
 * Password rules: a minimum length, not entirely numeric, and not
 * containing the username.
 */
export function validatePassword(
  password: string,
  username: string,
): string | undefined {
  if (characterCount(password) < MIN_PASSWORD_LENGTH) {
    return `This password is too short. It must contain at least ${MIN_PASSWORD_LENGTH} characters.`;
  }
  if (/^\d+$/.test(password)) {
    return "This password is entirely numeric.";
  }
  if (
    username !== "" &&
    password.toLowerCase().includes(username.toLowerCase())
  ) {
    return "The password is too similar to the username.";
  }
  return undefined;
}

type RegistrationField =
  | "username"
  | "email"
  | "first_name"
  | "last_name"
  | "password1"
  | "password2";

export interface RegistrationInput {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  password: string;
}

export function registrationForm(db: Database) {
  const usernameIsFree: FieldValidator<RegistrationField> = async (value) => {
    const existing = await db.query.users.findFirst({
      columns: { id: true },
      where: eq(users.username, value),
    });
    return existing == null ? undefined : USERNAME_TAKEN;
  };
  const emailIsFree: FieldValidator<RegistrationField> = async (value) => {
    const existing = await db.query.users.findFirst({
      columns: { id: true },
      where: eq(users.email, value),
    });
    return existing == null ? undefined : EMAIL_REGISTERED;
  };
  return defineForm<RegistrationField, RegistrationInput>({
    fields: [
      "username",
      "email",
      "first_name",
      "last_name",
      "password1",
      "password2",
    ],
    untrimmed: ["password1", "password2"],
    validators: [
      ["username", required("Username is required.")],
      ["username", maxLength(150, "Username")],
      [
        "username",
        (value) =>
          USERNAME_PATTERN.test(value)
            ? undefined
            : "Username may contain only letters, digits and @/./+/-/_ characters.",
      ],
      ["username", usernameIsFree],
      ["email", required("Email address is required.")],
      ["email", fromSchema(email)],
      ["email", emailIsFree],
      ["first_name", maxLength(30, "First name")],
      ["last_name", maxLength(150, "Last name")],
      ["password1", required("Password is required.")],
      [
        "password1",
        (value, values) => validatePassword(value, values.username),
      ],
      ["password2", required("Password confirmation is required.")],
    ],
    clean: (values) =>
      values.password1 !== "" &&
      values.password2 !== "" &&
      values.password1 !== values.password2
        ? ["password2", "The two password fields didn't match."]
        : undefined,
    transform: (values) => ({
      username: values.username,
      email: values.email,
      firstName: values.first_name,
      lastName: values.last_name,
      password: values.password1,
    }),
  });
}

type LoginField = "username" | "password";

export const loginForm = defineForm<
  LoginField,
  { username: string; password: string }
>({
  fields: ["username", "password"],
  untrimmed: ["password"],
  validators: [
    ["username", required("Username is required.")],
    ["password", required("Password is required.")],
  ],
  transform: (values) => ({
    username: values.username,
    password: values.password,
  }),
});

type ProfileField =
  | "email"
  | "first_name"
  | "last_name"
  | "bio"
  | "location"
  | "website"
  | "avatar_url";

export interface ProfileInput {
  email: string;
  firstName: string;
  lastName: string;
  bio: string;
  location: string;
  website: string;
  avatarUrl: string | null;
}

export function profileForm(db: Database, userId: Uuid) {
  const emailIsFree: FieldValidator<ProfileField> = async (value) => {
    const existing = await db.query.users.findFirst({
      columns: { id: true },
      where: and(eq(users.email, value), ne(users.id, userId)),
    });
    return existing == null ? undefined : EMAIL_IN_USE;
  };
  return defineForm<ProfileField, ProfileInput>({
    fields: [
      "email",
      "first_name",
      "last_name",
      "bio",
      "location",
      "website",
      "avatar_url",
    ],
    validators: [
      ["email", required("Email address is required.")],
      ["email", fromSchema(email)],
      ["email", emailIsFree],
      ["first_name", maxLength(30, "First name")],
      ["last_name", maxLength(150, "Last name")],
      ["bio", maxLength(500, "Bio")],
      ["location", maxLength(100, "Location")],
      ["website", optional(fromSchema(webUrl))],
      ["avatar_url", optional(fromSchema(webUrl))],
    ],
    transform: (values) => ({
      email: values.email,
      firstName: values.first_name,
      lastName: values.last_name,
      bio: values.bio,
      location: values.location,
      website: values.website,
      avatarUrl: values.avatar_url === "" ? null : values.avatar_url,
    }),
  });
}

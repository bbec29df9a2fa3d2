import { getLogger } from "@logtape/logtape";
import { compare, hash } from "bcryptjs";
import { eq } from "drizzle-orm";
import { z } from "zod";
import type { Database } from "./db";
import { NotFoundError, ValidationError } from "./errors";
import { validateForm } from "./forms";
import {
  EMAIL_IN_USE,
  EMAIL_REGISTERED,
  type ProfileInput,
  profileForm,
  type RegistrationInput,
  registrationForm,
  USERNAME_TAKEN,
} from "./forms/account";
import { type User, type UserProfile, userProfiles, users } from "./schema";
import { newId, type Uuid } from "./uuid";

const logger = getLogger(["penpost", "accounts"]);

export const BCRYPT_ROUNDS = 10;

export type Account = User & { profile: UserProfile };

const uniqueViolation = z.object({
  code: z.literal("23505"),
  constraint: z.string().optional(),
  constraint_name: z.string().optional(),
});

/**
 * Find the unique constraint a failed query violated.  Drizzle wraps the
 * driver's error, so the cause chain is searched; PGlite reports the name
 * as `constraint`, postgres.js as `constraint_name`.
 */
export function violatedUniqueConstraint(error: unknown): string | undefined {
  let current = error;
  for (let depth = 0; depth < 4 && current != null; depth++) {
    const result = uniqueViolation.safeParse(current);
    if (result.success) {
      return result.data.constraint ?? result.data.constraint_name ?? "";
    }
    current = current instanceof Error ? current.cause : undefined;
  }
  return undefined;
}

/**
 * Turn a username or e-mail uniqueness violation that slipped past form
 * validation (a concurrent request) into the same form error.
 */
function rethrowAsValidationError(
  error: unknown,
  emailMessage: string,
): never {
  const constraint = violatedUniqueConstraint(error);
  if (constraint === "users_username_unique") {
    throw new ValidationError({ username: [USERNAME_TAKEN] });
  }
  if (constraint === "users_email_unique") {
    throw new ValidationError({ email: [emailMessage] });
  }
  throw error;
}

export async function hashPassword(password: string): Promise<string> {
  return await hash(password, BCRYPT_ROUNDS);
}

/**
 * Create a user and its profile in one transaction.  The input is assumed
 * to have passed {@link registrationForm}.
 */
export async function createAccount(
  db: Database,
  input: RegistrationInput,
): Promise<Account> {
  const passwordHash = await hashPassword(input.password);
  const account = await db
    .transaction(async (tx) => {
      const [user] = await tx
        .insert(users)
        .values({
          id: newId(),
          username: input.username,
          email: input.email,
          firstName: input.firstName,
          lastName: input.lastName,
          passwordHash,
        })
        .returning();
      const [profile] = await tx
        .insert(userProfiles)
        .values({ userId: user.id })
        .returning();
      return { ...user, profile };
    })
    .catch((error: unknown) =>
      rethrowAsValidationError(error, EMAIL_REGISTERED),
    );
  logger.info("Registered account {username}", { username: account.username });
  return account;
}

/**
 * Validate registration input and create the account.
 * @throws {ValidationError} When the input is invalid.
 */
export async function registerAccount(
  db: Database,
  input: Record<string, unknown>,
): Promise<Account> {
  const result = await validateForm(registrationForm(db), input);
  if (!result.success) throw new ValidationError(result.errors);
  return await createAccount(db, result.data);
}

/**
 * @returns The user, or `undefined` when the username is unknown or the
 *          password does not match.
 */
export async function authenticate(
  db: Database,
  username: string,
  password: string,
): Promise<User | undefined> {
  const user = await db.query.users.findFirst({
    where: eq(users.username, username),
  });
  if (user == null) return undefined;
  if (!(await compare(password, user.passwordHash))) {
    logger.info("Failed login attempt for {username}", { username });
    return undefined;
  }
  return user;
}

export async function getUser(
  db: Database,
  id: Uuid,
): Promise<User | undefined> {
  return await db.query.users.findFirst({ where: eq(users.id, id) });
}

/**
 * Fetch a user with its profile.  A user that somehow lacks a profile
 * gets an empty one.
 * @throws {NotFoundError} When there is no such user.
 */
export async function getAccount(db: Database, id: Uuid): Promise<Account> {
  const user = await db.query.users.findFirst({
    where: eq(users.id, id),
    with: { profile: true },
  });
  if (user == null) throw new NotFoundError("No such user");
  if (user.profile != null) return { ...user, profile: user.profile };
  const [profile] = await db
    .insert(userProfiles)
    .values({ userId: user.id })
    .onConflictDoNothing()
    .returning();
  if (profile != null) return { ...user, profile };
  const existing = await db.query.userProfiles.findFirst({
    where: eq(userProfiles.userId, user.id),
  });
  if (existing == null) throw new NotFoundError("No such user");
  return { ...user, profile: existing };
}

/**
 * Validate profile input and apply it to the user and its profile.
 * @throws {ValidationError} When the input is invalid.
 */
export async function updateProfile(
  db: Database,
  userId: Uuid,
  input: Record<string, unknown>,
): Promise<Account> {
  const result = await validateForm(profileForm(db, userId), input);
  if (!result.success) throw new ValidationError(result.errors);
  await applyProfile(db, userId, result.data);
  logger.info("Updated profile of user {userId}", { userId });
  return await getAccount(db, userId);
}

async function applyProfile(
  db: Database,
  userId: Uuid,
  input: ProfileInput,
): Promise<void> {
  await getAccount(db, userId);
  await db
    .transaction(async (tx) => {
      await tx
        .update(users)
        .set({
          email: input.email,
          firstName: input.firstName,
          lastName: input.lastName,
        })
        .where(eq(users.id, userId));
      await tx
        .update(userProfiles)
        .set({
          bio: input.bio,
          location: input.location,
          website: input.website,
          avatarUrl: input.avatarUrl,
          updated: new Date(),
        })
        .where(eq(userProfiles.userId, userId));
    })
    .catch((error: unknown) => rethrowAsValidationError(error, EMAIL_IN_USE));
}

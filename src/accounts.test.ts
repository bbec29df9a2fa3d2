import { eq } from "drizzle-orm";
import { beforeEach, describe, expect, it } from "vitest";

import { cleanDatabase, createUser } from "../tests/helpers";
import {
  authenticate,
  createAccount,
  getAccount,
  registerAccount,
  updateProfile,
  violatedUniqueConstraint,
} from "./accounts";
import db from "./db";
import { NotFoundError, ValidationError } from "./errors";
import {
  EMAIL_IN_USE,
  EMAIL_REGISTERED,
  USERNAME_TAKEN,
} from "./forms/account";
import { userProfiles } from "./schema";
import { newId } from "./uuid";

const registration = {
  username: "ada",
  email: "ada@example.com",
  first_name: "Ada",
  last_name: "Lovelace",
  password1: "test-password",
  password2: "test-password",
};

describe("registerAccount", () => {
  beforeEach(async () => {
    await cleanDatabase();
  });

  it("creates a user with an empty profile", async () => {
    expect.assertions(4);

    const account = await registerAccount(db, registration);
    expect(account.username).toBe("ada");
    expect(account.passwordHash).not.toBe("test-password");
    expect(account.profile.userId).toBe(account.id);
    expect(account.profile.bio).toBe("");
  });

  it("throws a validation error with every message", async () => {
    expect.assertions(2);

    try {
      await registerAccount(db, { ...registration, email: "" });
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.errors).toEqual({
          email: ["Email address is required."],
        });
      }
    }
  });

  it("reports a username taken by a concurrent registration", async () => {
    expect.assertions(3);

    const results = await Promise.allSettled([
      registerAccount(db, registration),
      registerAccount(db, { ...registration, email: "ada2@example.com" }),
    ]);
    const rejected = results.filter(
      (r): r is PromiseRejectedResult => r.status === "rejected",
    );
    expect(rejected).toHaveLength(1);
    const [failure] = rejected;
    expect(failure.reason).toBeInstanceOf(ValidationError);
    if (failure.reason instanceof ValidationError) {
      expect(failure.reason.errors).toEqual({ username: [USERNAME_TAKEN] });
    }
  });
});

describe("createAccount", () => {
  beforeEach(async () => {
    await cleanDatabase();
  });

  const input = {
    username: "grace",
    email: "grace@example.com",
    firstName: "",
    lastName: "",
    password: "test-password",
  };

  it("turns a duplicate username into a form error", async () => {
    expect.assertions(2);

    await createAccount(db, input);
    const error = await createAccount(db, {
      ...input,
      email: "other@example.com",
    }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.errors).toEqual({ username: [USERNAME_TAKEN] });
    }
  });

  it("turns a duplicate e-mail address into a form error", async () => {
    expect.assertions(2);

    await createAccount(db, input);
    const error = await createAccount(db, {
      ...input,
      username: "grace2",
    }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.errors).toEqual({ email: [EMAIL_REGISTERED] });
    }
  });
});

describe("violatedUniqueConstraint", () => {
  it("finds the constraint on the error or its cause", () => {
    const driverError = Object.assign(new Error("duplicate key"), {
      code: "23505",
      constraint_name: "users_email_unique",
    });
    expect(violatedUniqueConstraint(driverError)).toBe("users_email_unique");
    const wrapped = new Error("Failed query", { cause: driverError });
    expect(violatedUniqueConstraint(wrapped)).toBe("users_email_unique");
  });

  it("ignores other errors", () => {
    const notNull = Object.assign(new Error("null value"), { code: "23502" });
    expect(violatedUniqueConstraint(notNull)).toBeUndefined();
    expect(violatedUniqueConstraint("boom")).toBeUndefined();
  });
});

describe("authenticate", () => {
  beforeEach(async () => {
    await cleanDatabase();
  });

  it("checks the password", async () => {
    expect.assertions(3);

    const account = await registerAccount(db, registration);
    expect((await authenticate(db, "ada", "test-password"))?.id).toBe(
      account.id,
    );
    expect(await authenticate(db, "ada", "wrong-password")).toBeUndefined();
    expect(await authenticate(db, "nobody", "test-password")).toBeUndefined();
  });
});

describe("getAccount", () => {
  beforeEach(async () => {
    await cleanDatabase();
  });

  it("throws for an unknown user", async () => {
    expect.assertions(1);
    await expect(getAccount(db, newId())).rejects.toThrow(NotFoundError);
  });

  it("creates a missing profile", async () => {
    expect.assertions(2);

    const user = await createUser();
    await db.delete(userProfiles).where(eq(userProfiles.userId, user.id));

    const account = await getAccount(db, user.id);
    expect(account.profile.userId).toBe(user.id);
    expect(account.profile.location).toBe("");
  });
});

describe("updateProfile", () => {
  beforeEach(async () => {
    await cleanDatabase();
  });

  it("updates the user and its profile", async () => {
    expect.assertions(5);

    const user = await createUser();
    const account = await updateProfile(db, user.id, {
      email: "new@example.com",
      first_name: "Ada",
      bio: "Writes about engines.",
      location: "London",
      avatar_url: "https://example.com/ada.png",
    });
    expect(account.email).toBe("new@example.com");
    expect(account.firstName).toBe("Ada");
    expect(account.profile.bio).toBe("Writes about engines.");
    expect(account.profile.location).toBe("London");
    expect(account.profile.avatarUrl).toBe("https://example.com/ada.png");
  });

  it("reports an e-mail address taken by a concurrent update", async () => {
    expect.assertions(3);

    const first = await createUser();
    const second = await createUser();
    const results = await Promise.allSettled(
      [first, second].map((user) =>
        updateProfile(db, user.id, { email: "shared@example.com" }),
      ),
    );
    const rejected = results.filter(
      (r): r is PromiseRejectedResult => r.status === "rejected",
    );
    expect(rejected).toHaveLength(1);
    const [failure] = rejected;
    expect(failure.reason).toBeInstanceOf(ValidationError);
    if (failure.reason instanceof ValidationError) {
      expect(failure.reason.errors).toEqual({ email: [EMAIL_IN_USE] });
    }
  });
});

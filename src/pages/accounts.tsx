import { getLogger } from "@logtape/logtape";
import { Hono } from "hono";
import {
  type Account,
  authenticate,
  getAccount,
  registerAccount,
  updateProfile,
} from "../accounts";
import {
  LoginForm,
  ProfileForm,
  type ProfileValues,
  RegistrationForm,
} from "../components/AccountForms";
import { Layout } from "../components/Layout";
import db from "../db";
import { ValidationError } from "../errors";
import {
  type FormErrors,
  NON_FIELD_ERRORS,
  readFormValues,
  validateForm,
} from "../forms";
import { loginForm, profileForm, registrationForm } from "../forms/account";
import { requestBody } from "../helpers";
import { type Env, logIn, logOut, requireUser, safeNextPath } from "../login";
import type { User } from "../schema";

const logger = getLogger(["penpost", "pages", "accounts"]);

const NOTICES: Record<string, string> = {
  registered: "Your account has been created.",
  updated: "Your profile has been updated.",
};

const accounts = new Hono<Env>();

accounts.get("/register", (c) => {
  if (c.get("user") != null) return c.redirect("/profile");
  return c.html(
    <Layout title="Register" user={null}>
      <h1>Register</h1>
      <RegistrationForm />
    </Layout>,
  );
});

accounts.post("/register", async (c) => {
  if (c.get("user") != null) return c.redirect("/profile");
  const input = await requestBody(c.req);
  let account: Account;
  try {
    account = await registerAccount(db, input);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    return c.html(
      <Layout title="Register" user={null}>
        <h1>Register</h1>
        <RegistrationForm
          values={readFormValues(registrationForm(db), input)}
          errors={error.errors}
        />
      </Layout>,
      400,
    );
  }
  await logIn(c, account);
  return c.redirect("/profile?done=registered");
});

accounts.get("/login", (c) => {
  if (c.get("user") != null) return c.redirect("/profile");
  return c.html(
    <Layout title="Log in" user={null}>
      <h1>Log in</h1>
      <LoginForm next={c.req.query("next")} />
    </Layout>,
  );
});

accounts.post("/login", async (c) => {
  if (c.get("user") != null) return c.redirect("/profile");
  const input = await requestBody(c.req);
  const next = typeof input["next"] === "string" ? input["next"] : undefined;
  const result = await validateForm(loginForm, input);
  let user: User | undefined;
  if (result.success) {
    user = await authenticate(db, result.data.username, result.data.password);
  }
  if (user == null) {
    const errors = result.success
      ? {
          [NON_FIELD_ERRORS]: [
            "Please enter a correct username and password.",
          ],
        }
      : result.errors;
    return c.html(
      <Layout title="Log in" user={null}>
        <h1>Log in</h1>
        <LoginForm
          username={result.values.username}
          next={next}
          errors={errors}
        />
      </Layout>,
      400,
    );
  }
  await logIn(c, user);
  logger.info("{username} logged in", { username: user.username });
  return c.redirect(safeNextPath(next));
});

accounts.post("/logout", (c) => {
  logOut(c);
  return c.redirect("/");
});

function profileValues(account: Account): ProfileValues {
  return {
    email: account.email,
    first_name: account.firstName,
    last_name: account.lastName,
    bio: account.profile.bio,
    location: account.profile.location,
    website: account.profile.website,
    avatar_url: account.profile.avatarUrl ?? "",
  };
}

interface ProfilePageProps {
  account: Account;
  values: ProfileValues;
  notice?: string;
  errors?: FormErrors;
}

function ProfilePage({ account, values, notice, errors }: ProfilePageProps) {
  return (
    <Layout title="Profile" user={account}>
      <h1>{account.username}</h1>
      {notice != null && <article role="status">{notice}</article>}
      {account.profile.avatarUrl != null && (
        <img src={account.profile.avatarUrl} alt="" width={96} height={96} />
      )}
      <p>
        <a href={`/users/${account.id}/posts`}>Your posts</a>
      </p>
      <ProfileForm values={values} errors={errors} />
    </Layout>
  );
}

accounts.get("/profile", async (c) => {
  const user = requireUser(c.get("user"));
  const account = await getAccount(db, user.id);
  const done = c.req.query("done");
  return c.html(
    <ProfilePage
      account={account}
      values={profileValues(account)}
      notice={done == null ? undefined : NOTICES[done]}
    />,
  );
});

accounts.post("/profile", async (c) => {
  const user = requireUser(c.get("user"));
  const input = await requestBody(c.req);
  try {
    await updateProfile(db, user.id, input);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    const account = await getAccount(db, user.id);
    return c.html(
      <ProfilePage
        account={account}
        values={readFormValues(profileForm(db, user.id), input)}
        errors={error.errors}
      />,
      400,
    );
  }
  return c.redirect("/profile?done=updated");
});

export default accounts;

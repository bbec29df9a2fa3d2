import type { FormErrors, FormValues } from "../forms";
import { FieldError, invalid, NonFieldErrors } from "./FormErrors";

interface TextFieldProps {
  label: string;
  name: string;
  type?: "text" | "email" | "password" | "url";
  value?: string;
  required?: boolean;
  autocomplete?: string;
  errors?: FormErrors;
}

function TextField(props: TextFieldProps) {
  return (
    <label>
      {props.label}
      <input
        type={props.type ?? "text"}
        name={props.name}
        value={props.type === "password" ? undefined : props.value}
        required={props.required}
        autocomplete={props.autocomplete}
        aria-invalid={invalid(props.errors, props.name)}
      />
      <FieldError errors={props.errors} field={props.name} />
    </label>
  );
}

export type RegistrationValues = Partial<
  FormValues<"username" | "email" | "first_name" | "last_name">
>;

export interface RegistrationFormProps {
  values?: RegistrationValues;
  errors?: FormErrors;
}

export function RegistrationForm({ values, errors }: RegistrationFormProps) {
  return (
    <form method="post" action="/register">
      <NonFieldErrors errors={errors} />
      <TextField
        label="Username"
        name="username"
        value={values?.username}
        required
        autocomplete="username"
        errors={errors}
      />
      <TextField
        label="Email address"
        name="email"
        type="email"
        value={values?.email}
        required
        autocomplete="email"
        errors={errors}
      />
      <div class="grid">
        <TextField
          label="First name"
          name="first_name"
          value={values?.first_name}
          errors={errors}
        />
        <TextField
          label="Last name"
          name="last_name"
          value={values?.last_name}
          errors={errors}
        />
      </div>
      <TextField
        label="Password"
        name="password1"
        type="password"
        required
        autocomplete="new-password"
        errors={errors}
      />
      <TextField
        label="Password confirmation"
        name="password2"
        type="password"
        required
        autocomplete="new-password"
        errors={errors}
      />
      <button type="submit">Register</button>
    </form>
  );
}

export interface LoginFormProps {
  username?: string;
  next?: string;
  errors?: FormErrors;
}

export function LoginForm({ username, next, errors }: LoginFormProps) {
  return (
    <form method="post" action="/login">
      <NonFieldErrors errors={errors} />
      {next != null && <input type="hidden" name="next" value={next} />}
      <TextField
        label="Username"
        name="username"
        value={username}
        required
        autocomplete="username"
        errors={errors}
      />
      <TextField
        label="Password"
        name="password"
        type="password"
        required
        autocomplete="current-password"
        errors={errors}
      />
      <button type="submit">Log in</button>
    </form>
  );
}

export type ProfileValues = Partial<
  FormValues<
    | "email"
    | "first_name"
    | "last_name"
    | "bio"
    | "location"
    | "website"
    | "avatar_url"
  >
>;

export interface ProfileFormProps {
  values: ProfileValues;
  errors?: FormErrors;
}

export function ProfileForm({ values, errors }: ProfileFormProps) {
  return (
    <form method="post" action="/profile">
      <NonFieldErrors errors={errors} />
      <TextField
        label="Email address"
        name="email"
        type="email"
        value={values.email}
        required
        errors={errors}
      />
      <div class="grid">
        <TextField
          label="First name"
          name="first_name"
          value={values.first_name}
          errors={errors}
        />
        <TextField
          label="Last name"
          name="last_name"
          value={values.last_name}
          errors={errors}
        />
      </div>
      <label>
        Bio
        <textarea name="bio" rows={4} aria-invalid={invalid(errors, "bio")}>
          {values.bio}
        </textarea>
        <FieldError errors={errors} field="bio" />
      </label>
      <TextField
        label="Location"
        name="location"
        value={values.location}
        errors={errors}
      />
      <TextField
        label="Website"
        name="website"
        type="url"
        value={values.website}
        errors={errors}
      />
      <TextField
        label="Avatar URL"
        name="avatar_url"
        type="url"
        value={values.avatar_url}
        errors={errors}
      />
      <button type="submit">Save profile</button>
    </form>
  );
}

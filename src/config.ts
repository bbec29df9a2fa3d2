import { z } from "zod";

const logLevel = z.enum([
  "trace",
  "debug",
  "info",
  "warning",
  "error",
  "fatal",
]);

const flag = z
  .enum(["true", "false", ""])
  .optional()
  .transform((v) => v === "true");

const configSchema = z.object({
  DATABASE_URL: z
    .string({ error: "DATABASE_URL must be defined" })
    .min(1, "DATABASE_URL must be defined"),
  SECRET_KEY: z
    .string({ error: "SECRET_KEY must be defined" })
    .min(1, "SECRET_KEY must be defined"),
  LOG_LEVEL: logLevel.default("info"),
  LOG_QUERY: flag,
  PAGE_SIZE: z
    .string()
    .regex(/^\d+$/, "PAGE_SIZE must be a positive integer")
    .default("10")
    .transform((v) => Number.parseInt(v, 10))
    .refine((v) => v >= 1 && v <= 50, "PAGE_SIZE must be between 1 and 50"),
  PORT: z
    .string()
    .regex(/^\d+$/, "PORT must be an integer")
    .default("3000")
    .transform((v) => Number.parseInt(v, 10)),
  BIND: z.string().optional(),
  BEHIND_PROXY: flag,
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => issue.message);
    throw new Error(`Invalid configuration: ${messages.join("; ")}`);
  }
  return result.data;
}

export const config = loadConfig();

export default config;

import { z } from "zod";

const parseEnvBool = (val: unknown, def: boolean): boolean => {
  if (typeof val === "boolean") return val;
  if (typeof val === "string") {
    const v = val.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(v)) return true;
    if (["0", "false", "no", "off", ""].includes(v)) return false;
  }
  if (typeof val === "number") return val !== 0;
  return def;
};

const optionalString = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z.string().optional(),
);

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_FILE: optionalString,
  VAULT_ADDR: z.string().url().default("http://127.0.0.1:8200"),
  // Left optional here so a missing token surfaces as a startup ConfigurationError.
  VAULT_SERVICE_TOKEN: optionalString,
  VAULT_KV_MOUNT: z.string().min(1).default("secrets"),
  VAULT_KV_PATH: z.string().min(1).default("aws/credentials"),
  AWS_REGION: z.string().min(1).default("us-east-1"),
  S3_ENDPOINT: optionalString,
  S3_FORCE_PATH_STYLE: z.preprocess((v) => parseEnvBool(v, false), z.boolean()).default(false),
  SENTRY_DSN: optionalString,
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_RELEASE: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
  SENTRY_ENABLE_LOGS: z.preprocess((v) => parseEnvBool(v, true), z.boolean()).default(true),
  SENTRY_ENABLE_METRICS: z.preprocess((v) => parseEnvBool(v, true), z.boolean()).default(true),
});

export type AppConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("Invalid environment configuration", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const config: AppConfig = parsed.data;

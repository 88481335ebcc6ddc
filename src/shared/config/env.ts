import dotenv from "dotenv";
import dotenvSafe from "dotenv-safe";
import { z } from "zod";

// Load environment variables (fallback to plain dotenv if example file missing)
try {
  dotenvSafe.config({ example: ".env.example", allowEmptyValues: true });
} catch (error) {
  // eslint-disable-next-line no-console
  console.warn("⚠️  dotenv-safe fallback:", error instanceof Error ? error.message : String(error));
  dotenv.config();
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(4000),

  // Database -- one connection string, validated once at startup
  MONGODB_URI: z.string().min(1, "MONGODB_URI is required"),
  MONGO_SERVER_SELECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  SENTRY_DSN: z.string().optional().or(z.literal("")),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  APP_NAME: z.string().default("TrainingCertificates"),

  // CORS -- comma-separated origins
  CORS_ORIGIN: optionalString,

  // Admin routes (issue, list, reprint). Unset leaves them open for local development.
  ADMIN_API_KEY: optionalString,

  // Certificate rendering
  CERTIFICATE_ISSUER_NAME: z.string().min(1).default("Ministry of Health"),
  CERTIFICATE_PROGRAM_NAME: z.string().min(1).default("MNCH Training Program"),
  CERTIFICATE_VERIFY_URL: optionalString.pipe(z.string().url().optional()),
  CERTIFICATE_FONT_PATH: optionalString,
  CERTIFICATE_ID_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
});

export type AppEnv = z.infer<typeof EnvSchema>;

export const env: AppEnv = EnvSchema.parse({
  NODE_ENV: process.env.NODE_ENV,
  PORT: process.env.PORT,
  MONGODB_URI: process.env.MONGODB_URI,
  MONGO_SERVER_SELECTION_TIMEOUT_MS: process.env.MONGO_SERVER_SELECTION_TIMEOUT_MS,
  SENTRY_DSN: process.env.SENTRY_DSN,
  LOG_LEVEL: process.env.LOG_LEVEL,
  APP_NAME: process.env.APP_NAME,
  CORS_ORIGIN: process.env.CORS_ORIGIN,
  ADMIN_API_KEY: process.env.ADMIN_API_KEY,
  CERTIFICATE_ISSUER_NAME: process.env.CERTIFICATE_ISSUER_NAME,
  CERTIFICATE_PROGRAM_NAME: process.env.CERTIFICATE_PROGRAM_NAME,
  CERTIFICATE_VERIFY_URL: process.env.CERTIFICATE_VERIFY_URL,
  CERTIFICATE_FONT_PATH: process.env.CERTIFICATE_FONT_PATH,
  CERTIFICATE_ID_MAX_ATTEMPTS: process.env.CERTIFICATE_ID_MAX_ATTEMPTS,
});

import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const ZConfig = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  DATABASE_URL: z.string().default("postgres://localhost:5432/marketplace"),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),
  DB_ISOLATION_LEVEL: z
    .enum(["read committed", "repeatable read", "serializable"])
    .default("read committed"),
  DB_TRANSACTION_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),

  RABBITMQ_URL: z.string().default("amqp://localhost"),
  JOB_QUEUE: z.string().min(1).default("jobs"),
  JOB_DRIVER: z.enum(["amqp", "inline"]).default("amqp"),
  JOB_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  IMPORT_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(120_000),
  EMAIL_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(60_000),

  ORDER_TRANSITIONS: z.enum(["permissive", "sequential"]).default("permissive"),

  JWT_SECRET: z.string().min(1).default("change-me"),

  SMTP_URL: z.string().optional(),
  MAIL_FROM: z.string().default("shop@example.com"),

  FEED_FETCH_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),
});

export type Config = z.infer<typeof ZConfig>;

function loadConfig(): Config {
  const parsed = ZConfig.safeParse(process.env);
  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([key, errors]) => `${key}: ${(errors ?? []).join(", ")}`)
      .join("; ");
    throw new Error(`Invalid configuration - ${fields}`);
  }
  return parsed.data;
}

export const config = loadConfig();

import dotenv from "dotenv";
import * as cron from "node-cron";
import { z } from "zod";

dotenv.config();

const numericString = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer")
  .optional();

const envSchema = z.object({
  PORT: numericString,
  NODE_ENV: z.string().optional(),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),

  RATE_LIMIT_WINDOW: numericString,
  RATE_LIMIT_MAX: numericString,
  CORS_ORIGIN: z.string().optional(),

  SESSION_TTL_MINUTES: numericString,
  SESSION_SWEEP_CRON: z.string().optional(),
});

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type AppConfig = ReturnType<typeof buildConfig>;

const toLogLevel = (value: string | undefined): LogLevel => {
  const parsed = envSchema.shape.LOG_LEVEL.safeParse(value);
  return parsed.success && parsed.data ? parsed.data : "info";
};

const buildConfig = () => {
  const env = process.env;
  return {
    port: parseInt(env.PORT || "3000", 10),
    nodeEnv: env.NODE_ENV || "development",
    logging: {
      level: toLogLevel(env.LOG_LEVEL),
    },
    api: {
      rateLimit: {
        windowMs: parseInt(env.RATE_LIMIT_WINDOW || "900000", 10),
        max: parseInt(env.RATE_LIMIT_MAX || "100", 10),
      },
      cors: {
        origin: env.CORS_ORIGIN?.split(",").map((o) => o.trim()) || [
          "http://localhost:3000",
        ],
      },
    },
    session: {
      ttlMinutes: parseInt(env.SESSION_TTL_MINUTES || "120", 10),
      sweepCron: env.SESSION_SWEEP_CRON || "*/15 * * * *",
    },
  };
};

let cachedConfig: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = buildConfig();
  }
  return cachedConfig;
};

export const validateConfig = () => {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join(", ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const config = loadConfig();
  if (config.session.ttlMinutes <= 0) {
    throw new Error("SESSION_TTL_MINUTES must be greater than zero");
  }
  if (!cron.validate(config.session.sweepCron)) {
    throw new Error(
      `SESSION_SWEEP_CRON is not a valid cron expression: ${config.session.sweepCron}`
    );
  }
};

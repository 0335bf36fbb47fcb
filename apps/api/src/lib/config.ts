import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import type {
  CompanyContext,
  UserContext,
} from "../modules/templates/templates.renderer.js";

loadDotenv();

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : null));

const EnvSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  DATABASE_URL: z
    .string({ error: "DATABASE_URL is required" })
    .min(1, "DATABASE_URL is required"),
  REDIS_URL: z
    .string({ error: "REDIS_URL is required" })
    .min(1, "REDIS_URL is required"),
  ALLOWED_ORIGINS: z.string().default(""),
  DISPATCH_CONCURRENCY: z.coerce.number().int().min(1).max(50).default(5),
  DISPATCH_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(1),
  DISPATCH_BACKOFF_MS: z.coerce.number().int().min(0).default(60_000),
  DEFAULT_COUNTRY_CODE: z
    .string()
    .regex(/^\d{1,4}$/, "DEFAULT_COUNTRY_CODE must be 1-4 digits")
    .default("39"),
  COMPANY_NAME: z.string().trim().default(""),
  COMPANY_EMAIL: optionalText,
  COMPANY_PHONE: optionalText,
  COMPANY_WEBSITE: optionalText,
  COMPANY_VAT: optionalText,
  SYSTEM_USER_NAME: z.string().trim().min(1).default("System"),
});

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  host: string;
  logLevel: string;
  databaseUrl: string;
  redisUrl: string;
  allowedOrigins: string[];
  dispatch: {
    /** Size of the worker pool consuming the dispatch queue. */
    concurrency: number;
    attempts: number;
    backoffMs: number;
  };
  defaultCountryCode: string;
  /** `company` root of template placeholders. */
  company: CompanyContext;
  /** Acting user for renders that are not tied to a person. */
  systemUser: UserContext;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    databaseUrl: e.DATABASE_URL,
    redisUrl: e.REDIS_URL,
    allowedOrigins: e.ALLOWED_ORIGINS.split(",")
      .map((o) => o.trim())
      .filter((o) => o.length > 0),
    dispatch: {
      concurrency: e.DISPATCH_CONCURRENCY,
      attempts: e.DISPATCH_ATTEMPTS,
      backoffMs: e.DISPATCH_BACKOFF_MS,
    },
    defaultCountryCode: e.DEFAULT_COUNTRY_CODE,
    company: {
      id: "company",
      name: e.COMPANY_NAME,
      email: e.COMPANY_EMAIL,
      phone: e.COMPANY_PHONE,
      website: e.COMPANY_WEBSITE,
      vat: e.COMPANY_VAT,
    },
    systemUser: {
      id: "system",
      name: e.SYSTEM_USER_NAME,
      email: null,
      phone: null,
      login: "system",
    },
  };
}

let _config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/** Drops the cached config. Tests only. */
export function resetConfig(): void {
  _config = null;
}

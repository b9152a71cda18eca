import { z } from "zod";

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => ["true", "1", "yes"].includes((value || "").trim().toLowerCase()));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  EXECUTION_STORE: z.enum(["postgres", "memory"]).default("postgres"),
  DATABASE_URL: z.string().min(1).optional(),
  DATABASE_SSL: z.string().optional(),
  EXECUTOR_URL: z.string().url().default("http://localhost:8932"),
  EXECUTOR_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(3_600_000).default(300_000),
  CLASSIFIER_URL: z.string().url().optional(),
  INTELLIGENT_RETRY_ENABLED: booleanFlag,
  ENCRYPTION_KEY: z.string().min(1, "ENCRYPTION_KEY is required."),
  BATCH_MAX_PARALLEL: z.coerce.number().int().min(1).max(5).default(5),
  CORS_ALLOWED_ORIGINS: z.string().default("http://localhost:5173"),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().min(1_000).default(15_000)
});

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  store:
    | { kind: "memory" }
    | {
        kind: "postgres";
        databaseUrl: string;
        ssl: boolean;
      };
  executorUrl: string;
  executorTimeoutMs: number;
  classifierUrl: string | null;
  intelligentRetryEnabled: boolean;
  encryptionKey: string;
  batchMaxParallel: number;
  corsAllowedOrigins: string[];
  shutdownGraceMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }

  const values = parsed.data;

  if (values.EXECUTION_STORE === "postgres" && !values.DATABASE_URL) {
    throw new ConfigError(["DATABASE_URL: required when EXECUTION_STORE=postgres."]);
  }

  return {
    nodeEnv: values.NODE_ENV,
    port: values.PORT,
    store:
      values.EXECUTION_STORE === "memory" || !values.DATABASE_URL
        ? { kind: "memory" }
        : {
            kind: "postgres",
            databaseUrl: values.DATABASE_URL,
            ssl: values.DATABASE_SSL === "require"
          },
    executorUrl: values.EXECUTOR_URL.replace(/\/+$/, ""),
    executorTimeoutMs: values.EXECUTOR_TIMEOUT_MS,
    classifierUrl: values.CLASSIFIER_URL ? values.CLASSIFIER_URL.replace(/\/+$/, "") : null,
    intelligentRetryEnabled: values.INTELLIGENT_RETRY_ENABLED,
    encryptionKey: values.ENCRYPTION_KEY,
    batchMaxParallel: values.BATCH_MAX_PARALLEL,
    corsAllowedOrigins: values.CORS_ALLOWED_ORIGINS.split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
    shutdownGraceMs: values.SHUTDOWN_GRACE_MS
  };
}

import dotenv from "dotenv";
import { z } from "zod";
import { StorageDriver } from "../common/common-enum";

dotenv.config();

const numericString = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer")
  .optional();

const envSchema = z.object({
  PORT: numericString,
  NODE_ENV: z.string().optional(),

  DATABASE_URL: z.string().url().optional(),
  DB_HOST: z.string().optional(),
  DB_PORT: numericString,
  DB_NAME: z.string().optional(),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_SSL: z.enum(["true", "false"]).optional(),
  STORAGE_DRIVER: z.nativeEnum(StorageDriver).optional(),

  FDC_API_KEY: z.string().optional(),
  FDC_BASE_URL: z.string().url().optional(),
  FDC_TIMEOUT_MS: numericString,

  OLLAMA_URL: z.string().url().optional(),
  OLLAMA_MODEL: z.string().optional(),
  OLLAMA_TIMEOUT_MS: numericString,

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),

  RATE_LIMIT_WINDOW: numericString,
  RATE_LIMIT_MAX: numericString,
  CORS_ORIGIN: z.string().optional(),

  SUMMARY_MIN_YEAR: numericString,
});

export type AppConfig = ReturnType<typeof buildConfig>;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env) => {
  return {
    port: parseInt(env.PORT || "3000", 10),
    nodeEnv: env.NODE_ENV || "development",
    storageDriver:
      env.STORAGE_DRIVER === StorageDriver.MEMORY
        ? StorageDriver.MEMORY
        : StorageDriver.POSTGRES,
    database: {
      url: env.DATABASE_URL,
      host: env.DB_HOST || "localhost",
      port: parseInt(env.DB_PORT || "5432", 10),
      name: env.DB_NAME || "nutrition_log",
      user: env.DB_USER || "postgres",
      password: env.DB_PASSWORD || "postgres",
      ssl: env.DB_SSL === "true",
    },
    fdc: {
      apiKey: env.FDC_API_KEY || "DEMO_KEY",
      baseUrl: env.FDC_BASE_URL || "https://api.nal.usda.gov/fdc/v1",
      timeoutMs: parseInt(env.FDC_TIMEOUT_MS || "10000", 10),
    },
    ollama: {
      url: (env.OLLAMA_URL || "http://localhost:11434").replace(/\/+$/, ""),
      model: env.OLLAMA_MODEL || "",
      timeoutMs: parseInt(env.OLLAMA_TIMEOUT_MS || "30000", 10),
      temperature: 0.7,
      maxTokens: 100,
    },
    logging: {
      level: env.LOG_LEVEL || "info",
    },
    api: {
      rateLimit: {
        windowMs: parseInt(env.RATE_LIMIT_WINDOW || "60000", 10),
        max: parseInt(env.RATE_LIMIT_MAX || "60", 10),
      },
      cors: {
        origin: env.CORS_ORIGIN?.split(",").map((origin) => origin.trim()) || [
          "http://localhost:5173",
        ],
      },
    },
    summaries: {
      minYear: parseInt(env.SUMMARY_MIN_YEAR || "1900", 10),
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

export const validateConfig = (env: NodeJS.ProcessEnv = process.env) => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join(", ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  if (!parsed.data.OLLAMA_MODEL) {
    throw new Error(
      "OLLAMA_MODEL is required (an Ollama model name such as 'mistral:latest')"
    );
  }
};

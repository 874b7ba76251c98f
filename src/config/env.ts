import { z } from "zod";

const envSchema = z.object({
  PORT: z.string().optional(),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  JWT_SECRET: z.string().optional(),
  MESSAGE_CATALOG_PATH: z.string().optional(),
  RECOMMENDATION_COUNT: z.string().optional()
});

const parseNumberStrict = (value: string | undefined, fallback: number, name: string) => {
  if (value == null || value === "") return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid ${name} value: ${value}`);
  }
  return parsed;
};

const buildEnv = (raw: z.infer<typeof envSchema>) => {
  const port = parseNumberStrict(raw.PORT, 3000, "PORT");
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error("PORT must be a positive integer");
  }

  const recommendationCount = parseNumberStrict(
    raw.RECOMMENDATION_COUNT,
    2,
    "RECOMMENDATION_COUNT"
  );
  if (!Number.isInteger(recommendationCount) || recommendationCount < 1) {
    throw new Error("RECOMMENDATION_COUNT must be an integer of at least 1");
  }

  return {
    port,
    host: raw.HOST,
    logLevel: raw.LOG_LEVEL,
    jwtSecret: raw.JWT_SECRET || null,
    messageCatalogPath: raw.MESSAGE_CATALOG_PATH || null,
    recommendationCount
  };
};

export type AppEnv = ReturnType<typeof buildEnv>;

// Parse an environment map without touching the process-wide cache.
export const parseEnv = (source: Record<string, string | undefined>): AppEnv => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return buildEnv(parsed.data);
};

let cachedEnv: AppEnv | null = null;

export const loadEnv = () => {
  if (cachedEnv) return cachedEnv;
  cachedEnv = parseEnv(process.env);
  return cachedEnv;
};

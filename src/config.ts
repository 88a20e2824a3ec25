import { z } from "zod";

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default("0.0.0.0"),
    LEDGER_PROVIDER: z.enum(["memory", "file", "postgres"]).default("file"),
    LEDGER_FILE_PATH: z.string().min(1).default("data/ledger.json"),
    DATABASE_URL: z.string().optional(),
    DB_POOL_SIZE: z.coerce.number().int().positive().default(10),
    DB_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
    BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(16_384),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info")
  })
  .superRefine((value, ctx) => {
    if (value.LEDGER_PROVIDER === "postgres" && !value.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "DATABASE_URL is required when LEDGER_PROVIDER=postgres",
        path: ["DATABASE_URL"]
      });
    }
  });

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse(env);
}

export const config: AppConfig = loadConfig();

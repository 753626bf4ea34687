import { z } from "zod";
import { logger } from "./logger";

const positiveMinutes = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).optional().default("development"),
  PORT: z.coerce.number().int().positive().max(65535).default(3000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional().default("info"),
  CORS_ORIGIN: z.string().optional(),
  SCHEDULER_MIN_CHUNK_MINUTES: positiveMinutes(15),
  SCHEDULER_SESSION_LENGTH: positiveMinutes(25),
  SCHEDULER_BREAK_LENGTH: positiveMinutes(5),
});

export type AppEnv = z.infer<typeof envSchema>;

export interface SchedulerDefaults {
  minChunkMinutes: number;
  sessionLength: number;
  breakLength: number;
}

export function getEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    logger.error("Invalid environment variables", {
      errorCount: parsed.error.issues.length,
      issues: parsed.error.issues.map((i) => ({
        path: i.path.join("."),
        message: i.message,
      })),
    });
    throw new Error(
      `Invalid environment variables: ${parsed.error.issues.length} validation error(s)`,
    );
  }

  return parsed.data;
}

export function getSchedulerDefaults(env: AppEnv = getEnv()): SchedulerDefaults {
  return {
    minChunkMinutes: env.SCHEDULER_MIN_CHUNK_MINUTES,
    sessionLength: env.SCHEDULER_SESSION_LENGTH,
    breakLength: env.SCHEDULER_BREAK_LENGTH,
  };
}

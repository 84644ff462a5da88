import { z } from 'zod';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const envSchema = z.object({
  LOG_LEVEL: logLevelSchema.default('info'),
  DMI_PARSER_CACHE_ENTRIES: z.coerce.number().int().min(0).max(10_000).default(64),
  DMI_PARSER_CACHE_TTL_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
});

export type Env = z.infer<typeof envSchema>;

export type LogLevel = z.infer<typeof logLevelSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return parsed.data;
}

let cached: Env | undefined;

export function getEnv(): Env {
  cached ??= loadEnv();
  return cached;
}

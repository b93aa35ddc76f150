import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const configSchema = z.object({
  // Server
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(8000),

  // Storage (optional; only probed by the diagnostic endpoint)
  databaseUrl: z.string().optional(),
  databaseName: z.string().optional(),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    host: env('HOST'),
    port: env('PORT'),
    databaseUrl: env('DATABASE_URL'),
    databaseName: env('DATABASE_NAME'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return result.data;
}

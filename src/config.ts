import { z } from 'zod';
import { ConfigError } from './errors';

export type StorageConfig =
  | { backend: 'memory' }
  | { backend: 'postgres'; databaseUrl: string };

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  storage: StorageConfig;
  apiKey: string | undefined;
  seedData: boolean;
}

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3001),
    STORAGE_BACKEND: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: z.preprocess(blankToUndefined, z.string().optional()),
    API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
    SEED_DATA: z.enum(['true', 'false']).default('false'),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_BACKEND === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'is required when STORAGE_BACKEND=postgres',
      });
    }
  });

/**
 * Builds the process configuration from environment variables.
 * Called once at start-up; the result is handed to every component that needs it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`)
    );
  }

  const values = parsed.data;
  const storage: StorageConfig =
    values.STORAGE_BACKEND === 'postgres' && values.DATABASE_URL
      ? { backend: 'postgres', databaseUrl: values.DATABASE_URL }
      : { backend: 'memory' };

  return {
    nodeEnv: values.NODE_ENV,
    port: values.PORT,
    storage,
    apiKey: values.API_KEY,
    seedData: values.SEED_DATA === 'true',
  };
}

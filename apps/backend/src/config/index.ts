import { z } from 'zod';
import { MEMORY_DATABASE, resolveSqliteFilename } from '../db/sqlite';

const configSchema = z
  .object({
    // Database
    databaseFile: z
      .string({ required_error: 'DATABASE_URL is required' })
      .min(1)
      .transform((value, ctx) => {
        const filename = resolveSqliteFilename(value);
        if (filename === null) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'DATABASE_URL must be a file:/sqlite: URL, a filesystem path or :memory:',
          });
          return z.NEVER;
        }
        return filename;
      }),
    dbPoolMin: z.coerce.number().int().positive().default(1),
    dbPoolMax: z.coerce.number().int().positive().default(6),
    dbAcquireTimeoutMs: z.coerce.number().int().positive().default(5000),
    dbBusyTimeoutMs: z.coerce.number().int().nonnegative().default(5000),

    // Tokens
    secretKey: z.string({ required_error: 'SECRET_KEY is required' }).min(16),
    accessTokenExpireMinutes: z.coerce.number().int().positive().default(60),
    bcryptRounds: z.coerce.number().int().min(4).max(15).default(12),

    // Server
    port: z.coerce.number().int().nonnegative().default(8000),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

    // CORS
    corsOrigin: z.string().default('*'),
  })
  .refine((c) => c.dbPoolMin <= c.dbPoolMax, {
    message: 'DB_POOL_MIN must not exceed DB_POOL_MAX',
    path: ['dbPoolMin'],
  })
  .refine((c) => c.databaseFile !== MEMORY_DATABASE || c.dbPoolMax === 1, {
    // each connection to :memory: is a separate database
    message: 'An in-memory database requires DB_POOL_MAX=1',
    path: ['dbPoolMax'],
  });

export type AppConfig = Readonly<z.infer<typeof configSchema>>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Builds the immutable configuration from environment variables. Called once
 * at startup; components receive the result instead of reading the
 * environment themselves.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse({
    databaseFile: env.DATABASE_URL,
    dbPoolMin: env.DB_POOL_MIN,
    dbPoolMax: env.DB_POOL_MAX,
    dbAcquireTimeoutMs: env.DB_ACQUIRE_TIMEOUT_MS,
    dbBusyTimeoutMs: env.DB_BUSY_TIMEOUT_MS,
    secretKey: env.SECRET_KEY,
    accessTokenExpireMinutes: env.ACCESS_TOKEN_EXPIRE_MINUTES,
    bcryptRounds: env.BCRYPT_ROUNDS,
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    corsOrigin: env.CORS_ORIGIN,
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => `${e.path.join('.') || 'config'}: ${e.message}`)
    );
  }

  return Object.freeze(result.data);
}

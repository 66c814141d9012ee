import z from 'zod';
import type { Logger } from 'pino';
import { logger as rootLogger } from './logger';

export type SSLConfig = false | { rejectUnauthorized: boolean; ca?: string };

export interface DatabaseConfig {
  connectionString: string;
  ssl: SSLConfig;
}

const DatabaseEnvSchema = z.object({
  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL is not set' })
    .min(1, 'DATABASE_URL is not set'),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PG_SSL: z.string().optional(),
  PG_SSL_REJECT_UNAUTHORIZED: z.string().optional(),
  PG_SSL_CA: z.string().optional(),
  DEV_SSL_ALLOW: z.string().optional(),
});

type DatabaseEnv = z.infer<typeof DatabaseEnvSchema>;

function withCA(
  rejectUnauthorized: boolean,
  ca: string | undefined,
): Exclude<SSLConfig, false> {
  return ca ? { rejectUnauthorized, ca } : { rejectUnauthorized };
}

/**
 * Builds SSL configuration for the PostgreSQL connection
 * Security rules:
 * - Production: Always enforce certificate validation (rejectUnauthorized: true)
 * - Development/Test: Allow relaxed settings only with an explicit flag
 * - Custom CA: Use PG_SSL_CA if provided
 */
function buildSSLConfig(env: DatabaseEnv, log: Logger): SSLConfig {
  if (env.PG_SSL === 'false') {
    return false;
  }

  if (env.NODE_ENV === 'production') {
    return withCA(true, env.PG_SSL_CA);
  }

  const allowRelaxedSSL =
    env.DEV_SSL_ALLOW === 'true' || env.PG_SSL_REJECT_UNAUTHORIZED === 'false';

  if (allowRelaxedSSL) {
    log.warn(
      { nodeEnv: env.NODE_ENV },
      'Using relaxed SSL settings. This is insecure for production!',
    );
    return withCA(false, env.PG_SSL_CA);
  }

  return withCA(true, env.PG_SSL_CA);
}

/**
 * Reads and validates the database settings once. The returned struct is the
 * only thing the connection layer sees; nothing downstream reads process.env.
 */
export function loadDatabaseConfig(
  env: NodeJS.ProcessEnv = process.env,
  log: Logger = rootLogger,
): DatabaseConfig {
  const parsed = DatabaseEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      issue ? issue.message : 'Invalid database configuration',
    );
  }

  const settings = parsed.data;

  if (
    settings.NODE_ENV === 'production' &&
    (settings.PG_SSL_REJECT_UNAUTHORIZED === 'false' ||
      settings.DEV_SSL_ALLOW === 'true')
  ) {
    throw new Error(
      'SECURITY ERROR: Cannot use relaxed SSL settings in production environment',
    );
  }

  return {
    connectionString: settings.DATABASE_URL,
    ssl: buildSSLConfig(settings, log),
  };
}

import { z } from 'zod'
import { config as dotenvConfig } from 'dotenv'
import { DEFAULT_SERVICE_NAME } from './constants.js'

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1')

/**
 * Environment variable schema
 *
 * Every variable the service reads lives here. Values are validated once at startup and
 * frozen; the rest of the code reads them through getEnv().
 */
const envSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test', 'local']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  SERVICE_NAME: z.string().default(DEFAULT_SERVICE_NAME),
  CORS_ORIGINS: z.string().optional(),

  // PostgreSQL
  DATABASE_URL: z.string().min(1),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),

  // Access tokens (HS256)
  JWT_SECRET: z.string().min(16),
  JWT_ISSUER: z.string().min(1).default('mini-crm'),
  JWT_AUDIENCE: z.string().min(1).default('mini-crm-api'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(60 * 24),

  // Email notifications
  ENABLE_EMAIL_NOTIFICATIONS: booleanString,
  MAIL_HOST: z.string().optional(),
  MAIL_PORT: z.coerce.number().int().positive().default(587),
  MAIL_USERNAME: z.string().optional(),
  MAIL_PASSWORD: z.string().optional(),
  MAIL_FROM_ADDRESS: z.string().email().default('noreply@example.com'),
  MAIL_FROM_NAME: z.string().default('Mini CRM'),
  MAIL_ENCRYPTION: z.enum(['ssl', 'tls', 'none']).default('tls'),
  ADMIN_EMAIL: z.string().email().default('admin@example.com'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'silent']).default('info'),
})

export type Env = z.infer<typeof envSchema>

let cachedEnv: Env | null = null

function parseEnv(raw: Record<string, string | undefined>, label: string): Env {
  const parsed = envSchema.safeParse(raw)

  if (!parsed.success) {
    const formatted = parsed.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n')
    throw new Error(`${label} validation failed:\n${formatted}`)
  }

  return Object.freeze(parsed.data)
}

/**
 * Bootstrap application configuration.
 *
 * Loading order:
 * 1. Load `.env` into process.env (existing variables win)
 * 2. Validate with the Zod schema
 * 3. Freeze and cache
 */
export function bootstrap(): Env {
  if (cachedEnv) {
    return cachedEnv
  }

  dotenvConfig()
  cachedEnv = parseEnv(process.env, 'Configuration')
  return cachedEnv
}

/**
 * Load environment synchronously from process.env plus explicit overrides.
 * Replaces any previously cached configuration.
 */
export function loadEnv(overrides: Record<string, string> = {}): Env {
  cachedEnv = parseEnv({ ...process.env, ...overrides }, 'Environment')
  return cachedEnv
}

/**
 * Return the bootstrapped environment (cached).
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    throw new Error('Environment not loaded. Call bootstrap() or loadEnv() first.')
  }

  return cachedEnv
}

/**
 * The cached environment, or null before bootstrap.
 */
export function peekEnv(): Env | null {
  return cachedEnv
}

export function isProduction(): boolean {
  return getEnv().NODE_ENV === 'production'
}

export function isDevelopment(): boolean {
  return getEnv().NODE_ENV === 'development'
}

export function isTest(): boolean {
  return getEnv().NODE_ENV === 'test'
}

export function getCorsOrigins(): string[] {
  const origins = getEnv().CORS_ORIGINS
  return origins ? origins.split(',').map((o) => o.trim()).filter(Boolean) : []
}

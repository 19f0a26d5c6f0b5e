import { z } from 'zod';
import { MODERATION_DEFAULTS, RetentionBasis, SERVICE_DEFAULTS } from '../constants/index.js';

/** Type for optional string schema that accepts undefined or transforms empty string to undefined */
type OptionalStringSchema = z.ZodType<string | undefined>;

/**
 * Helper for optional string fields that must be non-empty if provided
 * Rejects empty strings, but allows undefined
 * @returns Zod schema for optional non-empty string
 */
const optionalNonEmptyString = (): OptionalStringSchema =>
  z
    .string()
    .min(1)
    .optional()
    .or(z.literal('').transform(() => undefined));

/**
 * Helper for positive integer settings read from the environment
 */
const positiveInt = (defaultValue: number) =>
  z.coerce.number().int().positive().default(defaultValue);

/**
 * Helper for 'true' / 'false' flags
 */
const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false'])
    .transform(val => val === 'true')
    .default(defaultValue);

/**
 * Environment variable validation schema
 * Validates all required configuration at startup
 */
export const envSchema = z.object({
  // Telegram Configuration
  BOT_TOKEN: optionalNonEmptyString(), // Checked at startup; the bot refuses to run without it

  // Redis Configuration
  REDIS_URL: z
    .string()
    .url()
    .optional()
    .or(z.literal('').transform(() => undefined)), // Absent = degraded (stateless) mode

  // Moderation
  WARNING_DELETE_DELAY_SECONDS: positiveInt(MODERATION_DEFAULTS.WARNING_DELETE_DELAY_SECONDS),
  REACTION_CONFIRM_DELETE_DELAY_SECONDS: positiveInt(
    MODERATION_DEFAULTS.REACTION_CONFIRM_DELETE_DELAY_SECONDS
  ),
  SWEEP_THRESHOLD: positiveInt(MODERATION_DEFAULTS.SWEEP_THRESHOLD),
  RETENTION_DAYS: positiveInt(MODERATION_DEFAULTS.RETENTION_DAYS),
  RETENTION_BASIS: z.nativeEnum(RetentionBasis).default(RetentionBasis.CreatedAt),
  SOLICIT_REACTIONS: booleanFlag(true), // Attach a like button to new links in groups

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Liveness endpoint
  ENABLE_HEALTH_SERVER: booleanFlag(false),
  PORT: positiveInt(SERVICE_DEFAULTS.HEALTH_PORT),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validates and returns environment configuration
 * Throws detailed error if validation fails
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  try {
    return envSchema.parse(env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues
        .map(issue => `  - ${issue.path.join('.')}: ${issue.message}`)
        .join('\n');

      throw new Error(
        `Environment validation failed:\n${issues}\n\n` +
          'Please check your .env file and ensure all required variables are set.'
      );
    }
    throw error;
  }
}

/**
 * Cached config instance
 * Can be reset for testing via resetConfig()
 */
let _config: EnvConfig | undefined;

/**
 * Get validated environment configuration
 * Caches the result, but can be reset via resetConfig()
 */
export function getConfig(): EnvConfig {
  _config ??= validateEnv();
  return _config;
}

/**
 * Reset the cached config (primarily for testing)
 *
 * IMPORTANT: Call this in afterEach() to prevent test pollution
 */
export function resetConfig(): void {
  _config = undefined;
}

/**
 * Create config with custom values (for testing)
 * Uses safe test defaults instead of reading from process.env
 */
export function createTestConfig(overrides: Partial<EnvConfig> = {}): EnvConfig {
  const testDefaults: EnvConfig = {
    // Telegram
    BOT_TOKEN: undefined,

    // Redis
    REDIS_URL: undefined,

    // Moderation
    WARNING_DELETE_DELAY_SECONDS: MODERATION_DEFAULTS.WARNING_DELETE_DELAY_SECONDS,
    REACTION_CONFIRM_DELETE_DELAY_SECONDS: MODERATION_DEFAULTS.REACTION_CONFIRM_DELETE_DELAY_SECONDS,
    SWEEP_THRESHOLD: MODERATION_DEFAULTS.SWEEP_THRESHOLD,
    RETENTION_DAYS: MODERATION_DEFAULTS.RETENTION_DAYS,
    RETENTION_BASIS: RetentionBasis.CreatedAt,
    SOLICIT_REACTIONS: true,

    // Environment
    NODE_ENV: 'test',

    // Logging
    LOG_LEVEL: 'error', // Quiet logs in tests

    // Liveness endpoint
    ENABLE_HEALTH_SERVER: false,
    PORT: SERVICE_DEFAULTS.HEALTH_PORT,
  };

  return { ...testDefaults, ...overrides };
}

/**
 * Service Constants
 *
 * Network defaults and health status values.
 */

/**
 * Network and service defaults
 */
export const SERVICE_DEFAULTS = {
  /** Default Redis port */
  REDIS_PORT: 6379,
  /** Default port of the liveness endpoint */
  HEALTH_PORT: 8080,
} as const;

/**
 * Health check status values
 */
export enum HealthStatus {
  Healthy = 'healthy',
  Degraded = 'degraded',
}

/**
 * Content types used by the health server
 */
export const CONTENT_TYPES = {
  JSON: 'application/json',
  TEXT: 'text/plain; charset=utf-8',
} as const;

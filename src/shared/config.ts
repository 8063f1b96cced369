/**
 * Defaults and environment-driven configuration.
 *
 * Buffer defaults are plain constants. Feed settings can be overridden via
 * environment variables, which are coerced and validated with zod before
 * anything consumes them.
 */

import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';

/** Capacity used by `new RewindBuffer()` when none is given. */
export const DEFAULT_CAPACITY = 1024;

/** Default buffer capacity per feed. */
export const DEFAULT_FEED_CAPACITY = 200;

/** Maximum allowed buffer capacity for a feed loaded from the environment. */
export const MAX_FEED_CAPACITY = 10_000;

/** Environment variable names read by `loadFeedConfig()`. */
export const ENV_FEED_CAPACITY = 'REWIND_FEED_CAPACITY';
export const ENV_LOG_LEVEL = 'REWIND_LOG_LEVEL';

export const FeedConfigSchema = z.object({
  /** Ring buffer capacity for each feed (default: 200). */
  capacity: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_FEED_CAPACITY)
    .default(DEFAULT_FEED_CAPACITY),

  /** Logger threshold (default: info). */
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type FeedConfig = z.infer<typeof FeedConfigSchema>;

/**
 * Read feed configuration from the environment.
 * @throws Error listing every invalid variable.
 */
export function loadFeedConfig(env: NodeJS.ProcessEnv = process.env): FeedConfig {
  const result = FeedConfigSchema.safeParse({
    capacity: env[ENV_FEED_CAPACITY] || undefined,
    logLevel: env[ENV_LOG_LEVEL] || undefined,
  });

  if (!result.success) {
    const names: Record<string, string> = {
      capacity: ENV_FEED_CAPACITY,
      logLevel: ENV_LOG_LEVEL,
    };
    const details = result.error.issues
      .map((issue) => {
        const key = String(issue.path[0]);
        return `${names[key] ?? key}: ${issue.message}`;
      })
      .join('; ');
    throw new Error(`Invalid feed configuration: ${details}`);
  }

  return result.data;
}

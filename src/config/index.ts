/**
 * Configuration Module
 *
 * Ambient settings for a dispatcher: user agent, log level and the default
 * transport's timeout. Validated with zod; invalid values throw
 * {@link ConfigurationError} while the dispatcher is being built.
 *
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../error/index.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../observability/index.js';

/**
 * Default User-Agent header.
 */
export const DEFAULT_USER_AGENT = 'aws-request-core/0.1.0';

/**
 * Default log level.
 */
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

const LogLevelSchema = z.string().refine(isLogLevel, {
  message: `Log level must be one of: ${LOG_LEVELS.join(', ')}`,
});

export const CoreConfigSchema = z.object({
  /**
   * Sent as `User-Agent` on every request (unsigned).
   */
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),

  logLevel: LogLevelSchema.default(DEFAULT_LOG_LEVEL),

  /**
   * Timeout for the default transport, in milliseconds. The dispatcher
   * itself imposes none.
   */
  timeoutMs: z.number().int().positive().optional(),
});

export type CoreConfigInput = z.input<typeof CoreConfigSchema>;

export interface CoreConfig {
  readonly userAgent: string;
  readonly logLevel: LogLevel;
  readonly timeoutMs?: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CoreConfig = Object.freeze({
  userAgent: DEFAULT_USER_AGENT,
  logLevel: DEFAULT_LOG_LEVEL,
});

/**
 * Validate a partial configuration and fill in defaults.
 *
 * @throws {ConfigurationError} If any value is invalid
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ userAgent: 'my-app/1.0.0', timeoutMs: 30000 });
 * ```
 */
export function resolveConfig(input: CoreConfigInput = {}): CoreConfig {
  const parsed = CoreConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const { userAgent, logLevel, timeoutMs } = parsed.data;
  return Object.freeze({ userAgent, logLevel, timeoutMs });
}

/**
 * Loads configuration from environment variables.
 *
 * Supported environment variables:
 * - AWS_REQUEST_CORE_USER_AGENT: User-Agent header value
 * - AWS_REQUEST_CORE_LOG_LEVEL: error | warn | info | debug | trace
 * - AWS_REQUEST_CORE_TIMEOUT_MS: default transport timeout in milliseconds
 *
 * @throws {ConfigurationError} If a variable holds an invalid value
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CoreConfig {
  const input: CoreConfigInput = {};

  const userAgent = env.AWS_REQUEST_CORE_USER_AGENT;
  if (userAgent) {
    input.userAgent = userAgent;
  }

  const logLevel = env.AWS_REQUEST_CORE_LOG_LEVEL;
  if (logLevel) {
    input.logLevel = logLevel.toLowerCase();
  }

  const timeout = env.AWS_REQUEST_CORE_TIMEOUT_MS;
  if (timeout) {
    const parsed = Number(timeout);
    if (!Number.isFinite(parsed)) {
      throw new ConfigurationError(`Invalid configuration: AWS_REQUEST_CORE_TIMEOUT_MS: ${timeout}`);
    }
    input.timeoutMs = parsed;
  }

  return resolveConfig(input);
}

/**
 * @fileoverview spanlog configuration
 *
 * Settings come from environment variables:
 * - `SPANLOG_MAX_EVENTS`: capacity of a store created without an explicit size
 * - `SPANLOG_LOG_LEVEL`: minimum level for spanlog's own diagnostics
 * - `SPANLOG_CORRELATION_PREFIX`: prefix of generated correlation ids
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import type { LogLevel } from '../telemetry/logger.js';

export const DEFAULT_MAX_EVENTS = 12_000;
export const DEFAULT_CORRELATION_PREFIX = 'corr';

export interface SpanlogConfig {
  maxEvents: number;
  /** Applied to the logger on init; unset leaves the current level alone. */
  logLevel?: LogLevel;
  correlationPrefix: string;
}

export function defaultSpanlogConfig(): SpanlogConfig {
  return {
    maxEvents: DEFAULT_MAX_EVENTS,
    correlationPrefix: DEFAULT_CORRELATION_PREFIX,
  };
}

const EnvSchema = z.object({
  SPANLOG_MAX_EVENTS: z
    .string()
    .trim()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .transform(Number)
    .optional(),
  SPANLOG_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  SPANLOG_CORRELATION_PREFIX: z.string().trim().min(1).optional(),
});

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

/**
 * Read spanlog settings from the environment.
 * Empty variables count as unset.
 *
 * @throws ConfigurationError when a variable is set to an invalid value
 */
export function loadSpanlogConfig(env: NodeJS.ProcessEnv = process.env): SpanlogConfig {
  const raw = {
    SPANLOG_MAX_EVENTS: readEnv(env, 'SPANLOG_MAX_EVENTS'),
    SPANLOG_LOG_LEVEL: readEnv(env, 'SPANLOG_LOG_LEVEL'),
    SPANLOG_CORRELATION_PREFIX: readEnv(env, 'SPANLOG_CORRELATION_PREFIX'),
  };

  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const key = issue?.path.join('.') || 'environment';
    throw new ConfigurationError(key, issue?.message ?? 'invalid value');
  }

  return {
    maxEvents: parsed.data.SPANLOG_MAX_EVENTS ?? DEFAULT_MAX_EVENTS,
    logLevel: parsed.data.SPANLOG_LOG_LEVEL,
    correlationPrefix: parsed.data.SPANLOG_CORRELATION_PREFIX ?? DEFAULT_CORRELATION_PREFIX,
  };
}

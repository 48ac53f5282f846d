import { ValidationError } from '../core/errors.js';

/**
 * Severity of a span or event. Ordered ERROR > WARN > INFO > DEBUG > TRACE.
 */
export type Level = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG' | 'TRACE';

/** Most severe first. */
export const LEVELS: readonly Level[] = ['ERROR', 'WARN', 'INFO', 'DEBUG', 'TRACE'];

const LEVEL_SEVERITY: Record<Level, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
};

export function isLevel(value: unknown): value is Level {
  return typeof value === 'string' && LEVELS.some((level) => level === value);
}

/**
 * Parse a level name, ignoring case and surrounding whitespace.
 * @throws ValidationError for names that are not levels
 */
export function parseLevel(text: string): Level {
  const normalized = text.trim().toUpperCase();
  const level = LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    throw new ValidationError('level', LEVELS.join('|'), text);
  }
  return level;
}

/**
 * Negative when `a` is less severe than `b`, zero when equal, positive otherwise.
 */
export function compareLevels(a: Level, b: Level): number {
  return LEVEL_SEVERITY[a] - LEVEL_SEVERITY[b];
}

export function isLevelAtLeast(level: Level, threshold: Level): boolean {
  return compareLevels(level, threshold) >= 0;
}

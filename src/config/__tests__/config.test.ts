/**
 * @fileoverview Tests for environment-driven configuration
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CORRELATION_PREFIX,
  DEFAULT_MAX_EVENTS,
  defaultSpanlogConfig,
  loadSpanlogConfig,
} from '../index.js';
import { ConfigurationError } from '../../core/errors.js';

describe('loadSpanlogConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadSpanlogConfig({})).toEqual({
      maxEvents: DEFAULT_MAX_EVENTS,
      logLevel: undefined,
      correlationPrefix: DEFAULT_CORRELATION_PREFIX,
    });
    expect(defaultSpanlogConfig()).toEqual({
      maxEvents: DEFAULT_MAX_EVENTS,
      correlationPrefix: DEFAULT_CORRELATION_PREFIX,
    });
    expect(DEFAULT_MAX_EVENTS).toBe(12_000);
  });

  it('reads every variable', () => {
    const config = loadSpanlogConfig({
      SPANLOG_MAX_EVENTS: '250',
      SPANLOG_LOG_LEVEL: 'debug',
      SPANLOG_CORRELATION_PREFIX: 'req',
    });

    expect(config).toEqual({ maxEvents: 250, logLevel: 'debug', correlationPrefix: 'req' });
  });

  it('treats blank variables as unset', () => {
    const config = loadSpanlogConfig({ SPANLOG_MAX_EVENTS: '   ', SPANLOG_LOG_LEVEL: '' });

    expect(config.maxEvents).toBe(DEFAULT_MAX_EVENTS);
    expect(config.logLevel).toBeUndefined();
  });

  it('accepts zero capacity', () => {
    expect(loadSpanlogConfig({ SPANLOG_MAX_EVENTS: '0' }).maxEvents).toBe(0);
  });

  it('rejects a non-numeric capacity', () => {
    expect(() => loadSpanlogConfig({ SPANLOG_MAX_EVENTS: 'lots' })).toThrow(ConfigurationError);
  });

  it('names the offending variable', () => {
    try {
      loadSpanlogConfig({ SPANLOG_LOG_LEVEL: 'loud' });
      expect.fail('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect((error as ConfigurationError).configKey).toBe('SPANLOG_LOG_LEVEL');
    }
  });
});

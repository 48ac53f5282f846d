/**
 * Centralized Vitest Setup for spanlog
 *
 * Keeps spanlog's own diagnostics quiet unless SPANLOG_LOG_LEVEL asks for
 * them, and resets the process-wide registry between tests so no test sees
 * another test's manager.
 */

import { afterEach, beforeEach } from 'vitest';
import { globalRegistry } from './src/registry/event_registry.js';
import { isLogLevel, setLogLevel } from './src/telemetry/logger.js';

const requestedLevel = process.env.SPANLOG_LOG_LEVEL ?? 'silent';

beforeEach(() => {
  setLogLevel(isLogLevel(requestedLevel) ? requestedLevel : 'silent');
});

afterEach(() => {
  globalRegistry.reset();
});

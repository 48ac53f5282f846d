import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  clearGlobalEvents,
  createRegistry,
  emit,
  events,
  exportGlobalToBinFile,
  getEventSummary,
  getGlobalEventCount,
  getGlobalEvents,
  importAndMergeGlobalFromBinFile,
  initGlobalEventManagerWithCount,
  type EventRegistry,
} from '../event_registry.js';
import { Event } from '../../model/event.js';
import type { Level } from '../../model/level.js';
import { NotInitializedError } from '../../core/errors.js';
import { unwrap } from '../../core/result.js';
import { DEFAULT_MAX_EVENTS, type SpanlogConfig } from '../../config/index.js';
import { getLogLevel, setLogLevel } from '../../telemetry/logger.js';

const TEST_CONFIG: SpanlogConfig = { maxEvents: 5, logLevel: 'silent', correlationPrefix: 'test' };

function makeEvent(message: string, level: Level = 'INFO'): Event {
  return Event.fromTracingEvent(message, level, 'app');
}

describe('EventRegistry', () => {
  let registry: EventRegistry;

  beforeEach(() => {
    registry = createRegistry(TEST_CONFIG);
  });

  describe('before init', () => {
    it('reports NotInitializedError from every store operation', () => {
      const results = [
        registry.manager(),
        registry.events(),
        registry.emit(makeEvent('x')),
        registry.getEvents(),
        registry.getEventCount(),
        registry.clearEvents(),
        registry.search({}),
        registry.exportToBinData(),
      ];

      for (const result of results) {
        expect(result.ok).toBe(false);
        if (!result.ok) {
          expect(result.error).toBeInstanceOf(NotInitializedError);
        }
      }
      expect(registry.isInitialized()).toBe(false);
    });

    it('names the failed operation', () => {
      const result = registry.getEventCount();

      if (result.ok) throw new Error('expected failure');
      expect(result.error.code).toBe('NOT_INITIALIZED');
      expect(result.error.message).toBe('Event manager not initialized (operation: getEventCount)');
    });

    it('summarizes as no events captured', () => {
      expect(registry.getEventSummary()).toBe('No events captured');
    });

    it('fails file export without touching the disk', async () => {
      const result = await registry.exportToBinFile(path.join(os.tmpdir(), 'spanlog-never-written.json'));

      if (result.ok) throw new Error('expected failure');
      expect(result.error).toBeInstanceOf(NotInitializedError);
    });
  });

  describe('init', () => {
    it('installs a manager with the configured capacity', () => {
      expect(registry.init()).toBe(true);

      const manager = registry.manager();
      if (!manager.ok) throw manager.error;
      expect(manager.value.capacity).toBe(5);
    });

    it('honours an explicit capacity', () => {
      registry.init(2);

      const manager = registry.manager();
      if (!manager.ok) throw manager.error;
      expect(manager.value.capacity).toBe(2);
    });

    it('keeps the first manager when initialized again', () => {
      registry.init(2);
      const bus = registry.events();
      if (!bus.ok) throw bus.error;
      const handler = vi.fn();
      bus.value.subscribe(handler);

      expect(registry.init(50)).toBe(false);
      registry.emit(makeEvent('still wired'));

      const manager = registry.manager();
      if (!manager.ok) throw manager.error;
      expect(manager.value.capacity).toBe(2);
      expect(handler).toHaveBeenCalledTimes(1);
    });
  });

  describe('with a manager', () => {
    beforeEach(() => {
      registry.init();
    });

    it('stores and publishes emitted events', () => {
      const bus = registry.events();
      if (!bus.ok) throw bus.error;
      const seen: string[] = [];
      bus.value.subscribe((event) => seen.push(event.message));

      registry.emit(makeEvent('first'));
      registry.emit(makeEvent('second', 'ERROR'));

      expect(seen).toEqual(['first', 'second']);
      expect(registry.getEventCount()).toEqual({ ok: true, value: 2 });
      const found = registry.search({ level: 'ERROR' });
      if (!found.ok) throw found.error;
      expect(found.value.map((event) => event.message)).toEqual(['second']);
    });

    it('stores events published on the bus it hands out', () => {
      unwrap(registry.events()).emit(makeEvent('via bus'));

      expect(unwrap(registry.getEventCount())).toBe(1);
    });

    it('clears events', () => {
      registry.emit(makeEvent('gone'));

      registry.clearEvents();

      expect(registry.getEvents()).toEqual({ ok: true, value: [] });
    });

    it('summarizes stored events', () => {
      registry.emit(makeEvent('a', 'WARN'));
      registry.emit(makeEvent('b', 'WARN'));

      expect(registry.getEventSummary()).toBe('Event Summary: 2 total events\n  WARN: 2\n');
    });

    it('completes streams and allows a new manager after reset', async () => {
      const bus = registry.events();
      if (!bus.ok) throw bus.error;
      const stream = bus.value.asStream();

      registry.reset();

      expect(await stream.next()).toEqual({ value: undefined, done: true });
      expect(registry.isInitialized()).toBe(false);
      expect(registry.init(3)).toBe(true);
    });
  });

  describe('snapshots', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'spanlog-registry-'));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('exports the store and imports it into an independent store', async () => {
      registry.init();
      registry.emit(makeEvent('one'));
      registry.emit(makeEvent('two', 'ERROR'));
      const filePath = path.join(tempDir, 'events.json');

      expect(await registry.exportToBinFile(filePath, 'nightly')).toEqual({ ok: true, value: 2 });

      const other = createRegistry(TEST_CONFIG);
      const imported = await other.importFromBinFile(filePath);
      if (!imported.ok) throw imported.error;
      expect(imported.value.capacity).toBe(5);
      expect(imported.value.all().map((event) => event.message)).toEqual(['two', 'one']);
      expect(other.isInitialized()).toBe(false);
    });

    it('exports a filtered subset', async () => {
      registry.init();
      registry.emit(makeEvent('one'));
      registry.emit(makeEvent('two', 'ERROR'));
      const filePath = path.join(tempDir, 'errors.json');

      expect(await registry.exportFilteredToBinFile(filePath, { level: 'ERROR' })).toEqual({ ok: true, value: 1 });
    });

    it('needs a manager to merge', async () => {
      const result = await registry.importAndMergeFromBinFile(path.join(tempDir, 'events.json'));

      if (result.ok) throw new Error('expected failure');
      expect(result.error).toBeInstanceOf(NotInitializedError);
    });
  });
});

describe('EventRegistry environment configuration', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('falls back to defaults when a variable is invalid', async () => {
    vi.stubEnv('SPANLOG_LOG_LEVEL', 'trace');
    vi.stubEnv('SPANLOG_MAX_EVENTS', '7');
    const fromEnv = createRegistry();

    expect(fromEnv.init()).toBe(true);
    expect(unwrap(fromEnv.manager()).capacity).toBe(DEFAULT_MAX_EVENTS);
    expect(fromEnv.resolveConfig().correlationPrefix).toBe('corr');

    const imported = await fromEnv.importFromBinFile(path.join(os.tmpdir(), 'spanlog-absent-snapshot.json'));
    expect(imported.ok).toBe(false);
  });

  it('leaves the log level alone when none is configured', () => {
    vi.stubEnv('SPANLOG_LOG_LEVEL', '');
    setLogLevel('error');

    createRegistry().init();

    expect(getLogLevel()).toBe('error');
  });

  it('applies a configured log level on init', () => {
    vi.stubEnv('SPANLOG_LOG_LEVEL', 'debug');
    setLogLevel('error');

    createRegistry().init();

    expect(getLogLevel()).toBe('debug');
  });

  it('keeps the current log level for a registry without one', () => {
    setLogLevel('info');

    createRegistry({ maxEvents: 5, correlationPrefix: 'test' }).init();

    expect(getLogLevel()).toBe('info');
  });
});

describe('global registry functions', () => {
  it('fail before initialization', () => {
    expect(getGlobalEventCount().ok).toBe(false);
    expect(events().ok).toBe(false);
    expect(getEventSummary()).toBe('No events captured');
  });

  it('share one process-wide manager', () => {
    expect(initGlobalEventManagerWithCount(3)).toBe(true);

    emit(makeEvent('a'));
    emit(makeEvent('b'));
    emit(makeEvent('c'));
    emit(makeEvent('d'));

    const stored = getGlobalEvents();
    if (!stored.ok) throw stored.error;
    expect(stored.value.map((event) => event.message)).toEqual(['d', 'c', 'b']);

    clearGlobalEvents();
    expect(getGlobalEventCount()).toEqual({ ok: true, value: 0 });
  });

  it('round-trips a snapshot through the global store', async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'spanlog-global-'));
    try {
      initGlobalEventManagerWithCount(10);
      emit(makeEvent('saved'));
      const filePath = path.join(tempDir, 'events.json');
      await exportGlobalToBinFile(filePath);
      clearGlobalEvents();

      const merged = await importAndMergeGlobalFromBinFile(filePath);

      if (!merged.ok) throw merged.error;
      expect(merged.value.count).toBe(1);
      expect(getGlobalEventCount()).toEqual({ ok: true, value: 1 });
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });
});

/**
 * @fileoverview Event registry
 *
 * EventRegistry holds at most one active EventManager. It is an ordinary
 * object: create one at process start and hand it to the span recorder and
 * to client code, or use the process-wide `globalRegistry` through the
 * function wrappers below.
 *
 * `init` is first-writer-wins. Once a manager is installed, later `init`
 * calls are ignored (and logged at debug) so live subscriptions on the
 * installed manager are never orphaned. `reset` is the only way to replace it.
 *
 * Every operation that needs a manager returns NotInitializedError inside a
 * Result when none is installed.
 */

import { Err, Ok, type Result } from '../core/result.js';
import { NotInitializedError, isConfigurationError, type SnapshotIoError } from '../core/errors.js';
import { defaultSpanlogConfig, loadSpanlogConfig, type SpanlogConfig } from '../config/index.js';
import type { Event, SearchCriteria } from '../model/event.js';
import type { EventTarget } from '../events/event_target.js';
import { EventManager } from '../store/event_manager.js';
import {
  exportFilteredToBinFile,
  exportToBinData,
  exportToBinFile,
  importAndMergeFromBinFile,
  importFromBinFile,
  type MergeResult,
  type SnapshotReadError,
} from '../snapshot/files.js';
import { logDebug, logWarning, setLogLevel } from '../telemetry/logger.js';

export class EventRegistry {
  private active: EventManager | null = null;
  private config: SpanlogConfig | null;

  constructor(config?: SpanlogConfig) {
    this.config = config ?? null;
  }

  /**
   * Install a manager unless one is already active.
   * Returns true when this call installed it.
   */
  init(maxEvents?: number): boolean {
    if (this.active) {
      logDebug('Event manager already initialized; init ignored', {
        capacity: this.active.capacity,
        requested: maxEvents,
      });
      return false;
    }

    const config = this.resolveConfig();
    if (config.logLevel !== undefined) {
      setLogLevel(config.logLevel);
    }
    this.active = new EventManager(maxEvents ?? config.maxEvents);
    logDebug('Event manager initialized', { capacity: this.active.capacity });
    return true;
  }

  isInitialized(): boolean {
    return this.active !== null;
  }

  /**
   * Settings in effect: the ones given to the constructor, otherwise the
   * environment. An invalid environment is logged once and replaced by the defaults.
   */
  resolveConfig(): SpanlogConfig {
    if (!this.config) {
      try {
        this.config = loadSpanlogConfig();
      } catch (error: unknown) {
        if (!isConfigurationError(error)) throw error;
        logWarning('Invalid spanlog environment; using defaults', {
          configKey: error.configKey,
          error: error.message,
        });
        this.config = defaultSpanlogConfig();
      }
    }
    return this.config;
  }

  manager(): Result<EventManager, NotInitializedError> {
    return this.withManager('manager', (manager) => manager);
  }

  events(): Result<EventTarget<Event>, NotInitializedError> {
    return this.withManager('events', (manager) => manager.events());
  }

  emit(event: Event): Result<void, NotInitializedError> {
    return this.withManager('emit', (manager) => manager.emit(event));
  }

  getEvents(): Result<Event[], NotInitializedError> {
    return this.withManager('getEvents', (manager) => manager.all());
  }

  getEventCount(): Result<number, NotInitializedError> {
    return this.withManager('getEventCount', (manager) => manager.len());
  }

  clearEvents(): Result<void, NotInitializedError> {
    return this.withManager('clearEvents', (manager) => manager.clear());
  }

  search(criteria: SearchCriteria): Result<Event[], NotInitializedError> {
    return this.withManager('search', (manager) => manager.search(criteria));
  }

  getEventSummary(): string {
    return this.active ? this.active.getEventSummary() : 'No events captured';
  }

  exportToBinData(description?: string): Result<Uint8Array, NotInitializedError> {
    return this.withManager('exportToBinData', (manager) => exportToBinData(manager, description));
  }

  async exportToBinFile(
    filePath: string,
    description?: string,
  ): Promise<Result<number, NotInitializedError | SnapshotIoError>> {
    if (!this.active) return Err(new NotInitializedError('exportToBinFile'));
    return exportToBinFile(this.active, filePath, description);
  }

  async exportFilteredToBinFile(
    filePath: string,
    criteria: SearchCriteria,
    description?: string,
  ): Promise<Result<number, NotInitializedError | SnapshotIoError>> {
    if (!this.active) return Err(new NotInitializedError('exportFilteredToBinFile'));
    return exportFilteredToBinFile(this.active, filePath, criteria, description);
  }

  /**
   * Decode a snapshot into a new, independent store. Does not need an active manager.
   */
  importFromBinFile(filePath: string, maxEvents?: number): Promise<Result<EventManager, SnapshotReadError>> {
    return importFromBinFile(filePath, maxEvents ?? this.resolveConfig().maxEvents);
  }

  /**
   * Replay a snapshot into the active store without notifying subscribers.
   */
  async importAndMergeFromBinFile(
    filePath: string,
  ): Promise<Result<MergeResult, NotInitializedError | SnapshotReadError>> {
    if (!this.active) return Err(new NotInitializedError('importAndMergeFromBinFile'));
    return importAndMergeFromBinFile(this.active, filePath);
  }

  /**
   * Remove the active manager, completing its streams and dropping its subscriptions.
   */
  reset(): void {
    this.active?.events().dispose();
    this.active = null;
  }

  private withManager<T>(operation: string, fn: (manager: EventManager) => T): Result<T, NotInitializedError> {
    if (!this.active) {
      return Err(new NotInitializedError(operation));
    }
    return Ok(fn(this.active));
  }
}

// ============================================================================
// PROCESS-WIDE DEFAULT
// ============================================================================

/**
 * Registry shared by code that has no explicit registry to hand.
 */
export const globalRegistry = new EventRegistry();

/**
 * Create a registry instance. Useful for isolated testing.
 */
export function createRegistry(config?: SpanlogConfig): EventRegistry {
  return new EventRegistry(config);
}

export function initGlobalEventManager(): boolean {
  return globalRegistry.init();
}

export function initGlobalEventManagerWithCount(maxEvents: number): boolean {
  return globalRegistry.init(maxEvents);
}

export function events(): Result<EventTarget<Event>, NotInitializedError> {
  return globalRegistry.events();
}

export function emit(event: Event): Result<void, NotInitializedError> {
  return globalRegistry.emit(event);
}

export function getGlobalEvents(): Result<Event[], NotInitializedError> {
  return globalRegistry.getEvents();
}

export function getGlobalEventCount(): Result<number, NotInitializedError> {
  return globalRegistry.getEventCount();
}

export function clearGlobalEvents(): Result<void, NotInitializedError> {
  return globalRegistry.clearEvents();
}

export function getEventSummary(): string {
  return globalRegistry.getEventSummary();
}

export function exportGlobalToBinData(description?: string): Result<Uint8Array, NotInitializedError> {
  return globalRegistry.exportToBinData(description);
}

export function exportGlobalToBinFile(
  filePath: string,
  description?: string,
): Promise<Result<number, NotInitializedError | SnapshotIoError>> {
  return globalRegistry.exportToBinFile(filePath, description);
}

export function exportGlobalFilteredToBinFile(
  filePath: string,
  criteria: SearchCriteria,
  description?: string,
): Promise<Result<number, NotInitializedError | SnapshotIoError>> {
  return globalRegistry.exportFilteredToBinFile(filePath, criteria, description);
}

export function importGlobalFromBinFile(
  filePath: string,
  maxEvents?: number,
): Promise<Result<EventManager, SnapshotReadError>> {
  return globalRegistry.importFromBinFile(filePath, maxEvents);
}

export function importAndMergeGlobalFromBinFile(
  filePath: string,
): Promise<Result<MergeResult, NotInitializedError | SnapshotReadError>> {
  return globalRegistry.importAndMergeFromBinFile(filePath);
}

/**
 * @fileoverview spanlog - structured event and span capture
 *
 * Captures log-like events together with the spans active when they fired,
 * keeps a bounded newest-first history, delivers events to live subscribers
 * and streams, and exports/imports the history as snapshot documents.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createRegistry, SpanRecorder, traceSync } from 'spanlog';
 *
 * const registry = createRegistry();
 * registry.init(5_000);
 *
 * const recorder = new SpanRecorder(registry);
 * traceSync('loadUser', () => {
 *   recorder.record('cache miss', 'DEBUG', 'users::cache', { fields: { key: 'u42' } });
 * }, { recorder });
 *
 * const errors = registry.search({ level: 'ERROR' });
 * await registry.exportToBinFile('/tmp/events.json', 'nightly');
 * ```
 *
 * ## Live delivery
 *
 * ```typescript
 * const bus = unwrap(registry.events());
 * const subscription = bus.subscribe((event) => console.error(event.message));
 * for await (const event of bus.asStream()) {
 *   // ...
 * }
 * subscription.unsubscribe();
 * ```
 *
 * @packageDocumentation
 */

// Model
export { Event } from './model/event.js';
export type { EventContext, SearchCriteria } from './model/event.js';
export { EventData } from './model/event_data.js';
export type { EventDataInit } from './model/event_data.js';
export { SpanInfo, nextSpanId, reserveSpanId } from './model/span.js';
export type { SpanInit, SourceLocation } from './model/span.js';
export { LEVELS, compareLevels, isLevel, isLevelAtLeast, parseLevel } from './model/level.js';
export type { Level } from './model/level.js';

// Bus
export { EventTarget, Subscription } from './events/event_target.js';
export type { EventHandler } from './events/event_target.js';
export { EventStream } from './events/event_stream.js';

// Store
export { EventManager, countLevels } from './store/event_manager.js';
export type { LevelCounts } from './store/event_manager.js';

// Snapshot
export {
  createExportData,
  decodeSnapshot,
  encodeSnapshot,
  eventFromWire,
  eventToWire,
} from './snapshot/codec.js';
export type { ExportData, ExportMetadata } from './snapshot/codec.js';
export {
  exportFilteredToBinFile,
  exportFromManager,
  exportToBinData,
  exportToBinFile,
  importAndMergeFromBinFile,
  importFromBinFile,
  mergeIntoManager,
  readSnapshotFile,
  writeSnapshotFile,
} from './snapshot/files.js';
export type { MergeResult, SnapshotReadError } from './snapshot/files.js';
export { SNAPSHOT_FORMAT_VERSION } from './snapshot/schema.js';

// Registry
export {
  EventRegistry,
  clearGlobalEvents,
  createRegistry,
  emit,
  events,
  exportGlobalFilteredToBinFile,
  exportGlobalToBinData,
  exportGlobalToBinFile,
  getEventSummary,
  getGlobalEventCount,
  getGlobalEvents,
  globalRegistry,
  importAndMergeGlobalFromBinFile,
  importGlobalFromBinFile,
  initGlobalEventManager,
  initGlobalEventManagerWithCount,
} from './registry/event_registry.js';

// Capture
export {
  SpanRecorder,
  captureCurrentContext,
  createRecorder,
  currentThreadContext,
  generateCorrelationId,
  globalRecorder,
  traceAsync,
  traceSync,
} from './capture/span_recorder.js';
export type {
  EnterSpanOptions,
  EventSink,
  RecordOptions,
  SpanRecorderOptions,
  ThreadContext,
  TraceOptions,
} from './capture/span_recorder.js';

// Configuration, errors, logging
export { loadSpanlogConfig, defaultSpanlogConfig, DEFAULT_MAX_EVENTS } from './config/index.js';
export type { SpanlogConfig } from './config/index.js';
export {
  ConfigurationError,
  NotInitializedError,
  SnapshotDecodeError,
  SnapshotIoError,
  SpanStateError,
  SpanlogError,
  ValidationError,
  isConfigurationError,
  isNotInitializedError,
  isSnapshotDecodeError,
  isSnapshotIoError,
  isSpanlogError,
} from './core/errors.js';
export { Err, Ok, isErr, isOk, unwrap, unwrapOr } from './core/result.js';
export type { Result } from './core/result.js';
export { setLogLevel, getLogLevel } from './telemetry/logger.js';
export type { LogLevel } from './telemetry/logger.js';

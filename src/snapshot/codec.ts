/**
 * @fileoverview Snapshot codec
 *
 * Converts events plus summary metadata to and from the snapshot document.
 * "Binary" in the export function names is a label only: the payload is the
 * UTF-8 JSON document described in ./schema.ts.
 *
 * decode(encode(events)) reproduces every field, including nested span
 * trees, optional values and the parent chain (written inline).
 */

import { Err, Ok, type Result } from '../core/result.js';
import { SnapshotDecodeError } from '../core/errors.js';
import { Event } from '../model/event.js';
import { EventData } from '../model/event_data.js';
import { LEVELS } from '../model/level.js';
import { SpanInfo } from '../model/span.js';
import { countLevels, type LevelCounts } from '../store/event_manager.js';
import {
  SNAPSHOT_FORMAT_VERSION,
  SnapshotSchema,
  type WireEvent,
  type WireMetadata,
  type WireSnapshot,
  type WireSpan,
} from './schema.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ExportMetadata {
  formatVersion: string;
  /** ISO 8601 */
  exportTimestamp: string;
  totalEvents: number;
  /** Levels with at least one event, keys in level-name order. */
  levelCounts: LevelCounts;
  description?: string;
}

export interface ExportData {
  metadata: ExportMetadata;
  /** In the order given to `createExportData`; store exports are newest first. */
  events: Event[];
}

// ============================================================================
// EXPORT DATA
// ============================================================================

export function createExportData(
  events: readonly Event[],
  description?: string,
  exportedAt: Date = new Date(),
): ExportData {
  return {
    metadata: {
      formatVersion: SNAPSHOT_FORMAT_VERSION,
      exportTimestamp: exportedAt.toISOString(),
      totalEvents: events.length,
      levelCounts: sortLevelCounts(countLevels(events)),
      description,
    },
    events: [...events],
  };
}

function sortLevelCounts(counts: LevelCounts): LevelCounts {
  const sorted: LevelCounts = {};
  const names = [...LEVELS].sort();
  for (const level of names) {
    const count = counts[level];
    if (count !== undefined && count > 0) {
      sorted[level] = count;
    }
  }
  return sorted;
}

// ============================================================================
// ENCODE
// ============================================================================

export function encodeSnapshot(data: ExportData): Uint8Array {
  const document: WireSnapshot = {
    metadata: metadataToWire(data.metadata),
    events: data.events.map(eventToWire),
  };
  return Buffer.from(JSON.stringify(document), 'utf8');
}

function metadataToWire(metadata: ExportMetadata): WireMetadata {
  return {
    format_version: metadata.formatVersion,
    export_timestamp: metadata.exportTimestamp,
    total_events: metadata.totalEvents,
    level_counts: sortLevelCounts(metadata.levelCounts),
    description: metadata.description,
  };
}

export function spanToWire(span: SpanInfo): WireSpan {
  return {
    id: span.id,
    name: span.name,
    target: span.target,
    level: span.level,
    file: span.file,
    line: span.line,
    module_path: span.modulePath,
    fields: Object.fromEntries(span.fields),
    entered_at: span.enteredAt,
    exited_at: span.exitedAt,
    duration_ms: span.duration,
    children: span.children.map(spanToWire),
  };
}

export function eventToWire(event: Event): WireEvent {
  const data = event.eventData;
  return {
    event_data: {
      message: data.message,
      level: data.level,
      target: data.target,
      file: data.file,
      line: data.line,
      module_path: data.modulePath,
      fields: Object.fromEntries(data.fields),
      timestamp: data.timestamp,
    },
    span_stack: event.spanStack.map(spanToWire),
    current_span: event.currentSpan ? spanToWire(event.currentSpan) : undefined,
    thread_id: event.threadId,
    thread_name: event.threadName,
    process_id: event.processId,
    correlation_id: event.correlationId,
    custom_metadata: Object.fromEntries(event.customMetadata),
    parent: event.parent ? eventToWire(event.parent) : undefined,
  };
}

// ============================================================================
// DECODE
// ============================================================================

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Parse and validate a snapshot document.
 * Fails on invalid UTF-8, invalid JSON, schema violations, an unsupported
 * major format version, or an event count that disagrees with the metadata.
 */
export function decodeSnapshot(bytes: Uint8Array | string): Result<ExportData, SnapshotDecodeError> {
  let text: string;
  try {
    text = typeof bytes === 'string' ? bytes : utf8.decode(bytes);
  } catch {
    return Err(new SnapshotDecodeError('content is not valid UTF-8'));
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return Err(new SnapshotDecodeError(`invalid JSON (${error instanceof Error ? error.message : String(error)})`));
  }

  const parsed = SnapshotSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return Err(new SnapshotDecodeError('document does not match the snapshot schema', issues));
  }

  const { metadata, events } = parsed.data;

  const major = metadata.format_version.split('.')[0];
  const supportedMajor = SNAPSHOT_FORMAT_VERSION.split('.')[0];
  if (major !== supportedMajor) {
    return Err(
      new SnapshotDecodeError(
        `unsupported format version ${metadata.format_version} (supported: ${supportedMajor}.x)`,
      ),
    );
  }

  if (metadata.total_events !== events.length) {
    return Err(
      new SnapshotDecodeError(
        `metadata declares ${metadata.total_events} events but the document holds ${events.length}`,
      ),
    );
  }

  return Ok({
    metadata: {
      formatVersion: metadata.format_version,
      exportTimestamp: metadata.export_timestamp,
      totalEvents: metadata.total_events,
      levelCounts: sortLevelCounts(metadata.level_counts),
      description: metadata.description,
    },
    events: events.map(eventFromWire),
  });
}

export function spanFromWire(wire: WireSpan): SpanInfo {
  return new SpanInfo({
    id: wire.id,
    name: wire.name,
    target: wire.target,
    level: wire.level,
    file: wire.file,
    line: wire.line,
    modulePath: wire.module_path,
    fields: Object.entries(wire.fields),
    enteredAt: wire.entered_at,
    exitedAt: wire.exited_at,
    children: wire.children.map(spanFromWire),
  });
}

export function eventFromWire(wire: WireEvent): Event {
  const data = wire.event_data;
  return new Event(
    new EventData({
      message: data.message,
      level: data.level,
      target: data.target,
      file: data.file,
      line: data.line,
      modulePath: data.module_path,
      fields: Object.entries(data.fields),
      timestamp: data.timestamp,
    }),
    {
      spanStack: wire.span_stack.map(spanFromWire),
      currentSpan: wire.current_span ? spanFromWire(wire.current_span) : undefined,
      threadId: wire.thread_id,
      threadName: wire.thread_name,
      processId: wire.process_id,
      correlationId: wire.correlation_id,
      customMetadata: Object.entries(wire.custom_metadata),
      parent: wire.parent ? eventFromWire(wire.parent) : undefined,
    },
  );
}

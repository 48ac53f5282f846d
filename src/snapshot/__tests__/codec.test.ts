import { describe, it, expect } from 'vitest';
import { createExportData, decodeSnapshot, encodeSnapshot, eventToWire, type ExportData } from '../codec.js';
import { SnapshotSchema, type WireSnapshot } from '../schema.js';
import { Event } from '../../model/event.js';
import { EventData } from '../../model/event_data.js';
import type { Level } from '../../model/level.js';
import { SpanInfo } from '../../model/span.js';
import { SnapshotDecodeError } from '../../core/errors.js';

const EXPORTED_AT = new Date('2026-01-02T03:04:05.000Z');

function simpleEvent(message: string, level: Level, timestamp = 1_000): Event {
  return new Event(new EventData({ message, level, target: 'app', timestamp }));
}

function richEvent(): Event {
  const request = new SpanInfo({
    id: 501,
    name: 'request',
    target: 'api',
    level: 'INFO',
    file: 'src/server.ts',
    line: 10,
    modulePath: 'api::server',
    fields: [['route', '/users']],
    enteredAt: 1_000,
  });
  const query = new SpanInfo({ id: 502, name: 'db', target: 'api::db', level: 'DEBUG', enteredAt: 1_010 });
  query.exit(1_030);
  request.addChild(query);

  const parent = new Event(new EventData({ message: 'cause', level: 'WARN', target: 'db', timestamp: 900 }));

  return new Event(
    new EventData({
      message: 'boom',
      level: 'ERROR',
      target: 'api',
      file: 'src/server.ts',
      line: 40,
      modulePath: 'api::server',
      fields: [['user', 'u1']],
      timestamp: 1_050,
    }),
    {
      spanStack: [request],
      currentSpan: request,
      threadId: '1',
      threadName: 'main',
      processId: 4242,
      correlationId: 'corr-abc',
      customMetadata: [['env', 'test']],
      parent,
    },
  );
}

/** Encode, then read back as a typed wire document for tampering. */
function wireDocument(data: ExportData): WireSnapshot {
  return SnapshotSchema.parse(JSON.parse(Buffer.from(encodeSnapshot(data)).toString('utf8')));
}

function expectDecodeError(input: string | Uint8Array): SnapshotDecodeError {
  const result = decodeSnapshot(input);
  if (result.ok) {
    throw new Error('expected decode to fail');
  }
  expect(result.error).toBeInstanceOf(SnapshotDecodeError);
  return result.error;
}

describe('createExportData', () => {
  it('fills metadata from the events', () => {
    const events = [simpleEvent('a', 'ERROR'), simpleEvent('b', 'INFO'), simpleEvent('c', 'INFO')];

    const data = createExportData(events, 'nightly', EXPORTED_AT);

    expect(data.metadata).toEqual({
      formatVersion: '1.0',
      exportTimestamp: '2026-01-02T03:04:05.000Z',
      totalEvents: 3,
      levelCounts: { ERROR: 1, INFO: 2 },
      description: 'nightly',
    });
    expect(data.events).toEqual(events);
    expect(data.events).not.toBe(events);
  });

  it('orders level counts by level name', () => {
    const data = createExportData([simpleEvent('a', 'WARN'), simpleEvent('b', 'DEBUG'), simpleEvent('c', 'ERROR')]);

    expect(Object.keys(data.metadata.levelCounts)).toEqual(['DEBUG', 'ERROR', 'WARN']);
  });
});

describe('encodeSnapshot / decodeSnapshot', () => {
  it('writes snake_case UTF-8 JSON', () => {
    const text = Buffer.from(encodeSnapshot(createExportData([simpleEvent('a', 'INFO')], undefined, EXPORTED_AT))).toString(
      'utf8',
    );

    expect(text.startsWith('{"metadata":{"format_version":"1.0","export_timestamp":"2026-01-02T03:04:05.000Z"')).toBe(
      true,
    );
    expect(text).toContain('"event_data":{"message":"a","level":"INFO","target":"app","fields":{},"timestamp":1000}');
  });

  it('reproduces every field, nested spans and the parent chain', () => {
    const original = richEvent();

    const result = decodeSnapshot(encodeSnapshot(createExportData([original], 'nightly', EXPORTED_AT)));
    if (!result.ok) throw result.error;
    const [decoded] = result.value.events;

    expect(eventToWire(decoded)).toEqual(eventToWire(original));
    expect(decoded.spanStack[0]).toBeInstanceOf(SpanInfo);
    expect(decoded.spanStack[0].children[0].duration).toBe(20);
    expect(decoded.spanStack[0].isActive()).toBe(true);
    expect(decoded.currentSpan?.name).toBe('request');
    expect(decoded.customMetadata.get('env')).toBe('test');
    expect(decoded.parent?.message).toBe('cause');
    expect(decoded.parent?.parent).toBeUndefined();
    expect(result.value.metadata).toEqual({
      formatVersion: '1.0',
      exportTimestamp: '2026-01-02T03:04:05.000Z',
      totalEvents: 1,
      levelCounts: { ERROR: 1 },
      description: 'nightly',
    });
  });

  it('keeps event order', () => {
    const events = [simpleEvent('newest', 'INFO', 3), simpleEvent('middle', 'INFO', 2), simpleEvent('oldest', 'INFO', 1)];

    const result = decodeSnapshot(encodeSnapshot(createExportData(events)));
    if (!result.ok) throw result.error;

    expect(result.value.events.map((event) => event.message)).toEqual(['newest', 'middle', 'oldest']);
  });

  it('decodes an empty snapshot', () => {
    const result = decodeSnapshot(encodeSnapshot(createExportData([], undefined, EXPORTED_AT)));
    if (!result.ok) throw result.error;

    expect(result.value.events).toEqual([]);
    expect(result.value.metadata.totalEvents).toBe(0);
    expect(result.value.metadata.levelCounts).toEqual({});
    expect(result.value.metadata.description).toBeUndefined();
  });

  it('accepts unknown metadata keys and other minor versions', () => {
    const doc = wireDocument(createExportData([simpleEvent('a', 'INFO')], undefined, EXPORTED_AT));
    const text = JSON.stringify({
      ...doc,
      metadata: { ...doc.metadata, format_version: '1.7', producer: 'batch-job' },
    });

    const result = decodeSnapshot(text);

    expect(result.ok).toBe(true);
  });

  it('rejects content that is not UTF-8', () => {
    expect(expectDecodeError(new Uint8Array([0xff, 0xfe, 0xfd])).message).toBe(
      'Snapshot decode failed: content is not valid UTF-8',
    );
  });

  it('rejects content that is not JSON', () => {
    expect(expectDecodeError('not json').message.startsWith('Snapshot decode failed: invalid JSON')).toBe(true);
  });

  it('rejects an event missing a required field', () => {
    const doc = wireDocument(createExportData([simpleEvent('a', 'INFO')], undefined, EXPORTED_AT));
    const [event] = doc.events;
    const { message: _message, ...incomplete } = event.event_data;
    const text = JSON.stringify({ ...doc, events: [{ ...event, event_data: incomplete }] });

    const error = expectDecodeError(text);

    expect(error.issues).toContain('events.0.event_data.message: Required');
  });

  it('rejects an unknown level', () => {
    const doc = wireDocument(createExportData([simpleEvent('a', 'INFO')], undefined, EXPORTED_AT));
    const [event] = doc.events;
    const text = JSON.stringify({ ...doc, events: [{ ...event, event_data: { ...event.event_data, level: 'FATAL' } }] });

    expect(expectDecodeError(text).message).toBe('Snapshot decode failed: document does not match the snapshot schema');
  });

  it('rejects an exited span without a duration', () => {
    const span = new SpanInfo({ name: 'work', target: 'app', level: 'INFO', enteredAt: 1 });
    span.exit(5);
    const doc = wireDocument(createExportData([simpleEvent('a', 'INFO').withSpanStack([span])], undefined, EXPORTED_AT));
    const [event] = doc.events;
    const [wireSpan] = event.span_stack;
    const text = JSON.stringify({
      ...doc,
      events: [{ ...event, span_stack: [{ ...wireSpan, duration_ms: undefined }] }],
    });

    expect(expectDecodeError(text).issues).toContain(
      'events.0.span_stack.0: duration_ms must be present exactly when exited_at is present',
    );
  });

  it('rejects a duration that disagrees with the span times', () => {
    const span = new SpanInfo({ name: 'work', target: 'app', level: 'INFO', enteredAt: 1 });
    span.exit(5);
    const doc = wireDocument(createExportData([simpleEvent('a', 'INFO').withSpanStack([span])], undefined, EXPORTED_AT));
    const [event] = doc.events;
    const [wireSpan] = event.span_stack;
    const text = JSON.stringify({
      ...doc,
      events: [{ ...event, span_stack: [{ ...wireSpan, duration_ms: 999 }] }],
    });

    expect(expectDecodeError(text).issues).toContain(
      'events.0.span_stack.0: duration_ms must equal exited_at - entered_at',
    );
  });

  it('keeps decoded span ids out of later allocations', () => {
    const imported = new SpanInfo({ id: 900_000, name: 'old', target: 'app', level: 'INFO', enteredAt: 1 });
    const doc = encodeSnapshot(createExportData([simpleEvent('a', 'INFO').withSpanStack([imported])], undefined, EXPORTED_AT));

    const result = decodeSnapshot(doc);
    if (!result.ok) throw result.error;

    expect(result.value.events[0].spanStack[0].id).toBe(900_000);
    expect(new SpanInfo({ name: 'fresh', target: 'app', level: 'INFO' }).id).toBeGreaterThan(900_000);
  });

  it('rejects an unsupported major version', () => {
    const doc = wireDocument(createExportData([], undefined, EXPORTED_AT));
    const text = JSON.stringify({ ...doc, metadata: { ...doc.metadata, format_version: '2.0' } });

    expect(expectDecodeError(text).message).toBe(
      'Snapshot decode failed: unsupported format version 2.0 (supported: 1.x)',
    );
  });

  it('rejects an event count that disagrees with the metadata', () => {
    const doc = wireDocument(createExportData([simpleEvent('a', 'INFO')], undefined, EXPORTED_AT));
    const text = JSON.stringify({ ...doc, metadata: { ...doc.metadata, total_events: 5 } });

    expect(expectDecodeError(text).message).toBe(
      'Snapshot decode failed: metadata declares 5 events but the document holds 1',
    );
  });
});

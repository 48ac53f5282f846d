/**
 * @fileoverview Span recorder
 *
 * The ingestion side of spanlog. SpanRecorder tracks the spans the process
 * is currently inside and turns log calls into Events carrying a snapshot of
 * that span stack plus thread, process and correlation context, then hands
 * them to a registry or manager.
 *
 * Usage:
 * ```typescript
 * const recorder = new SpanRecorder(registry);
 * const spanId = recorder.enterSpan('handleRequest', { fields: { route: '/users' } });
 * recorder.record('user loaded', 'INFO', 'api::users');
 * recorder.exitSpan(spanId);
 * ```
 *
 * The span stack is per recorder, not per async context: interleaved async
 * work sharing one recorder sees each other's spans.
 */

import { randomUUID } from 'crypto';
import { isMainThread, threadId } from 'worker_threads';
import { DEFAULT_CORRELATION_PREFIX } from '../config/index.js';
import { Event } from '../model/event.js';
import type { Level } from '../model/level.js';
import { SpanInfo, type SourceLocation } from '../model/span.js';
import { EventManager } from '../store/event_manager.js';
import { EventRegistry, globalRegistry } from '../registry/event_registry.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage, getErrorType } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export type EventSink = EventRegistry | EventManager;

export interface SpanRecorderOptions {
  /** Target used when a span or event names none. */
  defaultTarget?: string;
  /** Prefix of generated correlation ids; defaults to the registry's configuration. */
  correlationPrefix?: string;
  enabled?: boolean;
}

export interface EnterSpanOptions {
  target?: string;
  level?: Level;
  fields?: Record<string, string>;
  location?: SourceLocation;
}

export interface RecordOptions {
  fields?: Record<string, string>;
  location?: SourceLocation;
  /** An event captured earlier that caused this one. */
  parent?: Event;
  metadata?: Record<string, string>;
  correlationId?: string;
}

export interface ThreadContext {
  threadId: string;
  threadName: string;
}

// ============================================================================
// CONTEXT HELPERS
// ============================================================================

export function currentThreadContext(): ThreadContext {
  return {
    threadId: String(threadId),
    threadName: isMainThread ? 'main' : `worker-${threadId}`,
  };
}

export function generateCorrelationId(prefix: string = DEFAULT_CORRELATION_PREFIX): string {
  return `${prefix}-${randomUUID()}`;
}

/**
 * An event stamped with the calling thread, this process and a fresh
 * correlation id. No spans are attached.
 */
export function captureCurrentContext(message: string, level: Level, target: string): Event {
  const thread = currentThreadContext();
  return Event.fromTracingEvent(message, level, target)
    .withThreadInfo(thread.threadId, thread.threadName)
    .withProcessId(process.pid)
    .withCorrelationId(generateCorrelationId());
}

// ============================================================================
// RECORDER
// ============================================================================

export class SpanRecorder {
  private readonly stack: SpanInfo[] = [];
  private readonly defaultTarget: string;
  private correlationPrefix: string | undefined;
  private enabled: boolean;

  constructor(
    private readonly sink: EventSink = globalRegistry,
    options: SpanRecorderOptions = {},
  ) {
    this.defaultTarget = options.defaultTarget ?? 'app';
    this.correlationPrefix = options.correlationPrefix;
    this.enabled = options.enabled ?? true;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Enter a span nested inside the currently active ones.
   * @returns The span id, or 0 when recording is disabled
   */
  enterSpan(name: string, options: EnterSpanOptions = {}): number {
    if (!this.enabled) {
      return 0;
    }

    const span = new SpanInfo({
      name,
      target: options.target ?? this.defaultTarget,
      level: options.level ?? 'INFO',
      file: options.location?.file,
      line: options.location?.line,
      modulePath: options.location?.modulePath,
      fields: Object.entries(options.fields ?? {}),
    });
    this.stack.push(span);
    return span.id;
  }

  /**
   * Exit a span. The finished span is attached to the span that encloses it.
   * Unknown ids are ignored.
   */
  exitSpan(spanId: number): void {
    const index = this.stack.findIndex((span) => span.id === spanId);
    if (index < 0) {
      return;
    }

    if (index !== this.stack.length - 1) {
      logDebug('Span exited out of order', { spanId, depth: index, active: this.stack.length });
    }

    const [span] = this.stack.splice(index, 1);
    span.exit();

    const enclosing = index > 0 ? this.stack[index - 1] : undefined;
    enclosing?.addChild(span.clone());
  }

  addField(spanId: number, key: string, value: string): void {
    this.stack.find((span) => span.id === spanId)?.addField(key, value);
  }

  /**
   * Capture an event in the current span context and publish it.
   * @returns The published event, or undefined when recording is disabled
   */
  record(message: string, level: Level, target?: string, options: RecordOptions = {}): Event | undefined {
    if (!this.enabled) {
      return undefined;
    }

    const spanStack = this.stack.map((span) => span.clone());
    const base = Event.fromTracingEvent(
      message,
      level,
      target ?? this.defaultTarget,
      options.location,
      Object.entries(options.fields ?? {}),
    );

    const event = new Event(base.eventData, {
      spanStack,
      currentSpan: spanStack.length > 0 ? spanStack[spanStack.length - 1] : undefined,
      ...currentThreadContext(),
      processId: process.pid,
      correlationId: options.correlationId ?? generateCorrelationId(this.resolveCorrelationPrefix()),
      customMetadata: Object.entries(options.metadata ?? {}),
      parent: options.parent,
    });

    this.publish(event);
    return event;
  }

  error(message: string, options?: RecordOptions): Event | undefined {
    return this.record(message, 'ERROR', undefined, options);
  }

  warn(message: string, options?: RecordOptions): Event | undefined {
    return this.record(message, 'WARN', undefined, options);
  }

  info(message: string, options?: RecordOptions): Event | undefined {
    return this.record(message, 'INFO', undefined, options);
  }

  debug(message: string, options?: RecordOptions): Event | undefined {
    return this.record(message, 'DEBUG', undefined, options);
  }

  trace(message: string, options?: RecordOptions): Event | undefined {
    return this.record(message, 'TRACE', undefined, options);
  }

  /**
   * Copies of the active spans, outermost first.
   */
  activeSpans(): SpanInfo[] {
    return this.stack.map((span) => span.clone());
  }

  currentSpan(): SpanInfo | undefined {
    const top = this.stack[this.stack.length - 1];
    return top?.clone();
  }

  /**
   * Drop all active spans without exiting them.
   */
  clear(): void {
    this.stack.length = 0;
  }

  private resolveCorrelationPrefix(): string {
    if (this.correlationPrefix === undefined) {
      this.correlationPrefix =
        this.sink instanceof EventRegistry
          ? this.sink.resolveConfig().correlationPrefix
          : DEFAULT_CORRELATION_PREFIX;
    }
    return this.correlationPrefix;
  }

  private publish(event: Event): void {
    if (this.sink instanceof EventManager) {
      this.sink.emit(event);
      return;
    }
    const outcome = this.sink.emit(event);
    if (!outcome.ok) {
      logDebug('Event dropped', { message: event.message, reason: outcome.error.message });
    }
  }
}

/**
 * Recorder bound to the process-wide registry.
 */
export const globalRecorder = new SpanRecorder(globalRegistry);

export function createRecorder(sink?: EventSink, options?: SpanRecorderOptions): SpanRecorder {
  return new SpanRecorder(sink, options);
}

// ============================================================================
// TRACING UTILITIES
// ============================================================================

export interface TraceOptions extends EnterSpanOptions {
  recorder?: SpanRecorder;
}

/**
 * Run an async function inside a span.
 * The span gets `status=ok`, or `status=error` plus the error message and type.
 */
export async function traceAsync<T>(
  name: string,
  fn: (spanId: number) => Promise<T>,
  options: TraceOptions = {},
): Promise<T> {
  const recorder = options.recorder ?? globalRecorder;
  const spanId = recorder.enterSpan(name, options);

  try {
    const result = await fn(spanId);
    recorder.addField(spanId, 'status', 'ok');
    return result;
  } catch (error) {
    markFailed(recorder, spanId, error);
    throw error;
  } finally {
    recorder.exitSpan(spanId);
  }
}

/**
 * Run a sync function inside a span.
 */
export function traceSync<T>(
  name: string,
  fn: (spanId: number) => T,
  options: TraceOptions = {},
): T {
  const recorder = options.recorder ?? globalRecorder;
  const spanId = recorder.enterSpan(name, options);

  try {
    const result = fn(spanId);
    recorder.addField(spanId, 'status', 'ok');
    return result;
  } catch (error) {
    markFailed(recorder, spanId, error);
    throw error;
  } finally {
    recorder.exitSpan(spanId);
  }
}

function markFailed(recorder: SpanRecorder, spanId: number, error: unknown): void {
  recorder.addField(spanId, 'status', 'error');
  recorder.addField(spanId, 'error.message', getErrorMessage(error));
  recorder.addField(spanId, 'error.type', getErrorType(error));
}

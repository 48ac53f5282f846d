/**
 * @fileoverview Captured events
 *
 * An Event pairs one EventData with the context it fired in: the stack of
 * active spans, the innermost span, thread/process identity, a correlation
 * id, free-form metadata and an optional parent event.
 *
 * Events are immutable. The `with*` builders return new instances, so a
 * parent is always an event that existed before its child and the parent
 * chain cannot form a cycle.
 */

import type { Level } from './level.js';
import { EventData } from './event_data.js';
import type { SourceLocation, SpanInfo } from './span.js';

/**
 * Filters shared by `Event.matchesCriteria` and `EventManager.search`.
 * An absent filter matches everything.
 */
export interface SearchCriteria {
  /** Exact level match */
  level?: Level;
  /** Substring of the event target */
  target?: string;
  /** Substring of the event message */
  message?: string;
  /** Substring of any span name in the stack or the current span */
  spanName?: string;
}

export interface EventContext {
  spanStack?: readonly SpanInfo[];
  currentSpan?: SpanInfo;
  threadId?: string;
  threadName?: string;
  processId?: number;
  correlationId?: string;
  customMetadata?: Iterable<readonly [string, string]>;
  parent?: Event;
}

export class Event {
  readonly eventData: EventData;
  /** Outer-to-inner spans active when the event fired. */
  readonly spanStack: readonly SpanInfo[];
  readonly currentSpan?: SpanInfo;
  readonly threadId?: string;
  readonly threadName?: string;
  readonly processId?: number;
  readonly correlationId?: string;
  readonly customMetadata: ReadonlyMap<string, string>;
  readonly parent?: Event;

  constructor(eventData: EventData, context: EventContext = {}) {
    this.eventData = eventData;
    this.spanStack = [...(context.spanStack ?? [])];
    this.currentSpan = context.currentSpan;
    this.threadId = context.threadId;
    this.threadName = context.threadName;
    this.processId = context.processId;
    this.correlationId = context.correlationId;
    this.customMetadata = new Map(context.customMetadata ?? []);
    this.parent = context.parent;
  }

  /**
   * Build an event from the raw pieces an instrumentation adapter extracts.
   */
  static fromTracingEvent(
    message: string,
    level: Level,
    target: string,
    location?: SourceLocation,
    fields?: Iterable<readonly [string, string]>,
  ): Event {
    return new Event(
      new EventData({
        message,
        level,
        target,
        file: location?.file,
        line: location?.line,
        modulePath: location?.modulePath,
        fields,
      }),
    );
  }

  get level(): Level {
    return this.eventData.level;
  }

  get message(): string {
    return this.eventData.message;
  }

  get target(): string {
    return this.eventData.target;
  }

  get timestamp(): number {
    return this.eventData.timestamp;
  }

  withParent(parent: Event): Event {
    return this.derive({ parent });
  }

  withSpanStack(spans: readonly SpanInfo[]): Event {
    return this.derive({ spanStack: spans });
  }

  withCurrentSpan(span: SpanInfo): Event {
    return this.derive({ currentSpan: span });
  }

  withThreadInfo(threadId: string, threadName?: string): Event {
    return this.derive({ threadId, threadName });
  }

  withProcessId(processId: number): Event {
    return this.derive({ processId });
  }

  withCorrelationId(correlationId: string): Event {
    return this.derive({ correlationId });
  }

  withMetadata(key: string, value: string): Event {
    const customMetadata = new Map(this.customMetadata);
    customMetadata.set(key, value);
    return this.derive({ customMetadata });
  }

  /**
   * Parents from nearest to oldest.
   */
  parentChain(): Event[] {
    const chain: Event[] = [];
    for (let node = this.parent; node; node = node.parent) {
      chain.push(node);
    }
    return chain;
  }

  matchesCriteria(criteria: SearchCriteria): boolean {
    const { level, target, message, spanName } = criteria;

    if (level !== undefined && this.eventData.level !== level) {
      return false;
    }
    if (target !== undefined && !this.eventData.target.includes(target)) {
      return false;
    }
    if (message !== undefined && !this.eventData.message.includes(message)) {
      return false;
    }
    if (spanName !== undefined && !this.hasSpanNamed(spanName)) {
      return false;
    }
    return true;
  }

  /**
   * True if any span in the stack, or the current span, has a name containing `fragment`.
   */
  hasSpanNamed(fragment: string): boolean {
    if (this.currentSpan?.name.includes(fragment)) {
      return true;
    }
    return this.spanStack.some((span) => span.name.includes(fragment));
  }

  /**
   * Indented tree of the current span and the span stack with child spans.
   */
  getSpanTree(): string {
    let tree = '';

    if (this.currentSpan) {
      tree += `Current Span: ${this.currentSpan.name} (${this.currentSpan.level})\n`;
    }

    if (this.spanStack.length > 0) {
      tree += 'Span Stack:\n';
      this.spanStack.forEach((span, depth) => {
        tree += formatSpanNode(span, depth);
      });
    }

    return tree;
  }

  /**
   * Everything known about this event followed by each parent in turn.
   */
  getFullContext(): string {
    const sections = [this, ...this.parentChain()].map((event) => event.describe());
    return sections.join('\n--- Parent Event ---\n');
  }

  private describe(): string {
    const data = this.eventData;
    let context = '';

    context += `Event: ${data.message} (${data.level})\n`;
    context += `Target: ${data.target}\n`;
    context += `Timestamp: ${new Date(data.timestamp).toISOString()}\n`;

    if (data.file !== undefined) {
      context += `Location: ${data.file}:${data.line ?? 0}\n`;
    }

    if (this.threadId !== undefined) {
      context += `Thread: ${this.threadId}`;
      if (this.threadName !== undefined) {
        context += ` (${this.threadName})`;
      }
      context += '\n';
    }

    if (this.processId !== undefined) {
      context += `Process ID: ${this.processId}\n`;
    }

    if (this.correlationId !== undefined) {
      context += `Correlation ID: ${this.correlationId}\n`;
    }

    if (data.fields.size > 0) {
      context += 'Event Fields:\n';
      for (const [key, value] of data.fields) {
        context += `  ${key}: ${value}\n`;
      }
    }

    if (this.customMetadata.size > 0) {
      context += 'Metadata:\n';
      for (const [key, value] of this.customMetadata) {
        context += `  ${key}: ${value}\n`;
      }
    }

    context += '\n';
    context += this.getSpanTree();
    return context;
  }

  private derive(overrides: EventContext): Event {
    return new Event(this.eventData, {
      spanStack: this.spanStack,
      currentSpan: this.currentSpan,
      threadId: this.threadId,
      threadName: this.threadName,
      processId: this.processId,
      correlationId: this.correlationId,
      customMetadata: this.customMetadata,
      parent: this.parent,
      ...overrides,
    });
  }
}

function formatSpanNode(span: SpanInfo, depth: number): string {
  const indent = '  '.repeat(depth);
  const duration = span.duration === undefined ? '[active]' : `[${span.duration}ms]`;
  let line = `${indent}├─ ${span.name} (${span.level}) ${duration}`;

  if (span.fields.size > 0) {
    const pairs = [...span.fields].map(([key, value]) => `${key}=${value}`);
    line += ` { ${pairs.join(' ')} }`;
  }

  let output = `${line}\n`;
  for (const child of span.children) {
    output += formatSpanNode(child, depth + 1);
  }
  return output;
}

/**
 * @fileoverview Span records
 *
 * A SpanInfo is created when execution enters a span, collects fields and
 * finished child spans while active, and is finalized once by `exit`.
 * Captured events hold clones, never the live span.
 */

import { SpanStateError } from '../core/errors.js';
import type { Level } from './level.js';

/**
 * Where a span or event was declared in source.
 */
export interface SourceLocation {
  file?: string;
  line?: number;
  modulePath?: string;
}

export interface SpanInit extends SourceLocation {
  id?: number;
  name: string;
  target: string;
  level: Level;
  fields?: Iterable<readonly [string, string]>;
  enteredAt?: number;
  exitedAt?: number;
  children?: SpanInfo[];
}

let lastSpanId = 0;

/**
 * Next process-unique span id.
 */
export function nextSpanId(): number {
  lastSpanId += 1;
  return lastSpanId;
}

/**
 * Mark `id` as taken so `nextSpanId` never hands it out again.
 */
export function reserveSpanId(id: number): void {
  if (id > lastSpanId) {
    lastSpanId = id;
  }
}

export class SpanInfo {
  readonly id: number;
  readonly name: string;
  readonly target: string;
  readonly level: Level;
  readonly file?: string;
  readonly line?: number;
  readonly modulePath?: string;
  readonly fields: Map<string, string>;
  readonly enteredAt: number;
  readonly children: SpanInfo[];
  private exitTime?: number;

  constructor(init: SpanInit) {
    if (init.id !== undefined) {
      reserveSpanId(init.id);
    }
    this.id = init.id ?? nextSpanId();
    this.name = init.name;
    this.target = init.target;
    this.level = init.level;
    this.file = init.file;
    this.line = init.line;
    this.modulePath = init.modulePath;
    this.fields = new Map(init.fields ?? []);
    this.enteredAt = init.enteredAt ?? Date.now();
    this.children = init.children ? [...init.children] : [];
    this.exitTime = init.exitedAt;
  }

  get exitedAt(): number | undefined {
    return this.exitTime;
  }

  /**
   * Elapsed milliseconds between entry and exit; undefined while active.
   */
  get duration(): number | undefined {
    return this.exitTime === undefined ? undefined : Math.max(0, this.exitTime - this.enteredAt);
  }

  addField(key: string, value: string): void {
    if (!this.isActive()) {
      throw new SpanStateError(this.id, 'add a field');
    }
    this.fields.set(key, value);
  }

  addChild(child: SpanInfo): void {
    if (!this.isActive()) {
      throw new SpanStateError(this.id, 'add a child');
    }
    this.children.push(child);
  }

  /**
   * Finalize the span. Returns false when it had already exited.
   */
  exit(at: number = Date.now()): boolean {
    if (this.exitTime !== undefined) {
      return false;
    }
    this.exitTime = Math.max(at, this.enteredAt);
    return true;
  }

  isActive(): boolean {
    return this.exitTime === undefined;
  }

  /**
   * Duration if exited, otherwise time spent so far.
   */
  getDuration(now: number = Date.now()): number {
    return this.duration ?? Math.max(0, now - this.enteredAt);
  }

  clone(): SpanInfo {
    return new SpanInfo({
      id: this.id,
      name: this.name,
      target: this.target,
      level: this.level,
      file: this.file,
      line: this.line,
      modulePath: this.modulePath,
      fields: this.fields,
      enteredAt: this.enteredAt,
      exitedAt: this.exitTime,
      children: this.children.map((child) => child.clone()),
    });
  }
}

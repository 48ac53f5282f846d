import type { Level } from './level.js';
import type { SourceLocation } from './span.js';

export interface EventDataInit extends SourceLocation {
  message: string;
  level: Level;
  target: string;
  fields?: Iterable<readonly [string, string]>;
  timestamp?: number;
}

/**
 * The record itself: message, severity, origin and structured fields.
 * Fields may be added while the adapter assembles the event; after the
 * owning Event is published nothing writes to it.
 */
export class EventData {
  readonly message: string;
  readonly level: Level;
  readonly target: string;
  readonly file?: string;
  readonly line?: number;
  readonly modulePath?: string;
  readonly fields: Map<string, string>;
  readonly timestamp: number;

  constructor(init: EventDataInit) {
    this.message = init.message;
    this.level = init.level;
    this.target = init.target;
    this.file = init.file;
    this.line = init.line;
    this.modulePath = init.modulePath;
    this.fields = new Map(init.fields ?? []);
    this.timestamp = init.timestamp ?? Date.now();
  }

  addField(key: string, value: string): void {
    this.fields.set(key, value);
  }
}

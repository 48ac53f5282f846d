/**
 * @fileoverview Bounded event history
 *
 * EventManager keeps the most recent events, newest first, up to a fixed
 * capacity. Everything published on the manager's bus is stored: the first
 * subscription on the bus belongs to the manager and pushes into the history
 * before any client handler runs.
 *
 * Queries never mutate and always return newest-first copies.
 */

import { ConfigurationError } from '../core/errors.js';
import { DEFAULT_MAX_EVENTS } from '../config/index.js';
import { EventTarget } from '../events/event_target.js';
import { LEVELS, type Level } from '../model/level.js';
import type { Event, SearchCriteria } from '../model/event.js';
import { RingBuffer } from './ring_buffer.js';

export type LevelCounts = Partial<Record<Level, number>>;

export class EventManager {
  private readonly buffer: RingBuffer<Event>;
  private readonly target = new EventTarget<Event>();

  constructor(maxEvents: number = DEFAULT_MAX_EVENTS) {
    if (!Number.isInteger(maxEvents) || maxEvents < 0) {
      throw new ConfigurationError('maxEvents', `must be a non-negative integer, got ${maxEvents}`);
    }
    this.buffer = new RingBuffer<Event>(maxEvents);
    this.target.subscribe((event) => {
      this.push(event);
    });
  }

  get capacity(): number {
    return this.buffer.capacity;
  }

  /**
   * The manager's bus. Values emitted on it directly are stored too.
   */
  events(): EventTarget<Event> {
    return this.target;
  }

  /**
   * Store `event` as the newest entry without publishing it.
   * Returns the event evicted to stay within capacity, if any.
   */
  push(event: Event): Event | undefined {
    return this.buffer.pushFront(event);
  }

  /**
   * Publish `event` on the bus, which stores it before client handlers see it.
   */
  emit(event: Event): void {
    this.target.emit(event);
  }

  len(): number {
    return this.buffer.size;
  }

  isEmpty(): boolean {
    return this.buffer.size === 0;
  }

  /**
   * Empty the history. Subscriptions and previously returned arrays are unaffected.
   */
  clear(): void {
    this.buffer.clear();
  }

  all(): Event[] {
    return this.buffer.toArray();
  }

  getByLevel(level: Level): Event[] {
    return this.filter((event) => event.level === level);
  }

  getByTarget(target: string): Event[] {
    return this.filter((event) => event.target.includes(target));
  }

  getBySpan(spanName: string): Event[] {
    return this.filter((event) => event.hasSpanNamed(spanName));
  }

  getByThread(threadId: string): Event[] {
    return this.filter((event) => event.threadId === threadId);
  }

  getByCorrelationId(correlationId: string): Event[] {
    return this.filter((event) => event.correlationId === correlationId);
  }

  getRecent(count: number): Event[] {
    return this.buffer.toArray(count);
  }

  search(criteria: SearchCriteria = {}): Event[] {
    return this.filter((event) => event.matchesCriteria(criteria));
  }

  /**
   * Number of stored events per level, for levels that occur at least once.
   */
  levelCounts(): LevelCounts {
    return countLevels(this.all());
  }

  getEventSummary(): string {
    const counts = this.levelCounts();
    let summary = `Event Summary: ${this.len()} total events\n`;
    for (const level of LEVELS) {
      const count = counts[level];
      if (count !== undefined) {
        summary += `  ${level}: ${count}\n`;
      }
    }
    return summary;
  }

  private filter(predicate: (event: Event) => boolean): Event[] {
    return this.buffer.toArray().filter(predicate);
  }
}

export function countLevels(events: Iterable<Event>): LevelCounts {
  const counts: LevelCounts = {};
  for (const event of events) {
    counts[event.level] = (counts[event.level] ?? 0) + 1;
  }
  return counts;
}

/**
 * @fileoverview Snapshot wire schema
 *
 * The snapshot document is UTF-8 JSON with snake_case keys:
 *
 * ```json
 * {
 *   "metadata": { "format_version": "1.0", "export_timestamp": "...",
 *                 "total_events": 2, "level_counts": { "ERROR": 1, "INFO": 1 } },
 *   "events": [ { "event_data": { ... }, "span_stack": [ ... ], ... } ]
 * }
 * ```
 *
 * Unknown metadata keys are accepted and dropped. Every required event
 * field must be present and well-formed.
 */

import { z } from 'zod';

export const SNAPSHOT_FORMAT_VERSION = '1.0';

export const LevelSchema = z.enum(['ERROR', 'WARN', 'INFO', 'DEBUG', 'TRACE']);

const FieldsSchema = z.record(z.string(), z.string());
const TimestampSchema = z.number().finite().nonnegative();

export interface WireSpan {
  id: number;
  name: string;
  target: string;
  level: z.infer<typeof LevelSchema>;
  file?: string;
  line?: number;
  module_path?: string;
  fields: Record<string, string>;
  entered_at: number;
  exited_at?: number;
  duration_ms?: number;
  children: WireSpan[];
}

export const SpanSchema: z.ZodType<WireSpan> = z.lazy(() =>
  z
    .object({
      id: z.number().int().nonnegative(),
      name: z.string(),
      target: z.string(),
      level: LevelSchema,
      file: z.string().optional(),
      line: z.number().int().nonnegative().optional(),
      module_path: z.string().optional(),
      fields: FieldsSchema,
      entered_at: TimestampSchema,
      exited_at: TimestampSchema.optional(),
      duration_ms: z.number().finite().nonnegative().optional(),
      children: z.array(SpanSchema),
    })
    .refine((span) => (span.exited_at === undefined) === (span.duration_ms === undefined), {
      message: 'duration_ms must be present exactly when exited_at is present',
    })
    .refine(
      (span) =>
        span.exited_at === undefined ||
        span.duration_ms === undefined ||
        (span.exited_at >= span.entered_at && span.duration_ms === span.exited_at - span.entered_at),
      { message: 'duration_ms must equal exited_at - entered_at' },
    ),
);

export const EventDataSchema = z.object({
  message: z.string(),
  level: LevelSchema,
  target: z.string(),
  file: z.string().optional(),
  line: z.number().int().nonnegative().optional(),
  module_path: z.string().optional(),
  fields: FieldsSchema,
  timestamp: TimestampSchema,
});

export type WireEventData = z.infer<typeof EventDataSchema>;

export interface WireEvent {
  event_data: WireEventData;
  span_stack: WireSpan[];
  current_span?: WireSpan;
  thread_id?: string;
  thread_name?: string;
  process_id?: number;
  correlation_id?: string;
  custom_metadata: Record<string, string>;
  parent?: WireEvent;
}

export const EventSchema: z.ZodType<WireEvent> = z.lazy(() =>
  z.object({
    event_data: EventDataSchema,
    span_stack: z.array(SpanSchema),
    current_span: SpanSchema.optional(),
    thread_id: z.string().optional(),
    thread_name: z.string().optional(),
    process_id: z.number().int().nonnegative().optional(),
    correlation_id: z.string().optional(),
    custom_metadata: FieldsSchema,
    parent: EventSchema.optional(),
  }),
);

export const MetadataSchema = z.object({
  format_version: z.string().regex(/^\d+\.\d+$/, 'expected MAJOR.MINOR'),
  export_timestamp: z.string().datetime({ offset: true }),
  total_events: z.number().int().nonnegative(),
  level_counts: z.record(LevelSchema, z.number().int().nonnegative()),
  description: z.string().optional(),
});

export type WireMetadata = z.infer<typeof MetadataSchema>;

export const SnapshotSchema = z.object({
  metadata: MetadataSchema,
  events: z.array(EventSchema),
});

export type WireSnapshot = z.infer<typeof SnapshotSchema>;

/**
 * @fileoverview Snapshot files and store transfer
 *
 * Reads and writes snapshot documents and moves events between a store and
 * a snapshot. I/O failures come back as SnapshotIoError, content failures as
 * SnapshotDecodeError, so callers can tell "file unreadable" from "file
 * readable but not a snapshot".
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Err, Ok, type Result } from '../core/result.js';
import { SnapshotIoError, type SnapshotDecodeError } from '../core/errors.js';
import type { SearchCriteria } from '../model/event.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { EventManager } from '../store/event_manager.js';
import { toError } from '../utils/errors.js';
import { createExportData, decodeSnapshot, encodeSnapshot, type ExportData } from './codec.js';

export type SnapshotReadError = SnapshotIoError | SnapshotDecodeError;

export interface MergeResult {
  data: ExportData;
  /** Number of events pushed into the store. */
  count: number;
}

// ============================================================================
// FILES
// ============================================================================

/**
 * Write `data` to `filePath` through a temp file and rename, so a failed
 * write never leaves a half-written snapshot at the destination.
 * Resolves to the number of events written.
 */
export async function writeSnapshotFile(
  filePath: string,
  data: ExportData,
): Promise<Result<number, SnapshotIoError>> {
  const bytes = encodeSnapshot(data);
  const tempPath = `${filePath}.tmp.${process.pid}`;

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, bytes);
    await fs.rename(tempPath, filePath);
  } catch (error: unknown) {
    const cause = toError(error);
    try {
      await fs.unlink(tempPath);
    } catch (cleanupError: unknown) {
      logDebug('Snapshot temp file cleanup skipped', {
        tempPath,
        error: toError(cleanupError).message,
      });
    }
    return Err(new SnapshotIoError('write', filePath, cause.message, cause));
  }

  logDebug('Snapshot written', { filePath, events: data.events.length, bytes: bytes.byteLength });
  return Ok(data.events.length);
}

export async function readSnapshotFile(filePath: string): Promise<Result<ExportData, SnapshotReadError>> {
  let bytes: Uint8Array;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error: unknown) {
    const cause = toError(error);
    return Err(new SnapshotIoError('read', filePath, cause.message, cause));
  }

  const decoded = decodeSnapshot(bytes);
  if (!decoded.ok) {
    logWarning('Snapshot rejected', { filePath, error: decoded.error.message });
  }
  return decoded;
}

// ============================================================================
// STORE TRANSFER
// ============================================================================

/**
 * Snapshot the store's contents, newest first, optionally filtered.
 */
export function exportFromManager(
  manager: EventManager,
  criteria?: SearchCriteria,
  description?: string,
): ExportData {
  const events = criteria ? manager.search(criteria) : manager.all();
  return createExportData(events, description);
}

export function exportToBinData(manager: EventManager, description?: string): Uint8Array {
  return encodeSnapshot(exportFromManager(manager, undefined, description));
}

export function exportToBinFile(
  manager: EventManager,
  filePath: string,
  description?: string,
): Promise<Result<number, SnapshotIoError>> {
  return writeSnapshotFile(filePath, exportFromManager(manager, undefined, description));
}

export function exportFilteredToBinFile(
  manager: EventManager,
  filePath: string,
  criteria: SearchCriteria,
  description?: string,
): Promise<Result<number, SnapshotIoError>> {
  return writeSnapshotFile(filePath, exportFromManager(manager, criteria, description));
}

/**
 * Replay a snapshot into `manager` with `push` only: the events are history,
 * so subscribers of the manager's bus do not see them.
 *
 * Snapshots list events newest first; they are pushed oldest first so the
 * store ends up in the same order, and capacity eviction applies as usual.
 */
export function mergeIntoManager(manager: EventManager, data: ExportData): number {
  for (let i = data.events.length - 1; i >= 0; i -= 1) {
    manager.push(data.events[i]);
  }
  return data.events.length;
}

/**
 * Build a fresh store from a snapshot file.
 */
export async function importFromBinFile(
  filePath: string,
  maxEvents?: number,
): Promise<Result<EventManager, SnapshotReadError>> {
  const read = await readSnapshotFile(filePath);
  if (!read.ok) return read;

  const manager = new EventManager(maxEvents);
  mergeIntoManager(manager, read.value);
  return Ok(manager);
}

export async function importAndMergeFromBinFile(
  manager: EventManager,
  filePath: string,
): Promise<Result<MergeResult, SnapshotReadError>> {
  const read = await readSnapshotFile(filePath);
  if (!read.ok) return read;

  const count = mergeIntoManager(manager, read.value);
  return Ok({ data: read.value, count });
}

/**
 * @fileoverview spanlog error hierarchy
 *
 * Every recoverable failure in the capture subsystem is one of these typed
 * errors. None of them is fatal to the host process: registry and snapshot
 * operations hand them back inside a `Result` instead of throwing.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class SpanlogError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// REGISTRY ERRORS
// ============================================================================

export class NotInitializedError extends SpanlogError {
  readonly code = 'NOT_INITIALIZED';
  readonly retryable = false;

  constructor(readonly operation: string) {
    super(`Event manager not initialized (operation: ${operation})`);
    this.name = 'NotInitializedError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
      },
    };
  }
}

// ============================================================================
// SNAPSHOT ERRORS
// ============================================================================

export type SnapshotIoOperation = 'read' | 'write';

/**
 * The snapshot file could not be read or written.
 */
export class SnapshotIoError extends SpanlogError {
  readonly code = 'SNAPSHOT_IO_ERROR';
  readonly retryable = true;

  constructor(
    readonly operation: SnapshotIoOperation,
    readonly filePath: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Snapshot ${operation} failed for ${filePath}: ${message}`);
    this.name = 'SnapshotIoError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        filePath: this.filePath,
        cause: this.cause?.message,
      },
    };
  }
}

/**
 * The snapshot content was readable but is not a valid snapshot document.
 */
export class SnapshotDecodeError extends SpanlogError {
  readonly code = 'SNAPSHOT_DECODE_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(`Snapshot decode failed: ${message}`);
    this.name = 'SnapshotDecodeError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        issues: this.issues,
      },
    };
  }
}

// ============================================================================
// MODEL ERRORS
// ============================================================================

export class SpanStateError extends SpanlogError {
  readonly code = 'SPAN_STATE_ERROR';
  readonly retryable = false;

  constructor(
    readonly spanId: number,
    readonly attempted: string,
  ) {
    super(`Cannot ${attempted} on span ${spanId}: span has already exited`);
    this.name = 'SpanStateError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        spanId: this.spanId,
        attempted: this.attempted,
      },
    };
  }
}

export class ValidationError extends SpanlogError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends SpanlogError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isSpanlogError(error: unknown): error is SpanlogError {
  return error instanceof SpanlogError;
}

export function isNotInitializedError(error: unknown): error is NotInitializedError {
  return error instanceof NotInitializedError;
}

export function isSnapshotIoError(error: unknown): error is SnapshotIoError {
  return error instanceof SnapshotIoError;
}

export function isSnapshotDecodeError(error: unknown): error is SnapshotDecodeError {
  return error instanceof SnapshotDecodeError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

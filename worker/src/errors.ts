export type TranscriberErrorKind =
  | 'load'
  | 'plan'
  | 'export'
  | 'size_violation'
  | 'transcription';

/**
 * Base class for every failure that aborts a transcription run.
 */
export class TranscriberError extends Error {
  readonly kind: TranscriberErrorKind;
  readonly context?: Record<string, unknown>;

  constructor(
    kind: TranscriberErrorKind,
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TranscriberError';
    this.kind = kind;
    this.context = context;
  }
}

/**
 * Source asset is missing, unreadable or cannot be decoded.
 */
export class LoadError extends TranscriberError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super('load', message, context, options);
    this.name = 'LoadError';
  }
}

/**
 * Chunk-duration arithmetic produced a degenerate plan.
 */
export class PlanError extends TranscriberError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('plan', message, context);
    this.name = 'PlanError';
  }
}

export class ExportError extends TranscriberError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super('export', message, context, options);
    this.name = 'ExportError';
  }
}

/**
 * An exported chunk is still at or over the service's hard limit.
 */
export class SizeViolationError extends TranscriberError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('size_violation', message, context);
    this.name = 'SizeViolationError';
  }
}

export class TranscriptionError extends TranscriberError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super('transcription', message, context, options);
    this.name = 'TranscriptionError';
  }
}

/**
 * Invalid configuration. Raised at startup, never during a run.
 */
export class ConfigError extends Error {
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'ConfigError';
    this.context = context;
  }
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

export class HarvestError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'HarvestError';
  }
}

export class ConfigError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

/** Malformed locator, video id or run argument. */
export class InputError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INPUT_ERROR', details);
    this.name = 'InputError';
  }
}

export class SinkError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SINK_ERROR', details);
    this.name = 'SinkError';
  }
}

export class RemoteError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'REMOTE_ERROR', details);
    this.name = 'RemoteError';
  }
}

export class CancelledError extends HarvestError {
  constructor(message = 'Operation cancelled', details?: Record<string, unknown>) {
    super(message, 'CANCELLED', details);
    this.name = 'CancelledError';
  }
}

/**
 * Wraps an error an operation wants the retry loop to give up on.
 * The retry loop rethrows `error` as-is.
 */
export class PermanentError extends Error {
  constructor(public readonly error: unknown) {
    super(errorMessage(error));
    this.name = 'PermanentError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

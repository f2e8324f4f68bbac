/**
 * Error types shared by the sync engine and the CLI.
 */

// ─── Error Types ───────────────────────────────────────────────────

export type SyncErrorCode =
  | 'WRITE_FAILED'
  | 'READ_FAILED'
  | 'VERIFICATION_FAILED'
  | 'TIMEOUT'
  | 'CORRUPT_DOCUMENT'
  | 'UNKNOWN_COMPONENT'
  | 'WATCH_FAILED'
  | 'SHUTDOWN'
  | 'STARTUP_FAILED'
  | 'CONFIG_INVALID'
  | 'NOT_FOUND';

export class SyncError extends Error {
  constructor(
    message: string,
    public readonly code: SyncErrorCode,
    public readonly componentKey?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SyncError';
  }
}

export class ConfigError extends SyncError {
  constructor(
    message: string,
    public readonly configPath: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'CONFIG_INVALID', undefined, options);
    this.name = 'ConfigError';
  }
}

/** Wrap an unknown thrown value, keeping an existing SyncError as-is */
export function toSyncError(
  error: unknown,
  code: SyncErrorCode,
  componentKey?: string
): SyncError {
  if (error instanceof SyncError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new SyncError(message, code, componentKey, { cause: error });
}

/**
 * Map an error to a short human-readable reason for outcomes and CLI output.
 */
export function getFailureReason(error: unknown): string {
  if (error instanceof ConfigError) return `Invalid configuration in ${error.configPath}`;
  if (error instanceof SyncError) {
    switch (error.code) {
      case 'WRITE_FAILED':
        return 'Could not write file';
      case 'READ_FAILED':
        return 'Could not read file';
      case 'VERIFICATION_FAILED':
        return 'Written content did not read back';
      case 'TIMEOUT':
        return 'Timed out waiting for update';
      case 'CORRUPT_DOCUMENT':
        return 'Merged document is not valid JSON';
      case 'UNKNOWN_COMPONENT':
        return 'Unknown component';
      case 'WATCH_FAILED':
        return 'File watcher failed';
      case 'SHUTDOWN':
        return 'Engine is shutting down';
      case 'STARTUP_FAILED':
        return 'Engine failed to start';
      case 'NOT_FOUND':
        return 'Not found';
      default:
        return `Sync error (${error.code})`;
    }
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

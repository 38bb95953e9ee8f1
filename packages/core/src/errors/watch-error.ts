/**
 * Error types for ipwatch
 * Messages carry a suggested action so the CLI can print something useful
 */

export type WatchErrorCode =
  | 'PROBE_FAILED'
  | 'INVALID_ADDRESS'
  | 'CONNECTION_FAILED'
  | 'TIMEOUT'
  | 'RATE_LIMITED'
  | 'DELIVERY_REJECTED'
  | 'MESSAGE_INVALID'
  | 'HISTORY_READ_FAILED'
  | 'HISTORY_WRITE_FAILED'
  | 'EXPORT_FAILED'
  | 'CONFIGURATION_ERROR'
  | 'UNKNOWN';

/** Codes worth another attempt within the same cycle */
const TRANSIENT_CODES: ReadonlySet<WatchErrorCode> = new Set<WatchErrorCode>([
  'PROBE_FAILED',
  'CONNECTION_FAILED',
  'TIMEOUT',
  'RATE_LIMITED',
]);

export interface WatchErrorDetails {
  /** Error code for programmatic handling */
  code: WatchErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class WatchError extends Error {
  readonly code: WatchErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: WatchErrorDetails) {
    super(details.message);
    this.name = 'WatchError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  get transient(): boolean {
    return TRANSIENT_CODES.has(this.code);
  }

  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Helper to wrap unknown errors as WatchError
 */
export function wrapError(error: unknown, defaultCode: WatchErrorCode = 'UNKNOWN'): WatchError {
  if (error instanceof WatchError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new WatchError({ code: defaultCode, message, cause });
}

export function isTransientError(error: unknown): boolean {
  return error instanceof WatchError && error.transient;
}

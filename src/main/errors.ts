/**
 * Error taxonomy for the dictation pipeline.
 *
 * Every error that can reach an observer is a ScribekeyError with a stable
 * `code`. Anything else is reported as `Unexpected`.
 */

import type { ErrorCode, ProviderAttempt, ProviderErrorKind, SessionErrorPayload } from '../shared/types';

export type ErrorSeverity = 'user' | 'system';

export class ScribekeyError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;

  constructor(code: ErrorCode, message: string, severity: ErrorSeverity = 'system') {
    super(message);
    this.name = 'ScribekeyError';
    this.code = code;
    this.severity = severity;
  }
}

export class DeviceUnavailableError extends ScribekeyError {
  constructor(message = 'No audio input device available') {
    super('DeviceUnavailable', message, 'user');
    this.name = 'DeviceUnavailableError';
  }
}

export class RecordingTooShortError extends ScribekeyError {
  public readonly durationMs: number;
  public readonly minimumMs: number;

  constructor(durationMs: number, minimumMs: number) {
    super(
      'RecordingTooShort',
      `Recording too short (${Math.round(durationMs)}ms, minimum ${minimumMs}ms)`,
      'user'
    );
    this.name = 'RecordingTooShortError';
    this.durationMs = durationMs;
    this.minimumMs = minimumMs;
  }
}

export class SegmentSizeExceededError extends ScribekeyError {
  constructor(maxBytes: number, detail: string) {
    super('SegmentSizeExceeded', `Cannot fit audio into ${maxBytes}-byte segments: ${detail}`);
    this.name = 'SegmentSizeExceededError';
  }
}

const PROVIDER_ERROR_CODES: Record<ProviderErrorKind, ErrorCode> = {
  auth: 'ProviderAuthError',
  'rate-limit': 'ProviderRateLimited',
  'size-limit': 'ProviderSizeLimit',
  'transient-network': 'ProviderTransient',
  'server-error': 'ProviderTransient',
};

const NON_RETRYABLE_KINDS: ReadonlySet<ProviderErrorKind> = new Set(['auth', 'size-limit']);

/**
 * A classified failure from a transcription or cleanup provider.
 */
export class ProviderError extends ScribekeyError {
  public readonly kind: ProviderErrorKind;
  public readonly provider: string;
  public readonly status?: number;

  constructor(provider: string, kind: ProviderErrorKind, message: string, status?: number) {
    super(PROVIDER_ERROR_CODES[kind], `${provider}: ${message}`);
    this.name = 'ProviderError';
    this.provider = provider;
    this.kind = kind;
    this.status = status;
  }

  get retryable(): boolean {
    return !NON_RETRYABLE_KINDS.has(this.kind);
  }
}

export class AllProvidersExhaustedError extends ScribekeyError {
  public readonly segmentIndex: number;
  public readonly attempts: ProviderAttempt[];
  public readonly lastError: Error | null;

  constructor(segmentIndex: number, attempts: ProviderAttempt[], lastError: Error | null) {
    const reason = lastError ? ` Last error: ${lastError.message}` : '';
    super(
      'AllProvidersExhausted',
      `All transcription providers failed for segment ${segmentIndex}.${reason}`
    );
    this.name = 'AllProvidersExhaustedError';
    this.segmentIndex = segmentIndex;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class PostProcessFailureError extends ScribekeyError {
  constructor(message: string) {
    super('PostProcessFailure', message);
    this.name = 'PostProcessFailureError';
  }
}

export class SessionAlreadyActiveError extends ScribekeyError {
  constructor(sessionId: string, state: string) {
    super(
      'SessionAlreadyActive',
      `Session already active (session: ${sessionId}, state: ${state})`,
      'user'
    );
    this.name = 'SessionAlreadyActiveError';
  }
}

export class MergeIntegrityError extends ScribekeyError {
  constructor(message: string) {
    super('MergeIntegrity', message);
    this.name = 'MergeIntegrityError';
  }
}

export class CaptureStateError extends ScribekeyError {
  constructor(operation: string, state: string) {
    super('CaptureState', `Cannot ${operation} audio capture while ${state}`);
    this.name = 'CaptureStateError';
  }
}

export class CancelledError extends ScribekeyError {
  constructor(message = 'Operation cancelled') {
    super('Cancelled', message, 'user');
    this.name = 'CancelledError';
  }
}

export function isScribekeyError(error: unknown): error is ScribekeyError {
  return error instanceof ScribekeyError;
}

/**
 * Convert any thrown value into the structured payload delivered to observers.
 */
export function toErrorPayload(error: unknown): SessionErrorPayload {
  if (error instanceof ScribekeyError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: 'Unexpected', message: error.message };
  }
  return { code: 'Unexpected', message: String(error) };
}

/**
 * True when a Node system error carries the given errno code (e.g. ENOENT).
 */
export function hasErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

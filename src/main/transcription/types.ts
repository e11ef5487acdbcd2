/**
 * Shared Types for Transcription Services
 *
 * Providers are remote speech-to-text endpoints tried in priority order.
 * Each one is reached through the TranscriptionProvider interface so the
 * client's retry and fallback logic never sees HTTP.
 */

// ============================================================================
// Provider Identity
// ============================================================================

export type ProviderName = 'groq' | 'openai';

export const PROVIDER_NAMES: readonly ProviderName[] = ['groq', 'openai'];

// ============================================================================
// Transcription Provider
// ============================================================================

/**
 * One upload to a transcription endpoint.
 */
export interface TranscriptionRequest {
  audio: Buffer;
  fileName: string;
  mimeType: string;
  /** ISO 639-1 code, or null to let the provider detect it */
  language: string | null;
  /** Vocabulary/context prompt, passed through verbatim */
  prompt: string | null;
}

/**
 * A speech-to-text endpoint.
 *
 * `transcribe` must reject with a ProviderError (or something the
 * ErrorHandler can classify) and must honor `signal`.
 */
export interface TranscriptionProvider {
  readonly name: string;
  transcribe(request: TranscriptionRequest, signal: AbortSignal): Promise<string>;
}

// ============================================================================
// Retry Policy
// ============================================================================

export interface RetryPolicy {
  /** Attempts per provider per segment */
  maxAttempts: number;
  /** Delay before the second attempt */
  baseDelayMs: number;
  /** Upper bound for any single backoff delay */
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 4000,
};

/**
 * Delay before attempt `attempt + 1`, after `attempt` failed (1-based).
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

// ============================================================================
// Callback Types
// ============================================================================

export type SegmentProgressCallback = (completed: number, total: number) => void;

/**
 * Shared Types for scribekey
 *
 * Single source of truth for session states, commands and the event
 * payloads the SessionController emits to observers (UI, notifications,
 * text insertion).
 */

// =============================================================================
// Session State Machine
// =============================================================================

export enum SessionState {
  IDLE = 'idle',
  RECORDING = 'recording',
  PAUSED = 'paused',
  TRANSCRIBING = 'transcribing',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

export const TERMINAL_STATES: ReadonlySet<SessionState> = new Set([
  SessionState.COMPLETED,
  SessionState.FAILED,
  SessionState.CANCELLED,
]);

export function isTerminalState(state: SessionState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Commands an external source (hotkey, CLI keypress, overlay button) can send.
 */
export type SessionCommand = 'start' | 'stop' | 'pause' | 'resume' | 'cancel' | 'acknowledge';

// =============================================================================
// Audio
// =============================================================================

export interface AudioDevice {
  id: string;
  name: string;
  isDefault: boolean;
}

export interface PcmFormat {
  sampleRate: number;
  channels: number;
}

// =============================================================================
// Transcription Results
// =============================================================================

export type ProviderErrorKind =
  | 'auth'
  | 'rate-limit'
  | 'size-limit'
  | 'transient-network'
  | 'server-error';

/**
 * One network call to one provider for one segment.
 */
export interface ProviderAttempt {
  provider: string;
  segmentIndex: number;
  attempt: number;
  elapsedMs: number;
  ok: boolean;
  errorKind?: ProviderErrorKind;
  errorMessage?: string;
}

export interface SegmentTranscript {
  index: number;
  text: string;
  /** Provider that ultimately served this segment */
  provider: string;
}

export interface TranscriptResult {
  /** Final text (post-processed when cleanup was applied) */
  text: string;
  /** Merged provider output before cleanup */
  rawText: string;
  success: boolean;
  segments: SegmentTranscript[];
  attempts: ProviderAttempt[];
  postProcessed: boolean;
  cleanupProvider?: string;
}

// =============================================================================
// Errors
// =============================================================================

export type ErrorCode =
  | 'DeviceUnavailable'
  | 'RecordingTooShort'
  | 'SegmentSizeExceeded'
  | 'ProviderAuthError'
  | 'ProviderRateLimited'
  | 'ProviderSizeLimit'
  | 'ProviderTransient'
  | 'AllProvidersExhausted'
  | 'PostProcessFailure'
  | 'SessionAlreadyActive'
  | 'MergeIntegrity'
  | 'CaptureState'
  | 'Cancelled'
  | 'Unexpected';

// =============================================================================
// Observer Events
// =============================================================================

export interface SessionErrorPayload {
  code: ErrorCode;
  message: string;
}

export interface StateChangeEvent {
  state: SessionState;
  previousState: SessionState;
  sessionId: string | null;
  timestamp: number;
  device: AudioDevice | null;
  /** Active recording time, frozen while paused */
  elapsedMs: number;
}

export interface SessionResultEvent {
  sessionId: string;
  state: SessionState.COMPLETED | SessionState.FAILED | SessionState.CANCELLED;
  transcript?: TranscriptResult;
  error?: SessionErrorPayload;
}

export interface CommandRejectedEvent {
  command: SessionCommand;
  error: SessionErrorPayload;
}

export interface AudioLevelEvent {
  /** Latest windowed RMS, normalized to 0..1 */
  rms: number;
  /** Recent levels for waveform display, newest last */
  history: number[];
}

export interface DeviceFallbackEvent {
  requested: string;
  used: AudioDevice;
  reason: string;
}

export interface SessionSnapshot {
  id: string;
  generation: number;
  state: SessionState;
  startedAt: number;
  accumulatedPausedMs: number;
  pausedAt: number | null;
  device: AudioDevice | null;
  result: TranscriptResult | null;
  error: SessionErrorPayload | null;
}

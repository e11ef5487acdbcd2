/**
 * CLIPipeline - Transcribe an existing WAV file without a recording session
 *
 * Steps:
 *   1. Read and validate a 16-bit PCM WAV file
 *   2. Split it into upload-sized segments
 *   3. Transcribe each segment with retry and provider fallback
 *   4. Optionally clean up the merged transcript
 */

import { existsSync, readFileSync } from 'fs';
import { createAudioBuffer } from '../main/audio/AudioCapture';
import { framesToMs, parseWav, type ParsedWav } from '../main/audio/audioUtils';
import { CancelledError, isScribekeyError } from '../main/errors';
import type { ErrorCode, ProviderAttempt } from '../shared/types';
import type { TranscriptionServices } from '../main/services';

// ============================================================================
// Types
// ============================================================================

export interface CLIPipelineOptions {
  wavPath: string;
  postProcess: boolean;
}

export interface CLIPipelineResult {
  text: string;
  rawText: string;
  segments: number;
  attempts: ProviderAttempt[];
  postProcessed: boolean;
  cleanupProvider?: string;
  audioSeconds: number;
  durationSeconds: number;
}

type LogFn = (message: string) => void;

// ============================================================================
// Exit code constants
// ============================================================================

export const EXIT_SUCCESS = 0;
export const EXIT_USER_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;
export const EXIT_SIGINT = 130;

const USER_ERROR_CODES: ReadonlySet<ErrorCode> = new Set([
  'DeviceUnavailable',
  'RecordingTooShort',
  'ProviderAuthError',
  'SessionAlreadyActive',
]);

/**
 * Exit code for a session error code.
 */
export function exitCodeForError(code: ErrorCode): number {
  if (code === 'Cancelled') return EXIT_SIGINT;
  return USER_ERROR_CODES.has(code) ? EXIT_USER_ERROR : EXIT_SYSTEM_ERROR;
}

export class CLIPipelineError extends Error {
  readonly severity: 'user' | 'system';

  constructor(message: string, severity: 'user' | 'system') {
    super(message);
    this.name = 'CLIPipelineError';
    this.severity = severity;
  }
}

// ============================================================================
// CLIPipeline Class
// ============================================================================

export class CLIPipeline {
  private readonly options: CLIPipelineOptions;
  private readonly services: TranscriptionServices;
  private readonly log: LogFn;
  private readonly abortController = new AbortController();

  constructor(options: CLIPipelineOptions, services: TranscriptionServices, log: LogFn = () => {}) {
    this.options = options;
    this.services = services;
    this.log = log;
  }

  async run(): Promise<CLIPipelineResult> {
    const startTime = Date.now();
    const signal = this.abortController.signal;

    if (!existsSync(this.options.wavPath)) {
      throw new CLIPipelineError(`Audio file not found: ${this.options.wavPath}`, 'user');
    }

    let wav: ParsedWav;
    try {
      wav = parseWav(readFileSync(this.options.wavPath));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CLIPipelineError(`Cannot read ${this.options.wavPath}: ${message}`, 'user');
    }

    const buffer = createAudioBuffer(wav.data, { sampleRate: wav.sampleRate, channels: wav.channels });
    const audioSeconds = framesToMs(buffer.totalFrames, buffer.sampleRate) / 1000;
    if (buffer.totalFrames === 0) {
      throw new CLIPipelineError('Audio file contains no samples', 'user');
    }
    this.log(`Audio: ${audioSeconds.toFixed(1)}s at ${wav.sampleRate} Hz, ${wav.channels} channel(s)`);

    try {
      const segments = await this.services.chunker.chunk(buffer);
      this.log(`Segments: ${segments.length}`);
      this.checkAborted();

      const outcome = await this.services.client.transcribe(segments, signal, (completed, total) => {
        this.log(`Transcribed ${completed}/${total} segment(s)`);
      });

      let text = outcome.text;
      let postProcessed = false;
      let cleanupProvider: string | undefined;
      if (this.options.postProcess) {
        this.log('Cleaning up transcript...');
        const cleaned = await this.services.postProcessor.process(outcome.text, signal);
        this.checkAborted();
        text = cleaned.text;
        postProcessed = cleaned.postProcessed;
        cleanupProvider = cleaned.provider;
      }

      return {
        text,
        rawText: outcome.text,
        segments: segments.length,
        attempts: outcome.attempts,
        postProcessed,
        cleanupProvider,
        audioSeconds,
        durationSeconds: (Date.now() - startTime) / 1000,
      };
    } catch (error) {
      if (isScribekeyError(error)) {
        throw new CLIPipelineError(error.message, error.severity);
      }
      throw error;
    }
  }

  abort(): void {
    this.abortController.abort();
  }

  private checkAborted(): void {
    if (this.abortController.signal.aborted) {
      throw new CancelledError('Transcription cancelled');
    }
  }
}

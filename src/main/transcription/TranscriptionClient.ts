/**
 * TranscriptionClient
 *
 * Sends every AudioSegment to the first provider that will transcribe it:
 * - up to `retry.maxAttempts` attempts per provider, exponential backoff
 * - auth and size-limit failures skip straight to the next provider
 * - every attempt has its own deadline on top of the session signal
 * - segments run through a bounded worker pool and merge by index
 *
 * One segment exhausting every provider fails the whole transcription;
 * no partial transcript is ever returned.
 */

import type { ProviderAttempt, SegmentTranscript } from '../../shared/types';
import {
  AllProvidersExhaustedError,
  CancelledError,
  MergeIntegrityError,
  ProviderError,
} from '../errors';
import { errorHandler } from '../ErrorHandler';
import type { AudioSegment } from './Chunker';
import {
  DEFAULT_RETRY_POLICY,
  backoffDelay,
  type RetryPolicy,
  type SegmentProgressCallback,
  type TranscriptionProvider,
  type TranscriptionRequest,
} from './types';

// =============================================================================
// Types
// =============================================================================

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface TranscriptionClientOptions {
  retry: RetryPolicy;
  attemptTimeoutMs: number;
  concurrency: number;
  language: string | null;
  prompt: string | null;
  sleep: SleepFn;
  now: () => number;
}

export interface TranscriptionOutcome {
  text: string;
  segments: SegmentTranscript[];
  attempts: ProviderAttempt[];
}

const DEFAULT_OPTIONS: TranscriptionClientOptions = {
  retry: DEFAULT_RETRY_POLICY,
  attemptTimeoutMs: 60_000,
  concurrency: 3,
  language: null,
  prompt: null,
  sleep: abortableSleep,
  now: () => Date.now(),
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Resolve after `ms`, or reject with CancelledError as soon as `signal` aborts.
 */
export function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * An AbortController that also aborts when any parent signal does.
 */
function linkedController(...parents: AbortSignal[]): { controller: AbortController; dispose: () => void } {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  for (const parent of parents) {
    if (parent.aborted) {
      controller.abort();
      break;
    }
    parent.addEventListener('abort', onAbort, { once: true });
  }
  return {
    controller,
    dispose: () => {
      for (const parent of parents) {
        parent.removeEventListener('abort', onAbort);
      }
    },
  };
}

/**
 * Order segment transcripts by index and join their text.
 * Throws MergeIntegrityError unless indices are exactly 0..expectedCount-1.
 */
export function mergeTranscripts(
  parts: ReadonlyArray<SegmentTranscript | undefined>,
  expectedCount: number
): { text: string; segments: SegmentTranscript[] } {
  const byIndex = new Map<number, SegmentTranscript>();
  for (const part of parts) {
    if (!part) continue;
    if (byIndex.has(part.index)) {
      throw new MergeIntegrityError(`Duplicate transcript for segment ${part.index}`);
    }
    byIndex.set(part.index, part);
  }

  const segments: SegmentTranscript[] = [];
  for (let index = 0; index < expectedCount; index++) {
    const part = byIndex.get(index);
    if (!part) {
      throw new MergeIntegrityError(`Missing transcript for segment ${index} of ${expectedCount}`);
    }
    segments.push(part);
  }
  if (byIndex.size !== expectedCount) {
    throw new MergeIntegrityError(
      `Expected ${expectedCount} segment transcripts, received ${byIndex.size}`
    );
  }

  const text = segments
    .map((segment) => segment.text.trim())
    .filter((segmentText) => segmentText.length > 0)
    .join(' ');
  return { text, segments };
}

// =============================================================================
// TranscriptionClient
// =============================================================================

export class TranscriptionClient {
  private readonly providers: readonly TranscriptionProvider[];
  private readonly options: TranscriptionClientOptions;

  constructor(
    providers: readonly TranscriptionProvider[],
    options: Partial<TranscriptionClientOptions> = {}
  ) {
    this.providers = providers;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  getProviderNames(): string[] {
    return this.providers.map((provider) => provider.name);
  }

  /**
   * Transcribe all segments and merge them in order.
   *
   * @param signal - Session cancellation; aborting rejects with CancelledError
   */
  async transcribe(
    segments: readonly AudioSegment[],
    signal: AbortSignal = new AbortController().signal,
    onProgress?: SegmentProgressCallback
  ): Promise<TranscriptionOutcome> {
    const attempts: ProviderAttempt[] = [];
    if (segments.length === 0) {
      return { text: '', segments: [], attempts };
    }
    if (this.providers.length === 0) {
      throw new AllProvidersExhaustedError(
        segments[0].index,
        [],
        new Error('No transcription providers configured')
      );
    }
    if (signal.aborted) {
      throw new CancelledError();
    }

    // Aborted by the session or by the first segment that fails for good
    const pool = linkedController(signal);
    const results: Array<SegmentTranscript | undefined> = new Array(segments.length);
    let nextSegment = 0;
    let completed = 0;
    const failure: { first: Error | null } = { first: null };

    const worker = async (): Promise<void> => {
      while (nextSegment < segments.length && !pool.controller.signal.aborted) {
        const position = nextSegment++;
        const segment = segments[position];
        try {
          results[position] = await this.transcribeSegment(segment, pool.controller.signal, attempts);
          completed++;
          onProgress?.(completed, segments.length);
        } catch (error) {
          if (!failure.first && !(error instanceof CancelledError)) {
            failure.first = error instanceof Error ? error : new Error(String(error));
          }
          pool.controller.abort();
          return;
        }
      }
    };

    const workerCount = Math.max(1, Math.min(this.options.concurrency, segments.length));
    errorHandler.log('info', `Transcribing ${segments.length} segment(s)`, {
      component: 'TranscriptionClient',
      operation: 'transcribe',
      data: { workers: workerCount, providers: this.getProviderNames() },
    });

    try {
      await Promise.all(Array.from({ length: workerCount }, () => worker()));
    } finally {
      pool.dispose();
    }

    if (signal.aborted) {
      throw new CancelledError('Transcription cancelled');
    }
    if (failure.first) {
      throw failure.first;
    }

    const merged = mergeTranscripts(results, segments.length);
    return { ...merged, attempts };
  }

  // ===========================================================================
  // Per-Segment Retry and Fallback
  // ===========================================================================

  private async transcribeSegment(
    segment: AudioSegment,
    signal: AbortSignal,
    attempts: ProviderAttempt[]
  ): Promise<SegmentTranscript> {
    const { retry } = this.options;
    const segmentAttempts: ProviderAttempt[] = [];
    let lastError: Error | null = null;

    for (const provider of this.providers) {
      for (let attempt = 1; attempt <= retry.maxAttempts; attempt++) {
        if (signal.aborted) {
          throw new CancelledError();
        }

        const startedAt = this.options.now();
        try {
          const text = await this.attemptOnce(provider, segment, signal);
          const record: ProviderAttempt = {
            provider: provider.name,
            segmentIndex: segment.index,
            attempt,
            elapsedMs: this.options.now() - startedAt,
            ok: true,
          };
          attempts.push(record);
          segmentAttempts.push(record);
          return { index: segment.index, text, provider: provider.name };
        } catch (error) {
          if (signal.aborted) {
            throw new CancelledError();
          }

          const classified = errorHandler.classifyProviderFailure(provider.name, error);
          const record: ProviderAttempt = {
            provider: provider.name,
            segmentIndex: segment.index,
            attempt,
            elapsedMs: this.options.now() - startedAt,
            ok: false,
            errorKind: classified.kind,
            errorMessage: classified.message,
          };
          attempts.push(record);
          segmentAttempts.push(record);
          lastError = classified;

          errorHandler.log('warn', `Attempt ${attempt}/${retry.maxAttempts} failed: ${classified.message}`, {
            component: 'TranscriptionClient',
            operation: 'transcribeSegment',
            data: { segment: segment.index, provider: provider.name, kind: classified.kind },
          });

          if (!classified.retryable) {
            break;
          }
          if (attempt < retry.maxAttempts) {
            await this.options.sleep(backoffDelay(retry, attempt), signal);
          }
        }
      }
    }

    throw new AllProvidersExhaustedError(segment.index, segmentAttempts, lastError);
  }

  /**
   * One provider call bounded by `attemptTimeoutMs` and the session signal.
   */
  private attemptOnce(
    provider: TranscriptionProvider,
    segment: AudioSegment,
    signal: AbortSignal
  ): Promise<string> {
    const request: TranscriptionRequest = {
      audio: segment.data,
      fileName: segment.fileName,
      mimeType: segment.mimeType,
      language: this.options.language,
      prompt: this.options.prompt,
    };

    const timeoutMs = this.options.attemptTimeoutMs;
    const attempt = linkedController(signal);

    return new Promise<string>((resolve, reject) => {
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        attempt.controller.abort();
      }, timeoutMs);

      const settle = () => {
        clearTimeout(timer);
        attempt.dispose();
        attempt.controller.signal.removeEventListener('abort', onAbort);
      };

      // Providers that ignore the signal still cannot outlive the deadline
      const onAbort = () => {
        settle();
        reject(
          timedOut
            ? new ProviderError(provider.name, 'transient-network', `Request timed out after ${timeoutMs}ms`)
            : new CancelledError()
        );
      };

      if (attempt.controller.signal.aborted) {
        onAbort();
        return;
      }
      attempt.controller.signal.addEventListener('abort', onAbort, { once: true });

      provider.transcribe(request, attempt.controller.signal).then(
        (text) => {
          settle();
          if (text.trim().length === 0) {
            reject(new ProviderError(provider.name, 'server-error', 'Empty transcription returned'));
            return;
          }
          resolve(text.trim());
        },
        (error: unknown) => {
          settle();
          reject(error);
        }
      );
    });
  }
}

export default TranscriptionClient;

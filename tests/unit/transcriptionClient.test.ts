/**
 * TranscriptionClient Unit Tests
 *
 * Retry/backoff, provider fallback, attempt attribution, bounded
 * concurrency, ordered merge, cancellation and per-attempt deadlines.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  AllProvidersExhaustedError,
  CancelledError,
  MergeIntegrityError,
  ProviderError,
} from '../../src/main/errors';
import type { AudioSegment } from '../../src/main/transcription/Chunker';
import {
  TranscriptionClient,
  abortableSleep,
  mergeTranscripts,
  type SleepFn,
} from '../../src/main/transcription/TranscriptionClient';
import { DEFAULT_RETRY_POLICY, backoffDelay } from '../../src/main/transcription/types';
import { ScriptedProvider, SegmentEchoProvider, nextTick } from '../helpers/fakes';

function segment(index: number): AudioSegment {
  return {
    index,
    data: Buffer.alloc(4),
    mimeType: 'audio/wav',
    fileName: `segment-${String(index).padStart(3, '0')}.wav`,
    startFrame: index * 100,
    frameCount: 100,
    startMs: index * 100,
    endMs: (index + 1) * 100,
    compressed: false,
  };
}

function segments(count: number): AudioSegment[] {
  return Array.from({ length: count }, (_, i) => segment(i));
}

function recordingSleep() {
  const delays: number[] = [];
  const sleep: SleepFn = async (ms) => {
    delays.push(ms);
  };
  return { delays, sleep };
}

const serverError = (provider: string) => new ProviderError(provider, 'server-error', 'HTTP 503', 503);

describe('TranscriptionClient', () => {
  // ===========================================================================
  // Retry and fallback
  // ===========================================================================

  describe('retry and fallback', () => {
    it('retries a transient failure on the same provider', async () => {
      const { delays, sleep } = recordingSleep();
      const groq = new ScriptedProvider('groq', [serverError('groq'), 'hello']);
      const client = new TranscriptionClient([groq], { sleep });

      const outcome = await client.transcribe([segment(0)]);

      expect(outcome.text).toBe('hello');
      expect(outcome.segments).toEqual([{ index: 0, text: 'hello', provider: 'groq' }]);
      expect(delays).toEqual([500]);
      expect(outcome.attempts.map(({ provider, attempt, ok, errorKind }) => ({ provider, attempt, ok, errorKind }))).toEqual([
        { provider: 'groq', attempt: 1, ok: false, errorKind: 'server-error' },
        { provider: 'groq', attempt: 2, ok: true, errorKind: undefined },
      ]);
      expect(outcome.attempts[0].errorMessage).toBe('groq: HTTP 503');
    });

    it('falls back after exhausting attempts and attributes the segment to the serving provider', async () => {
      const { delays, sleep } = recordingSleep();
      const groq = new ScriptedProvider('groq', [serverError('groq')]);
      const openai = new ScriptedProvider('openai', ['from openai']);
      const client = new TranscriptionClient([groq, openai], { sleep });

      const outcome = await client.transcribe([segment(0)]);

      expect(outcome.segments[0].provider).toBe('openai');
      expect(groq.requests).toHaveLength(3);
      expect(delays).toEqual([500, 1000]);
      expect(outcome.attempts.map((a) => `${a.provider}#${a.attempt}:${a.ok}`)).toEqual([
        'groq#1:false',
        'groq#2:false',
        'groq#3:false',
        'openai#1:true',
      ]);
    });

    it('attributes a segment to the primary when it succeeds on the last attempt', async () => {
      const { delays, sleep } = recordingSleep();
      const groq = new ScriptedProvider('groq', [serverError('groq'), serverError('groq'), 'third time']);
      const openai = new ScriptedProvider('openai', ['unused']);
      const client = new TranscriptionClient([groq, openai], { sleep });

      const outcome = await client.transcribe([segment(0)]);

      expect(outcome.segments).toEqual([{ index: 0, text: 'third time', provider: 'groq' }]);
      expect(openai.requests).toHaveLength(0);
      expect(delays).toEqual([500, 1000]);
      expect(outcome.attempts.map((a) => `${a.provider}#${a.attempt}:${a.ok}`)).toEqual([
        'groq#1:false',
        'groq#2:false',
        'groq#3:true',
      ]);
    });

    it('falls back after the primary is rate limited on every attempt', async () => {
      const { delays, sleep } = recordingSleep();
      const groq = new ScriptedProvider('groq', [new ProviderError('groq', 'rate-limit', 'Too many requests', 429)]);
      const openai = new ScriptedProvider('openai', ['from openai']);
      const client = new TranscriptionClient([groq, openai], { sleep });

      const outcome = await client.transcribe([segment(0)]);

      expect(groq.requests).toHaveLength(3);
      expect(delays).toEqual([500, 1000]);
      expect(outcome.segments).toEqual([{ index: 0, text: 'from openai', provider: 'openai' }]);
      expect(outcome.attempts.slice(0, 3).map((a) => a.errorKind)).toEqual(['rate-limit', 'rate-limit', 'rate-limit']);
    });

    it('skips to the next provider on auth errors without backoff', async () => {
      const { delays, sleep } = recordingSleep();
      const groq = new ScriptedProvider('groq', [new ProviderError('groq', 'auth', 'Invalid API Key', 401)]);
      const openai = new ScriptedProvider('openai', ['ok']);
      const client = new TranscriptionClient([groq, openai], { sleep });

      const outcome = await client.transcribe([segment(0)]);

      expect(groq.requests).toHaveLength(1);
      expect(delays).toEqual([]);
      expect(outcome.attempts[0]).toMatchObject({ provider: 'groq', ok: false, errorKind: 'auth' });
    });

    it('classifies plain errors thrown by a provider', async () => {
      const { sleep } = recordingSleep();
      const groq = new ScriptedProvider('groq', [new TypeError('fetch failed'), 'ok']);
      const client = new TranscriptionClient([groq], { sleep });

      const outcome = await client.transcribe([segment(0)]);

      expect(outcome.attempts[0]).toMatchObject({
        errorKind: 'transient-network',
        errorMessage: 'groq: fetch failed',
      });
    });

    it('retries an empty transcription', async () => {
      const { sleep } = recordingSleep();
      const groq = new ScriptedProvider('groq', ['   ', ' text ']);
      const client = new TranscriptionClient([groq], { sleep });

      const outcome = await client.transcribe([segment(0)]);

      expect(outcome.text).toBe('text');
      expect(outcome.attempts[0]).toMatchObject({ ok: false, errorKind: 'server-error' });
    });

    it('fails with AllProvidersExhaustedError when every provider fails', async () => {
      const { delays, sleep } = recordingSleep();
      const groq = new ScriptedProvider('groq', [serverError('groq')]);
      const openai = new ScriptedProvider('openai', [serverError('openai')]);
      const client = new TranscriptionClient([groq, openai], { sleep });

      const error = await client.transcribe([segment(0)]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AllProvidersExhaustedError);
      if (!(error instanceof AllProvidersExhaustedError)) return;
      expect(error.segmentIndex).toBe(0);
      expect(error.attempts).toHaveLength(6);
      expect(error.lastError?.message).toBe('openai: HTTP 503');
      expect(delays).toEqual([500, 1000, 500, 1000]);
    });

    it('fails without providers', async () => {
      const client = new TranscriptionClient([]);
      await expect(client.transcribe([segment(0)])).rejects.toBeInstanceOf(AllProvidersExhaustedError);
    });

    it('passes language and prompt through to every request', async () => {
      const groq = new ScriptedProvider('groq', ['ok']);
      const client = new TranscriptionClient([groq], { language: 'fr', prompt: 'Vitest, zod' });

      await client.transcribe([segment(0)]);

      expect(groq.requests[0]).toMatchObject({
        fileName: 'segment-000.wav',
        mimeType: 'audio/wav',
        language: 'fr',
        prompt: 'Vitest, zod',
      });
    });
  });

  // ===========================================================================
  // Concurrency and merge
  // ===========================================================================

  describe('multiple segments', () => {
    it('returns an empty transcript for no segments', async () => {
      const client = new TranscriptionClient([new ScriptedProvider('groq', ['unused'])]);
      expect(await client.transcribe([])).toEqual({ text: '', segments: [], attempts: [] });
    });

    it('merges in segment order whatever order responses arrive in', async () => {
      const ticksByFile: Record<string, number> = {
        'segment-000.wav': 4,
        'segment-001.wav': 1,
        'segment-002.wav': 2,
      };
      const textByFile: Record<string, string> = {
        'segment-000.wav': 'one',
        'segment-001.wav': 'two',
        'segment-002.wav': 'three',
      };
      const provider = new ScriptedProvider('groq', [
        async (request) => {
          for (let i = 0; i < (ticksByFile[request.fileName] ?? 0); i++) await nextTick();
          return textByFile[request.fileName] ?? '';
        },
      ]);
      const progress: Array<[number, number]> = [];
      const client = new TranscriptionClient([provider], { concurrency: 3 });

      const outcome = await client.transcribe(segments(3), undefined, (done, total) => progress.push([done, total]));

      expect(outcome.text).toBe('one two three');
      expect(outcome.segments.map((s) => s.index)).toEqual([0, 1, 2]);
      expect(progress).toEqual([
        [1, 3],
        [2, 3],
        [3, 3],
      ]);
    });

    const COMPLETION_ORDERS: number[][] = [
      [0, 1, 2],
      [0, 2, 1],
      [1, 0, 2],
      [1, 2, 0],
      [2, 0, 1],
      [2, 1, 0],
    ];

    it.each(COMPLETION_ORDERS)('merges in segment order when segments finish as %i, %i, %i', async (...order) => {
      const texts = ['one', 'two', 'three'];
      const finished: number[] = [];
      const provider = new ScriptedProvider('groq', [
        async (request) => {
          const index = Number(request.fileName.slice('segment-'.length, -'.wav'.length));
          const ticks = (order.indexOf(index) + 1) * 2;
          for (let i = 0; i < ticks; i++) await nextTick();
          finished.push(index);
          return texts[index];
        },
      ]);
      const client = new TranscriptionClient([provider], { concurrency: 3 });

      const outcome = await client.transcribe(segments(3));

      expect(finished).toEqual(order);
      expect(outcome.text).toBe('one two three');
      expect(outcome.segments.map((s) => [s.index, s.text])).toEqual([
        [0, 'one'],
        [1, 'two'],
        [2, 'three'],
      ]);
    });

    it('never runs more requests at once than the concurrency limit', async () => {
      let inFlight = 0;
      let peak = 0;
      const provider = new ScriptedProvider('groq', [
        async () => {
          inFlight++;
          peak = Math.max(peak, inFlight);
          await nextTick();
          inFlight--;
          return 'x';
        },
      ]);
      const client = new TranscriptionClient([provider], { concurrency: 2 });

      await client.transcribe(segments(5));

      expect(peak).toBe(2);
      expect(provider.requests).toHaveLength(5);
    });

    it('stops dispatching segments once one segment fails for good', async () => {
      const provider = new ScriptedProvider('groq', [
        async (request) => {
          if (request.fileName === 'segment-001.wav') {
            throw new ProviderError('groq', 'auth', 'Invalid API Key', 401);
          }
          return 'ok';
        },
      ]);
      const client = new TranscriptionClient([provider], { concurrency: 1 });

      const error = await client.transcribe(segments(3)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AllProvidersExhaustedError);
      expect(provider.requests.map((r) => r.fileName)).toEqual(['segment-000.wav', 'segment-001.wav']);
    });

    it('joins segment texts with a single space', async () => {
      const provider = new SegmentEchoProvider('groq', {
        'segment-000.wav': 'alpha',
        'segment-001.wav': 'beta',
      });
      const client = new TranscriptionClient([provider]);

      const outcome = await client.transcribe(segments(2));
      expect(outcome.text).toBe('alpha beta');
    });
  });

  // ===========================================================================
  // Cancellation and deadlines
  // ===========================================================================

  describe('cancellation', () => {
    it('rejects immediately when the signal is already aborted', async () => {
      const provider = new ScriptedProvider('groq', ['ok']);
      const controller = new AbortController();
      controller.abort();

      await expect(
        new TranscriptionClient([provider]).transcribe([segment(0)], controller.signal)
      ).rejects.toBeInstanceOf(CancelledError);
      expect(provider.requests).toHaveLength(0);
    });

    it('rejects with CancelledError when aborted mid-request, even if the provider hangs', async () => {
      const provider = new ScriptedProvider('groq', [() => new Promise<string>(() => {})]);
      const controller = new AbortController();
      const client = new TranscriptionClient([provider]);

      const running = client.transcribe(segments(2), controller.signal);
      await nextTick();
      controller.abort();

      await expect(running).rejects.toThrow('Transcription cancelled');
    });

    it('gives each attempt a deadline the provider cannot outlive', async () => {
      const provider = new ScriptedProvider('slow', [() => new Promise<string>(() => {})]);
      const client = new TranscriptionClient([provider], {
        attemptTimeoutMs: 20,
        retry: { ...DEFAULT_RETRY_POLICY, maxAttempts: 1 },
      });

      const error = await client.transcribe([segment(0)]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AllProvidersExhaustedError);
      if (!(error instanceof AllProvidersExhaustedError)) return;
      expect(error.attempts[0]).toMatchObject({
        provider: 'slow',
        ok: false,
        errorKind: 'transient-network',
        errorMessage: 'slow: Request timed out after 20ms',
      });
    });

    it('passes an abortable signal to the provider', async () => {
      const seen: AbortSignal[] = [];
      const provider = new ScriptedProvider('groq', [
        (_request, signal) => {
          seen.push(signal);
          return new Promise<string>(() => {});
        },
      ]);
      const controller = new AbortController();
      const running = new TranscriptionClient([provider]).transcribe([segment(0)], controller.signal);
      await nextTick();
      controller.abort();
      await running.catch(() => undefined);

      expect(seen).toHaveLength(1);
      expect(seen[0].aborted).toBe(true);
    });
  });
});

// =============================================================================
// Helpers
// =============================================================================

describe('mergeTranscripts', () => {
  const parts = [
    { index: 2, text: 'c', provider: 'groq' },
    { index: 0, text: ' a ', provider: 'openai' },
    { index: 1, text: 'b', provider: 'groq' },
  ];

  it('orders by index regardless of input order', () => {
    const merged = mergeTranscripts(parts, 3);
    expect(merged.text).toBe('a b c');
    expect(merged.segments.map((s) => s.index)).toEqual([0, 1, 2]);
  });

  it('rejects duplicates and gaps', () => {
    expect(() => mergeTranscripts([...parts, { index: 1, text: 'b', provider: 'groq' }], 3)).toThrow(
      new MergeIntegrityError('Duplicate transcript for segment 1')
    );
    expect(() => mergeTranscripts([parts[0], parts[1]], 3)).toThrow('Missing transcript for segment 1 of 3');
    expect(() => mergeTranscripts(parts, 2)).toThrow('Expected 2 segment transcripts, received 3');
  });
});

describe('backoffDelay', () => {
  it('doubles from the base delay up to the cap', () => {
    expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(DEFAULT_RETRY_POLICY, attempt))).toEqual([
      500, 1000, 2000, 4000, 4000,
    ]);
  });
});

describe('abortableSleep', () => {
  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    const done = vi.fn();
    const sleeping = abortableSleep(500, new AbortController().signal).then(done);

    await vi.advanceTimersByTimeAsync(499);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await sleeping;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('rejects as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const sleeping = abortableSleep(60_000, controller.signal);
    controller.abort();
    await expect(sleeping).rejects.toBeInstanceOf(CancelledError);
  });
});

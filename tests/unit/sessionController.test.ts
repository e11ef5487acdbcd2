/**
 * SessionController Unit Tests
 *
 * Tests the core session orchestration logic:
 * - State machine transitions
 * - Session lifecycle (start, pause, stop, cancel, acknowledge)
 * - Elapsed time with pauses
 * - Error handling and stale result suppression
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { EventEmitter } from 'events';
import { createAudioBuffer, type AudioBuffer } from '../../src/main/audio/AudioCapture';
import { SYSTEM_DEFAULT_DEVICE } from '../../src/main/audio/DeviceInventory';
import { AllProvidersExhaustedError, DeviceUnavailableError } from '../../src/main/errors';
import type { PostProcessOutcome } from '../../src/main/pipeline/PostProcessor';
import {
  SESSION_EVENTS,
  SESSION_TRANSITIONS,
  SessionController,
  nextState,
  type SessionCapture,
  type SessionControllerConfig,
} from '../../src/main/SessionController';
import type { AudioSegment } from '../../src/main/transcription/Chunker';
import type { TranscriptionOutcome } from '../../src/main/transcription/TranscriptionClient';
import {
  SessionState,
  type AudioDevice,
  type AudioLevelEvent,
  type CommandRejectedEvent,
  type DeviceFallbackEvent,
  type SessionResultEvent,
  type StateChangeEvent,
} from '../../src/shared/types';
import { constantPcm, deferred } from '../helpers/fakes';

// =============================================================================
// Mocks
// =============================================================================

class MockCapture extends EventEmitter implements SessionCapture {
  startError: Error | null = null;
  frames = 32000;
  start = vi.fn(async (_deviceId: string | null): Promise<AudioDevice> => {
    if (this.startError) throw this.startError;
    return SYSTEM_DEFAULT_DEVICE;
  });
  pause = vi.fn();
  resume = vi.fn();
  cancel = vi.fn();
  stop = vi.fn(
    async (): Promise<AudioBuffer> => createAudioBuffer(constantPcm(this.frames), { sampleRate: 16000, channels: 1 })
  );

  onLevel(callback: (event: AudioLevelEvent) => void): () => void {
    this.on('level', callback);
    return () => this.off('level', callback);
  }

  onDeviceFallback(callback: (event: DeviceFallbackEvent) => void): () => void {
    this.on('deviceFallback', callback);
    return () => this.off('deviceFallback', callback);
  }

  onFatalError(callback: (error: Error) => void): () => void {
    this.on('fatalError', callback);
    return () => this.off('fatalError', callback);
  }
}

const SEGMENT: AudioSegment = {
  index: 0,
  data: Buffer.alloc(4),
  mimeType: 'audio/wav',
  fileName: 'segment-000.wav',
  startFrame: 0,
  frameCount: 32000,
  startMs: 0,
  endMs: 2000,
  compressed: false,
};

const OUTCOME: TranscriptionOutcome = {
  text: 'hello world',
  segments: [{ index: 0, text: 'hello world', provider: 'groq' }],
  attempts: [{ provider: 'groq', segmentIndex: 0, attempt: 1, elapsedMs: 5, ok: true }],
};

// =============================================================================
// Harness
// =============================================================================

describe('SessionController', () => {
  let clock: number;
  let capture: MockCapture;
  let chunker: { chunk: Mock<[AudioBuffer], Promise<AudioSegment[]>> };
  let transcriber: { transcribe: Mock<[readonly AudioSegment[], AbortSignal], Promise<TranscriptionOutcome>> };
  let cleaner: { process: Mock<[string, AbortSignal?], Promise<PostProcessOutcome>> };
  let controller: SessionController;
  let states: SessionState[];
  let results: SessionResultEvent[];

  const create = (config: Partial<SessionControllerConfig> = {}) => {
    controller?.destroy();
    controller = new SessionController(
      { capture, chunker, transcriber, cleaner, now: () => clock },
      { minRecordingMs: 500, ...config }
    );
    states = [];
    results = [];
    controller.onStateChange((event) => states.push(event.state));
    controller.onResult((event) => results.push(event));
    return controller;
  };

  beforeEach(() => {
    clock = 1_000_000;
    capture = new MockCapture();
    chunker = { chunk: vi.fn<[AudioBuffer], Promise<AudioSegment[]>>(async () => [SEGMENT]) };
    transcriber = {
      transcribe: vi.fn<[readonly AudioSegment[], AbortSignal], Promise<TranscriptionOutcome>>(async () => OUTCOME),
    };
    cleaner = {
      process: vi.fn<[string, AbortSignal?], Promise<PostProcessOutcome>>(async () => ({
        text: 'Hello, world.',
        postProcessed: true,
        provider: 'groq',
      })),
    };
    create();
  });

  afterEach(() => {
    controller.destroy();
  });

  async function record(ms: number): Promise<void> {
    await controller.execute('start');
    clock += ms;
  }

  // ===========================================================================
  // Transition table
  // ===========================================================================

  describe('transition table', () => {
    it('maps every (state, event) pair to a state or a no-op', () => {
      for (const state of Object.values(SessionState)) {
        for (const event of SESSION_EVENTS) {
          const target = nextState(state, event);
          expect(target === null || Object.values(SessionState).includes(target)).toBe(true);
        }
      }
    });

    it('only lets terminal states return to idle through acknowledge', () => {
      for (const state of [SessionState.COMPLETED, SessionState.FAILED, SessionState.CANCELLED]) {
        expect(SESSION_TRANSITIONS[state]).toEqual({ acknowledge: SessionState.IDLE });
      }
      expect(nextState(SessionState.IDLE, 'stop')).toBeNull();
      expect(nextState(SessionState.TRANSCRIBING, 'pause')).toBeNull();
      expect(nextState(SessionState.PAUSED, 'stop')).toBe(SessionState.TRANSCRIBING);
    });
  });

  // ===========================================================================
  // Happy path
  // ===========================================================================

  describe('full session', () => {
    it('records, transcribes and completes', async () => {
      await record(2000);
      const stop = await controller.execute('stop');
      expect(stop).toEqual({ command: 'stop', accepted: true, state: SessionState.TRANSCRIBING });

      await controller.whenIdle();

      expect(states).toEqual([SessionState.RECORDING, SessionState.TRANSCRIBING, SessionState.COMPLETED]);
      expect(results).toHaveLength(1);
      expect(results[0].state).toBe(SessionState.COMPLETED);
      expect(results[0].transcript).toEqual({
        text: 'hello world',
        rawText: 'hello world',
        success: true,
        segments: OUTCOME.segments,
        attempts: OUTCOME.attempts,
        postProcessed: false,
      });
      expect(capture.start).toHaveBeenCalledWith(null);
      expect(transcriber.transcribe).toHaveBeenCalledWith([SEGMENT], expect.any(AbortSignal));
      expect(cleaner.process).not.toHaveBeenCalled();
    });

    it('applies post-processing when enabled', async () => {
      create({ postProcess: true });
      await record(2000);
      await controller.execute('stop');
      await controller.whenIdle();

      expect(cleaner.process).toHaveBeenCalledWith('hello world', expect.any(AbortSignal));
      expect(results[0].transcript).toMatchObject({
        text: 'Hello, world.',
        rawText: 'hello world',
        postProcessed: true,
        cleanupProvider: 'groq',
      });
    });

    it('opens the configured device', async () => {
      create({ deviceId: 'usb-mic' });
      await controller.execute('start');
      expect(capture.start).toHaveBeenCalledWith('usb-mic');
    });

    it('reports the device and elapsed time on state changes', async () => {
      const changes: StateChangeEvent[] = [];
      controller.onStateChange((event) => changes.push(event));

      await record(1500);
      await controller.execute('stop');

      expect(changes[0]).toMatchObject({
        state: SessionState.RECORDING,
        previousState: SessionState.IDLE,
        device: SYSTEM_DEFAULT_DEVICE,
        elapsedMs: 0,
      });
      expect(changes[1]).toMatchObject({ state: SessionState.TRANSCRIBING, elapsedMs: 1500 });
      expect(changes[0].sessionId).toBe(changes[1].sessionId);
    });
  });

  // ===========================================================================
  // Rejections and no-ops
  // ===========================================================================

  describe('start while a session exists', () => {
    it('rejects start during recording and keeps the session', async () => {
      const rejected: CommandRejectedEvent[] = [];
      controller.onRejected((event) => rejected.push(event));
      await controller.execute('start');
      const sessionId = controller.getSnapshot()?.id;

      const outcome = await controller.execute('start');

      expect(outcome.accepted).toBe(false);
      expect(outcome.error?.code).toBe('SessionAlreadyActive');
      expect(rejected).toHaveLength(1);
      expect(rejected[0].command).toBe('start');
      expect(controller.getState()).toBe(SessionState.RECORDING);
      expect(controller.getSnapshot()?.id).toBe(sessionId);
      expect(capture.start).toHaveBeenCalledTimes(1);
    });

    it('rejects start in a terminal state until acknowledged', async () => {
      await record(2000);
      await controller.execute('cancel');

      expect((await controller.execute('start')).accepted).toBe(false);

      const ack = await controller.execute('acknowledge');
      expect(ack.state).toBe(SessionState.IDLE);
      expect(controller.getSnapshot()).toBeNull();
      expect((await controller.execute('start')).accepted).toBe(true);
    });

    it('ignores commands that do not apply to the current state', async () => {
      expect(await controller.execute('stop')).toEqual({
        command: 'stop',
        accepted: false,
        state: SessionState.IDLE,
      });
      expect((await controller.execute('pause')).accepted).toBe(false);
      expect((await controller.execute('acknowledge')).accepted).toBe(false);
      expect(states).toEqual([]);
    });
  });

  // ===========================================================================
  // Failures
  // ===========================================================================

  describe('failures', () => {
    it('fails with DeviceUnavailable when capture cannot start', async () => {
      capture.startError = new DeviceUnavailableError('No audio input device found');

      const outcome = await controller.execute('start');

      expect(outcome.state).toBe(SessionState.FAILED);
      expect(states).toEqual([SessionState.FAILED]);
      expect(results).toEqual([
        {
          sessionId: expect.any(String),
          state: SessionState.FAILED,
          error: { code: 'DeviceUnavailable', message: 'No audio input device found' },
        },
      ]);
    });

    it('wraps unexpected capture start errors as DeviceUnavailable', async () => {
      capture.startError = new Error('permission denied');
      const outcome = await controller.execute('start');
      expect(outcome.error).toEqual({
        code: 'DeviceUnavailable',
        message: 'Could not start audio capture: permission denied',
      });
    });

    it('fails recordings shorter than the minimum without transcribing', async () => {
      await record(200);
      const outcome = await controller.execute('stop');

      expect(outcome.state).toBe(SessionState.FAILED);
      expect(outcome.error).toEqual({
        code: 'RecordingTooShort',
        message: 'Recording too short (200ms, minimum 500ms)',
      });
      expect(chunker.chunk).not.toHaveBeenCalled();
      expect(transcriber.transcribe).not.toHaveBeenCalled();
    });

    it('fails recordings that captured no frames', async () => {
      capture.frames = 0;
      await record(2000);
      const outcome = await controller.execute('stop');

      expect(outcome.error?.code).toBe('RecordingTooShort');
      expect(transcriber.transcribe).not.toHaveBeenCalled();
    });

    it('fails when every provider fails', async () => {
      transcriber.transcribe.mockRejectedValueOnce(new AllProvidersExhaustedError(0, [], null));
      await record(2000);
      await controller.execute('stop');
      await controller.whenIdle();

      expect(controller.getState()).toBe(SessionState.FAILED);
      expect(results[0]).toMatchObject({
        state: SessionState.FAILED,
        error: { code: 'AllProvidersExhausted' },
      });
      expect(controller.getSnapshot()?.error?.code).toBe('AllProvidersExhausted');
    });

    it('stops with the captured audio when the input stream dies', async () => {
      await record(2000);
      capture.emit('fatalError', new Error('device unplugged'));
      await controller.whenIdle();

      expect(capture.stop).toHaveBeenCalledTimes(1);
      expect(controller.getState()).toBe(SessionState.COMPLETED);
    });
  });

  // ===========================================================================
  // Pause and elapsed time
  // ===========================================================================

  describe('pause and resume', () => {
    it('excludes paused time from the elapsed duration', async () => {
      await record(1000);
      await controller.execute('pause');
      clock += 2000;
      expect(controller.getElapsedMs()).toBe(1000);

      await controller.execute('resume');
      clock += 500;
      expect(controller.getElapsedMs()).toBe(1500);
      expect(capture.pause).toHaveBeenCalledTimes(1);
      expect(capture.resume).toHaveBeenCalledTimes(1);
    });

    it('applies the minimum duration to active time only', async () => {
      await record(300);
      await controller.execute('pause');
      clock += 10_000;
      await controller.execute('resume');
      clock += 100;

      const outcome = await controller.execute('stop');
      expect(outcome.error?.message).toBe('Recording too short (400ms, minimum 500ms)');
    });

    it('allows stopping while paused', async () => {
      await record(1000);
      await controller.execute('pause');
      clock += 5000;

      const outcome = await controller.execute('stop');
      clock += 5000;

      expect(outcome.state).toBe(SessionState.TRANSCRIBING);
      expect(controller.getElapsedMs()).toBe(1000);
    });
  });

  // ===========================================================================
  // Cancellation
  // ===========================================================================

  describe('cancel', () => {
    it('discards the recording', async () => {
      await record(2000);
      const outcome = await controller.execute('cancel');

      expect(outcome.state).toBe(SessionState.CANCELLED);
      expect(capture.cancel).toHaveBeenCalled();
      expect(chunker.chunk).not.toHaveBeenCalled();
      expect(results).toEqual([
        {
          sessionId: expect.any(String),
          state: SessionState.CANCELLED,
          error: { code: 'Cancelled', message: 'Session cancelled' },
        },
      ]);
    });

    it('suppresses a transcript that arrives after cancel', async () => {
      const pending = deferred<TranscriptionOutcome>();
      transcriber.transcribe.mockReturnValueOnce(pending.promise);
      await record(2000);
      await controller.execute('stop');
      await vi.waitFor(() => expect(transcriber.transcribe).toHaveBeenCalled());

      await controller.execute('cancel');
      pending.resolve(OUTCOME);
      await controller.whenIdle();

      const signal = transcriber.transcribe.mock.calls[0][1];
      expect(signal.aborted).toBe(true);
      expect(controller.getState()).toBe(SessionState.CANCELLED);
      expect(results.map((result) => result.state)).toEqual([SessionState.CANCELLED]);
    });

    it('keeps a late result from reaching the next session', async () => {
      const pending = deferred<TranscriptionOutcome>();
      transcriber.transcribe.mockReturnValueOnce(pending.promise);
      await record(2000);
      await controller.execute('stop');
      await vi.waitFor(() => expect(transcriber.transcribe).toHaveBeenCalled());
      await controller.execute('cancel');
      await controller.execute('acknowledge');
      await record(2000);

      pending.resolve(OUTCOME);
      await controller.whenIdle();

      expect(controller.getState()).toBe(SessionState.RECORDING);
      expect(results.map((result) => result.state)).toEqual([SessionState.CANCELLED]);
    });

    it('is a no-op when idle', async () => {
      expect((await controller.execute('cancel')).accepted).toBe(false);
    });
  });

  // ===========================================================================
  // Dispatch and timers
  // ===========================================================================

  describe('dispatch', () => {
    it('returns immediately and applies commands in order', async () => {
      controller.dispatch('start');
      controller.dispatch('pause');
      expect(controller.getState()).toBe(SessionState.IDLE);

      await controller.whenIdle();
      expect(states).toEqual([SessionState.RECORDING, SessionState.PAUSED]);
    });

    it('accepts commands from inside observers', async () => {
      controller.onStateChange((event) => {
        if (event.state === SessionState.RECORDING) controller.dispatch('pause');
      });

      await controller.execute('start');
      await controller.whenIdle();

      expect(controller.getState()).toBe(SessionState.PAUSED);
    });

    it('finishes the session when an observer throws', async () => {
      const later = vi.fn();
      controller.onStateChange((event) => {
        if (event.state === SessionState.TRANSCRIBING) throw new Error('observer failed');
      });
      controller.onStateChange(later);
      controller.onResult(() => {
        throw new Error('observer failed');
      });

      await record(2000);
      const stop = await controller.execute('stop');
      await controller.whenIdle();

      expect(stop).toEqual({ command: 'stop', accepted: true, state: SessionState.TRANSCRIBING });
      expect(transcriber.transcribe).toHaveBeenCalledTimes(1);
      expect(states).toEqual([SessionState.RECORDING, SessionState.TRANSCRIBING, SessionState.COMPLETED]);
      expect(later).toHaveBeenCalledTimes(3);
      expect(results.map((result) => result.state)).toEqual([SessionState.COMPLETED]);
      expect(controller.getState()).toBe(SessionState.COMPLETED);
    });

    it('forwards capture levels', async () => {
      const levels: AudioLevelEvent[] = [];
      controller.onLevel((event) => levels.push(event));
      capture.emit('level', { rms: 0.5, history: [0.5] });
      expect(levels).toEqual([{ rms: 0.5, history: [0.5] }]);
    });
  });

  describe('timers', () => {
    it('returns to idle after the auto-acknowledge delay', async () => {
      create({ autoAcknowledgeMs: 1 });
      await record(2000);
      await controller.execute('stop');
      await controller.whenIdle();
      expect(results.map((result) => result.state)).toEqual([SessionState.COMPLETED]);

      await vi.waitFor(() => expect(controller.getState()).toBe(SessionState.IDLE));
    });

    it('stops automatically at the maximum duration', async () => {
      create({ maxRecordingMs: 3000, watchdogIntervalMs: 5 });
      await record(3000);

      await vi.waitFor(() => expect(controller.getState()).not.toBe(SessionState.RECORDING));
      await controller.whenIdle();

      expect(capture.stop).toHaveBeenCalledTimes(1);
      expect(controller.getState()).toBe(SessionState.COMPLETED);
    });
  });
});

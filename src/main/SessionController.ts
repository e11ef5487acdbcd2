/**
 * SessionController - Core orchestrator for dictation sessions
 *
 * Finite state machine for one recording-to-transcript attempt:
 *   idle -> recording <-> paused -> transcribing -> completed | failed
 *   plus cancelled from recording, paused or transcribing.
 * Terminal states return to idle once an observer acknowledges them.
 *
 * Every command and every pipeline completion runs through one serialized
 * queue, so only one transition is ever in flight. Pipeline results carry
 * the session id and generation that produced them and are dropped when
 * the session has moved on (cancelled, acknowledged, replaced).
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import {
  SessionState,
  isTerminalState,
  type AudioDevice,
  type AudioLevelEvent,
  type CommandRejectedEvent,
  type DeviceFallbackEvent,
  type SessionCommand,
  type SessionErrorPayload,
  type SessionResultEvent,
  type SessionSnapshot,
  type StateChangeEvent,
  type TranscriptResult,
} from '../shared/types';
import type { AudioBuffer } from './audio/AudioCapture';
import type { AudioSegment } from './transcription/Chunker';
import type { TranscriptionOutcome } from './transcription/TranscriptionClient';
import type { PostProcessOutcome } from './pipeline/PostProcessor';
import {
  CancelledError,
  DeviceUnavailableError,
  RecordingTooShortError,
  SessionAlreadyActiveError,
  toErrorPayload,
} from './errors';
import { errorHandler } from './ErrorHandler';

// =============================================================================
// State Machine
// =============================================================================

/** Internal pipeline events plus the external commands */
export type SessionEvent = SessionCommand | 'success' | 'failure';

export const SESSION_EVENTS: readonly SessionEvent[] = [
  'start',
  'stop',
  'pause',
  'resume',
  'cancel',
  'acknowledge',
  'success',
  'failure',
];

/**
 * Transition table. Pairs that are not listed are no-ops.
 * `failure` out of idle/recording/paused covers device errors at start and
 * recordings that are too short to transcribe.
 */
export const SESSION_TRANSITIONS: Record<SessionState, Partial<Record<SessionEvent, SessionState>>> = {
  [SessionState.IDLE]: {
    start: SessionState.RECORDING,
    failure: SessionState.FAILED,
  },
  [SessionState.RECORDING]: {
    stop: SessionState.TRANSCRIBING,
    pause: SessionState.PAUSED,
    cancel: SessionState.CANCELLED,
    failure: SessionState.FAILED,
  },
  [SessionState.PAUSED]: {
    stop: SessionState.TRANSCRIBING,
    resume: SessionState.RECORDING,
    cancel: SessionState.CANCELLED,
    failure: SessionState.FAILED,
  },
  [SessionState.TRANSCRIBING]: {
    cancel: SessionState.CANCELLED,
    success: SessionState.COMPLETED,
    failure: SessionState.FAILED,
  },
  [SessionState.COMPLETED]: { acknowledge: SessionState.IDLE },
  [SessionState.FAILED]: { acknowledge: SessionState.IDLE },
  [SessionState.CANCELLED]: { acknowledge: SessionState.IDLE },
};

export function nextState(state: SessionState, event: SessionEvent): SessionState | null {
  return SESSION_TRANSITIONS[state][event] ?? null;
}

// =============================================================================
// Collaborator Seams
// =============================================================================

export interface SessionCapture {
  start(deviceId: string | null): Promise<AudioDevice>;
  pause(): void;
  resume(): void;
  stop(): Promise<AudioBuffer>;
  cancel(): void;
  onLevel(callback: (event: AudioLevelEvent) => void): () => void;
  onDeviceFallback(callback: (event: DeviceFallbackEvent) => void): () => void;
  onFatalError(callback: (error: Error) => void): () => void;
}

export interface SegmentChunker {
  chunk(buffer: AudioBuffer): Promise<AudioSegment[]>;
}

export interface SegmentTranscriber {
  transcribe(segments: readonly AudioSegment[], signal: AbortSignal): Promise<TranscriptionOutcome>;
}

export interface TranscriptCleaner {
  process(rawText: string, signal?: AbortSignal): Promise<PostProcessOutcome>;
}

export interface SessionControllerDeps {
  capture: SessionCapture;
  chunker: SegmentChunker;
  transcriber: SegmentTranscriber;
  cleaner?: TranscriptCleaner | null;
  now?: () => number;
}

export interface SessionControllerConfig {
  /** Requested input device, null for the system default */
  deviceId: string | null;
  postProcess: boolean;
  /** Active (pause-excluded) duration below which a recording is discarded */
  minRecordingMs: number;
  /** Active duration after which recording stops on its own; null disables */
  maxRecordingMs: number | null;
  /** Return to idle this long after a terminal state; null waits for acknowledge */
  autoAcknowledgeMs: number | null;
  watchdogIntervalMs: number;
}

export const DEFAULT_SESSION_CONFIG: SessionControllerConfig = {
  deviceId: null,
  postProcess: false,
  minRecordingMs: 500,
  maxRecordingMs: 30 * 60_000,
  autoAcknowledgeMs: null,
  watchdogIntervalMs: 1000,
};

export interface CommandOutcome {
  command: SessionCommand;
  /** False when the command was a no-op or was rejected */
  accepted: boolean;
  state: SessionState;
  error?: SessionErrorPayload;
}

interface Session {
  id: string;
  generation: number;
  startedAt: number;
  stoppedAt: number | null;
  pausedAt: number | null;
  accumulatedPausedMs: number;
  device: AudioDevice | null;
  result: TranscriptResult | null;
  error: SessionErrorPayload | null;
}

type PipelineCompletion =
  | { ok: true; transcript: TranscriptResult }
  | { ok: false; error: unknown };

// =============================================================================
// SessionController
// =============================================================================

type ControllerEventName = 'stateChange' | 'result' | 'rejected' | 'level' | 'deviceFallback';

export class SessionController extends EventEmitter {
  private readonly capture: SessionCapture;
  private readonly chunker: SegmentChunker;
  private readonly transcriber: SegmentTranscriber;
  private readonly cleaner: TranscriptCleaner | null;
  private readonly now: () => number;
  private config: SessionControllerConfig;

  private state: SessionState = SessionState.IDLE;
  private session: Session | null = null;
  private generation = 0;
  private abortController: AbortController | null = null;

  private queue: Promise<void> = Promise.resolve();
  private pipelineTask: Promise<void> | null = null;
  private watchdogTimer: NodeJS.Timeout | null = null;
  private acknowledgeTimer: NodeJS.Timeout | null = null;
  private readonly unsubscribers: Array<() => void> = [];

  constructor(deps: SessionControllerDeps, config: Partial<SessionControllerConfig> = {}) {
    super();
    this.capture = deps.capture;
    this.chunker = deps.chunker;
    this.transcriber = deps.transcriber;
    this.cleaner = deps.cleaner ?? null;
    this.now = deps.now ?? (() => Date.now());
    this.config = { ...DEFAULT_SESSION_CONFIG, ...config };

    this.unsubscribers.push(
      this.capture.onLevel((event) => this.notify('level', event)),
      this.capture.onDeviceFallback((event) => this.notify('deviceFallback', event)),
      this.capture.onFatalError((error) => this.handleCaptureFailure(error))
    );
  }

  updateConfig(updates: Partial<SessionControllerConfig>): void {
    this.config = { ...this.config, ...updates };
  }

  getConfig(): SessionControllerConfig {
    return { ...this.config };
  }

  // ===========================================================================
  // Command Entry Points
  // ===========================================================================

  /**
   * Enqueue a command and return immediately. Safe to call from any
   * event handler, including this controller's own observers.
   */
  dispatch(command: SessionCommand): void {
    void this.execute(command).catch((error: unknown) => {
      errorHandler.handle(error, { component: 'SessionController', operation: `dispatch:${command}` });
    });
  }

  /**
   * Enqueue a command and resolve once it has been applied.
   */
  execute(command: SessionCommand): Promise<CommandOutcome> {
    return this.enqueue(() => this.applyCommand(command));
  }

  /**
   * Resolve once no command and no pipeline run is pending.
   */
  async whenIdle(): Promise<void> {
    for (;;) {
      const queue = this.queue;
      const pipeline = this.pipelineTask;
      await queue;
      if (pipeline) await pipeline;
      if (queue === this.queue && pipeline === this.pipelineTask) return;
    }
  }

  // ===========================================================================
  // State Queries
  // ===========================================================================

  getState(): SessionState {
    return this.state;
  }

  getSnapshot(): SessionSnapshot | null {
    if (!this.session) return null;
    const session = this.session;
    return {
      id: session.id,
      generation: session.generation,
      state: this.state,
      startedAt: session.startedAt,
      accumulatedPausedMs: session.accumulatedPausedMs,
      pausedAt: session.pausedAt,
      device: session.device ? { ...session.device } : null,
      result: session.result ? { ...session.result } : null,
      error: session.error ? { ...session.error } : null,
    };
  }

  /**
   * Active recording time; frozen while paused and after stop.
   */
  getElapsedMs(): number {
    const session = this.session;
    if (!session) return 0;
    const end = session.stoppedAt ?? this.now();
    const openPause = session.pausedAt !== null ? Math.max(0, end - session.pausedAt) : 0;
    return Math.max(0, end - session.startedAt - session.accumulatedPausedMs - openPause);
  }

  // ===========================================================================
  // Event Subscription
  // ===========================================================================

  onStateChange(callback: (event: StateChangeEvent) => void): () => void {
    this.on('stateChange', callback);
    return () => this.off('stateChange', callback);
  }

  onResult(callback: (event: SessionResultEvent) => void): () => void {
    this.on('result', callback);
    return () => this.off('result', callback);
  }

  onRejected(callback: (event: CommandRejectedEvent) => void): () => void {
    this.on('rejected', callback);
    return () => this.off('rejected', callback);
  }

  onLevel(callback: (event: AudioLevelEvent) => void): () => void {
    this.on('level', callback);
    return () => this.off('level', callback);
  }

  onDeviceFallback(callback: (event: DeviceFallbackEvent) => void): () => void {
    this.on('deviceFallback', callback);
    return () => this.off('deviceFallback', callback);
  }

  // ===========================================================================
  // Serialized Queue
  // ===========================================================================

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async applyCommand(command: SessionCommand): Promise<CommandOutcome> {
    switch (command) {
      case 'start':
        return this.handleStart();
      case 'stop':
        return this.handleStop();
      case 'pause':
        return this.handlePause();
      case 'resume':
        return this.handleResume();
      case 'cancel':
        return this.handleCancel();
      case 'acknowledge':
        return this.handleAcknowledge();
    }
  }

  private noop(command: SessionCommand): CommandOutcome {
    errorHandler.log('debug', `Ignoring ${command} while ${this.state}`, {
      component: 'SessionController',
      operation: command,
    });
    return { command, accepted: false, state: this.state };
  }

  // ===========================================================================
  // Command Handlers
  // ===========================================================================

  private async handleStart(): Promise<CommandOutcome> {
    if (this.state !== SessionState.IDLE || this.session) {
      const error = new SessionAlreadyActiveError(this.session?.id ?? 'unknown', this.state);
      const payload = toErrorPayload(error);
      errorHandler.log('warn', error.message, { component: 'SessionController', operation: 'start' });
      const rejected: CommandRejectedEvent = { command: 'start', error: payload };
      this.notify('rejected', rejected);
      return { command: 'start', accepted: false, state: this.state, error: payload };
    }

    this.clearAcknowledgeTimer();
    const session: Session = {
      id: uuidv4(),
      generation: ++this.generation,
      startedAt: this.now(),
      stoppedAt: null,
      pausedAt: null,
      accumulatedPausedMs: 0,
      device: null,
      result: null,
      error: null,
    };
    this.session = session;

    let device: AudioDevice;
    try {
      device = await this.capture.start(this.config.deviceId);
    } catch (error) {
      const failure =
        error instanceof DeviceUnavailableError
          ? error
          : new DeviceUnavailableError(
              `Could not start audio capture: ${error instanceof Error ? error.message : String(error)}`
            );
      session.stoppedAt = session.startedAt;
      this.fail(failure);
      return { command: 'start', accepted: true, state: this.state, error: toErrorPayload(failure) };
    }

    // Timer starts once the device is actually delivering audio
    session.startedAt = this.now();
    session.device = device;
    this.abortController = new AbortController();
    this.transition('start');
    this.startWatchdog();

    errorHandler.log('info', `Session started`, {
      component: 'SessionController',
      operation: 'start',
      data: { sessionId: session.id, device: device.name },
    });
    return { command: 'start', accepted: true, state: this.state };
  }

  private async handleStop(): Promise<CommandOutcome> {
    const session = this.session;
    if (!session || (this.state !== SessionState.RECORDING && this.state !== SessionState.PAUSED)) {
      return this.noop('stop');
    }

    const stoppedAt = this.now();
    if (session.pausedAt !== null) {
      session.accumulatedPausedMs += Math.max(0, stoppedAt - session.pausedAt);
      session.pausedAt = null;
    }
    session.stoppedAt = stoppedAt;
    this.stopWatchdog();

    let buffer: AudioBuffer;
    try {
      buffer = await this.capture.stop();
    } catch (error) {
      this.fail(error);
      return { command: 'stop', accepted: true, state: this.state, error: toErrorPayload(error) };
    }

    const elapsedMs = this.getElapsedMs();
    if (elapsedMs < this.config.minRecordingMs || buffer.totalFrames === 0) {
      const tooShort = new RecordingTooShortError(elapsedMs, this.config.minRecordingMs);
      this.fail(tooShort);
      return { command: 'stop', accepted: true, state: this.state, error: toErrorPayload(tooShort) };
    }

    this.transition('stop');
    this.launchPipeline(session, buffer);
    return { command: 'stop', accepted: true, state: this.state };
  }

  private async handlePause(): Promise<CommandOutcome> {
    const session = this.session;
    if (!session || this.state !== SessionState.RECORDING) {
      return this.noop('pause');
    }
    this.capture.pause();
    session.pausedAt = this.now();
    this.transition('pause');
    return { command: 'pause', accepted: true, state: this.state };
  }

  private async handleResume(): Promise<CommandOutcome> {
    const session = this.session;
    if (!session || this.state !== SessionState.PAUSED) {
      return this.noop('resume');
    }
    this.capture.resume();
    if (session.pausedAt !== null) {
      session.accumulatedPausedMs += Math.max(0, this.now() - session.pausedAt);
      session.pausedAt = null;
    }
    this.transition('resume');
    return { command: 'resume', accepted: true, state: this.state };
  }

  private async handleCancel(): Promise<CommandOutcome> {
    const session = this.session;
    if (!session || nextState(this.state, 'cancel') === null) {
      return this.noop('cancel');
    }

    if (this.state === SessionState.RECORDING || this.state === SessionState.PAUSED) {
      this.capture.cancel();
      const cancelledAt = this.now();
      if (session.pausedAt !== null) {
        session.accumulatedPausedMs += Math.max(0, cancelledAt - session.pausedAt);
        session.pausedAt = null;
      }
      session.stoppedAt = cancelledAt;
    }
    this.stopWatchdog();
    this.abortController?.abort();
    this.abortController = null;

    // Anything still in flight for this session is now stale
    session.generation = ++this.generation;

    const cancelled = new CancelledError('Session cancelled');
    session.error = toErrorPayload(cancelled);
    this.transition('cancel');
    this.emitResult({ sessionId: session.id, state: SessionState.CANCELLED, error: session.error });
    return { command: 'cancel', accepted: true, state: this.state };
  }

  private async handleAcknowledge(): Promise<CommandOutcome> {
    if (!isTerminalState(this.state)) {
      return this.noop('acknowledge');
    }
    this.clearAcknowledgeTimer();
    this.transition('acknowledge');
    this.session = null;
    return { command: 'acknowledge', accepted: true, state: this.state };
  }

  // ===========================================================================
  // Transcription Pipeline
  // ===========================================================================

  private launchPipeline(session: Session, buffer: AudioBuffer): void {
    const { id, generation } = session;
    const signal = this.abortController?.signal ?? new AbortController().signal;

    const task = this.runPipeline(buffer, signal).then(
      (transcript): PipelineCompletion => ({ ok: true, transcript }),
      (error: unknown): PipelineCompletion => ({ ok: false, error })
    );

    this.pipelineTask = task
      .then((completion) => this.enqueue(async () => this.applyPipelineCompletion(id, generation, completion)))
      .catch((error: unknown) => {
        errorHandler.handle(error, { component: 'SessionController', operation: 'applyPipelineCompletion' });
      });
  }

  private async runPipeline(buffer: AudioBuffer, signal: AbortSignal): Promise<TranscriptResult> {
    const segments = await this.chunker.chunk(buffer);
    if (signal.aborted) {
      throw new CancelledError();
    }

    const outcome = await this.transcriber.transcribe(segments, signal);
    if (signal.aborted) {
      throw new CancelledError();
    }

    let text = outcome.text;
    let postProcessed = false;
    let cleanupProvider: string | undefined;
    if (this.config.postProcess && this.cleaner) {
      const cleaned = await this.cleaner.process(outcome.text, signal);
      text = cleaned.text;
      postProcessed = cleaned.postProcessed;
      cleanupProvider = cleaned.provider;
    }

    const result: TranscriptResult = {
      text,
      rawText: outcome.text,
      success: true,
      segments: outcome.segments,
      attempts: outcome.attempts,
      postProcessed,
    };
    if (cleanupProvider) {
      result.cleanupProvider = cleanupProvider;
    }
    return result;
  }

  private applyPipelineCompletion(
    sessionId: string,
    generation: number,
    completion: PipelineCompletion
  ): void {
    const session = this.session;
    if (
      !session ||
      session.id !== sessionId ||
      session.generation !== generation ||
      this.state !== SessionState.TRANSCRIBING
    ) {
      errorHandler.log('debug', 'Discarding stale pipeline result', {
        component: 'SessionController',
        operation: 'applyPipelineCompletion',
        data: { sessionId, generation, state: this.state },
      });
      return;
    }

    this.abortController = null;
    if (completion.ok) {
      session.result = completion.transcript;
      this.transition('success');
      errorHandler.log('info', `Transcription completed (${completion.transcript.text.length} chars)`, {
        component: 'SessionController',
        operation: 'applyPipelineCompletion',
        data: { sessionId },
      });
      this.emitResult({ sessionId, state: SessionState.COMPLETED, transcript: completion.transcript });
    } else {
      this.fail(completion.error);
    }
  }

  // ===========================================================================
  // Failure Handling
  // ===========================================================================

  private fail(error: unknown): void {
    const session = this.session;
    if (!session) return;

    this.stopWatchdog();
    this.abortController = null;
    errorHandler.handle(error, { component: 'SessionController', operation: 'fail', data: { state: this.state } });

    session.error = toErrorPayload(error);
    this.transition('failure');
    this.emitResult({ sessionId: session.id, state: SessionState.FAILED, error: session.error });
  }

  private handleCaptureFailure(error: Error): void {
    errorHandler.log('warn', `Capture failed, stopping with captured audio: ${error.message}`, {
      component: 'SessionController',
      operation: 'handleCaptureFailure',
    });
    this.dispatch('stop');
  }

  // ===========================================================================
  // Transitions and Events
  // ===========================================================================

  private transition(event: SessionEvent): void {
    const target = nextState(this.state, event);
    if (target === null) {
      errorHandler.log('error', `Invalid transition: ${this.state} --${event}-->`, {
        component: 'SessionController',
        operation: 'transition',
      });
      return;
    }

    const previousState = this.state;
    this.state = target;
    errorHandler.log('info', `State: ${previousState} -> ${target}`, {
      component: 'SessionController',
      operation: 'transition',
    });

    const change: StateChangeEvent = {
      state: target,
      previousState,
      sessionId: this.session?.id ?? null,
      timestamp: this.now(),
      device: this.session?.device ?? null,
      elapsedMs: this.getElapsedMs(),
    };
    this.notify('stateChange', change);

    if (isTerminalState(target)) {
      this.scheduleAutoAcknowledge();
    }
  }

  private emitResult(event: SessionResultEvent): void {
    this.notify('result', event);
  }

  /**
   * Call each observer in turn. A throwing observer is logged and never
   * interrupts the transition that produced the event.
   */
  private notify(eventName: ControllerEventName, payload: unknown): void {
    for (const listener of this.listeners(eventName)) {
      try {
        listener.call(this, payload);
      } catch (error) {
        errorHandler.handle(error, {
          component: 'SessionController',
          operation: `notify:${eventName}`,
          data: { state: this.state },
        });
      }
    }
  }

  private scheduleAutoAcknowledge(): void {
    this.clearAcknowledgeTimer();
    const delay = this.config.autoAcknowledgeMs;
    const session = this.session;
    if (delay === null || !session) return;

    const { id } = session;
    this.acknowledgeTimer = setTimeout(() => {
      this.acknowledgeTimer = null;
      if (this.session?.id === id) {
        this.dispatch('acknowledge');
      }
    }, delay);
    this.acknowledgeTimer.unref();
  }

  private clearAcknowledgeTimer(): void {
    if (this.acknowledgeTimer) {
      clearTimeout(this.acknowledgeTimer);
      this.acknowledgeTimer = null;
    }
  }

  // ===========================================================================
  // Watchdog
  // ===========================================================================

  private startWatchdog(): void {
    this.stopWatchdog();
    if (this.config.maxRecordingMs === null) return;

    this.watchdogTimer = setInterval(() => this.watchdogCheck(), this.config.watchdogIntervalMs);
    this.watchdogTimer.unref();
  }

  private stopWatchdog(): void {
    if (this.watchdogTimer) {
      clearInterval(this.watchdogTimer);
      this.watchdogTimer = null;
    }
  }

  private watchdogCheck(): void {
    const limit = this.config.maxRecordingMs;
    if (limit === null || this.state !== SessionState.RECORDING) return;

    if (this.getElapsedMs() >= limit) {
      errorHandler.log('info', 'Maximum recording duration reached, stopping', {
        component: 'SessionController',
        operation: 'watchdogCheck',
        data: { maxRecordingMs: limit },
      });
      this.stopWatchdog();
      this.dispatch('stop');
    }
  }

  // ===========================================================================
  // Teardown
  // ===========================================================================

  destroy(): void {
    this.stopWatchdog();
    this.clearAcknowledgeTimer();
    this.abortController?.abort();
    this.abortController = null;
    this.capture.cancel();
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
    this.removeAllListeners();
  }
}

export default SessionController;

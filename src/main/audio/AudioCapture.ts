/**
 * AudioCapture.ts - Microphone capture service
 *
 * Owns the input stream for one recording at a time:
 * - Opens the requested device, falling back to the system default
 * - Accumulates frame-aligned s16le blocks while recording
 * - Drops incoming audio while paused (the stream stays open)
 * - Computes live levels off the data path for waveform display
 *
 * The data handler only aligns and queues bytes; RMS/peak math runs in a
 * setImmediate batch so a slow observer never stalls the stream.
 */

import { EventEmitter } from 'events';
import type {
  AudioDevice,
  AudioLevelEvent,
  DeviceFallbackEvent,
  PcmFormat,
} from '../../shared/types';
import { CancelledError, CaptureStateError, DeviceUnavailableError } from '../errors';
import { errorHandler } from '../ErrorHandler';
import type { AudioInputStream, DeviceInventory } from './DeviceInventory';
import { bytesPerFrame, computeBlockLevels, framesToMs, normalizeLevel } from './audioUtils';

// ============================================================================
// Types and Interfaces
// ============================================================================

export interface AudioBlock {
  /** Interleaved s16le samples, always a whole number of frames */
  readonly samples: Buffer;
  readonly rms: number;
  readonly peak: number;
}

/**
 * Everything captured during one recording, in arrival order.
 */
export interface AudioBuffer {
  readonly sampleRate: number;
  readonly channels: number;
  readonly blocks: readonly AudioBlock[];
  readonly totalFrames: number;
}

export type CaptureStatus = 'idle' | 'starting' | 'capturing' | 'paused' | 'stopping';

/**
 * Wrap already-recorded PCM (e.g. a WAV file's data chunk) as an AudioBuffer.
 */
export function createAudioBuffer(pcm: Buffer, format: PcmFormat): AudioBuffer {
  const frameBytes = bytesPerFrame(format.channels);
  const aligned = pcm.subarray(0, pcm.byteLength - (pcm.byteLength % frameBytes));
  const blocks: AudioBlock[] =
    aligned.byteLength > 0 ? [{ samples: aligned, ...computeBlockLevels(aligned) }] : [];
  return Object.freeze({
    sampleRate: format.sampleRate,
    channels: format.channels,
    blocks: Object.freeze(blocks),
    totalFrames: aligned.byteLength / frameBytes,
  });
}

export interface AudioCaptureConfig extends PcmFormat {
  /** Window over which displayed RMS is averaged */
  levelWindowMs: number;
  /** Number of recent levels kept for waveform display */
  levelHistorySize: number;
}

const DEFAULT_CONFIG: AudioCaptureConfig = {
  sampleRate: 16000,
  channels: 1,
  levelWindowMs: 50,
  levelHistorySize: 48,
};

// ============================================================================
// AudioCapture Implementation
// ============================================================================

export class AudioCapture extends EventEmitter {
  private readonly inventory: DeviceInventory;
  private readonly config: AudioCaptureConfig;
  private readonly frameBytes: number;
  private readonly windowFrames: number;

  private status: CaptureStatus = 'idle';
  private stream: AudioInputStream | null = null;
  private device: AudioDevice | null = null;
  private startToken = 0;
  /** Whether samples flushed after stop() belong to the recording */
  private acceptTail = false;

  private blocks: AudioBlock[] = [];
  private totalFrames = 0;
  private carry: Buffer = Buffer.alloc(0);

  // Level computation state
  private pending: Buffer[] = [];
  private levelTimer: NodeJS.Immediate | null = null;
  private windowFramesSeen = 0;
  private windowSumSquares = 0;
  private levelHistory: number[] = [];

  constructor(inventory: DeviceInventory, config: Partial<AudioCaptureConfig> = {}) {
    super();
    this.inventory = inventory;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.frameBytes = bytesPerFrame(this.config.channels);
    this.windowFrames = Math.max(
      1,
      Math.round((this.config.sampleRate * this.config.levelWindowMs) / 1000)
    );
  }

  // ==========================================================================
  // Capture Control
  // ==========================================================================

  /**
   * Open the input device and begin accumulating audio.
   *
   * @param deviceId - Requested device, or null for the system default
   * @returns The device actually in use
   */
  async start(deviceId: string | null): Promise<AudioDevice> {
    if (this.status !== 'idle') {
      throw new CaptureStateError('start', this.status);
    }

    this.status = 'starting';
    this.resetBuffers();
    const token = ++this.startToken;
    const format: PcmFormat = { sampleRate: this.config.sampleRate, channels: this.config.channels };

    let stream: AudioInputStream;
    try {
      stream = await this.openWithFallback(deviceId, format);
    } catch (error) {
      if (token === this.startToken) {
        this.status = 'idle';
      }
      throw error;
    }

    // cancel() ran while the device was opening
    if (token !== this.startToken || this.status !== 'starting') {
      this.discardStream(stream);
      throw new CancelledError('Audio capture cancelled during start');
    }

    this.stream = stream;
    this.device = stream.device;
    this.status = 'capturing';

    stream.on('data', (chunk: Buffer) => this.handleData(chunk));
    stream.on('end', (error: Error | null) => this.handleStreamEnd(stream, error));

    errorHandler.log('info', `Capture started on ${stream.device.name}`, {
      component: 'AudioCapture',
      operation: 'start',
      data: { deviceId: stream.device.id, sampleRate: format.sampleRate, channels: format.channels },
    });

    return stream.device;
  }

  pause(): void {
    if (this.status !== 'capturing') {
      throw new CaptureStateError('pause', this.status);
    }
    this.status = 'paused';
  }

  resume(): void {
    if (this.status !== 'paused') {
      throw new CaptureStateError('resume', this.status);
    }
    this.status = 'capturing';
  }

  /**
   * Close the stream and hand over everything captured, including the
   * samples the device still had buffered when recording stopped.
   */
  async stop(): Promise<AudioBuffer> {
    if (this.status !== 'capturing' && this.status !== 'paused') {
      throw new CaptureStateError('stop', this.status);
    }

    const token = this.startToken;
    this.acceptTail = this.status === 'capturing';
    this.status = 'stopping';
    const stream = this.stream;
    this.stream = null;
    if (stream) {
      await stream.close();
    }

    // cancel() ran while the device was draining
    if (token !== this.startToken) {
      throw new CancelledError('Audio capture cancelled during stop');
    }

    this.processPending();
    const blocks = Object.freeze(this.blocks.slice());
    const buffer: AudioBuffer = Object.freeze({
      sampleRate: this.config.sampleRate,
      channels: this.config.channels,
      blocks,
      totalFrames: this.totalFrames,
    });

    errorHandler.log('info', 'Capture stopped', {
      component: 'AudioCapture',
      operation: 'stop',
      data: { frames: this.totalFrames, blocks: blocks.length },
    });

    this.status = 'idle';
    this.resetBuffers();
    return buffer;
  }

  /**
   * Abort capture and discard all audio. Safe from any status.
   */
  cancel(): void {
    this.startToken++;
    this.closeStream();
    this.resetBuffers();
    if (this.status !== 'idle') {
      errorHandler.log('info', 'Capture cancelled', {
        component: 'AudioCapture',
        operation: 'cancel',
      });
    }
    this.status = 'idle';
  }

  getStatus(): CaptureStatus {
    return this.status;
  }

  getDevice(): AudioDevice | null {
    return this.device;
  }

  /**
   * Duration of audio accepted so far, including bytes not yet level-processed.
   */
  getCapturedMs(): number {
    const queuedBytes = this.pending.reduce((sum, chunk) => sum + chunk.byteLength, 0);
    const frames = this.totalFrames + queuedBytes / this.frameBytes;
    return framesToMs(frames, this.config.sampleRate);
  }

  // ==========================================================================
  // Event Subscription
  // ==========================================================================

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

  // ==========================================================================
  // Device Opening
  // ==========================================================================

  private async openWithFallback(
    deviceId: string | null,
    format: PcmFormat
  ): Promise<AudioInputStream> {
    if (deviceId === null) {
      return this.openDefault(format);
    }

    try {
      return await this.inventory.open(deviceId, format);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      errorHandler.log('warn', `Requested device unavailable, falling back to default`, {
        component: 'AudioCapture',
        operation: 'openWithFallback',
        data: { deviceId, reason },
      });

      const stream = await this.openDefault(format);
      const event: DeviceFallbackEvent = { requested: deviceId, used: stream.device, reason };
      this.emit('deviceFallback', event);
      return stream;
    }
  }

  private async openDefault(format: PcmFormat): Promise<AudioInputStream> {
    try {
      return await this.inventory.open(null, format);
    } catch (error) {
      if (error instanceof DeviceUnavailableError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new DeviceUnavailableError(`No audio input device available: ${reason}`);
    }
  }

  // ==========================================================================
  // Data Path
  // ==========================================================================

  private handleData(chunk: Buffer): void {
    if (this.status !== 'capturing' && this.status !== 'paused' && this.status !== 'stopping') return;

    // Keep frame alignment across chunks, also while paused
    const joined = this.carry.byteLength > 0 ? Buffer.concat([this.carry, chunk]) : chunk;
    const alignedBytes = joined.byteLength - (joined.byteLength % this.frameBytes);
    this.carry = Buffer.from(joined.subarray(alignedBytes));

    const accepting = this.status === 'capturing' || (this.status === 'stopping' && this.acceptTail);
    if (!accepting || alignedBytes === 0) return;

    this.pending.push(joined.subarray(0, alignedBytes));
    if (!this.levelTimer) {
      this.levelTimer = setImmediate(() => {
        this.levelTimer = null;
        this.processPending();
      });
    }
  }

  private handleStreamEnd(stream: AudioInputStream, error: Error | null): void {
    if (stream !== this.stream) return;
    if (this.status !== 'capturing' && this.status !== 'paused') return;

    const fatal = error ?? new Error('Audio input stream ended unexpectedly');
    errorHandler.log('error', 'Audio input stream ended while recording', {
      component: 'AudioCapture',
      operation: 'handleStreamEnd',
      error: fatal.message,
    });
    this.emit('fatalError', fatal);
  }

  /**
   * Turn queued bytes into blocks cut at level-window boundaries.
   */
  private processPending(): void {
    if (this.levelTimer) {
      clearImmediate(this.levelTimer);
      this.levelTimer = null;
    }

    const chunks = this.pending;
    this.pending = [];

    for (const chunk of chunks) {
      let offset = 0;
      while (offset < chunk.byteLength) {
        const framesLeftInWindow = this.windowFrames - this.windowFramesSeen;
        const take = Math.min(chunk.byteLength - offset, framesLeftInWindow * this.frameBytes);
        const samples = chunk.subarray(offset, offset + take);
        offset += take;
        this.appendBlock(samples);
      }
    }
  }

  private appendBlock(samples: Buffer): void {
    const { rms, peak } = computeBlockLevels(samples);
    const frames = samples.byteLength / this.frameBytes;
    const sampleCount = samples.byteLength / 2;

    this.blocks.push({ samples, rms, peak });
    this.totalFrames += frames;

    this.windowSumSquares += rms * rms * sampleCount;
    this.windowFramesSeen += frames;

    if (this.windowFramesSeen >= this.windowFrames) {
      const windowSamples = this.windowFramesSeen * this.config.channels;
      const windowRms = Math.sqrt(this.windowSumSquares / windowSamples);
      this.windowFramesSeen = 0;
      this.windowSumSquares = 0;
      this.emitLevel(normalizeLevel(windowRms));
    }
  }

  private emitLevel(level: number): void {
    this.levelHistory.push(level);
    if (this.levelHistory.length > this.config.levelHistorySize) {
      this.levelHistory.splice(0, this.levelHistory.length - this.config.levelHistorySize);
    }
    const event: AudioLevelEvent = { rms: level, history: [...this.levelHistory] };
    this.emit('level', event);
  }

  // ==========================================================================
  // Cleanup
  // ==========================================================================

  private closeStream(): void {
    if (this.levelTimer) {
      clearImmediate(this.levelTimer);
      this.levelTimer = null;
    }
    const stream = this.stream;
    this.stream = null;
    if (stream) {
      this.discardStream(stream);
    }
  }

  private discardStream(stream: AudioInputStream): void {
    stream.close().catch((error: unknown) => {
      errorHandler.handle(error, { component: 'AudioCapture', operation: 'closeStream' });
    });
  }

  private resetBuffers(): void {
    this.blocks = [];
    this.totalFrames = 0;
    this.carry = Buffer.alloc(0);
    this.pending = [];
    this.windowFramesSeen = 0;
    this.windowSumSquares = 0;
    this.levelHistory = [];
  }
}

export default AudioCapture;

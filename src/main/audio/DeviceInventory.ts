/**
 * DeviceInventory - opens microphone sample streams.
 *
 * The FfmpegDeviceInventory implementation spawns ffmpeg with the
 * platform's capture backend and reads raw s16le PCM from its stdout.
 * The ffmpeg process is the capture loop: it keeps running while the
 * session is paused so resume has no device re-open latency.
 */

import { EventEmitter } from 'events';
import { spawn, type ChildProcess } from 'child_process';
import type { AudioDevice, PcmFormat } from '../../shared/types';
import { DeviceUnavailableError, hasErrnoCode } from '../errors';
import { SAFE_CHILD_ENV, detectAudioDevices } from './DeviceDetector';
import { logger } from '../utils/logger';

// ============================================================================
// Interfaces
// ============================================================================

/**
 * A live PCM stream from one input device.
 *
 * Emits `data` with s16le chunks (arbitrary length, not frame aligned) and
 * `end` once if the stream dies on its own (null error = clean EOF).
 * `close()` never emits `end`; it resolves once the device has stopped and
 * the last buffered chunk has been emitted as `data`.
 */
export interface AudioInputStream {
  readonly device: AudioDevice;
  on(event: 'data', listener: (chunk: Buffer) => void): this;
  on(event: 'end', listener: (error: Error | null) => void): this;
  close(): Promise<void>;
}

export interface DeviceInventory {
  listDevices(): Promise<AudioDevice[]>;
  /**
   * Open a device by identifier, or the system default when `deviceId` is null.
   * Rejects with DeviceUnavailableError when the device cannot be opened.
   */
  open(deviceId: string | null, format: PcmFormat): Promise<AudioInputStream>;
}

export const SYSTEM_DEFAULT_DEVICE: AudioDevice = {
  id: 'default',
  name: 'System default',
  isDefault: true,
};

// ============================================================================
// ffmpeg-backed stream
// ============================================================================

const STARTUP_GRACE_PERIOD_MS = 300; // ms to wait after spawn to verify process stays alive
const STOP_TIMEOUT_MS = 2000;

class FfmpegAudioStream extends EventEmitter implements AudioInputStream {
  readonly device: AudioDevice;
  private process: ChildProcess;
  private closing = false;
  private exited = false;
  private closed: Promise<void> | null = null;
  private pending: Buffer[] = [];
  private stderrBuffer = '';

  constructor(device: AudioDevice, process: ChildProcess) {
    super();
    this.device = device;
    this.process = process;

    // Chunks that arrive before a consumer subscribes are held, not dropped
    this.on('newListener', (event: string | symbol) => {
      if (event === 'data' && this.pending.length > 0) {
        setImmediate(() => this.flushPending());
      }
    });

    // Keeps forwarding after close() so the tail ffmpeg flushes on SIGINT is kept
    this.process.stdout?.on('data', (chunk: Buffer) => {
      if (this.listenerCount('data') === 0) {
        this.pending.push(chunk);
        return;
      }
      this.emit('data', chunk);
    });

    this.process.stderr?.on('data', (data: Buffer) => {
      this.stderrBuffer = (this.stderrBuffer + data.toString()).slice(-4096);
    });

    this.process.once('close', () => {
      this.exited = true;
    });

    this.process.once('exit', (code, signal) => {
      if (this.closing) return;
      const message = this.stderrBuffer.trim() || `ffmpeg exited (code ${code}, signal ${signal})`;
      logger.warn(`[DeviceInventory] Capture process ended unexpectedly: ${message}`);
      this.emit('end', code === 0 ? null : new Error(message));
    });
  }

  private flushPending(): void {
    const chunks = this.pending;
    this.pending = [];
    for (const chunk of chunks) {
      this.emit('data', chunk);
    }
  }

  close(): Promise<void> {
    if (this.closed) return this.closed;
    this.closing = true;

    const proc = this.process;
    this.closed = new Promise<void>((resolve) => {
      if (this.exited) {
        resolve();
        return;
      }
      const forceKill = setTimeout(() => {
        if (proc.exitCode === null) {
          logger.warn('[DeviceInventory] ffmpeg did not stop after SIGINT, killing it');
          proc.kill('SIGKILL');
        }
      }, STOP_TIMEOUT_MS);
      forceKill.unref();

      // 'close' fires after stdout has ended, so every flushed chunk is out
      proc.once('close', () => {
        clearTimeout(forceKill);
        resolve();
      });
      if (proc.exitCode === null && proc.signalCode === null) {
        proc.kill('SIGINT');
      }
    });
    return this.closed;
  }
}

// ============================================================================
// FfmpegDeviceInventory
// ============================================================================

export class FfmpegDeviceInventory implements DeviceInventory {
  private readonly platform: NodeJS.Platform;

  constructor(platform: NodeJS.Platform = process.platform) {
    this.platform = platform;
  }

  async listDevices(): Promise<AudioDevice[]> {
    const detected = await detectAudioDevices(this.platform);
    return [SYSTEM_DEFAULT_DEVICE, ...detected];
  }

  async open(deviceId: string | null, format: PcmFormat): Promise<AudioInputStream> {
    const device = await this.resolveDevice(deviceId);
    const args = [
      '-hide_banner',
      '-loglevel', 'error',
      ...this.inputArgs(device),
      '-ac', String(format.channels),
      '-ar', String(format.sampleRate),
      '-acodec', 'pcm_s16le',
      '-f', 's16le',
      'pipe:1',
    ];

    logger.info(`[DeviceInventory] Opening input device: ${device.name} (${device.id})`);
    const child = await this.spawnWithGracePeriod(args);
    return new FfmpegAudioStream(device, child);
  }

  buildInputArgs(device: AudioDevice): string[] {
    return this.inputArgs(device);
  }

  private async resolveDevice(deviceId: string | null): Promise<AudioDevice> {
    if (deviceId === null || deviceId === SYSTEM_DEFAULT_DEVICE.id) {
      if (this.platform !== 'win32') {
        return SYSTEM_DEFAULT_DEVICE;
      }
      // dshow has no "default" alias; the first listed input is the default
      const devices = await this.detectForLookup();
      if (devices.length === 0) {
        throw new DeviceUnavailableError('No audio input device found');
      }
      return { ...devices[0], isDefault: true };
    }

    if (this.platform === 'linux') {
      return { id: deviceId, name: deviceId, isDefault: false };
    }

    const devices = await this.detectForLookup();
    const match = devices.find((d) => d.id === deviceId || d.name === deviceId);
    if (!match) {
      throw new DeviceUnavailableError(`Audio input device not found: ${deviceId}`);
    }
    return match;
  }

  private async detectForLookup(): Promise<AudioDevice[]> {
    try {
      return await detectAudioDevices(this.platform);
    } catch (error) {
      logger.warn('[DeviceInventory] Device detection failed:', error);
      return [];
    }
  }

  private inputArgs(device: AudioDevice): string[] {
    switch (this.platform) {
      case 'darwin':
        // avfoundation input: ":device" means audio-only (no video input)
        return ['-f', 'avfoundation', '-i', `:${device.id}`];
      case 'win32':
        return ['-f', 'dshow', '-i', `audio=${device.id}`];
      default:
        return ['-f', 'pulse', '-i', device.id];
    }
  }

  private spawnWithGracePeriod(args: string[]): Promise<ChildProcess> {
    return new Promise((resolve, reject) => {
      let settled = false;
      let stderrBuffer = '';

      const fail = (error: Error) => {
        if (settled) return;
        settled = true;
        const isMissingBinary = hasErrnoCode(error, 'ENOENT');
        reject(
          new DeviceUnavailableError(
            isMissingBinary
              ? 'Audio capture requires ffmpeg on PATH (brew install ffmpeg / apt install ffmpeg)'
              : `Could not open audio input: ${error.message}`
          )
        );
      };

      let child: ChildProcess;
      try {
        child = spawn('ffmpeg', args, { env: SAFE_CHILD_ENV, stdio: ['ignore', 'pipe', 'pipe'] });
      } catch (error) {
        fail(error instanceof Error ? error : new Error(String(error)));
        return;
      }

      const onStderr = (data: Buffer) => {
        stderrBuffer += data.toString();
      };
      const onEarlyExit = (code: number | null) => {
        fail(new Error(stderrBuffer.trim() || `ffmpeg exited immediately with code ${code}`));
      };

      child.stderr?.on('data', onStderr);
      child.once('exit', onEarlyExit);
      child.once('error', fail);

      // Wait for spawn, then verify process survives grace period
      child.once('spawn', () => {
        setTimeout(() => {
          if (settled || child.exitCode !== null || child.killed) return;
          settled = true;
          child.removeListener('exit', onEarlyExit);
          child.stderr?.removeListener('data', onStderr);
          resolve(child);
        }, STARTUP_GRACE_PERIOD_MS);
      });
    });
  }
}

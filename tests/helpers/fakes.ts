/**
 * In-process stand-ins for devices, ffmpeg and provider endpoints.
 */

import { EventEmitter } from 'events';
import type { AudioInputStream, DeviceInventory } from '../../src/main/audio/DeviceInventory';
import { SYSTEM_DEFAULT_DEVICE } from '../../src/main/audio/DeviceInventory';
import { DeviceUnavailableError } from '../../src/main/errors';
import type { AudioCompressor, CompressedAudio } from '../../src/main/transcription/AudioCompressor';
import type { TranscriptionProvider, TranscriptionRequest } from '../../src/main/transcription/types';
import type { AudioDevice, PcmFormat } from '../../src/shared/types';

// =============================================================================
// Audio
// =============================================================================

/**
 * Mono s16le PCM filled with one sample value.
 */
export function constantPcm(frames: number, value = 328, channels = 1): Buffer {
  const buffer = Buffer.alloc(frames * channels * 2);
  for (let i = 0; i < frames * channels; i++) {
    buffer.writeInt16LE(value, i * 2);
  }
  return buffer;
}

export class FakeAudioStream extends EventEmitter implements AudioInputStream {
  readonly device: AudioDevice;
  closed = false;
  /** Chunks the device still holds; emitted while closing, like ffmpeg's flush */
  readonly tail: Buffer[] = [];

  constructor(device: AudioDevice) {
    super();
    this.device = device;
  }

  push(chunk: Buffer): void {
    this.emit('data', chunk);
  }

  end(error: Error | null = null): void {
    this.emit('end', error);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await Promise.resolve();
    for (const chunk of this.tail.splice(0)) {
      this.emit('data', chunk);
    }
  }
}

export class FakeInventory implements DeviceInventory {
  readonly devices: AudioDevice[];
  readonly unavailable = new Set<string>();
  readonly streams: FakeAudioStream[] = [];
  readonly openCalls: Array<{ deviceId: string | null; format: PcmFormat }> = [];
  /** When set, `open` waits for this before resolving */
  gate: Promise<void> | null = null;

  constructor(devices: AudioDevice[] = [{ id: 'usb-mic', name: 'USB Mic', isDefault: false }]) {
    this.devices = devices;
  }

  async listDevices(): Promise<AudioDevice[]> {
    return [SYSTEM_DEFAULT_DEVICE, ...this.devices];
  }

  async open(deviceId: string | null, format: PcmFormat): Promise<AudioInputStream> {
    this.openCalls.push({ deviceId, format });
    if (this.gate) await this.gate;

    const key = deviceId ?? SYSTEM_DEFAULT_DEVICE.id;
    if (this.unavailable.has(key)) {
      throw new DeviceUnavailableError(`Audio input device not found: ${key}`);
    }
    const device =
      deviceId === null ? SYSTEM_DEFAULT_DEVICE : this.devices.find((d) => d.id === deviceId);
    if (!device) {
      throw new DeviceUnavailableError(`Audio input device not found: ${deviceId}`);
    }

    const stream = new FakeAudioStream(device);
    this.streams.push(stream);
    return stream;
  }

  get lastStream(): FakeAudioStream | undefined {
    return this.streams[this.streams.length - 1];
  }
}

// =============================================================================
// Compression
// =============================================================================

/**
 * Pretends to encode by shrinking the payload to a fixed ratio.
 */
export class FakeCompressor implements AudioCompressor {
  available = true;
  failWith: Error | null = null;
  calls = 0;
  private readonly ratio: number;

  constructor(ratio = 0.1) {
    this.ratio = ratio;
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async compress(wav: Buffer): Promise<CompressedAudio> {
    this.calls++;
    if (this.failWith) throw this.failWith;
    return {
      data: Buffer.alloc(Math.ceil(wav.byteLength * this.ratio)),
      mimeType: 'audio/mpeg',
      extension: '.mp3',
    };
  }
}

// =============================================================================
// Providers
// =============================================================================

type ProviderStep = string | Error | ((request: TranscriptionRequest, signal: AbortSignal) => Promise<string>);

/**
 * Provider that answers each call with the next scripted step; the last step repeats.
 */
export class ScriptedProvider implements TranscriptionProvider {
  readonly name: string;
  readonly requests: TranscriptionRequest[] = [];
  private readonly steps: ProviderStep[];

  constructor(name: string, steps: ProviderStep[]) {
    this.name = name;
    this.steps = steps;
  }

  async transcribe(request: TranscriptionRequest, signal: AbortSignal): Promise<string> {
    const step = this.steps[Math.min(this.requests.length, this.steps.length - 1)];
    this.requests.push(request);
    if (typeof step === 'string') return step;
    if (step instanceof Error) throw step;
    return step(request, signal);
  }
}

/**
 * Provider keyed by segment file name, so concurrent calls stay deterministic.
 */
export class SegmentEchoProvider implements TranscriptionProvider {
  readonly name: string;
  readonly requests: TranscriptionRequest[] = [];
  private readonly texts: Record<string, string>;

  constructor(name: string, texts: Record<string, string>) {
    this.name = name;
    this.texts = texts;
  }

  async transcribe(request: TranscriptionRequest): Promise<string> {
    this.requests.push(request);
    return this.texts[request.fileName] ?? '';
  }
}

/**
 * A promise with its resolve/reject exposed.
 */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: Error) => void } {
  let resolve: (value: T) => void = () => {};
  let reject: (error: Error) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

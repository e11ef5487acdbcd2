/**
 * Chunker - turns a captured AudioBuffer into upload-sized segments.
 *
 * Strategy, in order:
 * 1. The whole recording as one WAV when it fits the ceiling
 * 2. One compressed (MP3) segment when compression brings it under
 * 3. Frame-aligned WAV splits, contiguous and non-overlapping
 */

import type { AudioBuffer } from '../audio/AudioCapture';
import {
  WAV_HEADER_BYTES,
  bytesPerFrame,
  encodePcm16Wav,
  framesToMs,
} from '../audio/audioUtils';
import { SegmentSizeExceededError } from '../errors';
import { errorHandler } from '../ErrorHandler';
import type { AudioCompressor } from './AudioCompressor';

// ============================================================================
// Types
// ============================================================================

export interface AudioSegment {
  /** Position in the recording, contiguous from 0 */
  readonly index: number;
  /** Encoded payload ready for upload */
  readonly data: Buffer;
  readonly mimeType: string;
  readonly fileName: string;
  readonly startFrame: number;
  readonly frameCount: number;
  readonly startMs: number;
  readonly endMs: number;
  readonly compressed: boolean;
}

export interface ChunkerOptions {
  /** Upload ceiling per segment, container header included */
  maxSegmentBytes: number;
  /** Optional duration ceiling per segment */
  maxSegmentMs: number | null;
}

export const DEFAULT_MAX_SEGMENT_BYTES = 25 * 1024 * 1024; // provider upload limit

const DEFAULT_OPTIONS: ChunkerOptions = {
  maxSegmentBytes: DEFAULT_MAX_SEGMENT_BYTES,
  maxSegmentMs: null,
};

// ============================================================================
// Chunker
// ============================================================================

export class Chunker {
  private readonly options: ChunkerOptions;
  private readonly compressor: AudioCompressor | null;

  constructor(options: Partial<ChunkerOptions> = {}, compressor: AudioCompressor | null = null) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.compressor = compressor;
  }

  async chunk(buffer: AudioBuffer): Promise<AudioSegment[]> {
    if (buffer.totalFrames === 0 || buffer.blocks.length === 0) {
      return [];
    }

    const pcm = Buffer.concat(buffer.blocks.map((block) => block.samples));
    const totalFrames = pcm.byteLength / bytesPerFrame(buffer.channels);
    const durationMs = framesToMs(totalFrames, buffer.sampleRate);
    const { maxSegmentBytes, maxSegmentMs } = this.options;
    const withinDuration = maxSegmentMs === null || durationMs <= maxSegmentMs;

    if (WAV_HEADER_BYTES + pcm.byteLength <= maxSegmentBytes && withinDuration) {
      const wav = encodePcm16Wav(pcm, buffer.sampleRate, buffer.channels);
      return [this.makeSegment(0, wav, 'audio/wav', '.wav', 0, totalFrames, buffer.sampleRate, false)];
    }

    if (withinDuration) {
      const compressed = await this.tryCompress(pcm, buffer);
      if (compressed) {
        return [
          this.makeSegment(
            0,
            compressed.data,
            compressed.mimeType,
            compressed.extension,
            0,
            totalFrames,
            buffer.sampleRate,
            true
          ),
        ];
      }
    }

    return this.split(pcm, buffer.sampleRate, buffer.channels);
  }

  private async tryCompress(
    pcm: Buffer,
    buffer: AudioBuffer
  ): Promise<{ data: Buffer; mimeType: string; extension: string } | null> {
    if (!this.compressor) return null;

    try {
      if (!(await this.compressor.isAvailable())) {
        return null;
      }
      const wav = encodePcm16Wav(pcm, buffer.sampleRate, buffer.channels);
      const compressed = await this.compressor.compress(wav);
      if (compressed.data.byteLength > 0 && compressed.data.byteLength <= this.options.maxSegmentBytes) {
        errorHandler.log('info', 'Recording compressed into a single segment', {
          component: 'Chunker',
          operation: 'tryCompress',
          data: { wavBytes: wav.byteLength, compressedBytes: compressed.data.byteLength },
        });
        return compressed;
      }
      errorHandler.log('info', 'Compressed audio still over the ceiling, splitting', {
        component: 'Chunker',
        operation: 'tryCompress',
        data: { compressedBytes: compressed.data.byteLength, maxSegmentBytes: this.options.maxSegmentBytes },
      });
    } catch (error) {
      errorHandler.log('warn', 'Compression failed, splitting raw audio', {
        component: 'Chunker',
        operation: 'tryCompress',
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return null;
  }

  private split(pcm: Buffer, sampleRate: number, channels: number): AudioSegment[] {
    const frameBytes = bytesPerFrame(channels);
    const { maxSegmentBytes, maxSegmentMs } = this.options;

    if (WAV_HEADER_BYTES + frameBytes > maxSegmentBytes) {
      throw new SegmentSizeExceededError(
        maxSegmentBytes,
        `a single ${frameBytes}-byte frame plus the ${WAV_HEADER_BYTES}-byte header does not fit`
      );
    }

    let framesPerSegment = Math.floor((maxSegmentBytes - WAV_HEADER_BYTES) / frameBytes);
    if (maxSegmentMs !== null) {
      framesPerSegment = Math.min(
        framesPerSegment,
        Math.max(1, Math.floor((maxSegmentMs * sampleRate) / 1000))
      );
    }

    const totalFrames = pcm.byteLength / frameBytes;
    const segments: AudioSegment[] = [];
    for (let startFrame = 0; startFrame < totalFrames; startFrame += framesPerSegment) {
      const frameCount = Math.min(framesPerSegment, totalFrames - startFrame);
      const slice = pcm.subarray(startFrame * frameBytes, (startFrame + frameCount) * frameBytes);
      const wav = encodePcm16Wav(slice, sampleRate, channels);
      segments.push(
        this.makeSegment(segments.length, wav, 'audio/wav', '.wav', startFrame, frameCount, sampleRate, false)
      );
    }

    errorHandler.log('info', `Split recording into ${segments.length} segments`, {
      component: 'Chunker',
      operation: 'split',
      data: { framesPerSegment, totalFrames },
    });
    return segments;
  }

  private makeSegment(
    index: number,
    data: Buffer,
    mimeType: string,
    extension: string,
    startFrame: number,
    frameCount: number,
    sampleRate: number,
    compressed: boolean
  ): AudioSegment {
    return Object.freeze({
      index,
      data,
      mimeType,
      fileName: `segment-${String(index).padStart(3, '0')}${extension}`,
      startFrame,
      frameCount,
      startMs: framesToMs(startFrame, sampleRate),
      endMs: framesToMs(startFrame + frameCount, sampleRate),
      compressed,
    });
  }
}

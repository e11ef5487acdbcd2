/**
 * AudioCompressor - lossy re-encoding used when a recording is too large
 * for a single upload.
 */

import { execFile, spawn } from 'child_process';
import { SAFE_CHILD_ENV } from '../audio/DeviceDetector';
import { hasErrnoCode } from '../errors';
import { logger } from '../utils/logger';

export interface CompressedAudio {
  data: Buffer;
  mimeType: string;
  extension: string;
}

export interface AudioCompressor {
  isAvailable(): Promise<boolean>;
  compress(wav: Buffer): Promise<CompressedAudio>;
}

export interface FfmpegCompressorOptions {
  /** Target bitrate passed to `-b:a` */
  bitrate: string;
  /** Kill the encoder after this long */
  timeoutMs: number;
}

const DEFAULT_OPTIONS: FfmpegCompressorOptions = {
  bitrate: '64k',
  timeoutMs: 120_000,
};

/**
 * Encodes WAV to MP3 by piping through ffmpeg. Nothing touches disk.
 */
export class FfmpegCompressor implements AudioCompressor {
  private readonly options: FfmpegCompressorOptions;
  private availability: Promise<boolean> | null = null;

  constructor(options: Partial<FfmpegCompressorOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  isAvailable(): Promise<boolean> {
    if (!this.availability) {
      this.availability = new Promise((resolve) => {
        execFile('ffmpeg', ['-version'], { env: SAFE_CHILD_ENV }, (error) => {
          if (error) {
            logger.warn(`[AudioCompressor] ffmpeg unavailable: ${error.message}`);
          }
          resolve(!error);
        });
      });
    }
    return this.availability;
  }

  compress(wav: Buffer): Promise<CompressedAudio> {
    return new Promise((resolve, reject) => {
      const args = [
        '-hide_banner',
        '-loglevel', 'error',
        '-f', 'wav',
        '-i', 'pipe:0',
        '-codec:a', 'libmp3lame',
        '-b:a', this.options.bitrate,
        '-f', 'mp3',
        'pipe:1',
      ];

      const child = spawn('ffmpeg', args, { env: SAFE_CHILD_ENV, stdio: ['pipe', 'pipe', 'pipe'] });
      const output: Buffer[] = [];
      let stderr = '';
      let settled = false;

      const timer = setTimeout(() => {
        child.kill('SIGKILL');
        finish(new Error(`ffmpeg compression timed out after ${this.options.timeoutMs}ms`));
      }, this.options.timeoutMs);

      const finish = (error: Error | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(error);
          return;
        }
        const data = Buffer.concat(output);
        logger.debug(`[AudioCompressor] Compressed ${wav.byteLength} -> ${data.byteLength} bytes`);
        resolve({ data, mimeType: 'audio/mpeg', extension: '.mp3' });
      };

      child.stdout.on('data', (chunk: Buffer) => output.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });
      child.once('error', (error) => {
        finish(
          hasErrnoCode(error, 'ENOENT') ? new Error('ffmpeg not found on PATH') : error
        );
      });
      child.once('close', (code) => {
        if (code === 0) {
          finish(null);
        } else {
          finish(new Error(stderr.trim() || `ffmpeg exited with code ${code}`));
        }
      });

      // EPIPE when ffmpeg dies before reading all input; 'close' reports the cause
      child.stdin.on('error', (error) => {
        logger.debug(`[AudioCompressor] stdin closed early: ${error.message}`);
      });
      child.stdin.end(wav);
    });
  }
}

/**
 * Audio Utility Functions
 *
 * WAV container helpers and level math shared by AudioCapture, Chunker
 * and the CLI. All PCM handled here is signed 16-bit little-endian.
 */

export const WAV_HEADER_BYTES = 44;
export const BYTES_PER_SAMPLE = 2;

/** Amplification applied to RMS for waveform display (distant microphones stay visible) */
export const LEVEL_DISPLAY_GAIN = 12;

export interface ParsedWav {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
  data: Buffer;
}

export interface BlockLevels {
  /** Root mean square in 0..1 (full scale = 1) */
  rms: number;
  /** Absolute peak in 0..1 */
  peak: number;
}

/**
 * Map an audio MIME type to a file extension.
 */
export function extensionFromMimeType(mimeType: string): string {
  const normalized = mimeType.toLowerCase();
  if (normalized.includes('mpeg') || normalized.includes('mp3')) return '.mp3';
  if (normalized.includes('ogg')) return '.ogg';
  if (normalized.includes('webm')) return '.webm';
  if (normalized.includes('wav')) return '.wav';
  return '.audio';
}

export function bytesPerFrame(channels: number): number {
  return channels * BYTES_PER_SAMPLE;
}

export function framesToMs(frames: number, sampleRate: number): number {
  return (frames / sampleRate) * 1000;
}

/**
 * Encode raw s16le PCM into a WAV container.
 *
 * @param pcm - Interleaved signed 16-bit little-endian samples
 * @returns WAV file as a Buffer (44-byte header + data)
 */
export function encodePcm16Wav(pcm: Buffer, sampleRate: number, channels: number): Buffer {
  const blockAlign = bytesPerFrame(channels);
  const byteRate = sampleRate * blockAlign;
  const dataSize = pcm.byteLength;
  const header = Buffer.alloc(WAV_HEADER_BYTES);

  // RIFF header
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + dataSize, 4);
  header.write('WAVE', 8, 'ascii');

  // fmt chunk
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16); // fmt chunk size
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(16, 34); // bits per sample

  // data chunk
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(dataSize, 40);

  return Buffer.concat([header, pcm], WAV_HEADER_BYTES + dataSize);
}

/**
 * Parse a RIFF/WAVE buffer holding 16-bit PCM.
 * Walks the chunk list so files with LIST/fact chunks before `data` work.
 */
export function parseWav(buffer: Buffer): ParsedWav {
  if (
    buffer.byteLength < 12 ||
    buffer.toString('ascii', 0, 4) !== 'RIFF' ||
    buffer.toString('ascii', 8, 12) !== 'WAVE'
  ) {
    throw new Error('Not a RIFF/WAVE file');
  }

  let offset = 12;
  let format: { audioFormat: number; channels: number; sampleRate: number; bitsPerSample: number } | null =
    null;

  while (offset + 8 <= buffer.byteLength) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    const bodyStart = offset + 8;

    if (chunkId === 'fmt ') {
      format = {
        audioFormat: buffer.readUInt16LE(bodyStart),
        channels: buffer.readUInt16LE(bodyStart + 2),
        sampleRate: buffer.readUInt32LE(bodyStart + 4),
        bitsPerSample: buffer.readUInt16LE(bodyStart + 14),
      };
    } else if (chunkId === 'data') {
      if (!format) {
        throw new Error('WAV data chunk appears before fmt chunk');
      }
      if (format.audioFormat !== 1 || format.bitsPerSample !== 16) {
        throw new Error(
          `Unsupported WAV encoding (format ${format.audioFormat}, ${format.bitsPerSample}-bit); expected 16-bit PCM`
        );
      }
      if (format.channels === 0 || format.sampleRate === 0) {
        throw new Error(`Invalid WAV format (${format.channels} channel(s) at ${format.sampleRate} Hz)`);
      }
      const end = Math.min(buffer.byteLength, bodyStart + chunkSize);
      return {
        sampleRate: format.sampleRate,
        channels: format.channels,
        bitsPerSample: format.bitsPerSample,
        data: buffer.subarray(bodyStart, end),
      };
    }

    // Chunks are word aligned
    offset = bodyStart + chunkSize + (chunkSize % 2);
  }

  throw new Error('WAV file has no data chunk');
}

/**
 * Compute RMS and peak of a block of s16le samples, normalized to 0..1.
 * A trailing odd byte is ignored.
 */
export function computeBlockLevels(samples: Buffer): BlockLevels {
  const count = Math.floor(samples.byteLength / BYTES_PER_SAMPLE);
  if (count === 0) {
    return { rms: 0, peak: 0 };
  }

  let sumSquares = 0;
  let peak = 0;
  for (let i = 0; i < count; i++) {
    const value = samples.readInt16LE(i * BYTES_PER_SAMPLE);
    sumSquares += value * value;
    const magnitude = Math.abs(value);
    if (magnitude > peak) peak = magnitude;
  }

  return {
    rms: Math.sqrt(sumSquares / count) / 32768,
    peak: peak / 32768,
  };
}

/**
 * Scale an RMS value for display, clamped to 1.
 */
export function normalizeLevel(rms: number): number {
  return Math.min(1, rms * LEVEL_DISPLAY_GAIN);
}

/**
 * DeviceDetector — List audio input devices via ffmpeg.
 *
 * Parses the stderr output of `ffmpeg -list_devices true` for avfoundation
 * (macOS) and dshow (Windows). Linux/PulseAudio has no listing here; the
 * inventory only offers the system default there.
 */

import { execFile as execFileCb } from 'child_process';
import type { AudioDevice } from '../../shared/types';
import { logger } from '../utils/logger';
import { hasErrnoCode } from '../errors';

// Minimal environment for child processes — prevents env variable leakage
export const SAFE_CHILD_ENV = {
  PATH: process.env.PATH,
  HOME: process.env.HOME || process.env.USERPROFILE,
  USERPROFILE: process.env.USERPROFILE,
  LANG: process.env.LANG,
  TMPDIR: process.env.TMPDIR || process.env.TEMP,
  TEMP: process.env.TEMP,
  XDG_RUNTIME_DIR: process.env.XDG_RUNTIME_DIR,
  PULSE_SERVER: process.env.PULSE_SERVER,
};

/**
 * Detect available audio input devices for the current platform.
 */
export async function detectAudioDevices(
  platform: NodeJS.Platform = process.platform
): Promise<AudioDevice[]> {
  if (platform === 'darwin') {
    const stderr = await runFfmpegDeviceList(['-f', 'avfoundation', '-list_devices', 'true', '-i', '']);
    return parseAvfoundationDevices(stderr);
  }

  if (platform === 'win32') {
    const stderr = await runFfmpegDeviceList(['-f', 'dshow', '-list_devices', 'true', '-i', 'dummy']);
    return parseDshowDevices(stderr);
  }

  return [];
}

function runFfmpegDeviceList(args: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    execFileCb('ffmpeg', ['-hide_banner', ...args], { env: SAFE_CHILD_ENV }, (error, _stdout, stderr) => {
      // ffmpeg always exits non-zero for -list_devices because the input is a dummy.
      // The device list is in stderr regardless.
      const output = stderr?.toString() ?? '';
      if (hasErrnoCode(error, 'ENOENT')) {
        reject(new Error('ffmpeg not found on PATH. Install ffmpeg to list audio devices.'));
        return;
      }
      resolve(output);
    });
  });
}

/**
 * Parse ffmpeg avfoundation device list stderr output.
 *
 * Expected format:
 * ```
 * [AVFoundation indev @ ...] AVFoundation video devices:
 * [AVFoundation indev @ ...] [0] FaceTime HD Camera
 * [AVFoundation indev @ ...] AVFoundation audio devices:
 * [AVFoundation indev @ ...] [0] MacBook Pro Microphone
 * [AVFoundation indev @ ...] [1] External Microphone
 * ```
 */
export function parseAvfoundationDevices(stderr: string): AudioDevice[] {
  const audio: AudioDevice[] = [];
  let inAudioSection = false;

  const deviceLineRegex = /\[AVFoundation.*?\]\s*\[(\d+)\]\s*(.+)/;

  for (const line of stderr.split('\n')) {
    if (/AVFoundation video devices/i.test(line)) {
      inAudioSection = false;
      continue;
    }
    if (/AVFoundation audio devices/i.test(line)) {
      inAudioSection = true;
      continue;
    }
    if (!inAudioSection) continue;

    const match = deviceLineRegex.exec(line);
    if (match) {
      audio.push({ id: match[1], name: match[2].trim(), isDefault: false });
    }
  }

  logger.debug(`[DeviceDetector] Detected ${audio.length} avfoundation audio device(s)`);
  return audio;
}

/**
 * Parse ffmpeg dshow device list stderr output.
 *
 * Handles both layouts ffmpeg has used:
 * ```
 * [dshow @ ...] "Microphone (Realtek Audio)" (audio)
 * ```
 * and the older sectioned one:
 * ```
 * [dshow @ ...] DirectShow audio devices
 * [dshow @ ...]  "Microphone (Realtek Audio)"
 * ```
 */
export function parseDshowDevices(stderr: string): AudioDevice[] {
  const audio: AudioDevice[] = [];
  let inAudioSection = false;

  const taggedRegex = /\[dshow.*?\]\s*"(.+)"\s*\(audio\)/;
  const quotedRegex = /\[dshow.*?\]\s*"(.+)"\s*$/;

  for (const line of stderr.split('\n')) {
    if (/DirectShow video devices/i.test(line)) {
      inAudioSection = false;
      continue;
    }
    if (/DirectShow audio devices/i.test(line)) {
      inAudioSection = true;
      continue;
    }
    if (/Alternative name/i.test(line)) continue;

    const tagged = taggedRegex.exec(line);
    if (tagged) {
      audio.push({ id: tagged[1], name: tagged[1], isDefault: false });
      continue;
    }

    if (inAudioSection) {
      const quoted = quotedRegex.exec(line.trimEnd());
      if (quoted) {
        audio.push({ id: quoted[1], name: quoted[1], isDefault: false });
      }
    }
  }

  logger.debug(`[DeviceDetector] Detected ${audio.length} dshow audio device(s)`);
  return audio;
}

/**
 * Builds the recording and transcription services from settings.
 *
 * Collaborators that touch devices, ffmpeg or the network can be replaced
 * through `ServiceOverrides`; everything else follows the settings.
 */

import { AudioCapture } from './audio/AudioCapture';
import { FfmpegDeviceInventory, type DeviceInventory } from './audio/DeviceInventory';
import { PostProcessor } from './pipeline/PostProcessor';
import { createCleanupProvider, type CleanupProvider } from './pipeline/ChatCleanupProvider';
import { SessionController, type SessionControllerConfig } from './SessionController';
import type { AppSettings, SettingsManager } from './settings';
import { FfmpegCompressor, type AudioCompressor } from './transcription/AudioCompressor';
import { Chunker } from './transcription/Chunker';
import { createWhisperProvider } from './transcription/providers/WhisperApiProvider';
import { TranscriptionClient } from './transcription/TranscriptionClient';
import type { ProviderName, TranscriptionProvider } from './transcription/types';
import { setLogLevel } from './utils/logger';
import { HotkeyCommandTranslator } from '../shared/hotkeys';

export interface ServiceOverrides {
  inventory?: DeviceInventory;
  compressor?: AudioCompressor | null;
  transcriptionProviders?: TranscriptionProvider[];
  cleanupProviders?: CleanupProvider[];
  now?: () => number;
}

export interface TranscriptionServices {
  chunker: Chunker;
  client: TranscriptionClient;
  postProcessor: PostProcessor;
}

export interface Services extends TranscriptionServices {
  inventory: DeviceInventory;
  capture: AudioCapture;
  controller: SessionController;
  /** Feed global hotkey press/release events here */
  hotkeys: HotkeyCommandTranslator;
}

function providersFor(settings: SettingsManager): Array<{ name: ProviderName; apiKey: string }> {
  const configured: Array<{ name: ProviderName; apiKey: string }> = [];
  for (const name of settings.getProviderOrder()) {
    const apiKey = settings.getApiKey(name);
    if (apiKey) configured.push({ name, apiKey });
  }
  return configured;
}

const SESSION_SETTING_KEYS: ReadonlyArray<keyof AppSettings> = [
  'inputDevice',
  'postProcess',
  'minRecordingMs',
  'maxRecordingMs',
  'autoAcknowledgeMs',
];

function sessionConfigFrom(values: AppSettings): Partial<SessionControllerConfig> {
  return {
    deviceId: values.inputDevice,
    postProcess: values.postProcess,
    minRecordingMs: values.minRecordingMs,
    maxRecordingMs: values.maxRecordingMs,
    autoAcknowledgeMs: values.autoAcknowledgeMs,
  };
}

export function createTranscriptionServices(
  settings: SettingsManager,
  overrides: ServiceOverrides = {}
): TranscriptionServices {
  const values: AppSettings = settings.getAll();
  const keyed = providersFor(settings);

  const compressor = overrides.compressor === undefined ? new FfmpegCompressor() : overrides.compressor;
  const chunker = new Chunker(
    { maxSegmentBytes: values.maxSegmentBytes, maxSegmentMs: values.maxSegmentMs },
    compressor
  );

  const client = new TranscriptionClient(
    overrides.transcriptionProviders ??
      keyed.map(({ name, apiKey }) => createWhisperProvider(name, apiKey, values.whisperModel)),
    {
      retry: values.retry,
      attemptTimeoutMs: values.attemptTimeoutMs,
      concurrency: values.concurrency,
      language: values.language,
      prompt: values.prompt,
      ...(overrides.now ? { now: overrides.now } : {}),
    }
  );

  const postProcessor = new PostProcessor(
    overrides.cleanupProviders ?? keyed.map(({ name, apiKey }) => createCleanupProvider(name, apiKey))
  );

  return { chunker, client, postProcessor };
}

/**
 * Wire the whole stack. Later settings changes reach the controller's
 * session options, the hotkey mode and the log level; provider and chunking settings are
 * read once.
 */
export function createServices(settings: SettingsManager, overrides: ServiceOverrides = {}): Services {
  const values = settings.getAll();
  setLogLevel(values.logLevel);

  const inventory = overrides.inventory ?? new FfmpegDeviceInventory();
  const capture = new AudioCapture(inventory, {
    sampleRate: values.sampleRate,
    channels: values.channels,
  });
  const transcription = createTranscriptionServices(settings, overrides);

  const controller = new SessionController(
    {
      capture,
      chunker: transcription.chunker,
      transcriber: transcription.client,
      cleaner: transcription.postProcessor,
      now: overrides.now,
    },
    sessionConfigFrom(values)
  );
  const hotkeys = new HotkeyCommandTranslator(controller, values.recordMode);

  settings.onChange((key) => {
    const current = settings.getAll();
    if (key === 'logLevel') {
      setLogLevel(current.logLevel);
      return;
    }
    if (key === 'recordMode') {
      hotkeys.setMode(current.recordMode);
      return;
    }
    if (SESSION_SETTING_KEYS.includes(key)) {
      controller.updateConfig(sessionConfigFrom(current));
    }
  });

  return { inventory, capture, controller, hotkeys, ...transcription };
}

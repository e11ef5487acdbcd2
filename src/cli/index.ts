#!/usr/bin/env tsx
/**
 * scribekey CLI - Dictate or transcribe audio from the command line
 *
 * Usage:
 *   scribekey record [options]        Record from the microphone and print the transcript
 *   scribekey transcribe <wav-file>   Transcribe an existing 16-bit PCM WAV file
 *   scribekey devices                 List audio input devices
 *   scribekey config                  Show effective settings
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { Command } from 'commander';
import { z, ZodError } from 'zod';
import {
  CLIPipeline,
  CLIPipelineError,
  EXIT_SUCCESS,
  EXIT_USER_ERROR,
  EXIT_SYSTEM_ERROR,
  EXIT_SIGINT,
  exitCodeForError,
} from './CLIPipeline';
import { DictationRunner } from './DictationRunner';
import { FfmpegDeviceInventory } from '../main/audio/DeviceInventory';
import { createServices, createTranscriptionServices } from '../main/services';
import { SettingsManager, API_KEY_ENV_VARS, maskSecret, type AppSettings } from '../main/settings';
import { SessionState } from '../shared/types';
import { PROVIDER_NAMES } from '../main/transcription/types';
import { getLogFilePath, setLogLevel } from '../main/utils/logger';

const packageSchema = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    const parsed = packageSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0-dev';
  } catch {
    return '0.0.0-dev';
  }
}

const VERSION = readVersion();

// ============================================================================
// Console output helpers
// ============================================================================

const SYMBOLS = {
  check: '✔',    // checkmark
  cross: '✘',    // cross
  arrow: '→',    // right arrow
  bullet: '•',   // bullet
  line: '─',     // horizontal line
} as const;

function banner(): void {
  console.log();
  console.log(`  scribekey v${VERSION} ${SYMBOLS.bullet} CLI Mode`);
  console.log(`  ${SYMBOLS.line.repeat(40)}`);
  console.log();
}

function step(message: string): void {
  console.log(`  ${SYMBOLS.arrow} ${message}`);
}

function success(message: string): void {
  console.log(`  ${SYMBOLS.check} ${message}`);
}

function fail(message: string): void {
  console.log(`  ${SYMBOLS.cross} ${message}`);
}

function printTranscript(text: string): void {
  console.log();
  console.log(text.length > 0 ? text : '(no speech detected)');
  console.log();
}

// ============================================================================
// Settings
// ============================================================================

/**
 * Load settings and apply per-run overrides. Exits on invalid overrides or
 * when no provider has an API key.
 */
function loadSettings(overrides: Partial<AppSettings>): SettingsManager {
  const settings = new SettingsManager();
  for (const warning of settings.getLoadWarnings()) {
    console.warn(`  WARNING: ${warning}`);
  }

  try {
    settings.update(overrides);
  } catch (error) {
    if (error instanceof ZodError) {
      for (const issue of error.issues) {
        fail(`Invalid option ${issue.path.join('.')}: ${issue.message}`);
      }
      process.exit(EXIT_USER_ERROR);
    }
    throw error;
  }
  setLogLevel(settings.get('logLevel'));

  if (settings.getProviderOrder().length === 0) {
    fail('No transcription API key found.');
    console.log(`  Set ${PROVIDER_NAMES.map((name) => API_KEY_ENV_VARS[name]).join(' or ')}.`);
    process.exit(EXIT_USER_ERROR);
  }
  return settings;
}

function overridesFrom(options: { device?: string; language?: string; postProcess?: boolean }): Partial<AppSettings> {
  const overrides: Partial<AppSettings> = {};
  if (options.device !== undefined) overrides.inputDevice = options.device;
  if (options.language !== undefined) overrides.language = options.language;
  if (options.postProcess) overrides.postProcess = true;
  return overrides;
}

// ============================================================================
// CLI definition
// ============================================================================

const program = new Command();

program
  .name('scribekey')
  .description('Record speech and turn it into text with cloud Whisper providers')
  .version(VERSION, '-v, --version')
  .showHelpAfterError('(use --help for available options)');

// ============================================================================
// record command
// ============================================================================

program
  .command('record')
  .description('Record from an input device and print the transcript')
  .option('--device <id>', 'Input device id or name (see `scribekey devices`)')
  .option('--language <code>', 'ISO 639-1 language hint, e.g. en')
  .option('--post-process', 'Clean up the transcript with a chat model', false)
  .action(async (options: { device?: string; language?: string; postProcess: boolean }) => {
    banner();

    if (!process.stdin.isTTY) {
      fail('record needs an interactive terminal.');
      process.exit(EXIT_USER_ERROR);
    }

    const settings = loadSettings(overridesFrom(options));
    const { controller } = createServices(settings);

    controller.onDeviceFallback((event) => {
      fail(`Device "${event.requested}" unavailable (${event.reason}); using ${event.used.name}`);
    });

    const runner = new DictationRunner(controller, process.stdin, process.stdout);
    const { result, interrupted } = await runner.run();
    controller.destroy();

    if (result.state === SessionState.COMPLETED && result.transcript) {
      const transcript = result.transcript;
      success(
        `Transcribed ${transcript.segments.length} segment(s)` +
          (transcript.postProcessed ? ` ${SYMBOLS.bullet} cleaned up via ${transcript.cleanupProvider}` : '')
      );
      printTranscript(transcript.text);
      process.exit(EXIT_SUCCESS);
    }

    if (result.state === SessionState.CANCELLED) {
      fail('Cancelled.');
      process.exit(interrupted ? EXIT_SIGINT : EXIT_SUCCESS);
    }

    const code = result.error?.code ?? 'Unexpected';
    fail(`Recording failed: ${result.error?.message ?? 'unknown error'}`);
    process.exit(exitCodeForError(code));
  });

// ============================================================================
// transcribe command
// ============================================================================

let activePipeline: CLIPipeline | null = null;

program
  .command('transcribe')
  .description('Transcribe a 16-bit PCM WAV file')
  .argument('<wav-file>', 'Path to the WAV file')
  .option('--language <code>', 'ISO 639-1 language hint, e.g. en')
  .option('--post-process', 'Clean up the transcript with a chat model', false)
  .option('--verbose', 'Verbose output', false)
  .action(async (wavFile: string, options: { language?: string; postProcess: boolean; verbose: boolean }) => {
    banner();

    const wavPath = resolve(wavFile);
    const settings = loadSettings(overridesFrom({ language: options.language, postProcess: options.postProcess }));
    const pipeline = new CLIPipeline(
      { wavPath, postProcess: settings.get('postProcess') },
      createTranscriptionServices(settings),
      step
    );
    activePipeline = pipeline;

    let interrupted = false;
    const interrupt = () => {
      interrupted = true;
      console.log('\n  Interrupted, cancelling...');
      pipeline.abort();
    };
    process.once('SIGINT', interrupt);
    process.once('SIGTERM', interrupt);

    step(`File: ${wavPath}`);
    step(`Providers: ${settings.getProviderOrder().join(` ${SYMBOLS.arrow} `)}`);
    console.log();

    try {
      const result = await pipeline.run();
      console.log();
      success(
        `Transcribed ${result.audioSeconds.toFixed(1)}s of audio in ${result.durationSeconds.toFixed(1)}s`
      );
      if (options.verbose) {
        for (const attempt of result.attempts) {
          const status = attempt.ok ? SYMBOLS.check : `${SYMBOLS.cross} ${attempt.errorKind ?? 'error'}`;
          step(`segment ${attempt.segmentIndex} ${attempt.provider} #${attempt.attempt} ${status}`);
        }
      }
      printTranscript(result.text);
    } catch (error) {
      console.log();
      const message = error instanceof Error ? error.message : String(error);
      fail(`Transcription failed: ${message}`);

      if (options.verbose && error instanceof Error && error.stack) {
        console.log();
        console.log(error.stack);
      }

      const exitCode = interrupted
        ? EXIT_SIGINT
        : error instanceof CLIPipelineError && error.severity === 'user'
          ? EXIT_USER_ERROR
          : EXIT_SYSTEM_ERROR;
      process.exit(exitCode);
    } finally {
      activePipeline = null;
      process.removeListener('SIGINT', interrupt);
      process.removeListener('SIGTERM', interrupt);
    }
  });

// ============================================================================
// devices command
// ============================================================================

program
  .command('devices')
  .description('List audio input devices')
  .action(async () => {
    banner();
    try {
      const devices = await new FfmpegDeviceInventory().listDevices();
      for (const device of devices) {
        step(`${device.name}${device.isDefault ? ' (default)' : ''}  [${device.id}]`);
      }
      console.log();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      fail(`Could not list devices: ${message}`);
      process.exit(EXIT_SYSTEM_ERROR);
    }
  });

// ============================================================================
// config command
// ============================================================================

program
  .command('config')
  .description('Show effective settings (API keys masked)')
  .action(() => {
    banner();
    const settings = new SettingsManager();

    step(`Settings file: ${settings.getStorePath()}`);
    step(`Log file:      ${getLogFilePath()}`);
    for (const warning of settings.getLoadWarnings()) {
      fail(warning);
    }
    console.log();

    for (const [key, value] of Object.entries(settings.getAll())) {
      console.log(`  ${key.padEnd(18)} ${JSON.stringify(value)}`);
    }
    console.log();
    for (const name of PROVIDER_NAMES) {
      console.log(`  ${API_KEY_ENV_VARS[name].padEnd(18)} ${maskSecret(settings.getApiKey(name))}`);
    }
    console.log();
  });

// ============================================================================
// Signal handling
// ============================================================================

process.on('SIGINT', () => {
  if (activePipeline) return;
  console.log('\n  Interrupted.');
  process.exit(EXIT_SIGINT);
});

// Show help if no command provided
if (process.argv.length <= 2) {
  banner();
  program.outputHelp();
  process.exit(EXIT_SUCCESS);
}

program.parseAsync().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  fail(message);
  process.exit(EXIT_SYSTEM_ERROR);
});

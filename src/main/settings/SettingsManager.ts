/**
 * SettingsManager - Validated settings storage for scribekey
 *
 * Handles:
 * - Persistent settings in a JSON file, validated with a zod schema
 * - API keys from the environment (GROQ_API_KEY, OPENAI_API_KEY) or a
 *   .env file in the working directory, never written to disk
 * - Change callbacks for reactive updates
 *
 * Invalid entries in the file are reported and replaced by their defaults
 * rather than discarding the whole file.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';
import { PROVIDER_NAMES, type ProviderName } from '../transcription/types';
import { logger } from '../utils/logger';

// ============================================================================
// Schema
// ============================================================================

const MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

const providerSchema = z.enum(['groq', 'openai']);
const recordModeSchema = z.enum(['toggle', 'hold']);
const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const settingsSchema = z
  .object({
    // Transcription
    primaryProvider: providerSchema,
    whisperModel: z.string().min(1),
    language: z.string().regex(/^[a-z]{2,3}$/, 'expected an ISO 639-1 code').nullable(),
    prompt: z.string().max(1000).nullable(),
    postProcess: z.boolean(),

    // Recording
    inputDevice: z.string().min(1).nullable(),
    sampleRate: z.number().int().min(8000).max(48000),
    channels: z.number().int().min(1).max(2),
    recordMode: recordModeSchema,
    minRecordingMs: z.number().int().min(0).max(10_000),
    maxRecordingMs: z.number().int().min(1000).nullable(),
    autoAcknowledgeMs: z.number().int().min(0).nullable(),

    // Upload
    maxSegmentBytes: z.number().int().min(1024).max(MAX_UPLOAD_BYTES),
    maxSegmentMs: z.number().int().min(1000).nullable(),
    retry: z
      .object({
        maxAttempts: z.number().int().min(1).max(10),
        baseDelayMs: z.number().int().min(0).max(60_000),
        maxDelayMs: z.number().int().min(0).max(300_000),
      })
      .refine((retry) => retry.maxDelayMs >= retry.baseDelayMs, {
        message: 'maxDelayMs must be at least baseDelayMs',
      }),
    attemptTimeoutMs: z.number().int().min(1000).max(600_000),
    concurrency: z.number().int().min(1).max(8),

    // Advanced
    logLevel: logLevelSchema,
  })
  .strict();

export type AppSettings = z.infer<typeof settingsSchema>;

type SettingsChangeCallback = (key: keyof AppSettings, newValue: unknown, oldValue: unknown) => void;

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_SETTINGS: AppSettings = {
  primaryProvider: 'groq',
  whisperModel: 'whisper-large-v3',
  language: 'en',
  prompt: null,
  postProcess: false,

  inputDevice: null,
  sampleRate: 16000,
  channels: 1,
  recordMode: 'toggle',
  minRecordingMs: 500,
  maxRecordingMs: 30 * 60_000,
  autoAcknowledgeMs: null,

  maxSegmentBytes: MAX_UPLOAD_BYTES,
  maxSegmentMs: null,
  retry: { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 4000 },
  attemptTimeoutMs: 60_000,
  concurrency: 3,

  logLevel: 'info',
};

export const API_KEY_ENV_VARS: Record<ProviderName, string> = {
  groq: 'GROQ_API_KEY',
  openai: 'OPENAI_API_KEY',
};

const SETTINGS_KEYS = Object.keys(DEFAULT_SETTINGS);

/**
 * Default location of the settings file: $SCRIBEKEY_CONFIG, else
 * $XDG_CONFIG_HOME/scribekey/config.json, else ~/.config/scribekey/config.json.
 */
export function defaultSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.SCRIBEKEY_CONFIG) {
    return env.SCRIBEKEY_CONFIG;
  }
  const configHome = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(configHome, 'scribekey', 'config.json');
}

// ============================================================================
// Implementation
// ============================================================================

export interface SettingsManagerOptions {
  filePath?: string;
  env?: NodeJS.ProcessEnv;
  /**
   * .env file merged into `env` without overriding set variables.
   * Defaults to `<cwd>/.env` when `env` is not given; null skips it.
   */
  dotenvPath?: string | null;
}

export class SettingsManager {
  private readonly filePath: string;
  private readonly env: NodeJS.ProcessEnv;
  private settings: AppSettings;
  private readonly apiKeys = new Map<ProviderName, string>();
  private readonly changeCallbacks = new Set<SettingsChangeCallback>();
  private loadWarnings: string[] = [];

  constructor(options: SettingsManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.filePath = options.filePath ?? defaultSettingsPath(this.env);
    this.settings = this.load();
    const dotenvPath =
      options.dotenvPath !== undefined ? options.dotenvPath : options.env ? null : join(process.cwd(), '.env');
    if (dotenvPath) {
      this.loadDotenv(dotenvPath);
    }
    this.loadApiKeysFromEnv();
  }

  // --------------------------------------------------------------------------
  // Core Methods
  // --------------------------------------------------------------------------

  get<K extends keyof AppSettings>(key: K): AppSettings[K] {
    return this.settings[key];
  }

  /**
   * Set a single setting. Throws a ZodError when the value is invalid.
   */
  set<K extends keyof AppSettings>(key: K, value: AppSettings[K]): void {
    const updates: Partial<AppSettings> = {};
    updates[key] = value;
    this.update(updates);
  }

  getAll(): AppSettings {
    return structuredClone(this.settings);
  }

  /**
   * Validate and apply several settings at once. Nothing changes when any
   * value is invalid.
   */
  update(updates: Partial<AppSettings>): AppSettings {
    const next = settingsSchema.parse({ ...this.settings, ...updates });
    const previous = this.settings;
    this.settings = next;

    for (const key of Object.keys(updates)) {
      if (!isSettingsKey(key)) continue;
      if (JSON.stringify(previous[key]) !== JSON.stringify(next[key])) {
        this.emitChange(key, next[key], previous[key]);
      }
    }
    return this.getAll();
  }

  reset(): void {
    const previous = this.settings;
    this.settings = structuredClone(DEFAULT_SETTINGS);
    for (const key of SETTINGS_KEYS) {
      if (!isSettingsKey(key)) continue;
      if (JSON.stringify(previous[key]) !== JSON.stringify(this.settings[key])) {
        this.emitChange(key, this.settings[key], previous[key]);
      }
    }
    logger.info('[SettingsManager] Reset to defaults');
  }

  getLoadWarnings(): string[] {
    return [...this.loadWarnings];
  }

  getStorePath(): string {
    return this.filePath;
  }

  // --------------------------------------------------------------------------
  // Persistence
  // --------------------------------------------------------------------------

  private load(): AppSettings {
    this.loadWarnings = [];
    if (!existsSync(this.filePath)) {
      return structuredClone(DEFAULT_SETTINGS);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.loadWarnings.push(`Could not read ${this.filePath}: ${message}`);
      logger.warn(`[SettingsManager] Ignoring unreadable settings file: ${message}`);
      return structuredClone(DEFAULT_SETTINGS);
    }

    const stored = z.record(z.unknown()).safeParse(raw);
    if (!stored.success) {
      this.loadWarnings.push(`${this.filePath} does not contain a JSON object`);
      return structuredClone(DEFAULT_SETTINGS);
    }

    // Unknown keys (including any API keys) are dropped
    const candidate: Record<string, unknown> = { ...structuredClone(DEFAULT_SETTINGS) };
    for (const [key, value] of Object.entries(stored.data)) {
      if (isSettingsKey(key)) {
        candidate[key] = value;
      }
    }

    const parsed = settingsSchema.safeParse(candidate);
    if (parsed.success) {
      return parsed.data;
    }

    // Replace each offending top-level key with its default
    for (const issue of parsed.error.issues) {
      const key = issue.path[0];
      if (typeof key === 'string' && isSettingsKey(key)) {
        this.loadWarnings.push(`${key}: ${issue.message}`);
        candidate[key] = structuredClone(DEFAULT_SETTINGS[key]);
      }
    }
    logger.warn(`[SettingsManager] Invalid settings replaced by defaults: ${this.loadWarnings.join('; ')}`);
    return settingsSchema.parse(candidate);
  }

  /**
   * Write settings to disk. API keys are never included.
   */
  save(): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, `${JSON.stringify(this.settings, null, 2)}\n`, 'utf-8');
    logger.info(`[SettingsManager] Saved settings to ${this.filePath}`);
  }

  // --------------------------------------------------------------------------
  // API Keys
  // --------------------------------------------------------------------------

  private loadDotenv(path: string): void {
    if (!existsSync(path)) return;

    let values: Record<string, string>;
    try {
      values = parseDotenv(readFileSync(path));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.loadWarnings.push(`Could not read ${path}: ${message}`);
      logger.warn(`[SettingsManager] Ignoring unreadable .env file: ${message}`);
      return;
    }

    const applied: string[] = [];
    for (const [name, value] of Object.entries(values)) {
      if (this.env[name] === undefined) {
        this.env[name] = value;
        applied.push(name);
      }
    }
    logger.debug(`[SettingsManager] Loaded ${applied.length} variable(s) from ${path}`);
  }

  private loadApiKeysFromEnv(): void {
    for (const provider of PROVIDER_NAMES) {
      const value = this.env[API_KEY_ENV_VARS[provider]]?.trim();
      if (value) {
        this.apiKeys.set(provider, value);
      }
    }
  }

  getApiKey(provider: ProviderName): string | null {
    return this.apiKeys.get(provider) ?? null;
  }

  /**
   * Keep a key for this process only.
   */
  setApiKey(provider: ProviderName, key: string): void {
    const normalized = key.trim();
    if (normalized.length === 0) {
      this.apiKeys.delete(provider);
      return;
    }
    this.apiKeys.set(provider, normalized);
  }

  hasApiKey(provider: ProviderName): boolean {
    return this.apiKeys.has(provider);
  }

  /**
   * Providers with a key, primary first.
   */
  getProviderOrder(): ProviderName[] {
    const primary = this.settings.primaryProvider;
    const ordered = [primary, ...PROVIDER_NAMES.filter((name) => name !== primary)];
    return ordered.filter((name) => this.apiKeys.has(name));
  }

  // --------------------------------------------------------------------------
  // Change Events
  // --------------------------------------------------------------------------

  /**
   * Subscribe to settings changes
   * @returns Unsubscribe function
   */
  onChange(callback: SettingsChangeCallback): () => void {
    this.changeCallbacks.add(callback);
    return () => {
      this.changeCallbacks.delete(callback);
    };
  }

  private emitChange(key: keyof AppSettings, newValue: unknown, oldValue: unknown): void {
    for (const callback of this.changeCallbacks) {
      try {
        callback(key, newValue, oldValue);
      } catch (error) {
        logger.error('[SettingsManager] Error in change callback:', error);
      }
    }
  }
}

function isSettingsKey(key: string): key is keyof AppSettings {
  return SETTINGS_KEYS.includes(key);
}

/**
 * Mask a secret for display, keeping the last four characters.
 */
export function maskSecret(secret: string | null): string {
  if (!secret) return '(not set)';
  if (secret.length <= 4) return '****';
  return `****${secret.slice(-4)}`;
}

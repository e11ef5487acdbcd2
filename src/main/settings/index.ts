/**
 * Settings Module
 *
 * Exports the SettingsManager for validated settings storage and
 * environment-provided API keys.
 */

export {
  SettingsManager,
  DEFAULT_SETTINGS,
  API_KEY_ENV_VARS,
  defaultSettingsPath,
  maskSecret,
  settingsSchema,
} from './SettingsManager';

export type { AppSettings, SettingsManagerOptions } from './SettingsManager';

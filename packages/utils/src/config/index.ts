export {
  loadSettings,
  saveSettings,
  createDefaultSettings,
  storedSettingsSchema,
  DEFAULT_SETTINGS_PATH,
  type Settings,
  type StoredSettings,
} from './settings.js';

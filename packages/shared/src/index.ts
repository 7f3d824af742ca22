export {
  DEFAULT_CONFIG,
  DEFAULT_CAMPAIGN_SETTINGS,
  configTemplate,
  type ConfigTemplateAnswers,
  type WorkspaceConfig,
  type SettingsValue,
} from './config.js';
export { mkdirSafe, isWritableDir } from './utils.js';
export {
  validateWorkspace,
  formatValidation,
  type ValidationCheck,
} from './validation.js';

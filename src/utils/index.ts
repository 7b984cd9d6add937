/**
 * Utilities Module Barrel Export
 *
 * Centralizes all utility exports for convenient importing.
 *
 * @module utils
 */

// ==================== Error Types ====================
export {
  ErrorCode,
  SupportFlowError,
  ValidationError,
  DialogueConfigError,
  ConfigLoadError,
  UnknownNodeError,
  type ErrorOptions,
} from './errors.js';

// ==================== Constants ====================
export {
  DEFAULT_SETTINGS,
  DEFAULT_ROOT_ID,
  ENV_VARS,
  RESET_COMMANDS,
  BACK_COMMANDS,
  REPLY_TEXT,
  getEngineSettings,
} from './constants.js';

// ==================== Logging ====================
export { logger } from './logger.js';

// ==================== Text Helpers ====================
export { normalizePhrase, tokenize, containsEitherWay } from './text.js';

// ==================== Zod Schemas ====================
export {
  EngineSettingsSchema,
  DialogueOptionSchema,
  DialogueNodeSchema,
  DialogueSchema,
  SuggestionEdgeSchema,
  FaqEntrySchema,
  SynonymGroupSchema,
  EngineConfigSchema,
  formatZodErrors,
  validateWithSchema,
  validateSafe,
  type EngineConfig,
  type EngineConfigInput,
} from './schemas.js';

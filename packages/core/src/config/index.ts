/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  DEFAULT_CONFIG,
  CONFIG_DIR,
  validatePatterns,
  validateRules,
  validateRubyVersion,
  validateIndent,
} from './ConfigLoader.js';
export type { RbstubConfig } from './ConfigLoader.js';

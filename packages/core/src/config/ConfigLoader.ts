import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYAML } from 'yaml';
import { ConfigError } from '../errors/RbstubError.js';
import { MinorVersion } from '../stubs/version.js';
import { isRuleId, type RuleId, type RuleSetting } from '../stubs/validate.js';

/**
 * rbstub configuration schema.
 *
 * Location: .rbstub/config.yaml (preferred) or .rbstub/config.json (deprecated)
 *
 * Example config.yaml:
 *
 * ```yaml
 * # Directory holding rubystubsXY/ version directories
 * stubsPath: vsix/stubs
 * rubyVersion: "3.3"
 *
 * include: ["**\/*.rb"]
 * exclude: ["**\/tk*.rb"]
 *
 * rules:
 *   missing-doc: error
 *   doc-param-mismatch: off
 *
 * strictDocs: false
 * indent: 2
 * ```
 */
export interface RbstubConfig {
  /** Directory containing one rubystubsXY/ directory per version, relative to the project */
  stubsPath: string;

  /** Requested runtime version; the closest supported stub set is used */
  rubyVersion: string;

  /**
   * Glob patterns (relative to the version directory) for stub files to load.
   * Undefined means every *.rb file.
   */
  include?: string[];

  /** Glob patterns for stub files to skip */
  exclude?: string[];

  /** Per-rule severity overrides */
  rules: Partial<Record<RuleId, RuleSetting>>;

  /** Require doc comments on alias and mixin lines as well */
  strictDocs: boolean;

  /** Spaces per nesting level used by `rbstub fmt` */
  indent: number;
}

export const DEFAULT_CONFIG: RbstubConfig = {
  stubsPath: 'stubs',
  rubyVersion: '3.3',
  rules: {},
  strictDocs: false,
  indent: 2,
};

export const CONFIG_DIR = '.rbstub';

const RULE_SETTINGS: readonly string[] = ['fatal', 'error', 'warning', 'info', 'off'];

function isRuleSetting(value: unknown): value is RuleSetting {
  return typeof value === 'string' && RULE_SETTINGS.includes(value);
}

function invalid(message: string, field: string): ConfigError {
  return new ConfigError(
    `Config error: ${message}`,
    'ERR_CONFIG_INVALID',
    { field },
    `Fix ${field} in ${CONFIG_DIR}/config.yaml`
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load rbstub config from project directory.
 *
 * Priority:
 * 1. config.yaml (preferred)
 * 2. config.json (deprecated, fallback)
 * 3. DEFAULT_CONFIG (if neither exists)
 *
 * Syntax errors are logged and the defaults returned; invalid values throw.
 *
 * @param projectPath - Absolute path to project root
 * @param logger - Optional logger for warnings (defaults to console.warn)
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): RbstubConfig {
  const configDir = join(projectPath, CONFIG_DIR);
  const yamlPath = join(configDir, 'config.yaml');
  const jsonPath = join(configDir, 'config.json');

  let parsed: unknown;

  if (existsSync(yamlPath)) {
    try {
      parsed = parseYAML(readFileSync(yamlPath, 'utf-8'));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.warn(`Failed to parse config.yaml: ${error.message}`);
      logger.warn('Using default configuration');
      return DEFAULT_CONFIG;
    }
  } else if (existsSync(jsonPath)) {
    logger.warn('⚠ config.json is deprecated. Move its settings to config.yaml');
    try {
      parsed = JSON.parse(readFileSync(jsonPath, 'utf-8'));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.warn(`Failed to parse config.json: ${error.message}`);
      logger.warn('Using default configuration');
      return DEFAULT_CONFIG;
    }
  } else {
    return DEFAULT_CONFIG;
  }

  // empty file
  if (parsed === null || parsed === undefined) {
    return DEFAULT_CONFIG;
  }
  if (!isRecord(parsed)) {
    throw invalid(`config must be a mapping, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`, 'config');
  }

  // Validation is outside the try-catch: invalid values MUST throw
  const include = validatePatterns(parsed.include, 'include', logger);
  const exclude = validatePatterns(parsed.exclude, 'exclude', logger);

  return {
    stubsPath: validateString(parsed.stubsPath, 'stubsPath') ?? DEFAULT_CONFIG.stubsPath,
    rubyVersion: validateRubyVersion(parsed.rubyVersion) ?? DEFAULT_CONFIG.rubyVersion,
    include,
    exclude,
    rules: { ...DEFAULT_CONFIG.rules, ...validateRules(parsed.rules) },
    strictDocs: validateBoolean(parsed.strictDocs, 'strictDocs') ?? DEFAULT_CONFIG.strictDocs,
    indent: validateIndent(parsed.indent) ?? DEFAULT_CONFIG.indent,
  };
}

function validateString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw invalid(`${field} must be a string, got ${typeof value}`, field);
  }
  if (!value.trim()) {
    throw invalid(`${field} cannot be empty or whitespace-only`, field);
  }
  return value;
}

function validateBoolean(value: unknown, field: string): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw invalid(`${field} must be true or false, got ${typeof value}`, field);
  }
  return value;
}

/**
 * Accepts strings and YAML numbers (`rubyVersion: 3.3`); must parse as MAJOR.MINOR.
 * YAML reads `3.0` as the integer 3, so integers get their `.0` back.
 */
export function validateRubyVersion(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const text = typeof value !== 'number' ? value
    : Number.isInteger(value) ? `${value}.0`
    : String(value);
  if (typeof text !== 'string') {
    throw invalid(`rubyVersion must be a string, got ${typeof value}`, 'rubyVersion');
  }
  try {
    return MinorVersion.parse(text).toString();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw invalid(`rubyVersion "${text}" is invalid: ${message}`, 'rubyVersion');
  }
}

export function validateIndent(value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > 8) {
    throw invalid(`indent must be an integer between 1 and 8, got ${String(value)}`, 'indent');
  }
  return value;
}

/**
 * Validate a rules mapping: known rule ids only, severities or 'off'.
 */
export function validateRules(value: unknown): Partial<Record<RuleId, RuleSetting>> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw invalid(`rules must be a mapping of rule id to severity`, 'rules');
  }

  const rules: Partial<Record<RuleId, RuleSetting>> = {};
  for (const [id, setting] of Object.entries(value)) {
    if (!isRuleId(id)) {
      throw invalid(`unknown rule "${id}"`, `rules.${id}`);
    }
    // YAML reads a bare `off` as the string "off" (1.2 core schema), `false` as boolean
    const normalized = setting === false ? 'off' : setting;
    if (!isRuleSetting(normalized)) {
      throw invalid(
        `rules.${id} must be one of ${RULE_SETTINGS.join(', ')}, got ${JSON.stringify(setting)}`,
        `rules.${id}`
      );
    }
    rules[id] = normalized;
  }
  return rules;
}

/**
 * Validate include/exclude patterns.
 *
 * Must be arrays of non-empty strings. An empty include array is
 * accepted with a warning since it matches no files.
 */
export function validatePatterns(
  value: unknown,
  field: 'include' | 'exclude',
  logger: { warn: (msg: string) => void }
): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw invalid(`${field} must be an array, got ${typeof value}`, field);
  }
  const patterns: string[] = [];
  value.forEach((pattern: unknown, i) => {
    if (typeof pattern !== 'string') {
      throw invalid(`${field}[${i}] must be a string, got ${typeof pattern}`, field);
    }
    if (!pattern.trim()) {
      throw invalid(`${field}[${i}] cannot be empty or whitespace-only`, field);
    }
    patterns.push(pattern);
  });
  if (field === 'include' && patterns.length === 0) {
    logger.warn('Warning: include is an empty array - no files will be processed');
  }
  return patterns;
}

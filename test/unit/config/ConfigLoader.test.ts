/**
 * ConfigLoader Tests
 *
 * Tests:
 * - YAML config loading (valid, partial, invalid syntax)
 * - JSON config loading (deprecated)
 * - YAML takes precedence over JSON
 * - No config returns defaults
 * - Invalid values throw ConfigError
 * - Logger injection for warning capture
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, writeFileSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { loadConfig, DEFAULT_CONFIG, ConfigError, validateRubyVersion } from '@rbstub/core';

// =============================================================================
// Test Helpers
// =============================================================================

/**
 * Captures warnings from logger during test execution
 */
interface LoggerMock {
  warnings: string[];
  warn: (msg: string) => void;
}

function createLoggerMock(): LoggerMock {
  const warnings: string[] = [];
  return {
    warnings,
    warn: (msg: string) => warnings.push(msg),
  };
}

function configError(message: string): (err: unknown) => boolean {
  return (err: unknown) => err instanceof ConfigError && err.code === 'ERR_CONFIG_INVALID' && err.message === message;
}

// =============================================================================
// TESTS: ConfigLoader
// =============================================================================

describe('ConfigLoader', () => {
  const testDir = join(process.cwd(), 'test-fixtures', 'config-loader');
  const configDir = join(testDir, '.rbstub');

  beforeEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true });
    }
    mkdirSync(configDir, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true });
    }
  });

  function writeYaml(text: string): void {
    writeFileSync(join(configDir, 'config.yaml'), text);
  }

  describe('YAML config', () => {
    it('should load every field', () => {
      writeYaml(`stubsPath: vsix/stubs
rubyVersion: "2.7.4"
include:
  - "**/*.rb"
exclude:
  - "tk*.rb"
rules:
  missing-doc: error
  doc-param-mismatch: off
  round-trip: false
strictDocs: true
indent: 4
`);
      const logger = createLoggerMock();
      const config = loadConfig(testDir, logger);

      assert.deepStrictEqual(config, {
        stubsPath: 'vsix/stubs',
        rubyVersion: '2.7',
        include: ['**/*.rb'],
        exclude: ['tk*.rb'],
        rules: { 'missing-doc': 'error', 'doc-param-mismatch': 'off', 'round-trip': 'off' },
        strictDocs: true,
        indent: 4,
      });
      assert.deepStrictEqual(logger.warnings, []);
    });

    it('should read an unquoted whole-number version as MAJOR.0', () => {
      writeYaml('rubyVersion: 3.0\n');
      assert.strictEqual(loadConfig(testDir, createLoggerMock()).rubyVersion, '3.0');
    });

    it('should fill missing fields with defaults', () => {
      writeYaml('rubyVersion: 3.1\n');
      const config = loadConfig(testDir, createLoggerMock());

      assert.strictEqual(config.rubyVersion, '3.1');
      assert.strictEqual(config.stubsPath, DEFAULT_CONFIG.stubsPath);
      assert.strictEqual(config.indent, 2);
      assert.strictEqual(config.strictDocs, false);
      assert.deepStrictEqual(config.rules, {});
      assert.strictEqual(config.include, undefined);
    });

    it('should return defaults and warn on a syntax error', () => {
      writeYaml('stubsPath: [unclosed\n');
      const logger = createLoggerMock();
      const config = loadConfig(testDir, logger);

      assert.strictEqual(config, DEFAULT_CONFIG);
      assert.strictEqual(logger.warnings.length, 2);
      assert.ok(logger.warnings[0].startsWith('Failed to parse config.yaml: '));
      assert.strictEqual(logger.warnings[1], 'Using default configuration');
    });

    it('should return defaults for an empty file', () => {
      writeYaml('');
      assert.strictEqual(loadConfig(testDir, createLoggerMock()), DEFAULT_CONFIG);
    });

    it('should warn when include is empty', () => {
      writeYaml('include: []\n');
      const logger = createLoggerMock();
      const config = loadConfig(testDir, logger);

      assert.deepStrictEqual(config.include, []);
      assert.deepStrictEqual(logger.warnings, ['Warning: include is an empty array - no files will be processed']);
    });
  });

  describe('JSON config', () => {
    it('should load config.json with a deprecation warning', () => {
      writeFileSync(join(configDir, 'config.json'), '{"rubyVersion": "3.0"}');
      const logger = createLoggerMock();
      const config = loadConfig(testDir, logger);

      assert.strictEqual(config.rubyVersion, '3.0');
      assert.deepStrictEqual(logger.warnings, ['⚠ config.json is deprecated. Move its settings to config.yaml']);
    });

    it('should prefer config.yaml when both exist', () => {
      writeFileSync(join(configDir, 'config.json'), '{"rubyVersion": "3.0"}');
      writeYaml('rubyVersion: "3.2"\n');
      const logger = createLoggerMock();

      assert.strictEqual(loadConfig(testDir, logger).rubyVersion, '3.2');
      assert.deepStrictEqual(logger.warnings, []);
    });
  });

  it('should return defaults without a config file', () => {
    rmSync(configDir, { recursive: true });
    assert.strictEqual(loadConfig(testDir, createLoggerMock()), DEFAULT_CONFIG);
  });

  describe('invalid values', () => {
    const cases: Array<[string, string]> = [
      ['indent: 0\n', 'Config error: indent must be an integer between 1 and 8, got 0'],
      ['rules:\n  nope: error\n', 'Config error: unknown rule "nope"'],
      [
        'rules:\n  missing-doc: loud\n',
        'Config error: rules.missing-doc must be one of fatal, error, warning, info, off, got "loud"',
      ],
      ['rubyVersion: "3"\n', 'Config error: rubyVersion "3" is invalid: Invalid version format: 3'],
      ['strictDocs: yes\n', 'Config error: strictDocs must be true or false, got string'],
      ['- a\n- b\n', 'Config error: config must be a mapping, got array'],
      ['exclude: [""]\n', 'Config error: exclude[0] cannot be empty or whitespace-only'],
      ['stubsPath: 42\n', 'Config error: stubsPath must be a string, got number'],
    ];

    for (const [yaml, message] of cases) {
      it(`should reject ${JSON.stringify(yaml.trim())}`, () => {
        writeYaml(yaml);
        assert.throws(() => loadConfig(testDir, createLoggerMock()), configError(message));
      });
    }
  });
});

describe('validateRubyVersion', () => {
  it('should normalize to MAJOR.MINOR', () => {
    assert.strictEqual(validateRubyVersion('3.3.0'), '3.3');
    assert.strictEqual(validateRubyVersion(2.7), '2.7');
    assert.strictEqual(validateRubyVersion(undefined), undefined);
  });
});

/**
 * DiagnosticCollector Tests
 *
 * Tests:
 * - addFromError() for RbstubError and plain Error
 * - add()/addAll() set a timestamp
 * - filtering by rule, file and code
 * - severity checks
 * - toDiagnosticsLog() JSON lines
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';

import { DiagnosticCollector, StubSyntaxError, ConfigError } from '@rbstub/core';
import type { DiagnosticInput } from '@rbstub/core';

function createDiagnostic(overrides: Partial<DiagnosticInput> = {}): DiagnosticInput {
  return {
    code: 'ERR_MISSING_DOC',
    severity: 'warning',
    message: 'method Foo#bar has no doc comment',
    file: 'foo.rb',
    line: 2,
    rule: 'missing-doc',
    ...overrides,
  };
}

describe('DiagnosticCollector', () => {
  let collector: DiagnosticCollector;

  beforeEach(() => {
    collector = new DiagnosticCollector();
  });

  describe('addFromError()', () => {
    it('should take code, severity and location from an RbstubError', () => {
      collector.addFromError(new StubSyntaxError('Unexpected end', 'bad.rb', 3, 'Remove it'), 'parser');
      const [diagnostic] = collector.getAll();

      assert.strictEqual(diagnostic.code, 'ERR_STUB_SYNTAX');
      assert.strictEqual(diagnostic.severity, 'error');
      assert.strictEqual(diagnostic.message, 'Unexpected end');
      assert.strictEqual(diagnostic.file, 'bad.rb');
      assert.strictEqual(diagnostic.line, 3);
      assert.strictEqual(diagnostic.rule, 'parser');
      assert.strictEqual(diagnostic.suggestion, 'Remove it');
      assert.strictEqual(typeof diagnostic.timestamp, 'number');
    });

    it('should record a plain Error as ERR_UNKNOWN', () => {
      collector.addFromError(new Error('disk on fire'), 'loader');
      const [diagnostic] = collector.getAll();

      assert.strictEqual(diagnostic.code, 'ERR_UNKNOWN');
      assert.strictEqual(diagnostic.severity, 'error');
      assert.strictEqual(diagnostic.message, 'disk on fire');
      assert.strictEqual(diagnostic.file, undefined);
    });
  });

  describe('filters', () => {
    beforeEach(() => {
      collector.addAll([
        createDiagnostic(),
        createDiagnostic({ code: 'ERR_ROUND_TRIP', severity: 'error', rule: 'round-trip', file: 'bar.rb' }),
        createDiagnostic({ line: 9 }),
      ]);
    });

    it('should filter by rule, file and code', () => {
      assert.strictEqual(collector.getByRule('missing-doc').length, 2);
      assert.strictEqual(collector.getByFile('bar.rb').length, 1);
      assert.strictEqual(collector.getByCode('ERR_ROUND_TRIP')[0].rule, 'round-trip');
      assert.strictEqual(collector.getByCode('ERR_NONE').length, 0);
    });

    it('should return a copy from getAll()', () => {
      const all = collector.getAll();
      all.pop();
      assert.strictEqual(collector.count(), 3);
    });

    it('should clear', () => {
      collector.clear();
      assert.strictEqual(collector.count(), 0);
    });
  });

  describe('severity checks', () => {
    it('should report nothing when empty', () => {
      assert.strictEqual(collector.hasErrors(), false);
      assert.strictEqual(collector.hasWarnings(), false);
      assert.strictEqual(collector.hasFatal(), false);
    });

    it('should count fatal as an error', () => {
      collector.addFromError(new ConfigError('bad', 'ERR_CONFIG_INVALID'), 'config');
      assert.strictEqual(collector.hasFatal(), true);
      assert.strictEqual(collector.hasErrors(), true);
      assert.strictEqual(collector.hasWarnings(), false);
    });

    it('should not count warnings or info as errors', () => {
      collector.add(createDiagnostic());
      collector.add(createDiagnostic({ severity: 'info' }));
      assert.strictEqual(collector.hasErrors(), false);
      assert.strictEqual(collector.hasWarnings(), true);
    });
  });

  describe('toDiagnosticsLog()', () => {
    it('should write one JSON object per line', () => {
      collector.add(createDiagnostic());
      collector.add(createDiagnostic({ line: 5 }));
      const lines = collector.toDiagnosticsLog().split('\n');

      assert.strictEqual(lines.length, 2);
      const second: unknown = JSON.parse(lines[1]);
      assert.ok(typeof second === 'object' && second !== null && 'line' in second);
      assert.strictEqual(second.line, 5);
    });

    it('should be empty without diagnostics', () => {
      assert.strictEqual(collector.toDiagnosticsLog(), '');
    });
  });
});

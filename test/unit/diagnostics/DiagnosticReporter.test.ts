/**
 * DiagnosticReporter Tests
 *
 * Tests:
 * - report({ format: 'text' | 'json' | 'csv' })
 * - summary() and categorizedSummary()
 * - getCategorizedStats() for known and unknown codes
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { DiagnosticCollector, DiagnosticReporter } from '@rbstub/core';
import type { DiagnosticInput } from '@rbstub/core';

function createCollectorWithDiagnostics(diagnostics: DiagnosticInput[]): DiagnosticCollector {
  const collector = new DiagnosticCollector();
  collector.addAll(diagnostics);
  return collector;
}

const MIXED: DiagnosticInput[] = [
  {
    code: 'ERR_MISSING_DOC',
    severity: 'warning',
    message: 'method Foo#bar has no doc comment',
    file: 'foo.rb',
    line: 2,
    rule: 'missing-doc',
    scope: 'Foo',
    suggestion: 'Add a doc',
  },
  {
    code: 'ERR_STUB_SYNTAX',
    severity: 'error',
    message: "Unexpected 'end' with no open scope",
    file: 'bad.rb',
    line: 3,
    rule: 'parser',
  },
  {
    code: 'ERR_CONFIG_INVALID',
    severity: 'fatal',
    message: 'Config error: x',
    rule: 'config',
  },
];

describe('DiagnosticReporter', () => {
  describe('text format', () => {
    it('should print one line per diagnostic with suggestions', () => {
      const reporter = new DiagnosticReporter(createCollectorWithDiagnostics(MIXED));
      assert.strictEqual(reporter.report({ format: 'text' }), [
        '[WARN] ERR_MISSING_DOC (foo.rb:2) method Foo#bar has no doc comment',
        '   Suggestion: Add a doc',
        "[ERROR] ERR_STUB_SYNTAX (bad.rb:3) Unexpected 'end' with no open scope",
        '[FATAL] ERR_CONFIG_INVALID Config error: x',
      ].join('\n'));
    });

    it('should append the summary when asked', () => {
      const reporter = new DiagnosticReporter(createCollectorWithDiagnostics(MIXED));
      const lines = reporter.report({ format: 'text', includeSummary: true }).split('\n');
      assert.deepStrictEqual(lines.slice(-2), ['', 'Fatal: 1, Errors: 1, Warnings: 1']);
    });

    it('should say so when there is nothing to report', () => {
      const reporter = new DiagnosticReporter(new DiagnosticCollector());
      assert.strictEqual(reporter.report({ format: 'text', includeSummary: true }), 'No issues found.');
      assert.strictEqual(reporter.summary(), 'No issues found.');
      assert.strictEqual(reporter.categorizedSummary(), 'No issues found.');
    });

    it('should show the file alone when there is no line', () => {
      const reporter = new DiagnosticReporter(createCollectorWithDiagnostics([
        { code: 'ERR_ROUND_TRIP', severity: 'error', message: 'differs', file: 'a.rb', rule: 'round-trip' },
      ]));
      assert.strictEqual(reporter.report({ format: 'text' }), '[ERROR] ERR_ROUND_TRIP (a.rb) differs');
    });
  });

  describe('json format', () => {
    it('should include diagnostics and the summary stats', () => {
      const reporter = new DiagnosticReporter(createCollectorWithDiagnostics(MIXED));
      const parsed: unknown = JSON.parse(reporter.report({ format: 'json', includeSummary: true }));

      assert.ok(typeof parsed === 'object' && parsed !== null && 'summary' in parsed && 'diagnostics' in parsed);
      assert.deepStrictEqual(parsed.summary, { total: 3, fatal: 1, errors: 1, warnings: 1, info: 0 });
      assert.ok(Array.isArray(parsed.diagnostics));
      assert.strictEqual(parsed.diagnostics.length, 3);
    });
  });

  describe('csv format', () => {
    it('should quote messages and suggestions', () => {
      const reporter = new DiagnosticReporter(createCollectorWithDiagnostics([
        MIXED[0],
        { code: 'ERR_ROUND_TRIP', severity: 'error', message: 'say "hi", then', rule: 'round-trip' },
      ]));
      assert.strictEqual(reporter.report({ format: 'csv' }), [
        'severity,code,file,line,message,rule,scope,suggestion',
        'warning,ERR_MISSING_DOC,foo.rb,2,"method Foo#bar has no doc comment",missing-doc,Foo,"Add a doc"',
        'error,ERR_ROUND_TRIP,,,"say ""hi"", then",round-trip,,',
      ].join('\n'));
    });
  });

  describe('categorizedSummary()', () => {
    it('should list codes by frequency with their check command', () => {
      const missing: DiagnosticInput = { code: 'ERR_MISSING_DOC', severity: 'warning', message: 'm', rule: 'missing-doc' };
      const reporter = new DiagnosticReporter(createCollectorWithDiagnostics([
        missing,
        { code: 'ERR_ROUND_TRIP', severity: 'error', message: 'r', rule: 'round-trip' },
        missing,
        { code: 'ERR_STUB_SYNTAX', severity: 'error', message: 's', rule: 'parser' },
        missing,
      ]));
      assert.strictEqual(reporter.categorizedSummary(), [
        'Errors: 2, Warnings: 3',
        '  - 3 documentation (run `rbstub check docs`)',
        '  - 1 formatting (run `rbstub check format`)',
        '  - 1 ERR_STUB_SYNTAX (run `rbstub check`)',
      ].join('\n'));
    });

    it('should fold codes beyond the top five', () => {
      const codes = ['A', 'B', 'C', 'D', 'E', 'F', 'G'];
      const reporter = new DiagnosticReporter(createCollectorWithDiagnostics(
        codes.map((code): DiagnosticInput => ({ code, severity: 'info', message: code, rule: 'test' }))
      ));
      const lines = reporter.categorizedSummary().split('\n');
      assert.strictEqual(lines.length, 7);
      assert.strictEqual(lines[0], 'Info: 7');
      assert.strictEqual(lines[6], '  - 2 other issues');
    });
  });
});

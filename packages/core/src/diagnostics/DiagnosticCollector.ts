/**
 * DiagnosticCollector - Collects and filters diagnostics from stub checks
 *
 * Validation rules return DiagnosticInput entries; the loader hands over
 * parse failures as errors. Both end up as unified Diagnostic entries.
 *
 * Usage:
 *   const collector = new DiagnosticCollector();
 *   collector.addAll(validateStubSource(text, path));
 *
 *   if (collector.hasErrors()) {
 *     process.exitCode = 1;
 *   }
 */

import type { Diagnostic, DiagnosticInput } from '@rbstub/types';
import { RbstubError } from '../errors/RbstubError.js';

export type { Diagnostic, DiagnosticInput };

export class DiagnosticCollector {
  private diagnostics: Diagnostic[] = [];

  /**
   * Add an error thrown while loading or parsing.
   *
   * RbstubError instances provide rich info (code, severity, context, suggestion).
   * Plain Error instances are treated as generic errors with code 'ERR_UNKNOWN'.
   */
  addFromError(error: Error, rule: string): void {
    if (error instanceof RbstubError) {
      this.add({
        code: error.code,
        severity: error.severity,
        message: error.message,
        file: error.context.filePath,
        line: error.context.lineNumber,
        scope: error.context.scope,
        rule,
        suggestion: error.suggestion,
      });
    } else {
      this.add({
        code: 'ERR_UNKNOWN',
        severity: 'error',
        message: error.message,
        rule,
      });
    }
  }

  /**
   * Add a diagnostic directly.
   * Timestamp is set automatically.
   */
  add(diagnostic: DiagnosticInput): void {
    this.diagnostics.push({
      ...diagnostic,
      timestamp: Date.now(),
    });
  }

  addAll(diagnostics: DiagnosticInput[]): void {
    for (const diagnostic of diagnostics) {
      this.add(diagnostic);
    }
  }

  /**
   * Get all diagnostics.
   * Returns a copy to prevent external modification.
   */
  getAll(): Diagnostic[] {
    return [...this.diagnostics];
  }

  getByRule(rule: string): Diagnostic[] {
    return this.diagnostics.filter(d => d.rule === rule);
  }

  getByFile(file: string): Diagnostic[] {
    return this.diagnostics.filter(d => d.file === file);
  }

  getByCode(code: string): Diagnostic[] {
    return this.diagnostics.filter(d => d.code === code);
  }

  hasFatal(): boolean {
    return this.diagnostics.some(d => d.severity === 'fatal');
  }

  /**
   * Check if any error (including fatal) exists.
   */
  hasErrors(): boolean {
    return this.diagnostics.some(d => d.severity === 'error' || d.severity === 'fatal');
  }

  hasWarnings(): boolean {
    return this.diagnostics.some(d => d.severity === 'warning');
  }

  count(): number {
    return this.diagnostics.length;
  }

  /**
   * Format diagnostics as JSON lines (one JSON object per line).
   * Suitable for .rbstub/diagnostics.log file.
   */
  toDiagnosticsLog(): string {
    return this.diagnostics.map(d => JSON.stringify(d)).join('\n');
  }

  clear(): void {
    this.diagnostics = [];
  }
}

/**
 * DiagnosticReporter - Formats diagnostics for output
 *
 * Supports multiple output formats:
 * - text: Human-readable format with severity indicators
 * - json: Machine-readable JSON format for CI integration
 * - csv: Spreadsheet-compatible format
 *
 * Usage:
 *   const reporter = new DiagnosticReporter(collector);
 *   console.log(reporter.report({ format: 'text', includeSummary: true }));
 */

import type { Diagnostic, DiagnosticCollector } from './DiagnosticCollector.js';
import { CODE_TO_CATEGORY } from './categories.js';

export type ReportFormat = 'text' | 'json' | 'csv';

export interface ReportOptions {
  format: ReportFormat;
  includeSummary?: boolean;
}

export interface SummaryStats {
  total: number;
  fatal: number;
  errors: number;
  warnings: number;
  info: number;
}

/**
 * Category count with metadata
 */
export interface CategoryCount {
  code: string;
  count: number;
  name: string;
  checkCommand: string;
}

export interface CategorizedSummaryStats extends SummaryStats {
  byCode: CategoryCount[];
}

export class DiagnosticReporter {
  constructor(private collector: DiagnosticCollector) {}

  /**
   * Generate a formatted report of all diagnostics.
   */
  report(options: ReportOptions): string {
    const diagnostics = this.collector.getAll();

    if (options.format === 'json') {
      return this.jsonReport(diagnostics, options);
    } else if (options.format === 'csv') {
      return this.csvReport(diagnostics);
    } else {
      return this.textReport(diagnostics, options);
    }
  }

  /**
   * Generate a human-readable summary of diagnostic counts.
   */
  summary(): string {
    const stats = this.getStats();

    if (stats.total === 0) {
      return 'No issues found.';
    }

    return this.severityParts(stats).join(', ');
  }

  /**
   * Severity totals followed by the five most frequent codes, each with
   * the command that narrows the check to its category.
   */
  categorizedSummary(): string {
    const stats = this.getCategorizedStats();

    if (stats.total === 0) {
      return 'No issues found.';
    }

    const lines: string[] = [this.severityParts(stats).join(', ')];

    for (const category of stats.byCode.slice(0, 5)) {
      lines.push(`  - ${category.count} ${category.name} (run \`${category.checkCommand}\`)`);
    }

    if (stats.byCode.length > 5) {
      const remainingCount = stats.byCode.slice(5).reduce((sum, cat) => sum + cat.count, 0);
      const issueWord = remainingCount === 1 ? 'other issue' : 'other issues';
      lines.push(`  - ${remainingCount} ${issueWord}`);
    }

    return lines.join('\n');
  }

  getStats(): SummaryStats {
    const diagnostics = this.collector.getAll();
    return {
      total: diagnostics.length,
      fatal: diagnostics.filter(d => d.severity === 'fatal').length,
      errors: diagnostics.filter(d => d.severity === 'error').length,
      warnings: diagnostics.filter(d => d.severity === 'warning').length,
      info: diagnostics.filter(d => d.severity === 'info').length,
    };
  }

  /**
   * Get diagnostic statistics grouped by code, most frequent first.
   */
  getCategorizedStats(): CategorizedSummaryStats {
    const codeMap = new Map<string, number>();
    for (const diag of this.collector.getAll()) {
      codeMap.set(diag.code, (codeMap.get(diag.code) ?? 0) + 1);
    }

    const byCode: CategoryCount[] = [];
    for (const [code, count] of codeMap.entries()) {
      const category = CODE_TO_CATEGORY[code];
      byCode.push({
        code,
        count,
        name: category?.name ?? code,
        checkCommand: category?.checkCommand ?? 'rbstub check',
      });
    }

    byCode.sort((a, b) => b.count - a.count);

    return {
      ...this.getStats(),
      byCode,
    };
  }

  private severityParts(stats: SummaryStats): string[] {
    const parts: string[] = [];
    if (stats.fatal > 0) {
      parts.push(`Fatal: ${stats.fatal}`);
    }
    if (stats.errors > 0) {
      parts.push(`Errors: ${stats.errors}`);
    }
    if (stats.warnings > 0) {
      parts.push(`Warnings: ${stats.warnings}`);
    }
    if (stats.info > 0) {
      parts.push(`Info: ${stats.info}`);
    }
    return parts;
  }

  private textReport(diagnostics: Diagnostic[], options: ReportOptions): string {
    if (diagnostics.length === 0) {
      return 'No issues found.';
    }

    const lines: string[] = [];

    for (const diag of diagnostics) {
      const icon = this.getSeverityIcon(diag.severity);
      const location = this.formatLocation(diag);

      lines.push(location
        ? `${icon} ${diag.code} ${location} ${diag.message}`
        : `${icon} ${diag.code} ${diag.message}`);

      if (diag.suggestion) {
        lines.push(`   Suggestion: ${diag.suggestion}`);
      }
    }

    if (options.includeSummary) {
      lines.push('');
      lines.push(this.summary());
    }

    return lines.join('\n');
  }

  private jsonReport(diagnostics: Diagnostic[], options: ReportOptions): string {
    const result: {
      diagnostics: Diagnostic[];
      summary?: SummaryStats;
    } = {
      diagnostics,
    };

    if (options.includeSummary) {
      result.summary = this.getStats();
    }

    return JSON.stringify(result, null, 2);
  }

  private csvReport(diagnostics: Diagnostic[]): string {
    const header = 'severity,code,file,line,message,rule,scope,suggestion';
    const rows = diagnostics.map(d =>
      [
        d.severity,
        d.code,
        d.file ?? '',
        d.line ?? '',
        this.csvEscape(d.message),
        d.rule,
        d.scope ?? '',
        d.suggestion ? this.csvEscape(d.suggestion) : '',
      ].join(',')
    );
    return [header, ...rows].join('\n');
  }

  private getSeverityIcon(severity: Diagnostic['severity']): string {
    switch (severity) {
      case 'fatal':
        return '[FATAL]';
      case 'error':
        return '[ERROR]';
      case 'warning':
        return '[WARN]';
      case 'info':
        return '[INFO]';
    }
  }

  private formatLocation(diag: Diagnostic): string {
    if (!diag.file) {
      return '';
    }
    if (diag.line) {
      return `(${diag.file}:${diag.line})`;
    }
    return `(${diag.file})`;
  }

  /**
   * Always quote to handle commas; internal quotes are doubled.
   */
  private csvEscape(value: string): string {
    return `"${value.replace(/"/g, '""')}"`;
  }
}

/**
 * Diagnostics - Collection, reporting and the diagnostics log
 */

export { DiagnosticCollector } from './DiagnosticCollector.js';
export type { Diagnostic, DiagnosticInput } from './DiagnosticCollector.js';

export { DiagnosticReporter } from './DiagnosticReporter.js';
export type { ReportFormat, ReportOptions, SummaryStats, CategoryCount, CategorizedSummaryStats } from './DiagnosticReporter.js';

export { DiagnosticWriter } from './DiagnosticWriter.js';

export {
  DIAGNOSTIC_CATEGORIES,
  CODE_TO_CATEGORY,
  isCategoryKey,
  getCategoryForCode,
  getRulesForCategory,
} from './categories.js';
export type {
  DiagnosticCategory,
  DiagnosticCategoryKey,
  CodeCategoryInfo,
} from './categories.js';

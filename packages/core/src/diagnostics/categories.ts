/**
 * Diagnostic Categories - Single source of truth for category/code mappings
 *
 * DIAGNOSTIC_CATEGORIES maps category → codes (used by `rbstub check <category>`),
 * CODE_TO_CATEGORY is derived from it and used by DiagnosticReporter.
 */

import type { RuleId } from '../stubs/validate.js';

/**
 * Category definition with human-readable metadata and associated rules
 */
export interface DiagnosticCategory {
  /** Human-readable name for display */
  readonly name: string;
  /** Description of what this category checks */
  readonly description: string;
  /** Diagnostic codes that belong to this category */
  readonly codes: readonly string[];
  /** Rules that produce those codes */
  readonly rules: readonly RuleId[];
}

export type DiagnosticCategoryKey = 'docs' | 'structure' | 'signatures' | 'format';

export const DIAGNOSTIC_CATEGORIES: Record<DiagnosticCategoryKey, DiagnosticCategory> = {
  docs: {
    name: 'Documentation',
    description: 'Check that every declaration carries a doc comment',
    codes: ['ERR_MISSING_DOC', 'ERR_DOC_PARAM_MISMATCH'],
    rules: ['missing-doc', 'doc-param-mismatch'],
  },
  structure: {
    name: 'Scope Structure',
    description: 'Check for scopes and members declared twice',
    codes: ['ERR_DUPLICATE_SCOPE', 'ERR_DUPLICATE_MEMBER'],
    rules: ['duplicate-scope', 'duplicate-member'],
  },
  signatures: {
    name: 'Method Signatures',
    description: 'Check parameter ordering and operator arity',
    codes: ['ERR_INVALID_SIGNATURE'],
    rules: ['invalid-signature'],
  },
  format: {
    name: 'Formatting',
    description: 'Check that files survive a print/parse round trip',
    codes: ['ERR_ROUND_TRIP'],
    rules: ['round-trip'],
  },
};

export function isCategoryKey(value: string): value is DiagnosticCategoryKey {
  return Object.hasOwn(DIAGNOSTIC_CATEGORIES, value);
}

/**
 * Metadata for code-to-category lookup (used by DiagnosticReporter)
 */
export interface CodeCategoryInfo {
  /** Human-readable name for the issue type */
  name: string;
  /** CLI command to check this category */
  checkCommand: string;
}

export const CODE_TO_CATEGORY: Record<string, CodeCategoryInfo> = (() => {
  const result: Record<string, CodeCategoryInfo> = {};

  for (const [categoryKey, category] of Object.entries(DIAGNOSTIC_CATEGORIES)) {
    for (const code of category.codes) {
      result[code] = {
        name: category.name.toLowerCase(),
        checkCommand: `rbstub check ${categoryKey}`,
      };
    }
  }

  return result;
})();

export function getCategoryForCode(code: string): CodeCategoryInfo | undefined {
  return CODE_TO_CATEGORY[code];
}

export function getRulesForCategory(category: DiagnosticCategoryKey): readonly RuleId[] {
  return DIAGNOSTIC_CATEGORIES[category].rules;
}

/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { RbstubError } from '@rbstub/core';

/**
 * Print a standardized error message and exit.
 *
 * @param title - Main error message (should be under 80 chars)
 * @param nextSteps - Optional array of actionable suggestions
 * @returns never - always calls process.exit(1)
 *
 * @example
 * exitWithError('Stub directory not found', [
 *   'Run: rbstub versions'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  console.error(`✗ ${title}`);

  if (nextSteps && nextSteps.length > 0) {
    console.error('');
    for (const step of nextSteps) {
      console.error(`→ ${step}`);
    }
  }

  process.exit(1);
}

/**
 * Report a thrown error the same way; non-rbstub errors are rethrown.
 */
export function exitWithRbstubError(err: unknown): never {
  if (err instanceof RbstubError) {
    const location = err.context.filePath
      ? err.context.lineNumber ? `${err.context.filePath}:${err.context.lineNumber}: ` : `${err.context.filePath}: `
      : '';
    exitWithError(`${location}${err.message}`, err.suggestion ? [err.suggestion] : undefined);
  }
  throw err;
}

/**
 * Check command - Validate stub files
 *
 * Checks the given files and directories, or the configured stub set when
 * no path is given. Exits 1 when an error-level diagnostic is reported.
 */

import { Command } from 'commander';
import { existsSync, readdirSync, readFileSync, statSync } from 'fs';
import { join, relative, resolve } from 'path';
import {
  DIAGNOSTIC_CATEGORIES,
  DiagnosticCollector,
  DiagnosticReporter,
  DiagnosticWriter,
  RULES,
  RULE_IDS,
  getRulesForCategory,
  isCategoryKey,
  isRuleId,
  validateStubFile,
  validateStubSource,
} from '@rbstub/core';
import type { ReportFormat, RuleId, ValidateOptions } from '@rbstub/core';
import { exitWithError } from '../utils/errorFormatter.js';
import { addStubSetOptions, loadStubSet, openProject, type StubSetOptions } from '../utils/project.js';

interface CheckOptions extends StubSetOptions {
  rule?: string[];
  category?: string;
  format: string;
  quiet?: boolean;
  strictDocs?: boolean;
  log?: boolean;
  listRules?: boolean;
}

export interface StubSource {
  /** Absolute path */
  path: string;
  /** Path shown in diagnostics */
  display: string;
}

const FORMATS: readonly string[] = ['text', 'json', 'csv'];

function isReportFormat(value: string): value is ReportFormat {
  return FORMATS.includes(value);
}

/**
 * Expand files and directories into the stub files to check, sorted.
 * Missing paths are returned separately.
 */
export function collectStubFiles(paths: string[], cwd: string): { sources: StubSource[]; missing: string[] } {
  const sources: StubSource[] = [];
  const missing: string[] = [];

  for (const path of paths) {
    const full = resolve(cwd, path);
    if (!existsSync(full)) {
      missing.push(path);
      continue;
    }
    if (statSync(full).isDirectory()) {
      const entries = readdirSync(full, { recursive: true, encoding: 'utf-8' })
        .filter((entry) => entry.endsWith('.rb'))
        .sort();
      for (const entry of entries) {
        const file = join(full, entry);
        sources.push({ path: file, display: relative(cwd, file) });
      }
    } else {
      sources.push({ path: full, display: relative(cwd, full) });
    }
  }

  return { sources, missing };
}

export function checkSources(sources: StubSource[], options: ValidateOptions): DiagnosticCollector {
  const collector = new DiagnosticCollector();
  for (const source of sources) {
    collector.addAll(validateStubSource(readFileSync(source.path, 'utf-8'), source.display, options));
  }
  return collector;
}

/**
 * Rules selected by --rule and --category; undefined runs every rule.
 */
export function selectRules(rules: string[] | undefined, category: string | undefined): RuleId[] | undefined {
  if (!rules?.length && !category) {
    return undefined;
  }

  const selected = new Set<RuleId>();
  for (const rule of rules ?? []) {
    if (!isRuleId(rule)) {
      exitWithError(`Unknown rule: ${rule}`, [`Available: ${RULE_IDS.join(', ')}`]);
    }
    selected.add(rule);
  }
  if (category) {
    if (!isCategoryKey(category)) {
      exitWithError(`Unknown category: ${category}`, [
        `Available: ${Object.keys(DIAGNOSTIC_CATEGORIES).join(', ')}`,
      ]);
    }
    for (const rule of getRulesForCategory(category)) {
      selected.add(rule);
    }
  }
  return RULE_IDS.filter((rule) => selected.has(rule));
}

/**
 * Copy of the collector with only errors and fatal diagnostics.
 */
function onlyFailures(collector: DiagnosticCollector): DiagnosticCollector {
  const failures = new DiagnosticCollector();
  for (const { timestamp: _timestamp, ...diagnostic } of collector.getAll()) {
    if (diagnostic.severity === 'error' || diagnostic.severity === 'fatal') {
      failures.add(diagnostic);
    }
  }
  return failures;
}

function printRules(): void {
  console.log('Available rules:');
  console.log('');
  for (const id of RULE_IDS) {
    const rule = RULES[id];
    console.log(`  ${id} (${rule.code}, default: ${rule.defaultSeverity})`);
    console.log(`    ${rule.description}`);
  }
  console.log('');
  console.log('Categories:');
  console.log('');
  for (const [key, category] of Object.entries(DIAGNOSTIC_CATEGORIES)) {
    console.log(`  ${key}: ${category.rules.join(', ')}`);
  }
}

function collectRepeatable(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export const checkCommand = addStubSetOptions(
  new Command('check')
    .description('Validate stub files')
    .argument('[paths...]', 'Files or directories to check (default: configured stub set)')
    .option('--rule <id>', 'Run only this rule (repeatable)', collectRepeatable)
    .option('-c, --category <name>', 'Run only the rules of a category')
    .option('-f, --format <format>', 'Output format: text, json, csv', 'text')
    .option('-q, --quiet', 'Only output errors')
    .option('--strict-docs', 'Require docs on alias and mixin lines')
    .option('--log', 'Write diagnostics.log to the config directory')
    .option('--list-rules', 'List available rules and categories')
)
  .addHelpText('after', `
Examples:
  rbstub check                          Check the configured stub set
  rbstub check stubs/rubystubs33        Check a directory
  rbstub check env.rb --rule missing-doc
  rbstub check -c signatures            Only signature rules
  rbstub check --format json            Machine-readable output
`)
  .action((paths: string[], options: CheckOptions) => {
    if (options.listRules) {
      printRules();
      return;
    }
    if (!isReportFormat(options.format)) {
      exitWithError(`Unknown format: ${options.format}`, ['Use one of: text, json, csv']);
    }
    const format = options.format;

    const context = openProject(options);
    const { config } = context;
    const validateOptions: ValidateOptions = {
      rules: config.rules,
      only: selectRules(options.rule, options.category),
      strictDocs: options.strictDocs ?? config.strictDocs,
      indent: config.indent,
    };

    let collector: DiagnosticCollector;
    let fileCount: number;

    if (paths.length > 0) {
      const { sources, missing } = collectStubFiles(paths, process.cwd());
      if (missing.length > 0) {
        exitWithError(`Path not found: ${missing.join(', ')}`);
      }
      collector = checkSources(sources, validateOptions);
      fileCount = sources.length;
    } else {
      const stubSet = loadStubSet(context, options);
      collector = stubSet.diagnostics;
      for (const file of stubSet.files) {
        collector.addAll(validateStubFile(file, validateOptions));
      }
      fileCount = stubSet.files.length + stubSet.diagnostics.getByRule('parser').length;
    }

    if (options.log) {
      const logPath = new DiagnosticWriter().write(collector, context.configDir);
      context.logger.info('Diagnostics written', { path: logPath });
    }

    const shown = options.quiet ? onlyFailures(collector) : collector;
    const reporter = new DiagnosticReporter(shown);

    if (format === 'text') {
      if (shown.count() > 0) {
        console.log(reporter.report({ format, includeSummary: false }));
        console.log('');
      }
      if (!options.quiet) {
        console.log(`Checked ${fileCount} file(s)`);
        console.log(reporter.categorizedSummary());
      }
    } else {
      console.log(reporter.report({ format, includeSummary: true }));
    }

    if (collector.hasErrors()) {
      process.exitCode = 1;
    }
  });

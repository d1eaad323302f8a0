/**
 * List command - List scopes of the stub set, or the members of one scope
 *
 * Use cases:
 * - "Which classes does the 2.7 stub set document?"
 * - "What does Comparable define, and where does String get it from?"
 */

import { Command } from 'commander';
import { formatSignature } from '@rbstub/core';
import type { ScopeEntry, StubRegistry } from '@rbstub/core';
import { exitWithError } from '../utils/errorFormatter.js';
import { addStubSetOptions, loadStubSet, openProject, type StubSetOptions } from '../utils/project.js';

interface LsOptions extends StubSetOptions {
  json?: boolean;
  inherited?: boolean;
}

export interface ScopeListing {
  name: string;
  kind: 'class' | 'module';
  superclass: string | null;
  ancestors: string[];
  files: string[];
  constants: string[];
  singletonMethods: string[];
  instanceMethods: string[];
}

function signatures(methods: ScopeEntry['instanceMethods']): string[] {
  return [...methods.values()]
    .map((method) => formatSignature({ ...method.decl, singleton: false }))
    .sort();
}

/**
 * Collect what `ls <scope>` shows. With `inherited`, method names come
 * from the whole ancestor chain instead of signatures of own methods.
 */
export function describeScope(registry: StubRegistry, name: string, inherited = false): ScopeListing | null {
  const entry = registry.getScope(name);
  if (!entry) {
    return null;
  }
  return {
    name: entry.name,
    kind: entry.kind,
    superclass: registry.superclassOf(entry.name),
    ancestors: registry.ancestors(entry.name),
    files: entry.files,
    constants: [...entry.constants.keys()].sort(),
    singletonMethods: inherited
      ? registry.methodNames(entry.name, { singleton: true })
      : signatures(entry.singletonMethods),
    instanceMethods: inherited
      ? registry.methodNames(entry.name)
      : signatures(entry.instanceMethods),
  };
}

export function formatScopeListing(listing: ScopeListing): string[] {
  const superclass = listing.superclass ? ` < ${listing.superclass}` : '';
  const lines = [`${listing.kind} ${listing.name}${superclass}`];
  lines.push(`  ancestors: ${listing.ancestors.join(', ')}`);
  lines.push(`  files: ${listing.files.join(', ')}`);

  const section = (title: string, items: string[], prefix: string): void => {
    if (items.length === 0) return;
    lines.push('');
    lines.push(`  ${title} (${items.length}):`);
    for (const item of items) {
      lines.push(`    ${prefix}${item}`);
    }
  };
  section('constants', listing.constants, '');
  section('singleton methods', listing.singletonMethods, '.');
  section('instance methods', listing.instanceMethods, '#');
  return lines;
}

/**
 * `class Array`, `module Comparable`, ... one per scope, sorted by name.
 */
export function formatScopeIndex(registry: StubRegistry): string[] {
  return registry.scopeNames().map((name) => {
    const entry = registry.getScope(name);
    return entry ? `${entry.kind.padEnd(6)} ${name}` : name;
  });
}

export const lsCommand = addStubSetOptions(
  new Command('ls')
    .description('List scopes, or the members of a scope')
    .argument('[scope]', 'Qualified scope name, e.g. Process::Status')
    .option('-j, --json', 'Output as JSON')
    .option('-a, --inherited', 'Include methods from ancestors')
)
  .addHelpText('after', `
Examples:
  rbstub ls                      List all scopes
  rbstub ls String               Members of String
  rbstub ls String --inherited   Including Comparable, Object, Kernel
  rbstub ls --ruby 2.7 --json    Scopes of the 2.7 stub set as JSON
`)
  .action((scope: string | undefined, options: LsOptions) => {
    const context = openProject(options);
    const { registry, version } = loadStubSet(context, options);

    if (!scope) {
      const names = registry.scopeNames();
      if (options.json) {
        console.log(JSON.stringify({ version: version.toString(), scopes: names }, null, 2));
        return;
      }
      console.log(`[scopes] (${names.length}) for ${version.toString()}:`);
      console.log('');
      for (const line of formatScopeIndex(registry)) {
        console.log(`  ${line}`);
      }
      return;
    }

    const listing = describeScope(registry, scope, options.inherited);
    if (!listing) {
      const suggestions = registry.complete(scope.slice(0, 3)).slice(0, 5);
      exitWithError(`Scope not found: ${scope}`, suggestions.length > 0
        ? [`Did you mean: ${suggestions.join(', ')}`]
        : ['Run: rbstub ls']);
    }

    if (options.json) {
      console.log(JSON.stringify(listing, null, 2));
    } else {
      for (const line of formatScopeListing(listing)) {
        console.log(line);
      }
    }
  });

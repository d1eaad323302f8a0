/**
 * Complete command - Completion candidates for a prefix
 */

import { Command } from 'commander';
import { exitWithError } from '../utils/errorFormatter.js';
import { addStubSetOptions, loadStubSet, openProject, type StubSetOptions } from '../utils/project.js';

interface CompleteOptions extends StubSetOptions {
  scope?: string;
  singleton?: boolean;
  limit: string;
}

export const completeCommand = addStubSetOptions(
  new Command('complete')
    .description('List completion candidates for a prefix')
    .argument('[prefix]', 'Text typed so far', '')
    .option('--scope <name>', 'Complete methods of this scope')
    .option('--singleton', 'With --scope: singleton methods (Scope.x) instead of instance methods')
    .option('-l, --limit <n>', 'Limit results', '50')
)
  .addHelpText('after', `
Examples:
  rbstub complete Str                       Scope and constant names
  rbstub complete Process::                 Names inside Process
  rbstub complete up --scope String         String#upcase, String#upto, ...
  rbstub complete jo --scope File --singleton
`)
  .action((prefix: string, options: CompleteOptions) => {
    const limit = Number.parseInt(options.limit, 10);
    if (!Number.isInteger(limit) || limit < 1) {
      exitWithError(`Invalid limit: ${options.limit}`);
    }

    const { registry } = loadStubSet(openProject(options), options);
    if (options.scope && !registry.hasScope(options.scope)) {
      exitWithError(`Scope not found: ${options.scope}`, ['Run: rbstub ls']);
    }

    const candidates = registry.complete(prefix, { scope: options.scope, singleton: options.singleton });
    for (const candidate of candidates.slice(0, limit)) {
      console.log(candidate);
    }
    if (candidates.length > limit) {
      console.error(`... ${candidates.length - limit} more. Use --limit ${candidates.length} to see all.`);
    }
  });

/**
 * Hover command - Show the documentation an editor would display for a reference
 */

import { Command } from 'commander';
import { exitWithError } from '../utils/errorFormatter.js';
import { addStubSetOptions, loadStubSet, openProject, type StubSetOptions } from '../utils/project.js';

export const hoverCommand = addStubSetOptions(
  new Command('hover')
    .description('Print hover Markdown for a scope, method or constant')
    .argument('<ref>', 'Scope, Scope#method, Scope.method, Scope::CONST or $global')
)
  .addHelpText('after', `
Examples:
  rbstub hover String            Class documentation
  rbstub hover 'String#upcase'   Instance method (inherited ones resolve too)
  rbstub hover File.join         Singleton method
  rbstub hover File::SEPARATOR   Constant
`)
  .action((ref: string, options: StubSetOptions) => {
    const { registry } = loadStubSet(openProject(options), options);
    const text = registry.hover(ref);
    if (text === null) {
      exitWithError(`Nothing documented for ${ref}`, ['Run: rbstub ls <scope> to see what is declared']);
    }
    console.log(text);
  });

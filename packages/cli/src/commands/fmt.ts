/**
 * Fmt command - Regenerate stub files in canonical form
 *
 * Without flags the formatted text goes to stdout. --check lists files that
 * are not canonical and exits 1; --write rewrites them in place.
 */

import { Command } from 'commander';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { parseStub, printStub } from '@rbstub/core';
import { exitWithError, exitWithRbstubError } from '../utils/errorFormatter.js';
import { addProjectOptions, openProject, type ProjectOptions } from '../utils/project.js';

interface FmtOptions extends ProjectOptions {
  check?: boolean;
  write?: boolean;
  indent?: string;
}

export interface FormatResult {
  output: string;
  changed: boolean;
}

/**
 * @throws StubSyntaxError when the source does not parse
 */
export function formatSource(text: string, path: string, indent: number): FormatResult {
  const output = printStub(parseStub(text, path), { indent });
  return { output, changed: output !== text };
}

function parseIndent(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const indent = Number(value);
  if (!Number.isInteger(indent) || indent < 1 || indent > 8) {
    exitWithError(`Invalid indent: ${value}`, ['Use an integer between 1 and 8']);
  }
  return indent;
}

export const fmtCommand = addProjectOptions(
  new Command('fmt')
    .description('Print stub files in canonical form')
    .argument('<files...>', 'Stub files to format')
    .option('--check', 'Exit 1 if any file is not canonical')
    .option('-w, --write', 'Rewrite files in place')
    .option('--indent <n>', 'Spaces per nesting level (overrides config)')
)
  .addHelpText('after', `
Examples:
  rbstub fmt env.rb                  Print formatted env.rb
  rbstub fmt --check stubs/**/*.rb   CI: fail when a file needs formatting
  rbstub fmt --write env.rb          Rewrite env.rb
`)
  .action((files: string[], options: FmtOptions) => {
    if (options.check && options.write) {
      exitWithError('--check and --write cannot be combined');
    }
    const { config } = openProject(options);
    const indent = parseIndent(options.indent, config.indent);

    const unformatted: string[] = [];
    for (const path of files) {
      if (!existsSync(path)) {
        exitWithError(`File not found: ${path}`);
      }

      let result: FormatResult;
      try {
        result = formatSource(readFileSync(path, 'utf-8'), path, indent);
      } catch (err) {
        exitWithRbstubError(err);
      }

      if (options.check) {
        if (result.changed) {
          unformatted.push(path);
        }
      } else if (options.write) {
        if (result.changed) {
          writeFileSync(path, result.output, 'utf-8');
          console.log(`✓ Formatted ${path}`);
        }
      } else {
        process.stdout.write(result.output);
      }
    }

    if (options.check) {
      if (unformatted.length > 0) {
        for (const path of unformatted) {
          console.log(`✗ ${path}`);
        }
        console.log('');
        console.log(`${unformatted.length} file(s) need formatting. Run: rbstub fmt --write <files>`);
        process.exitCode = 1;
      } else {
        console.log(`✓ ${files.length} file(s) already formatted`);
      }
    }
  });

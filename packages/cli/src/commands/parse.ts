/**
 * Parse command - Print the declaration model of a stub file as JSON
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { parseStub, stripPositions } from '@rbstub/core';
import type { StubFile } from '@rbstub/core';
import { exitWithError, exitWithRbstubError } from '../utils/errorFormatter.js';

interface ParseOptions {
  pretty?: boolean;
  positions?: boolean;
}

export function renderModel(file: StubFile, options: ParseOptions = {}): string {
  const model = options.positions ? file : stripPositions(file);
  return JSON.stringify(model, null, options.pretty ? 2 : undefined);
}

export const parseCommand = new Command('parse')
  .description('Print the declarations of a stub file as JSON')
  .argument('<file>', 'Stub file to parse')
  .option('--pretty', 'Indent the JSON output')
  .option('--positions', 'Include source ranges')
  .addHelpText('after', `
Examples:
  rbstub parse stubs/rubystubs33/env.rb            Compact JSON
  rbstub parse stubs/rubystubs33/env.rb --pretty   Indented JSON
`)
  .action((path: string, options: ParseOptions) => {
    if (!existsSync(path)) {
      exitWithError(`File not found: ${path}`);
    }

    let file: StubFile;
    try {
      file = parseStub(readFileSync(path, 'utf-8'), path);
    } catch (err) {
      exitWithRbstubError(err);
    }
    console.log(renderModel(file, options));
  });

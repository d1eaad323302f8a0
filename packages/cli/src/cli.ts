#!/usr/bin/env -S node --import tsx
/**
 * @rbstub/cli - CLI for documentation stub files
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { parseCommand } from './commands/parse.js';
import { checkCommand } from './commands/check.js';
import { fmtCommand } from './commands/fmt.js';
import { lsCommand } from './commands/ls.js';
import { hoverCommand } from './commands/hover.js';
import { completeCommand } from './commands/complete.js';
import { versionsCommand } from './commands/versions.js';

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: { version: string } = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));

const program = new Command();

program
  .name('rbstub')
  .description('Parse, check and query documentation stub files')
  .version(pkg.version);

// Commands in logical order
program.addCommand(parseCommand);
program.addCommand(checkCommand);
program.addCommand(fmtCommand);
program.addCommand(lsCommand);
program.addCommand(hoverCommand);
program.addCommand(completeCommand);
program.addCommand(versionsCommand);

program.parse();

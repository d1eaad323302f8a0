/**
 * Shared project setup for commands: logger, config and stub set.
 */

import { Command } from 'commander';
import { join, resolve } from 'path';
import {
  CONFIG_DIR,
  StubLoader,
  createLogger,
  isLogLevel,
  loadConfig,
} from '@rbstub/core';
import type { LoadResult, LogLevel, Logger, RbstubConfig } from '@rbstub/core';
import { exitWithError, exitWithRbstubError } from './errorFormatter.js';

export interface ProjectOptions {
  project: string;
  logLevel?: string;
  logFile?: string;
  verbose?: boolean;
}

export interface StubSetOptions extends ProjectOptions {
  stubs?: string;
  ruby?: string;
}

export interface ProjectContext {
  projectPath: string;
  configDir: string;
  config: RbstubConfig;
  logger: Logger;
}

/**
 * Determine log level from CLI options.
 * Priority: --log-level > --verbose > default ('warnings')
 */
export function getLogLevel(options: { verbose?: boolean; logLevel?: string }): LogLevel {
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      exitWithError(`Unknown log level: ${options.logLevel}`, [
        'Use one of: silent, errors, warnings, info, debug',
      ]);
    }
    return options.logLevel;
  }
  return options.verbose ? 'info' : 'warnings';
}

export function addProjectOptions(command: Command): Command {
  return command
    .option('-p, --project <path>', 'Project path', '.')
    .option('-v, --verbose', 'Show loader progress')
    .option('--log-level <level>', 'Log level: silent, errors, warnings, info, debug')
    .option('--log-file <path>', 'Also write logs to a file');
}

export function addStubSetOptions(command: Command): Command {
  return addProjectOptions(command)
    .option('-s, --stubs <dir>', 'Stub directory (overrides stubsPath)')
    .option('-r, --ruby <version>', 'Runtime version (overrides rubyVersion)');
}

export function openProject(options: ProjectOptions): ProjectContext {
  const projectPath = resolve(options.project);
  const logFile = options.logFile ? resolve(options.logFile) : undefined;
  const logger = createLogger(getLogLevel(options), logFile ? { logFile } : undefined);

  try {
    const config = loadConfig(projectPath, logger);
    return { projectPath, configDir: join(projectPath, CONFIG_DIR), config, logger };
  } catch (err) {
    exitWithRbstubError(err);
  }
}

/**
 * Load the configured stub set; exits with guidance when it cannot be found.
 */
export function loadStubSet(context: ProjectContext, options: StubSetOptions): LoadResult {
  const { config, logger, projectPath } = context;
  const stubsPath = resolve(projectPath, options.stubs ?? config.stubsPath);
  const loader = new StubLoader(stubsPath, {
    include: config.include,
    exclude: config.exclude,
    logger,
  });

  try {
    const result = loader.loadVersion(options.ruby ?? config.rubyVersion);
    if (result.diagnostics.count() > 0) {
      logger.warn(`${result.diagnostics.count()} stub file(s) failed to load`, {
        run: 'rbstub check',
      });
    }
    return result;
  } catch (err) {
    exitWithRbstubError(err);
  }
}

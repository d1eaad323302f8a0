/**
 * Versions command - Stub sets available under the stubs path
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { MinorVersion, StubLoader, SUPPORTED_VERSIONS } from '@rbstub/core';
import { exitWithError } from '../utils/errorFormatter.js';
import { addProjectOptions, openProject, type ProjectOptions } from '../utils/project.js';

interface VersionsOptions extends ProjectOptions {
  stubs?: string;
  json?: boolean;
}

/**
 * One line per available version; the one `configured` resolves to is marked.
 */
export function formatVersions(available: MinorVersion[], configured: MinorVersion): string[] {
  const resolved = configured.findClosestSupported();
  return available.map((version) => {
    const supported = version.isSupported() ? '' : ' (unsupported)';
    const marker = resolved && version.equals(resolved)
      ? resolved.equals(configured) ? '  ← configured' : `  ← configured (${configured.toString()})`
      : '';
    return `${version.toString().padEnd(4)} ${version.toDirectoryName()}${supported}${marker}`;
  });
}

export const versionsCommand = addProjectOptions(
  new Command('versions')
    .description('List stub versions available under the stubs path')
    .option('-s, --stubs <dir>', 'Stub directory (overrides stubsPath)')
    .option('-j, --json', 'Output as JSON')
)
  .action((options: VersionsOptions) => {
    const { projectPath, config, logger } = openProject(options);
    const stubsPath = resolve(projectPath, options.stubs ?? config.stubsPath);
    const available = new StubLoader(stubsPath, { logger }).availableVersions();
    const configured = MinorVersion.parse(config.rubyVersion);

    if (options.json) {
      console.log(JSON.stringify({
        stubsPath,
        configured: configured.toString(),
        resolved: configured.findClosestSupported()?.toString() ?? null,
        available: available.map((v) => v.toString()),
        supported: SUPPORTED_VERSIONS.map((v) => v.toString()),
      }, null, 2));
      return;
    }

    if (available.length === 0) {
      exitWithError(`No stub versions found in ${stubsPath}`, [
        'Set stubsPath in .rbstub/config.yaml',
        'Stub directories are named rubystubsXY, e.g. rubystubs33',
      ]);
    }

    console.log(`Stub versions in ${stubsPath}:`);
    console.log('');
    for (const line of formatVersions(available, configured)) {
      console.log(`  ${line}`);
    }
  });

/**
 * StubLoader - Locates the stub set for a runtime version and loads it
 *
 * Layout under the base path:
 *
 *   stubs/
 *     rubystubs27/
 *       object.rb
 *       string.rb
 *     rubystubs33/
 *       ...
 *
 * A requested version without its own directory in the supported list
 * falls back to the closest lower supported version. Files that do not
 * parse are reported as diagnostics; the rest of the set still loads.
 */

import { existsSync, readdirSync, readFileSync, statSync } from 'fs';
import { join, relative, basename, extname, sep } from 'path';
import { minimatch } from 'minimatch';
import type { Logger, StubFile } from '@rbstub/types';
import { ConfigError, FileAccessError } from '../errors/RbstubError.js';
import { DiagnosticCollector } from '../diagnostics/DiagnosticCollector.js';
import { silentLogger } from '../logging/Logger.js';
import { parseStub } from './parser.js';
import { StubRegistry } from './StubRegistry.js';
import { MinorVersion, sortVersions } from './version.js';

export interface StubLoaderOptions {
  /** Glob patterns relative to the version directory; default every *.rb file */
  include?: string[];
  exclude?: string[];
  logger?: Logger;
}

export interface LoadResult {
  requested: MinorVersion;
  /** Version whose directory was loaded */
  version: MinorVersion;
  directory: string;
  files: StubFile[];
  registry: StubRegistry;
  /** Parse and read failures, one per file */
  diagnostics: DiagnosticCollector;
}

/** File names whose scope name is not plain PascalCase */
const SCOPE_NAME_EXCEPTIONS: Record<string, string> = {
  io_error: 'IOError',
  open_ssl: 'OpenSSL',
  big_math: 'BigMath',
  ruby_vm: 'RubyVM',
  tk_util: 'TkUtil',
};

/**
 * `string` → `String`, `float_domain_error` → `FloatDomainError`.
 */
export function fileNameToScopeName(fileName: string): string {
  const stem = fileName.endsWith('.rb') ? fileName.slice(0, -3) : fileName;
  if (Object.hasOwn(SCOPE_NAME_EXCEPTIONS, stem)) {
    return SCOPE_NAME_EXCEPTIONS[stem];
  }
  return stem
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');
}

/**
 * Recursively list files under `dir`, as paths relative to it with `/` separators.
 */
function listFiles(dir: string, root: string = dir): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...listFiles(full, root));
    } else if (entry.isFile()) {
      files.push(relative(root, full).split(sep).join('/'));
    }
  }
  return files.sort();
}

export class StubLoader {
  private readonly include: string[];
  private readonly exclude: string[];
  private readonly logger: Logger;

  private loaded: LoadResult | null = null;
  /** Scope name derived from the file name → absolute path */
  private scopeFiles = new Map<string, string>();

  constructor(private readonly basePath: string, options: StubLoaderOptions = {}) {
    this.include = options.include ?? ['**/*.rb'];
    this.exclude = options.exclude ?? [];
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Versions that have a stub directory under the base path, oldest first.
   */
  availableVersions(): MinorVersion[] {
    if (!existsSync(this.basePath)) {
      return [];
    }
    const versions: MinorVersion[] = [];
    for (const entry of readdirSync(this.basePath, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      const version = MinorVersion.fromDirectoryName(entry.name);
      if (version) {
        versions.push(version);
      }
    }
    return sortVersions(versions);
  }

  isVersionAvailable(version: MinorVersion): boolean {
    const dir = join(this.basePath, version.toDirectoryName());
    return existsSync(dir) && statSync(dir).isDirectory();
  }

  /**
   * Stub files of a version directory selected by include/exclude, relative paths.
   */
  discoverFiles(directory: string): string[] {
    return listFiles(directory).filter((file) =>
      file.endsWith('.rb') &&
      this.include.some((pattern) => minimatch(file, pattern, { dot: true })) &&
      !this.exclude.some((pattern) => minimatch(file, pattern, { dot: true }))
    );
  }

  /**
   * Load the stub set for `requested` (a MinorVersion or "3.3.1").
   *
   * @throws ConfigError ERR_STUBS_NOT_FOUND when no supported version fits
   *         or its directory is missing
   */
  loadVersion(requested: MinorVersion | string): LoadResult {
    const wanted = typeof requested === 'string' ? MinorVersion.parse(requested) : requested;
    const version = wanted.findClosestSupported();

    if (!version) {
      throw new ConfigError(
        `No supported runtime version found for ${wanted.toString()}. Minimum supported version is 1.9`,
        'ERR_STUBS_NOT_FOUND',
        { version: wanted.toString() },
        'Set rubyVersion in .rbstub/config.yaml to 1.9 or later'
      );
    }
    if (!version.equals(wanted)) {
      this.logger.info('Requested version not directly supported, using closest version', {
        requested: wanted.toString(),
        using: version.toString(),
      });
    }

    const directory = join(this.basePath, version.toDirectoryName());
    if (!this.isVersionAvailable(version)) {
      throw new ConfigError(
        `Stub directory not found: ${directory}`,
        'ERR_STUBS_NOT_FOUND',
        { filePath: directory, version: version.toString() },
        'Check stubsPath in .rbstub/config.yaml or run: rbstub versions'
      );
    }

    this.logger.debug('Loading stubs', { directory });

    const diagnostics = new DiagnosticCollector();
    const files: StubFile[] = [];
    const scopeFiles = new Map<string, string>();

    for (const relativePath of this.discoverFiles(directory)) {
      const fullPath = join(directory, relativePath);
      scopeFiles.set(fileNameToScopeName(basename(relativePath, extname(relativePath))), fullPath);

      let text: string;
      try {
        text = readFileSync(fullPath, 'utf-8');
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        diagnostics.addFromError(
          new FileAccessError(`Cannot read stub file: ${message}`, 'ERR_FILE_UNREADABLE', { filePath: relativePath }),
          'loader'
        );
        continue;
      }

      try {
        files.push(parseStub(text, relativePath));
      } catch (err) {
        if (!(err instanceof Error)) throw err;
        this.logger.warn('Failed to parse stub file', { file: relativePath, error: err.message });
        diagnostics.addFromError(err, 'parser');
      }
    }

    const result: LoadResult = {
      requested: wanted,
      version,
      directory,
      files,
      registry: new StubRegistry(files),
      diagnostics,
    };

    this.loaded = result;
    this.scopeFiles = scopeFiles;

    this.logger.info('Loaded stub files', {
      version: version.toString(),
      files: files.length,
      failed: diagnostics.count(),
    });
    return result;
  }

  getLoadedVersion(): MinorVersion | null {
    return this.loaded?.version ?? null;
  }

  getRegistry(): StubRegistry | null {
    return this.loaded?.registry ?? null;
  }

  /**
   * Absolute path of the file declaring `scope`: by file name first, then by
   * the first file the registry saw the scope in.
   */
  getScopeFile(scope: string): string | null {
    const byName = this.scopeFiles.get(scope);
    if (byName) {
      return byName;
    }
    const entry = this.loaded?.registry.getScope(scope);
    if (entry && this.loaded && entry.files.length > 0) {
      return join(this.loaded.directory, entry.files[0]);
    }
    return null;
  }

  hasScope(scope: string): boolean {
    return this.getScopeFile(scope) !== null;
  }
}

/**
 * DiagnosticWriter - Writes diagnostics to .rbstub/diagnostics.log
 *
 * JSON lines format (one JSON object per line), so the log can be
 * grepped or fed to jq line by line.
 */

import { writeFileSync, existsSync, mkdirSync } from 'fs';
import { join, dirname } from 'path';

import type { DiagnosticCollector } from './DiagnosticCollector.js';

export class DiagnosticWriter {
  /**
   * Write all diagnostics to <configDir>/diagnostics.log, overwriting it.
   */
  write(collector: DiagnosticCollector, configDir: string): string {
    const logPath = this.getLogPath(configDir);

    const dir = dirname(logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    writeFileSync(logPath, collector.toDiagnosticsLog(), 'utf-8');
    return logPath;
  }

  getLogPath(configDir: string): string {
    return join(configDir, 'diagnostics.log');
  }
}

/**
 * Console reporting for sync results, and the exit code each outcome maps to.
 */

import * as path from 'path';
import type { SyncResult } from '../types.js';

export interface ConsoleOutput {
  log(message: string): void;
  error(message: string): void;
}

export interface ReportOptions {
  /** How the catalog file is named in messages */
  label: string;
  /** Command suggested when the catalog is out of date */
  generator: string;
}

/**
 * Print the outcome of a sync. Returns 0 for `written` and `up-to-date`,
 * 1 for `out-of-date`.
 */
export function reportSyncResult(
  result: SyncResult,
  options: ReportOptions,
  out: ConsoleOutput = console
): number {
  const fileName = path.basename(result.outputPath);

  switch (result.status) {
    case 'written':
      out.log(`Generated ${options.label}`);
      return 0;
    case 'up-to-date':
      out.log(`${fileName} is up to date.`);
      return 0;
    case 'out-of-date': {
      out.error(`ERROR: ${fileName} is out of date. Run '${options.generator}' and commit.`);
      if (result.difference) {
        const { line, expected, actual } = result.difference;
        out.error(`  First difference at line ${line}:`);
        out.error(`  - ${actual ?? '(end of file)'}`);
        out.error(`  + ${expected ?? '(end of file)'}`);
      }
      return 1;
    }
  }
}

/**
 * Print a failure as `Error: <message>`. Always returns 1.
 */
export function reportError(error: unknown, out: ConsoleOutput = console): number {
  out.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  return 1;
}

/**
 * GitHub Actions job summary generation.
 *
 * Produces condensed markdown suitable for $GITHUB_STEP_SUMMARY.
 */

import * as fs from 'fs/promises';
import type { SyncResult } from '../types.js';

const STATUS_LABEL: Record<SyncResult['status'], string> = {
  written: ':white_check_mark: Catalog regenerated',
  'up-to-date': ':white_check_mark: Catalog is up to date',
  'out-of-date': ':x: Catalog is out of date',
};

/**
 * Generate a condensed summary for a sync run.
 */
export function generateGitHubSummary(result: SyncResult, fileLabel = result.outputPath): string {
  const { counts } = result;
  const lines: string[] = [];

  lines.push(`## ${STATUS_LABEL[result.status]}`);
  lines.push('');
  lines.push(`\`${fileLabel}\``);
  lines.push('');

  lines.push('| Section | Entries |');
  lines.push('|---------|---------|');
  lines.push(`| Rules | ${counts.rules} |`);
  lines.push(`| Skills | ${counts.skills} |`);
  lines.push(`| Agents | ${counts.agents} |`);
  lines.push(`| Custom Skills | ${counts.customSkills} |`);
  lines.push(`| Custom Agents | ${counts.customAgents} |`);
  lines.push('');

  if (result.difference) {
    const { line, expected, actual } = result.difference;
    lines.push(`First difference at line ${line}:`);
    lines.push('');
    lines.push('```diff');
    lines.push(actual === null ? '- (end of file)' : `- ${actual}`);
    lines.push(expected === null ? '+ (end of file)' : `+ ${expected}`);
    lines.push('```');
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Write summary to $GITHUB_STEP_SUMMARY if available.
 */
export async function writeGitHubSummary(result: SyncResult, fileLabel?: string): Promise<boolean> {
  const summaryPath = process.env.GITHUB_STEP_SUMMARY;
  if (!summaryPath) return false;

  await fs.appendFile(summaryPath, generateGitHubSummary(result, fileLabel) + '\n');
  return true;
}

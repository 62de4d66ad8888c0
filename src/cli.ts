#!/usr/bin/env node

/**
 * CLI for the documentation catalog generator.
 *
 * Default action regenerates the catalog; `--check` only verifies it.
 * Also supports: list.
 */

import 'dotenv/config';
import { Command } from 'commander';
import * as path from 'path';
import { loadConfig, pathOverrides } from './config.js';
import { buildCatalog, syncCatalog } from './pipeline.js';
import { reportError, reportSyncResult } from './report/console.js';
import { writeGitHubSummary } from './report/github-summary.js';

interface CommonOptions {
  root?: string;
  output?: string;
  config?: string;
}

function displayPath(filePath: string): string {
  return path.relative(process.cwd(), filePath) || filePath;
}

const program = new Command();

program
  .name('doc-catalog')
  .description('Generate a catalog of rules, skills and agents from their frontmatter')
  .version('1.0.0')
  .enablePositionalOptions();

// ============================================
// Primary action: generate / check
// ============================================

program
  .option('--check', 'Verify the catalog is up to date without writing it')
  .option('--root <dir>', 'Repository root to scan (default: .)')
  .option('--output <path>', 'Catalog file, relative to the root (default: docs/CATALOG.md)')
  .option('--config <path>', 'Path to catalog.config.yaml')
  .option('--github-summary', 'Write GitHub Actions step summary')
  .action(async (options: CommonOptions & { check?: boolean; githubSummary?: boolean }) => {
    try {
      const config = await loadConfig(options.config, pathOverrides(options));
      const result = await syncCatalog({
        config,
        mode: options.check ? 'check' : 'write',
      });
      const outputLabel = displayPath(result.outputPath);

      if (options.githubSummary) {
        await writeGitHubSummary(result, outputLabel);
      }

      const exitCode = reportSyncResult(result, { label: outputLabel, generator: config.generator });
      if (exitCode !== 0) process.exit(exitCode);
    } catch (error) {
      process.exit(reportError(error));
    }
  });

// ============================================
// List discovered entries
// ============================================

program
  .command('list')
  .description('Print the discovered rules, skills and agents as JSON')
  .option('--root <dir>', 'Repository root to scan (default: .)')
  .option('--config <path>', 'Path to catalog.config.yaml')
  .action(async (options: CommonOptions) => {
    try {
      const config = await loadConfig(options.config, pathOverrides(options));
      const { collections } = await buildCatalog({ config });

      const json = JSON.stringify(
        {
          ...collections,
          skills: Object.fromEntries(collections.skills),
        },
        null,
        2
      );
      console.log(json);
    } catch (error) {
      process.exit(reportError(error));
    }
  });

await program.parseAsync();

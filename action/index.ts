/**
 * GitHub Action entry point for catalog verification.
 *
 * Reads inputs from the action.yml, checks that the committed catalog
 * matches a fresh render, and sets outputs + job summary.
 */

import * as core from '@actions/core';
import * as path from 'path';
import { loadConfig, pathOverrides, resolveCatalogPaths } from '../src/config.js';
import { syncCatalog } from '../src/pipeline.js';
import { generateGitHubSummary } from '../src/report/github-summary.js';

async function run(): Promise<void> {
  try {
    // Read inputs
    const root = core.getInput('root');
    const output = core.getInput('output');
    const configPath = core.getInput('config') || undefined;

    const config = await loadConfig(configPath, pathOverrides({ root, output }));
    const result = await syncCatalog({
      config,
      mode: 'check',
      warn: (message) => core.warning(message),
    });

    // Set outputs
    core.setOutput('status', result.status);

    // Write job summary
    const fileLabel = path.relative(resolveCatalogPaths(config).root, result.outputPath) || result.outputPath;
    await core.summary.addRaw(generateGitHubSummary(result, fileLabel)).write();

    if (result.status === 'out-of-date') {
      core.setFailed(`${fileLabel} is out of date. Run '${config.generator}' and commit.`);
    }
  } catch (error) {
    core.setOutput('status', 'error');
    core.setFailed(error instanceof Error ? error.message : String(error));
  }
}

await run();

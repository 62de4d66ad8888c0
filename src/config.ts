/**
 * Centralized configuration for the catalog generator.
 *
 * Configuration is loaded with the following precedence (lowest to highest):
 * 1. Built-in defaults
 * 2. Config file (catalog.config.yaml or custom path)
 * 3. Environment variables (CATALOG_* prefix)
 * 4. Programmatic overrides (CLI flags or API)
 */

import yaml from 'js-yaml';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError, isNotFoundCode } from './errors.js';
import type { NavigationLink } from './types.js';

export const CONFIG_FILE_NAME = 'catalog.config.yaml';

export interface CatalogConfig {
  // Layout, relative to rootDir
  rootDir: string;
  outputPath: string;
  rulesDir: string;
  skillsDir: string;
  agentsDir: string;
  customDir: string;

  // Document
  title: string;
  generator: string;
  navigation: NavigationLink[];
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CatalogConfig = {
  rootDir: '.',
  outputPath: 'docs/CATALOG.md',
  rulesDir: 'rules',
  skillsDir: 'skills',
  agentsDir: 'agents',
  customDir: 'custom',
  title: 'Skill Library — Catalog',
  generator: 'doc-catalog',
  // Hrefs are relative to rootDir and rebased onto the output directory
  navigation: [
    { label: 'README', href: 'README.md' },
    { label: 'CATALOG' },
    { label: 'SKILLS-EXPLAINED', href: 'docs/SKILLS-EXPLAINED.md' },
    { label: 'ARTICLE', href: 'docs/ARTICLE.md' },
  ],
};

// ============================================
// Config file
// ============================================

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(section: RawRecord, key: string, where: string): string | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`${where}.${key} must be a string`);
  }
  return value;
}

function readSection(raw: RawRecord, key: string): RawRecord {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`'${key}' must be a mapping`);
  }
  return value;
}

function readNavigation(document: RawRecord): NavigationLink[] | undefined {
  const value = document.navigation;
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    throw new ConfigError('document.navigation must be a list');
  }

  return value.map((item: unknown, i) => {
    if (!isRecord(item)) {
      throw new ConfigError(`document.navigation[${i}] must be a mapping`);
    }
    const label = readString(item, 'label', `document.navigation[${i}]`);
    if (!label) {
      throw new ConfigError(`document.navigation[${i}] is missing 'label'`);
    }
    const href = readString(item, 'href', `document.navigation[${i}]`);
    return href ? { label, href } : { label };
  });
}

/**
 * Convert a parsed config document into a partial config.
 */
export function parseConfigDocument(raw: unknown): Partial<CatalogConfig> {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new ConfigError('Config file must contain a mapping');
  }

  const paths = readSection(raw, 'paths');
  const document = readSection(raw, 'document');
  const config: Partial<CatalogConfig> = {};

  const root = readString(paths, 'root', 'paths');
  const output = readString(paths, 'output', 'paths');
  const rules = readString(paths, 'rules', 'paths');
  const skills = readString(paths, 'skills', 'paths');
  const agents = readString(paths, 'agents', 'paths');
  const custom = readString(paths, 'custom', 'paths');
  if (root) config.rootDir = root;
  if (output) config.outputPath = output;
  if (rules) config.rulesDir = rules;
  if (skills) config.skillsDir = skills;
  if (agents) config.agentsDir = agents;
  if (custom) config.customDir = custom;

  const title = readString(document, 'title', 'document');
  const generator = readString(document, 'generator', 'document');
  const navigation = readNavigation(document);
  if (title) config.title = title;
  if (generator) config.generator = generator;
  if (navigation) config.navigation = navigation;

  return config;
}

/**
 * Load a YAML config file if it exists.
 */
async function loadConfigFile(configPath?: string): Promise<Partial<CatalogConfig>> {
  const filePath = configPath || path.join(process.cwd(), CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    // A missing default config file is fine; an explicitly requested one is not
    if (isNotFoundCode(error) && !configPath) return {};
    throw new ConfigError(`Cannot read config file ${filePath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid YAML in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const config = parseConfigDocument(raw);
  // Relative roots in a config file are relative to the file itself
  if (config.rootDir) {
    config.rootDir = path.resolve(path.dirname(filePath), config.rootDir);
  }
  return config;
}

// ============================================
// Environment
// ============================================

/**
 * Load configuration from environment variables.
 *
 * Supported variables:
 * - CATALOG_ROOT: Repository root to scan (default: '.')
 * - CATALOG_OUTPUT: Output file, relative to the root (default: 'docs/CATALOG.md')
 * - CATALOG_TITLE: Document title
 */
function loadEnvConfig(): Partial<CatalogConfig> {
  const config: Partial<CatalogConfig> = {};

  if (process.env.CATALOG_ROOT) config.rootDir = process.env.CATALOG_ROOT;
  if (process.env.CATALOG_OUTPUT) config.outputPath = process.env.CATALOG_OUTPUT;
  if (process.env.CATALOG_TITLE) config.title = process.env.CATALOG_TITLE;

  return config;
}

/**
 * Merge partial configs over the defaults, later ones winning.
 */
function mergeConfigs(...configs: Partial<CatalogConfig>[]): CatalogConfig {
  const result: CatalogConfig = { ...DEFAULT_CONFIG, navigation: [...DEFAULT_CONFIG.navigation] };

  for (const config of configs) {
    if (config.rootDir !== undefined) result.rootDir = config.rootDir;
    if (config.outputPath !== undefined) result.outputPath = config.outputPath;
    if (config.rulesDir !== undefined) result.rulesDir = config.rulesDir;
    if (config.skillsDir !== undefined) result.skillsDir = config.skillsDir;
    if (config.agentsDir !== undefined) result.agentsDir = config.agentsDir;
    if (config.customDir !== undefined) result.customDir = config.customDir;
    if (config.title !== undefined) result.title = config.title;
    if (config.generator !== undefined) result.generator = config.generator;
    if (config.navigation !== undefined) result.navigation = config.navigation;
  }

  return result;
}

/**
 * Load full configuration with all sources merged.
 *
 * @param configPath - Optional path to catalog.config.yaml
 * @param overrides - Optional programmatic overrides (CLI flags)
 */
export async function loadConfig(
  configPath?: string,
  overrides?: Partial<CatalogConfig>
): Promise<CatalogConfig> {
  const fileConfig = await loadConfigFile(configPath);
  const envConfig = loadEnvConfig();

  return mergeConfigs(fileConfig, envConfig, overrides ?? {});
}

/**
 * Overrides for the root and output path from CLI flags or action inputs.
 * Empty values are left out so lower layers still apply.
 */
export function pathOverrides(options: { root?: string; output?: string }): Partial<CatalogConfig> {
  const overrides: Partial<CatalogConfig> = {};
  if (options.root) overrides.rootDir = options.root;
  if (options.output) overrides.outputPath = options.output;
  return overrides;
}

// ============================================
// Resolved paths
// ============================================

export interface CatalogPaths {
  root: string;
  output: string;
  outputDir: string;
  rules: string;
  skills: string;
  agents: string;
  customSkills: string;
  customAgents: string;
}

/**
 * Resolve every configured directory to an absolute path.
 */
export function resolveCatalogPaths(config: CatalogConfig, cwd = process.cwd()): CatalogPaths {
  const root = path.resolve(cwd, config.rootDir);
  const output = path.resolve(root, config.outputPath);
  const custom = path.resolve(root, config.customDir);

  return {
    root,
    output,
    outputDir: path.dirname(output),
    rules: path.resolve(root, config.rulesDir),
    skills: path.resolve(root, config.skillsDir),
    agents: path.resolve(root, config.agentsDir),
    customSkills: path.join(custom, 'skills'),
    customAgents: path.join(custom, 'agents'),
  };
}

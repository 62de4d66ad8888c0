/**
 * Catalog discovery.
 *
 * Scans the rules, skills and agents trees (plus their custom counterparts)
 * for markdown files, parses their frontmatter, and returns catalog entries
 * in path order.
 */

import * as path from 'path';
import { parseMetadata } from '../parser.js';
import { extractCatalogDescription } from '../description.js';
import { resolveSkillCategory, titleCase } from './categories.js';
import { walkFiles, type CatalogFileSystem } from './file-system.js';
import type { CatalogPaths } from '../config.js';
import type {
  AgentEntry,
  CatalogCollections,
  CatalogEntry,
  MetadataBlock,
  SkillsByCategory,
  WarningSink,
} from '../types.js';

export const SKILL_FILE_NAME = 'SKILL.md';
export const README_FILE_NAME = 'README.md';
export const ARCHIVE_DIRS = ['_archive', 'archive'] as const;
const REFERENCE_SUFFIX = '-reference';

export interface ScanContext {
  fs: CatalogFileSystem;
  /** Directory the scanner walks */
  root: string;
  /** Directory of the generated document; entry paths are relative to it */
  outputDir: string;
  warn: WarningSink;
}

const isMarkdown = (fileName: string) => fileName.endsWith('.md');
const isSkillFile = (fileName: string) => fileName === SKILL_FILE_NAME;

/**
 * Agent files exclude READMEs and `*-reference.md` companions.
 */
function isAgentFile(fileName: string): boolean {
  if (!isMarkdown(fileName) || fileName === README_FILE_NAME) return false;
  return !path.basename(fileName, '.md').endsWith(REFERENCE_SUFFIX);
}

// ============================================
// Shared entry building
// ============================================

/**
 * Read a file and build its entry, or warn and return null when the
 * frontmatter is missing or has no name.
 */
async function readEntry(
  ctx: ScanContext,
  filePath: string
): Promise<{ entry: CatalogEntry; metadata: MetadataBlock } | null> {
  const content = await ctx.fs.readFile(filePath);
  const metadata = parseMetadata(content);

  if (!metadata) {
    ctx.warn(`WARNING: ${filePath} has no frontmatter, skipping`);
    return null;
  }
  if (!metadata.name) {
    ctx.warn(`WARNING: ${filePath} frontmatter has no 'name' key, skipping`);
    return null;
  }
  if (metadata.duplicateKeys.length > 0) {
    ctx.warn(`WARNING: ${filePath} repeats ${metadata.duplicateKeys.join(', ')}; using the last value`);
  }

  return {
    metadata,
    entry: {
      name: metadata.name,
      description: extractCatalogDescription(metadata.description ?? ''),
      path: toLink(ctx.outputDir, filePath),
    },
  };
}

function toLink(fromDir: string, filePath: string): string {
  return path.relative(fromDir, filePath).split(path.sep).join('/');
}

// ============================================
// Scanners
// ============================================

/**
 * Rules: `*.md` files directly inside the rules directory.
 */
export async function discoverRules(ctx: ScanContext): Promise<CatalogEntry[]> {
  const files = await walkFiles(ctx.fs, ctx.root, isMarkdown, { recursive: false });
  const entries: CatalogEntry[] = [];

  for (const file of files) {
    const result = await readEntry(ctx, file);
    if (result) entries.push(result.entry);
  }
  return entries;
}

/**
 * Skills: every SKILL.md below the root, grouped by the directories between
 * the root and the skill's own folder (`build/backend/foo/SKILL.md` -> `build/backend`).
 */
export async function discoverSkills(ctx: ScanContext): Promise<SkillsByCategory> {
  const files = await walkFiles(ctx.fs, ctx.root, isSkillFile);
  const byCategory: SkillsByCategory = new Map();

  for (const file of files) {
    const result = await readEntry(ctx, file);
    if (!result) continue;

    const key = skillCategoryKey(ctx.root, file);
    let category = resolveSkillCategory(key);
    if (!category) {
      ctx.warn(`WARNING: ${file} is in unknown skill category '${key || '(none)'}', listing under Other`);
      category = 'other';
    }

    const list = byCategory.get(category) ?? [];
    list.push(result.entry);
    byCategory.set(category, list);
  }

  return byCategory;
}

export function skillCategoryKey(root: string, skillFile: string): string {
  const parts = path.relative(root, skillFile).split(path.sep);
  return parts.slice(0, -2).join('/');
}

/**
 * Agents: every markdown file below the root outside archive directories,
 * categorized by its parent directory name.
 */
export async function discoverAgents(ctx: ScanContext): Promise<AgentEntry[]> {
  const files = await walkFiles(ctx.fs, ctx.root, isAgentFile, { skipDirs: ARCHIVE_DIRS });
  const entries: AgentEntry[] = [];

  for (const file of files) {
    const result = await readEntry(ctx, file);
    if (!result) continue;
    entries.push({
      ...result.entry,
      category: titleCase(path.basename(path.dirname(file))),
    });
  }
  return entries;
}

/**
 * Custom skills: same files as `discoverSkills`, listed without grouping.
 */
export async function discoverCustomSkills(ctx: ScanContext): Promise<CatalogEntry[]> {
  const files = await walkFiles(ctx.fs, ctx.root, isSkillFile);
  const entries: CatalogEntry[] = [];

  for (const file of files) {
    const result = await readEntry(ctx, file);
    if (result) entries.push(result.entry);
  }
  return entries;
}

/**
 * Custom agents: same filtering as `discoverAgents`, listed without a category.
 */
export async function discoverCustomAgents(ctx: ScanContext): Promise<CatalogEntry[]> {
  const agents = await discoverAgents(ctx);
  return agents.map(({ name, description, path: link }) => ({ name, description, path: link }));
}

/**
 * Run every scanner over the configured trees.
 */
export async function discoverCatalog(
  paths: CatalogPaths,
  fileSystem: CatalogFileSystem,
  warn: WarningSink
): Promise<CatalogCollections> {
  const context = (root: string): ScanContext => ({
    fs: fileSystem,
    root,
    outputDir: paths.outputDir,
    warn,
  });

  return {
    rules: await discoverRules(context(paths.rules)),
    skills: await discoverSkills(context(paths.skills)),
    agents: await discoverAgents(context(paths.agents)),
    customSkills: await discoverCustomSkills(context(paths.customSkills)),
    customAgents: await discoverCustomAgents(context(paths.customAgents)),
  };
}

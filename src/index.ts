/**
 * Documentation catalog generator.
 *
 * Scans rules, skills and agents for frontmatter and renders a single
 * markdown catalog, or verifies that a committed catalog is current.
 *
 * @packageDocumentation
 */

// Types
export type {
  MetadataBlock,
  CatalogEntry,
  AgentEntry,
  SkillCategory,
  SkillsByCategory,
  CatalogCollections,
  CatalogCounts,
  NavigationLink,
  RenderOptions,
  SyncMode,
  SyncStatus,
  SyncResult,
  LineDifference,
  WarningSink,
} from './types.js';
export { SKILL_CATEGORIES } from './types.js';

// Errors
export { CatalogError, NotFoundError, ConfigError } from './errors.js';

// Config
export { loadConfig, parseConfigDocument, pathOverrides, resolveCatalogPaths, DEFAULT_CONFIG } from './config.js';
export type { CatalogConfig, CatalogPaths } from './config.js';

// Parser
export { extractFrontmatter, parseMetadata, parseMetadataBody, formatMetadataValue } from './parser.js';
export { extractCatalogDescription } from './description.js';

// Discovery
export {
  discoverRules,
  discoverSkills,
  discoverAgents,
  discoverCustomSkills,
  discoverCustomAgents,
  discoverCatalog,
} from './discovery/scanners.js';
export type { ScanContext } from './discovery/scanners.js';
export { nodeFileSystem, createMemoryFileSystem, walkFiles } from './discovery/file-system.js';
export type { CatalogFileSystem, DirectoryEntry } from './discovery/file-system.js';
export { SKILL_CATEGORY_DISPLAY, resolveSkillCategory, titleCase } from './discovery/categories.js';

// Report
export { renderCatalog, countEntries } from './report/catalog.js';
export { generateGitHubSummary, writeGitHubSummary } from './report/github-summary.js';
export { reportSyncResult, reportError } from './report/console.js';
export type { ConsoleOutput, ReportOptions } from './report/console.js';

// Pipeline
export { buildCatalog, syncCatalog, findFirstDifference } from './pipeline.js';
export type { SyncOptions, RenderedCatalog } from './pipeline.js';

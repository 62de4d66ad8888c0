/**
 * Type definitions for the documentation catalog generator.
 */

// ============================================
// Parser Types
// ============================================

/**
 * Flat key/value metadata read from a file's leading `---` block.
 *
 * `name` and `description` are lifted out; every other key lands in `extra`.
 * When a key repeats, the last occurrence wins and the key is listed in
 * `duplicateKeys`.
 */
export interface MetadataBlock {
  name?: string;
  description?: string;
  extra: Record<string, string>;
  duplicateKeys: string[];
}

// ============================================
// Catalog Types
// ============================================

export interface CatalogEntry {
  name: string;
  description: string;
  /** Link target, relative to the generated document's directory */
  path: string;
}

export interface AgentEntry extends CatalogEntry {
  category: string;
}

export const SKILL_CATEGORIES = [
  'meta',
  'build/backend',
  'build/frontend',
  'workflow',
  'patterns',
  'other',
] as const;

export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

export type SkillsByCategory = Map<SkillCategory, CatalogEntry[]>;

export interface CatalogCollections {
  rules: CatalogEntry[];
  skills: SkillsByCategory;
  agents: AgentEntry[];
  customSkills: CatalogEntry[];
  customAgents: CatalogEntry[];
}

export interface CatalogCounts {
  rules: number;
  skills: number;
  agents: number;
  customSkills: number;
  customAgents: number;
}

// ============================================
// Report Types
// ============================================

export interface NavigationLink {
  label: string;
  /** Omitted for the current page, which is rendered in bold */
  href?: string;
}

export interface RenderOptions {
  title: string;
  /** Shown in the auto-generated banner */
  generator: string;
  navigation: NavigationLink[];
  /** Relative link from the document's directory back to the repository root ('' when they coincide) */
  rootLink: string;
  /** Name of the custom tree, used in the placeholder link */
  customDir: string;
}

// ============================================
// Sync Types
// ============================================

export type SyncMode = 'write' | 'check';

export type SyncStatus = 'written' | 'up-to-date' | 'out-of-date';

export interface LineDifference {
  /** 1-based line number */
  line: number;
  expected: string | null;
  actual: string | null;
}

export interface SyncResult {
  mode: SyncMode;
  status: SyncStatus;
  outputPath: string;
  content: string;
  counts: CatalogCounts;
  difference?: LineDifference;
}

export type WarningSink = (message: string) => void;

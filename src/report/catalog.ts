/**
 * Catalog document rendering.
 *
 * Pure: the same collections and options always produce the same text.
 */

import { SKILL_CATEGORY_DISPLAY } from '../discovery/categories.js';
import { SKILL_CATEGORIES } from '../types.js';
import type {
  AgentEntry,
  CatalogCollections,
  CatalogCounts,
  CatalogEntry,
  NavigationLink,
  RenderOptions,
} from '../types.js';

const TWO_COLUMN_HEADER = ['| Name | Description |', '|------|------------|'];
const THREE_COLUMN_HEADER = ['| Name | Category | Description |', '|------|----------|------------|'];

/**
 * Render the full catalog markdown.
 */
export function renderCatalog(collections: CatalogCollections, options: RenderOptions): string {
  const { rules, skills, agents, customSkills, customAgents } = collections;
  const counts = countEntries(collections);
  const lines: string[] = [];

  // Header
  lines.push(`<!-- AUTO-GENERATED by ${options.generator} — do not edit manually -->`);
  lines.push('');
  lines.push(`# ${options.title}`);
  lines.push('');
  lines.push(`> ${formatNavigation(options.navigation)}`);
  lines.push('');
  lines.push('> [!TIP]');
  lines.push(
    `> To install any skill or agent below, see [Quickstart](${rootRelative(options.rootLink, 'README.md#quickstart')}) in the README.`
  );
  lines.push('');

  // Rules
  lines.push(`## Rules (${counts.rules})`);
  lines.push('');
  lines.push('*Always loaded — shape every interaction.*');
  lines.push('');
  lines.push(...entryTable(rules));
  lines.push('');
  lines.push('---');
  lines.push('');

  // Skills
  lines.push(`## Skills (${counts.skills})`);
  lines.push('');
  lines.push('*Load on demand — teach the agent specialized workflows.*');
  lines.push('');
  for (const category of SKILL_CATEGORIES) {
    const entries = skills.get(category) ?? [];
    if (entries.length === 0) continue;
    lines.push(`### ${SKILL_CATEGORY_DISPLAY[category]} (${entries.length})`);
    lines.push('');
    lines.push(...entryTable(entries));
    lines.push('');
  }
  lines.push('---');
  lines.push('');

  // Agents
  lines.push(`## Agents (${counts.agents})`);
  lines.push('');
  lines.push('*Isolated subprocesses — zero parent context in, result out.*');
  lines.push('');
  lines.push(...agentTable(agents));
  lines.push('');
  lines.push('---');
  lines.push('');

  // Custom
  lines.push('## Custom');
  lines.push('');
  if (customSkills.length > 0 || customAgents.length > 0) {
    if (customSkills.length > 0) {
      lines.push(`### Custom Skills (${customSkills.length})`);
      lines.push('');
      lines.push(...entryTable(customSkills));
      lines.push('');
    }
    if (customAgents.length > 0) {
      lines.push(`### Custom Agents (${customAgents.length})`);
      lines.push('');
      lines.push(...entryTable(customAgents));
      lines.push('');
    }
  } else {
    const readme = `${options.customDir}/README.md`;
    lines.push(
      `*Your project-specific skills and agents — not tracked by upstream. See [${readme}](${rootRelative(options.rootLink, readme)}) to get started.*`
    );
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Count entries per section; skills are summed over all categories.
 */
export function countEntries(collections: CatalogCollections): CatalogCounts {
  let skills = 0;
  for (const entries of collections.skills.values()) {
    skills += entries.length;
  }

  return {
    rules: collections.rules.length,
    skills,
    agents: collections.agents.length,
    customSkills: collections.customSkills.length,
    customAgents: collections.customAgents.length,
  };
}

function entryTable(entries: CatalogEntry[]): string[] {
  return [
    ...TWO_COLUMN_HEADER,
    ...entries.map((e) => `| ${entryLink(e)} | ${escapeCell(e.description)} |`),
  ];
}

function agentTable(entries: AgentEntry[]): string[] {
  return [
    ...THREE_COLUMN_HEADER,
    ...entries.map((e) => `| ${entryLink(e)} | ${escapeCell(e.category)} | ${escapeCell(e.description)} |`),
  ];
}

function entryLink(entry: CatalogEntry): string {
  return `[${escapeCell(entry.name)}](${entry.path})`;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}

function formatNavigation(links: NavigationLink[]): string {
  return links.map((link) => (link.href ? `[${link.label}](${link.href})` : `**${link.label}**`)).join(' | ');
}

function rootRelative(rootLink: string, target: string): string {
  return rootLink ? `${rootLink}/${target}` : target;
}

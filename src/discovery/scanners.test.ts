import { describe, expect, it, vi } from 'vitest';
import { createMemoryFileSystem, type CatalogFileSystem } from './file-system.js';
import {
  discoverAgents,
  discoverCatalog,
  discoverCustomAgents,
  discoverCustomSkills,
  discoverRules,
  discoverSkills,
  skillCategoryKey,
  type ScanContext,
} from './scanners.js';
import { DEFAULT_CONFIG, resolveCatalogPaths } from '../config.js';

function skill(name: string, description: string): string {
  return `---\nname: ${name}\ndescription: ${description}\n---\n\n# ${name}\n`;
}

function context(fs: CatalogFileSystem, root: string): ScanContext & { warn: ReturnType<typeof vi.fn> } {
  return { fs, root, outputDir: '/repo/docs', warn: vi.fn() };
}

describe('discoverRules', () => {
  const fs = createMemoryFileSystem({
    '/repo/rules/b-style.md': skill('style', 'Code style rules.'),
    '/repo/rules/a-core.md': '---\nname: core\ndescription: |\n  Core principles.\n  Use when starting.\n---\n',
    '/repo/rules/notes.md': '# Notes\n',
    '/repo/rules/nested/deep.md': skill('deep', 'Not a rule.'),
    '/repo/rules/README.txt': 'not markdown',
  });

  it('lists top-level markdown files in path order', async () => {
    const ctx = context(fs, '/repo/rules');
    const rules = await discoverRules(ctx);

    expect(rules).toEqual([
      { name: 'core', description: 'Core principles.', path: '../rules/a-core.md' },
      { name: 'style', description: 'Code style rules.', path: '../rules/b-style.md' },
    ]);
  });

  it('warns once for each file without frontmatter', async () => {
    const ctx = context(fs, '/repo/rules');
    await discoverRules(ctx);

    expect(ctx.warn).toHaveBeenCalledTimes(1);
    expect(ctx.warn).toHaveBeenCalledWith('WARNING: /repo/rules/notes.md has no frontmatter, skipping');
  });

  it('returns nothing for a missing directory', async () => {
    const ctx = context(fs, '/repo/missing');
    expect(await discoverRules(ctx)).toEqual([]);
    expect(ctx.warn).not.toHaveBeenCalled();
  });
});

describe('discoverSkills', () => {
  const fs = createMemoryFileSystem({
    '/repo/skills/workflow/ralph-loop/SKILL.md': skill('ralph-loop', 'Runs a loop.'),
    '/repo/skills/workflow/ralph-loop/hooks/stop.sh': '#!/bin/sh\n',
    '/repo/skills/workflow/broken/SKILL.md': '---\ndescription: no name\n---\n',
    '/repo/skills/build/backend/api-design/SKILL.md': skill('api-design', 'Designs APIs'),
    '/repo/skills/build/frontend/ui/SKILL.md': skill('ui', 'Builds UIs.'),
    '/repo/skills/experimental/thing/SKILL.md': skill('thing', 'Does a thing.'),
  });

  it('groups skills by the directories above the skill folder', async () => {
    const skills = await discoverSkills(context(fs, '/repo/skills'));

    expect(skills.get('build/backend')).toEqual([
      { name: 'api-design', description: 'Designs APIs.', path: '../skills/build/backend/api-design/SKILL.md' },
    ]);
    expect(skills.get('build/frontend')?.map((s) => s.name)).toEqual(['ui']);
    expect(skills.get('workflow')?.map((s) => s.name)).toEqual(['ralph-loop']);
    expect(skills.has('meta')).toBe(false);
  });

  it('puts unknown categories under other and skips nameless skills', async () => {
    const ctx = context(fs, '/repo/skills');
    const skills = await discoverSkills(ctx);

    expect(skills.get('other')?.map((s) => s.name)).toEqual(['thing']);
    expect(ctx.warn.mock.calls).toEqual([
      ["WARNING: /repo/skills/experimental/thing/SKILL.md is in unknown skill category 'experimental', listing under Other"],
      ["WARNING: /repo/skills/workflow/broken/SKILL.md frontmatter has no 'name' key, skipping"],
    ]);
  });

  it('derives the category key from the path', () => {
    expect(skillCategoryKey('/repo/skills', '/repo/skills/build/backend/foo/SKILL.md')).toBe('build/backend');
    expect(skillCategoryKey('/repo/skills', '/repo/skills/foo/SKILL.md')).toBe('');
  });
});

describe('discoverAgents', () => {
  const fs = createMemoryFileSystem({
    '/repo/agents/review/code-reviewer.md': skill('code-reviewer', 'Reviews code.'),
    '/repo/agents/review/code-reviewer-reference.md': skill('reference', 'Reference notes.'),
    '/repo/agents/README.md': skill('readme', 'Index.'),
    '/repo/agents/_archive/old.md': skill('old', 'Retired.'),
    '/repo/agents/data-science/analyst.md': skill('analyst', 'Analyzes data. Use proactively for stats.'),
  });

  it('skips archives, references and READMEs and titles the parent directory', async () => {
    const ctx = context(fs, '/repo/agents');
    const agents = await discoverAgents(ctx);

    expect(agents).toEqual([
      {
        name: 'analyst',
        description: 'Analyzes data.',
        path: '../agents/data-science/analyst.md',
        category: 'Data-Science',
      },
      {
        name: 'code-reviewer',
        description: 'Reviews code.',
        path: '../agents/review/code-reviewer.md',
        category: 'Review',
      },
    ]);
    expect(ctx.warn).not.toHaveBeenCalled();
  });
});

describe('custom scanners', () => {
  it('return empty lists when the custom tree does not exist', async () => {
    const fs = createMemoryFileSystem({ '/repo/rules/core.md': skill('core', 'Core.') });

    expect(await discoverCustomSkills(context(fs, '/repo/custom/skills'))).toEqual([]);
    expect(await discoverCustomAgents(context(fs, '/repo/custom/agents'))).toEqual([]);
  });

  it('list custom entries without categories', async () => {
    const fs = createMemoryFileSystem({
      '/repo/custom/skills/team/deploy/SKILL.md': skill('deploy', 'Deploys the app.'),
      '/repo/custom/agents/README.md': '# Custom agents\n',
      '/repo/custom/agents/ops/oncall.md': skill('oncall', 'Handles pages.'),
    });

    expect(await discoverCustomSkills(context(fs, '/repo/custom/skills'))).toEqual([
      { name: 'deploy', description: 'Deploys the app.', path: '../custom/skills/team/deploy/SKILL.md' },
    ]);
    expect(await discoverCustomAgents(context(fs, '/repo/custom/agents'))).toEqual([
      { name: 'oncall', description: 'Handles pages.', path: '../custom/agents/ops/oncall.md' },
    ]);
  });
});

describe('discoverCatalog', () => {
  it('scans every configured tree', async () => {
    const fs = createMemoryFileSystem({
      '/repo/rules/core.md': skill('core', 'Core.'),
      '/repo/skills/meta/writing-skills/SKILL.md': skill('writing-skills', 'Writes skills.'),
      '/repo/agents/review/reviewer.md': '---\nname: reviewer\nname: code-reviewer\n---\n',
      '/repo/custom/skills/deploy/SKILL.md': skill('deploy', 'Deploys.'),
    });
    const warn = vi.fn();
    const paths = resolveCatalogPaths({ ...DEFAULT_CONFIG, rootDir: '/repo' });

    const catalog = await discoverCatalog(paths, fs, warn);

    expect(catalog.rules.map((r) => r.name)).toEqual(['core']);
    expect(catalog.skills.get('meta')?.map((s) => s.name)).toEqual(['writing-skills']);
    expect(catalog.agents).toEqual([
      { name: 'code-reviewer', description: '', path: '../agents/review/reviewer.md', category: 'Review' },
    ]);
    expect(catalog.customSkills.map((s) => s.path)).toEqual(['../custom/skills/deploy/SKILL.md']);
    expect(catalog.customAgents).toEqual([]);
    expect(warn).toHaveBeenCalledWith('WARNING: /repo/agents/review/reviewer.md repeats name; using the last value');
  });
});

import { describe, expect, it } from 'vitest';
import { countEntries, renderCatalog } from './catalog.js';
import type { CatalogCollections, CatalogEntry, RenderOptions, SkillCategory } from '../types.js';

const options: RenderOptions = {
  title: 'Catalog',
  generator: 'doc-catalog',
  navigation: [{ label: 'README', href: '../README.md' }, { label: 'CATALOG' }],
  rootLink: '..',
  customDir: 'custom',
};

function collections(overrides: Partial<CatalogCollections> = {}): CatalogCollections {
  return {
    rules: [{ name: 'core', description: 'Core principles.', path: '../rules/core.md' }],
    skills: new Map<SkillCategory, CatalogEntry[]>([
      ['workflow', [{ name: 'ralph-loop', description: 'Runs a loop.', path: '../skills/workflow/ralph-loop/SKILL.md' }]],
    ]),
    agents: [
      {
        name: 'analyst',
        description: 'Analyzes data.',
        path: '../agents/data-science/analyst.md',
        category: 'Data-Science',
      },
    ],
    customSkills: [],
    customAgents: [],
    ...overrides,
  };
}

describe('renderCatalog', () => {
  it('renders every section in order', () => {
    const expected = [
      '<!-- AUTO-GENERATED by doc-catalog — do not edit manually -->',
      '',
      '# Catalog',
      '',
      '> [README](../README.md) | **CATALOG**',
      '',
      '> [!TIP]',
      '> To install any skill or agent below, see [Quickstart](../README.md#quickstart) in the README.',
      '',
      '## Rules (1)',
      '',
      '*Always loaded — shape every interaction.*',
      '',
      '| Name | Description |',
      '|------|------------|',
      '| [core](../rules/core.md) | Core principles. |',
      '',
      '---',
      '',
      '## Skills (1)',
      '',
      '*Load on demand — teach the agent specialized workflows.*',
      '',
      '### Workflow (1)',
      '',
      '| Name | Description |',
      '|------|------------|',
      '| [ralph-loop](../skills/workflow/ralph-loop/SKILL.md) | Runs a loop. |',
      '',
      '---',
      '',
      '## Agents (1)',
      '',
      '*Isolated subprocesses — zero parent context in, result out.*',
      '',
      '| Name | Category | Description |',
      '|------|----------|------------|',
      '| [analyst](../agents/data-science/analyst.md) | Data-Science | Analyzes data. |',
      '',
      '---',
      '',
      '## Custom',
      '',
      '*Your project-specific skills and agents — not tracked by upstream. See [custom/README.md](../custom/README.md) to get started.*',
      '',
    ].join('\n');

    expect(renderCatalog(collections(), options)).toBe(expected);
  });

  it('orders skill categories by display order and omits empty ones', () => {
    const output = renderCatalog(
      collections({
        skills: new Map<SkillCategory, CatalogEntry[]>([
          ['other', [{ name: 'misc', description: 'Misc.', path: 'm' }]],
          ['patterns', [{ name: 'p1', description: 'P1.', path: 'p1' }, { name: 'p2', description: 'P2.', path: 'p2' }]],
          ['workflow', []],
          ['meta', [{ name: 'm1', description: 'M1.', path: 'm1' }]],
          ['build/backend', [{ name: 'api', description: 'API.', path: 'api' }]],
        ]),
      }),
      options
    );

    const headings = output.split('\n').filter((line) => line.startsWith('## ') || line.startsWith('### '));
    expect(headings).toEqual([
      '## Rules (1)',
      '## Skills (5)',
      '### Meta (1)',
      '### Build — Backend (1)',
      '### Patterns (2)',
      '### Other (1)',
      '## Agents (1)',
      '## Custom',
    ]);
  });

  it('lists custom skills and agents when present', () => {
    const output = renderCatalog(
      collections({
        customAgents: [{ name: 'oncall', description: 'Handles pages.', path: '../custom/agents/oncall.md' }],
      }),
      options
    );
    const custom = output.slice(output.indexOf('## Custom'));

    expect(custom).toBe(
      [
        '## Custom',
        '',
        '### Custom Agents (1)',
        '',
        '| Name | Description |',
        '|------|------------|',
        '| [oncall](../custom/agents/oncall.md) | Handles pages. |',
        '',
      ].join('\n')
    );
  });

  it('escapes pipes inside table cells', () => {
    const output = renderCatalog(
      collections({ rules: [{ name: 'a|b', description: 'Either x | y.', path: '../rules/ab.md' }] }),
      options
    );

    expect(output).toContain('| [a\\|b](../rules/ab.md) | Either x \\| y. |');
  });

  it('links to the root directly when the document sits at the root', () => {
    const output = renderCatalog(collections(), { ...options, rootLink: '' });

    expect(output).toContain('see [Quickstart](README.md#quickstart) in the README.');
    expect(output).toContain('See [custom/README.md](custom/README.md) to get started.');
  });

  it('is deterministic', () => {
    expect(renderCatalog(collections(), options)).toBe(renderCatalog(collections(), options));
  });
});

describe('countEntries', () => {
  it('sums skills across categories', () => {
    const counts = countEntries(
      collections({
        skills: new Map<SkillCategory, CatalogEntry[]>([
          ['meta', [{ name: 'a', description: '', path: 'a' }]],
          ['patterns', [{ name: 'b', description: '', path: 'b' }, { name: 'c', description: '', path: 'c' }]],
        ]),
      })
    );

    expect(counts).toEqual({ rules: 1, skills: 3, agents: 1, customSkills: 0, customAgents: 0 });
  });
});

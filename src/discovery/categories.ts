/**
 * Skill and agent category helpers.
 */

import { SKILL_CATEGORIES, type SkillCategory } from '../types.js';

export const SKILL_CATEGORY_DISPLAY: Record<SkillCategory, string> = {
  meta: 'Meta',
  'build/backend': 'Build — Backend',
  'build/frontend': 'Build — Frontend',
  workflow: 'Workflow',
  patterns: 'Patterns',
  other: 'Other',
};

/**
 * Map a category key taken from the directory layout (e.g. `build/backend`)
 * onto the known categories. Unknown keys resolve to null.
 */
export function resolveSkillCategory(key: string): SkillCategory | null {
  for (const category of SKILL_CATEGORIES) {
    if (category !== 'other' && category === key) return category;
  }
  return null;
}

/**
 * Capitalize each run of letters: `code-review` -> `Code-Review`.
 */
export function titleCase(value: string): string {
  return value.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

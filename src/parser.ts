/**
 * Frontmatter parser for rule, skill and agent files.
 *
 * Supports the flat subset of YAML these files use:
 * - `key: value` pairs, one per line
 * - quoted values with `\n` and `\"` escapes
 * - `key: |` blocks whose indented lines form one multi-line string
 *
 * Nested maps, lists and multiple documents are not supported.
 */

import type { MetadataBlock } from './types.js';

const FRONTMATTER_RE = /^---[ \t]*\n(?:([\s\S]*?)\n)?---[ \t]*(?:\n|$)/;
const KEY_RE = /^(\w[\w-]*)\s*:\s*(.*)/;
const MULTILINE_MARKER = '|';

// ============================================
// Block extraction
// ============================================

/**
 * Return the body of the leading `---` block, or null when the text has none.
 */
export function extractFrontmatter(text: string): string | null {
  const normalized = text.replace(/\r\n/g, '\n');
  const match = normalized.match(FRONTMATTER_RE);
  if (!match) return null;
  return match[1] ?? '';
}

/**
 * Parse a file's full text. Returns null when there is no frontmatter block.
 */
export function parseMetadata(text: string): MetadataBlock | null {
  const body = extractFrontmatter(text);
  if (body === null) return null;
  return parseMetadataBody(body);
}

// ============================================
// Body parsing
// ============================================

/**
 * Parse the lines between the `---` delimiters into a metadata record.
 */
export function parseMetadataBody(body: string): MetadataBlock {
  const values = new Map<string, string>();
  const duplicateKeys: string[] = [];

  let currentKey: string | null = null;
  let currentLines: string[] = [];
  let isMultiline = false;

  const flush = () => {
    if (currentKey === null) return;
    if (values.has(currentKey) && !duplicateKeys.includes(currentKey)) {
      duplicateKeys.push(currentKey);
    }
    values.set(currentKey, currentLines.join('\n').trim());
  };

  for (const line of body.split('\n')) {
    const keyMatch = line.match(KEY_RE);
    const isContinuation = isMultiline && /^[ \t]/.test(line);

    if (keyMatch && !isContinuation) {
      flush();
      currentKey = keyMatch[1] ?? '';
      const value = (keyMatch[2] ?? '').trim();

      if (value === MULTILINE_MARKER) {
        isMultiline = true;
        currentLines = [];
      } else {
        isMultiline = false;
        currentLines = [unquote(value)];
      }
    } else if (isMultiline && currentKey !== null) {
      currentLines.push(line.trim());
    }
  }

  flush();

  const extra: Record<string, string> = {};
  for (const [key, value] of values) {
    if (key !== 'name' && key !== 'description') extra[key] = value;
  }

  return {
    name: values.get('name'),
    description: values.get('description'),
    extra,
    duplicateKeys,
  };
}

/**
 * Strip matching surrounding quotes and resolve the escapes we support.
 * Double-escaped forms resolve before single ones.
 */
function unquote(value: string): string {
  const first = value[0];
  if (value.length < 2 || (first !== '"' && first !== "'") || value[value.length - 1] !== first) {
    return value;
  }

  return value
    .slice(1, -1)
    .replace(/\\\\n/g, '\n')
    .replace(/\\n/g, '\n')
    .replace(/\\\\"/g, '"')
    .replace(/\\"/g, '"');
}

// ============================================
// Formatting
// ============================================

/**
 * Render a value in the double-quoted form that `parseMetadataBody` reads back.
 */
export function formatMetadataValue(value: string): string {
  const escaped = value.replace(/"/g, '\\"').replace(/\n/g, '\\n');
  return `"${escaped}"`;
}

/**
 * Catalog description extraction.
 *
 * Frontmatter descriptions carry a human-facing summary followed by
 * trigger/usage instructions aimed at the agent. The catalog shows the summary.
 */

const TRIGGER_PHRASES =
  String.raw`Use when\b|Use before\b|Use this\b|Use proactively\b|Recognizes?:|Triggers?:|Usage:|Optional:|Cancel:|Activate when:`;

// A trigger starts a line, or starts a new sentence on the same line.
const TRIGGER_RE = new RegExp(String.raw`(?:^\s*|(?<=[.!?])\s+)(?:${TRIGGER_PHRASES})`, 'im');

/**
 * Reduce a raw description to a single period-terminated line.
 */
export function extractCatalogDescription(rawDescription: string): string {
  const match = TRIGGER_RE.exec(rawDescription);
  const summary = match ? rawDescription.slice(0, match.index) : rawDescription;

  let description = summary.split(/\s+/).filter(Boolean).join(' ');
  if (description && !description.endsWith('.')) {
    description += '.';
  }
  return description;
}

/**
 * Text Utilities
 *
 * Helpers that turn free-form agent output into structured fields.
 * All keyword matching is case-insensitive and works line by line.
 */

/**
 * Returns every line (trimmed) whose lowercase text contains any keyword.
 * Order and duplicates are preserved.
 *
 * @example
 * extractLinesWithKeywords('Key fact: 40% growth\nOther', ['fact']); // ['Key fact: 40% growth']
 */
export function extractLinesWithKeywords(text: string, keywords: readonly string[]): string[] {
  const lowered = keywords.map((k) => k.toLowerCase());
  const matches: string[] = [];
  for (const line of text.split('\n')) {
    const lower = line.toLowerCase();
    if (lowered.some((keyword) => lower.includes(keyword))) {
      matches.push(line.trim());
    }
  }
  return matches;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Finds `<label>` followed by optional colons/whitespace and digits.
 * Returns the first such integer, or null.
 *
 * @example
 * extractScore('Overall Score: 8/10', 'score'); // 8
 */
export function extractScore(text: string, label: string): number | null {
  const pattern = new RegExp(`${escapeRegExp(label.toLowerCase())}[:\\s]*(\\d+)`);
  const match = text.toLowerCase().match(pattern);
  return match ? Number.parseInt(match[1], 10) : null;
}

/**
 * Returns the non-blank, non-marker lines after the first marker line, joined by newlines.
 * Falls back to the whole (trimmed) text when no marker is found or nothing follows it.
 */
export function extractSectionAfterMarker(text: string, markers: readonly string[]): string {
  const isMarker = (line: string): boolean => {
    const lower = line.toLowerCase();
    return markers.some((marker) => lower.includes(marker.toLowerCase()));
  };
  const lines = text.split('\n');
  const index = lines.findIndex(isMarker);
  if (index === -1) {
    return text.trim();
  }
  // Marker lines themselves are headings, never content
  const section = lines
    .slice(index + 1)
    .filter((line) => !isMarker(line))
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
  return section || text.trim();
}

/**
 * Splits matching lines into comma-separated items.
 * The part before the first colon (the label) is ignored.
 *
 * @example
 * extractCommaList('Primary keywords: ai, content tools', (l) => l.includes('primary'));
 * // ['ai', 'content tools']
 */
export function extractCommaList(text: string, predicate: (lowerLine: string) => boolean): string[] {
  const items: string[] = [];
  for (const line of text.split('\n')) {
    if (!predicate(line.toLowerCase())) continue;
    const colon = line.indexOf(':');
    const values = colon === -1 ? line : line.slice(colon + 1);
    for (const item of values.split(',')) {
      const trimmed = item.trim();
      if (trimmed) items.push(trimmed);
    }
  }
  return items;
}

/**
 * Text after the last colon of a `Label: value` line, trimmed.
 * Lines without a colon are returned trimmed.
 */
export function extractLabelValue(line: string): string {
  const parts = line.split(':');
  return parts[parts.length - 1].trim();
}

/**
 * First trimmed line containing any keyword, or an empty string.
 */
export function firstLineContaining(text: string, keywords: readonly string[]): string {
  return extractLinesWithKeywords(text, keywords)[0] ?? '';
}

/**
 * Number of whitespace-separated words.
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * True for strings that are non-empty after trimming.
 */
export function isNonEmptyText(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

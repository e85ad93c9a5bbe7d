export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function containsAny(haystack: string, needles: readonly string[]): boolean {
  const lowered = haystack.toLowerCase();
  return needles.some((needle) => lowered.includes(needle));
}

// Keeps letters, digits, underscores, whitespace and hyphens; spaces become underscores.
export function sanitizeFileComponent(value: string): string {
  return value
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .trim()
    .replace(/ /g, '_');
}

export function leadingExcerpt(value: string, maxChars = 200): string {
  const blankLine = value.indexOf('\n\n');
  return blankLine >= 0 ? value.slice(0, blankLine) : value.slice(0, maxChars);
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function joinFrenchList(items: readonly string[]): string {
  if (items.length <= 1) {
    return items.join('');
  }
  return `${items.slice(0, -1).join(', ')} et ${items[items.length - 1]}`;
}

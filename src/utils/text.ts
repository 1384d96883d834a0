/**
 * String helpers shared by the harvester and the extractor
 */

/**
 * Collapse every whitespace run to one space and trim the ends
 */
export function cleanText(value: string | null | undefined): string {
  return (value ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Article location: the URL without its query string, trimmed.
 * Returns an empty string for blank input.
 */
export function normalizeLocation(url: string | null | undefined): string {
  const [withoutQuery = ''] = (url ?? '').split('?');
  return withoutQuery.trim();
}

/**
 * Drop repeats, keeping the first occurrence of each value
 */
export function uniqueInOrder(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

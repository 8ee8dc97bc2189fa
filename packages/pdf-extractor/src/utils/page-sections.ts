/**
 * Number of non-whitespace characters (code points) in `text`.
 */
export function countMeaningfulCharacters(text: string): number {
  return Array.from(text.replace(/\s/gu, '')).length;
}

/**
 * Page-boundary marker preceding each page's text.
 */
export function formatPageMarker(pageNo: number): string {
  return `\n\n===== Page ${pageNo} =====\n`;
}

/**
 * Join page texts (index 0 → page 1) into the document layout: every page
 * gets its marker followed by its trimmed text, empty pages included, and
 * the result is trimmed as a whole.
 */
export function formatPageSections(pageTexts: readonly string[]): string {
  return pageTexts
    .map((text, index) => `${formatPageMarker(index + 1)}${text.trim()}`)
    .join('')
    .trim();
}

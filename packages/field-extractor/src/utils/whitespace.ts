/**
 * Replace non-breaking spaces and collapse runs of spaces and tabs.
 *
 * Line breaks are kept: several patterns must not run past the end of a line.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\u00A0/g, ' ').replace(/[ \t]+/g, ' ');
}

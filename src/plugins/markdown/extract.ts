/**
 * Read-only scans over raw markdown.
 *
 * @module markdown/extract
 */

export interface LinkDescriptor {
  text: string;
  url: string;
}

export interface HeadingDescriptor {
  level: number;
  text: string;
}

const LINK_PATTERN = /\[([^\]\n]+)\]\(([^)\n]+)\)/g;
const HEADING_PATTERN = /^(#{1,6})\s+(.+)$/gm;

/** Every `[text](url)` in document order, duplicates included. */
export function extractLinks(markdown: string): LinkDescriptor[] {
  return Array.from(markdown.matchAll(LINK_PATTERN), ([, text, url]) => ({ text, url }));
}

export function extractHeadings(markdown: string): HeadingDescriptor[] {
  return Array.from(markdown.matchAll(HEADING_PATTERN), ([, marker, text]) => ({
    level: marker.length,
    text: text.trim(),
  }));
}

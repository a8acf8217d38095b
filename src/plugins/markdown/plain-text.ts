/**
 * Plain-text projection of markdown, used for word and character counts.
 *
 * The stripping order differs from the renderer: fenced blocks are removed
 * together with their body, and images disappear entirely.
 *
 * @module markdown/plain-text
 */

const STRIP_STEPS: ReadonlyArray<readonly [RegExp, string]> = [
  // Indentation goes first so the anchored steps see every marker
  [/^[ \t]+/gm, ''],
  [/^#{1,6}\s+/gm, ''],
  [/\*{1,3}(.+?)\*{1,3}/g, '$1'],
  [/!\[[^\]\n]+\]\([^)\n]+\)/g, ''],
  [/\[([^\]\n]+)\]\([^)\n]+\)/g, '$1'],
  [/```.*?```/gs, ''],
  [/`(.+?)`/g, '$1'],
  [/^---+$/gm, ''],
  [/^[*-]\s+/gm, ''],
  [/^\d+\.\s+/gm, ''],
];

export interface TextStatistics {
  words: number;
  characters: number;
  characters_no_spaces: number;
  lines: number;
}

export function plainText(markdown: string): string {
  return STRIP_STEPS.reduce((text, [pattern, replacement]) => text.replace(pattern, replacement), markdown).trim();
}

/** Counts over the plain text; `lines` is taken from the original input. */
export function countWords(markdown: string): TextStatistics {
  const text = plainText(markdown);
  return {
    words: text.split(/\s+/).filter(Boolean).length,
    characters: Array.from(text).length,
    characters_no_spaces: Array.from(text.replace(/[ \n]/g, '')).length,
    lines: markdown.split('\n').length,
  };
}

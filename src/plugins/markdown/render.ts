/**
 * Markdown → HTML Renderer
 *
 * Simple line-oriented conversion: the rewrite rule table followed by a
 * paragraph-wrapping pass. Not a CommonMark parser; there is no block tree,
 * and list items are not wrapped in list containers.
 *
 * @module markdown/render
 */

import { applyRules } from './rules.js';

/** Wrap every non-empty line that is not already an HTML element in `<p>`. */
export function wrapParagraphs(html: string): string {
  return html
    .split('\n')
    .map((line) => {
      const trimmed = line.trim();
      if (trimmed && !trimmed.startsWith('<')) return `<p>${trimmed}</p>`;
      return trimmed;
    })
    .join('\n');
}

/** Convert markdown text to HTML. Total: any input yields some output. */
export function render(markdown: string): string {
  return wrapParagraphs(applyRules(markdown));
}

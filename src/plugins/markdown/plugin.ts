/**
 * Markdown plugin: JSON actions over the renderer and scanners.
 *
 * @module markdown/plugin
 */

import { VERSION } from '../../version.js';
import {
  decodeRequest,
  errorMessage,
  errorResponse,
  requestText,
  type PluginInfo,
  type TextPlugin,
} from '../protocol.js';
import { extractHeadings, extractLinks } from './extract.js';
import { countWords } from './plain-text.js';
import { render } from './render.js';

export const MARKDOWN_ACTIONS = ['to-html', 'extract-links', 'extract-headings', 'word-count'] as const;

export type MarkdownAction = (typeof MARKDOWN_ACTIONS)[number];

const ACTION_ALIASES = new Map<string, MarkdownAction>([
  ['to-html', 'to-html'],
  ['tohtml', 'to-html'],
  ['extract-links', 'extract-links'],
  ['links', 'extract-links'],
  ['extract-headings', 'extract-headings'],
  ['headings', 'extract-headings'],
  ['word-count', 'word-count'],
  ['wordcount', 'word-count'],
]);

export function resolveMarkdownAction(name: string): MarkdownAction | undefined {
  return ACTION_ALIASES.get(name.toLowerCase());
}

function runAction(action: MarkdownAction, markdown: string): object {
  switch (action) {
    case 'to-html': {
      const html = render(markdown);
      return { html, input_length: Array.from(markdown).length, output_length: Array.from(html).length };
    }
    case 'extract-links': {
      const links = extractLinks(markdown);
      return { links, count: links.length };
    }
    case 'extract-headings': {
      const headings = extractHeadings(markdown);
      return { headings, count: headings.length };
    }
    case 'word-count':
      return countWords(markdown);
  }
}

export const markdownPlugin: TextPlugin = {
  info(): PluginInfo {
    return {
      name: 'plugin-markdown',
      version: VERSION,
      actions: [...MARKDOWN_ACTIONS],
      qualifiers: [],
    };
  },

  execute(actionName: string, inputJson: string): string {
    const action = resolveMarkdownAction(actionName);
    if (!action) return errorResponse(`Unknown action: ${actionName}`);

    const decoded = decodeRequest(inputJson);
    if (!decoded.ok) return errorResponse(decoded.error);

    const markdown = requestText(decoded.request);
    if (markdown === undefined) return errorResponse("Missing 'data' field");

    try {
      return JSON.stringify(runAction(action, markdown));
    } catch (error) {
      return errorResponse(errorMessage(error));
    }
  },

  qualifier(name: string): string {
    return errorResponse(`Unknown qualifier: ${name}`);
  },
};

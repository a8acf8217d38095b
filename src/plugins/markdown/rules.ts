/**
 * Markdown Rewrite Rules
 *
 * The renderer is a fixed, ordered table of pattern → template rules. Each rule
 * sees the output of the rules before it, so the order below is part of the
 * behaviour and must not be rearranged.
 *
 * @module markdown/rules
 */

/**
 * How a rule's pattern is matched against the buffer:
 * - `line`: `^`/`$` anchor at every line
 * - `buffer`: scan the whole buffer, `.` stops at newlines
 * - `dotall`: scan the whole buffer, `.` also matches newlines
 */
export type MatchMode = 'line' | 'buffer' | 'dotall';

export interface RewriteRule {
  readonly name: string;
  readonly pattern: string;
  readonly mode: MatchMode;
  readonly replacement: string;
}

const MODE_FLAGS: Record<MatchMode, string> = {
  line: 'gm',
  buffer: 'g',
  dotall: 'gs',
};

export function compileRule(rule: RewriteRule): RegExp {
  return new RegExp(rule.pattern, MODE_FLAGS[rule.mode]);
}

// ─── Rule Table ──────────────────────────────────────────────────────────────

const RULES: RewriteRule[] = [
  // Headings, h6 → h1 so a longer marker is never eaten by a shorter one
  { name: 'heading-6', pattern: String.raw`^######\s+(.+)$`, mode: 'line', replacement: '<h6>$1</h6>' },
  { name: 'heading-5', pattern: String.raw`^#####\s+(.+)$`, mode: 'line', replacement: '<h5>$1</h5>' },
  { name: 'heading-4', pattern: String.raw`^####\s+(.+)$`, mode: 'line', replacement: '<h4>$1</h4>' },
  { name: 'heading-3', pattern: String.raw`^###\s+(.+)$`, mode: 'line', replacement: '<h3>$1</h3>' },
  { name: 'heading-2', pattern: String.raw`^##\s+(.+)$`, mode: 'line', replacement: '<h2>$1</h2>' },
  { name: 'heading-1', pattern: String.raw`^#\s+(.+)$`, mode: 'line', replacement: '<h1>$1</h1>' },

  // Emphasis, longest marker first
  { name: 'bold-italic', pattern: String.raw`\*\*\*(.+?)\*\*\*`, mode: 'buffer', replacement: '<strong><em>$1</em></strong>' },
  { name: 'bold', pattern: String.raw`\*\*(.+?)\*\*`, mode: 'buffer', replacement: '<strong>$1</strong>' },
  { name: 'italic', pattern: String.raw`\*(.+?)\*`, mode: 'buffer', replacement: '<em>$1</em>' },

  // Link spans stay on one line.
  // Images before links: the link pattern would otherwise claim `[alt](src)`
  // and leave a bare `!` in front of an anchor.
  { name: 'image', pattern: String.raw`!\[([^\]\n]+)\]\(([^)\n]+)\)`, mode: 'buffer', replacement: '<img src="$2" alt="$1">' },
  { name: 'link', pattern: String.raw`\[([^\]\n]+)\]\(([^)\n]+)\)`, mode: 'buffer', replacement: '<a href="$2">$1</a>' },

  { name: 'code-block', pattern: '```(\\w*)\\n(.*?)\\n```', mode: 'dotall', replacement: '<pre><code class="$1">$2</code></pre>' },
  { name: 'inline-code', pattern: '`(.+?)`', mode: 'buffer', replacement: '<code>$1</code>' },

  { name: 'horizontal-rule', pattern: '^---+$', mode: 'line', replacement: '<hr>' },

  // List items are emitted standalone, without a <ul>/<ol> container
  { name: 'unordered-item', pattern: String.raw`^[*\-]\s+(.+)$`, mode: 'line', replacement: '<li>$1</li>' },
  { name: 'ordered-item', pattern: String.raw`^\d+\.\s+(.+)$`, mode: 'line', replacement: '<li>$1</li>' },
];

export const MARKDOWN_RULES: readonly RewriteRule[] = Object.freeze(RULES);

/** Run every rule over the buffer, in table order. */
export function applyRules(text: string, rules: readonly RewriteRule[] = MARKDOWN_RULES): string {
  return rules.reduce((buffer, rule) => buffer.replace(compileRule(rule), rule.replacement), text);
}

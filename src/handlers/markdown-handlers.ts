import {markdownPlugin, type MarkdownAction} from '../plugins/markdown/plugin.js';
import {MarkdownArgsSchema} from '../tools/schemas.js';
import {ServerResult} from '../types.js';
import {toServerResult} from './plugin-result.js';

function runMarkdownAction(action: MarkdownAction, args: unknown): ServerResult {
    const parsed = MarkdownArgsSchema.parse(args);
    return toServerResult(markdownPlugin.execute(action, JSON.stringify({data: parsed.data})));
}

/**
 * Handle markdown_to_html command
 */
export async function handleMarkdownToHtml(args: unknown): Promise<ServerResult> {
    return runMarkdownAction('to-html', args);
}

/**
 * Handle markdown_extract_links command
 */
export async function handleMarkdownExtractLinks(args: unknown): Promise<ServerResult> {
    return runMarkdownAction('extract-links', args);
}

/**
 * Handle markdown_extract_headings command
 */
export async function handleMarkdownExtractHeadings(args: unknown): Promise<ServerResult> {
    return runMarkdownAction('extract-headings', args);
}

/**
 * Handle markdown_word_count command
 */
export async function handleMarkdownWordCount(args: unknown): Promise<ServerResult> {
    return runMarkdownAction('word-count', args);
}

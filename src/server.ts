import {Server} from "@modelcontextprotocol/sdk/server/index.js";
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    ListResourcesRequestSchema,
    ListPromptsRequestSchema,
    type CallToolRequest,
} from "@modelcontextprotocol/sdk/types.js";
import {zodToJsonSchema} from "zod-to-json-schema";

import {
    ListPluginsArgsSchema,
    MarkdownArgsSchema,
    ApplyQualifierArgsSchema,
    ExtractSvgsArgsSchema,
} from './tools/schemas.js';
import {QUALIFIERS} from './plugins/collection/qualifiers.js';
import * as handlers from './handlers/index.js';
import {ServerResult} from './types.js';
import {createErrorResponse} from './error-handlers.js';
import {VERSION} from './version.js';
import {logToStderr} from './utils/logger.js';

export const SERVER_NAME = "text-plugins";

const QUALIFIER_NAMES = QUALIFIERS.map((q) => q.name).join(', ');

export const TOOLS = [
    {
        name: "list_plugins",
        description: `
            List the installed plugins with their version, supported actions and
            qualifier descriptors (name, accepted input types, description).`,
        inputSchema: zodToJsonSchema(ListPluginsArgsSchema),
        annotations: {
            title: "List Plugins",
            readOnlyHint: true,
        },
    },
    {
        name: "markdown_to_html",
        description: `
            Convert markdown text to HTML with a simple line-oriented renderer.

            Supports headings, emphasis, links, images, fenced and inline code,
            horizontal rules and list items. List items are emitted without an
            enclosing <ul>/<ol>, and every remaining text line becomes a <p>.

            Returns JSON: { html, input_length, output_length }.`,
        inputSchema: zodToJsonSchema(MarkdownArgsSchema),
        annotations: {
            title: "Markdown to HTML",
            readOnlyHint: true,
        },
    },
    {
        name: "markdown_extract_links",
        description: `
            Find every [text](url) link in markdown text, in document order.
            Returns JSON: { links: [{ text, url }], count }.`,
        inputSchema: zodToJsonSchema(MarkdownArgsSchema),
        annotations: {
            title: "Extract Markdown Links",
            readOnlyHint: true,
        },
    },
    {
        name: "markdown_extract_headings",
        description: `
            Find every ATX heading (# to ######) in markdown text.
            Returns JSON: { headings: [{ level, text }], count }.`,
        inputSchema: zodToJsonSchema(MarkdownArgsSchema),
        annotations: {
            title: "Extract Markdown Headings",
            readOnlyHint: true,
        },
    },
    {
        name: "markdown_word_count",
        description: `
            Count words and characters of markdown text after stripping its syntax.
            The line count is taken from the original text.
            Returns JSON: { words, characters, characters_no_spaces, lines }.`,
        inputSchema: zodToJsonSchema(MarkdownArgsSchema),
        annotations: {
            title: "Markdown Word Count",
            readOnlyHint: true,
        },
    },
    {
        name: "apply_qualifier",
        description: `
            Apply a collection qualifier to a value.

            Available qualifiers: ${QUALIFIER_NAMES}.
            sum and avg only consider numeric elements. Sorting and min/max use
            natural ordering and fall back to comparing string forms for mixed types.

            Returns JSON: { result } on success or { error } on failure.`,
        inputSchema: zodToJsonSchema(ApplyQualifierArgsSchema),
        annotations: {
            title: "Apply Qualifier",
            readOnlyHint: true,
        },
    },
    {
        name: "extract_svgs",
        description: `
            Extract inline <svg> blocks from a markdown file into standalone .svg files
            named <file>-figNN.svg, and return the markdown with each block replaced by
            an image reference. The source file is never modified; pass 'outputPath'
            to write the rewritten markdown.

            Returns JSON: { content, figures, count }.`,
        inputSchema: zodToJsonSchema(ExtractSvgsArgsSchema),
        annotations: {
            title: "Extract SVGs",
            readOnlyHint: false,
            destructiveHint: false,
        },
    },
];

/**
 * Dispatch a tool call. Failures come back as error results, never as throws.
 */
export async function callTool(name: string, args: unknown): Promise<ServerResult> {
    try {
        switch (name) {
            case "list_plugins":
                return await handlers.handleListPlugins(args);
            case "markdown_to_html":
                return await handlers.handleMarkdownToHtml(args);
            case "markdown_extract_links":
                return await handlers.handleMarkdownExtractLinks(args);
            case "markdown_extract_headings":
                return await handlers.handleMarkdownExtractHeadings(args);
            case "markdown_word_count":
                return await handlers.handleMarkdownWordCount(args);
            case "apply_qualifier":
                return await handlers.handleApplyQualifier(args);
            case "extract_svgs":
                return await handlers.handleExtractSvgs(args);
            default:
                logToStderr('warning', `Unknown tool requested: ${name}`);
                return createErrorResponse(`Unknown tool: ${name}`);
        }
    } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        logToStderr('error', `Tool ${name} failed: ${errorMessage}`);
        return createErrorResponse(errorMessage);
    }
}

export function createServer(): Server {
    const server = new Server(
        {
            name: SERVER_NAME,
            version: VERSION,
        },
        {
            capabilities: {
                tools: {},
                resources: {},
                prompts: {},
            },
        },
    );

    server.setRequestHandler(ListResourcesRequestSchema, async () => ({
        resources: [],
    }));

    server.setRequestHandler(ListPromptsRequestSchema, async () => ({
        prompts: [],
    }));

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        logToStderr('debug', `Returning ${TOOLS.length} tools`);
        return {
            tools: TOOLS,
        };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest): Promise<ServerResult> => {
        const {name, arguments: args} = request.params;
        const startTime = Date.now();
        const result = await callTool(name, args);
        logToStderr('debug', `Tool ${name} finished in ${Date.now() - startTime}ms${result.isError ? ' with an error' : ''}`);
        return result;
    });

    return server;
}

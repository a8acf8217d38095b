import {collectionPlugin} from '../plugins/collection/plugin.js';
import {listPluginInfo} from '../plugins/registry.js';
import {ApplyQualifierArgsSchema, ListPluginsArgsSchema} from '../tools/schemas.js';
import {ServerResult} from '../types.js';
import {toServerResult} from './plugin-result.js';

/**
 * Handle list_plugins command
 */
export async function handleListPlugins(args: unknown): Promise<ServerResult> {
    ListPluginsArgsSchema.parse(args ?? {});
    return {
        content: [{type: "text", text: JSON.stringify({plugins: listPluginInfo()})}],
    };
}

/**
 * Handle apply_qualifier command
 */
export async function handleApplyQualifier(args: unknown): Promise<ServerResult> {
    const parsed = ApplyQualifierArgsSchema.parse(args);
    const request = JSON.stringify({value: parsed.value ?? null, type: parsed.type ?? 'Unknown'});
    return toServerResult(collectionPlugin.qualifier(parsed.qualifier, request));
}

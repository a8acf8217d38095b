import { collectionPlugin } from './collection/plugin.js';
import { markdownPlugin } from './markdown/plugin.js';
import type { PluginInfo, TextPlugin } from './protocol.js';

/** Installed plugins, keyed by the name each one reports. */
export const PLUGINS: ReadonlyMap<string, TextPlugin> = new Map(
    [markdownPlugin, collectionPlugin].map((plugin) => [plugin.info().name, plugin] as const)
);

export function listPluginInfo(): PluginInfo[] {
    return [...PLUGINS.values()].map((plugin) => plugin.info());
}

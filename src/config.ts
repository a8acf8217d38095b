import path from 'path';
import process from 'process';
import fs from 'fs';
import { z } from 'zod';
import { logger } from './utils/logger.js';

export const CONFIG_FILE_NAME = 'text-plugins.config.json';
export const CONFIG_ENV_VAR = 'TEXT_PLUGINS_CONFIG';

export const SvgConfigSchema = z.object({
    imagesDirName: z.string().min(1).default('images'),
    processedDirName: z.string().min(1).default('processed'),
    figureLabel: z.string().default('Figure'),
    // Markdown files copied to the processed directory without extraction
    passthroughFiles: z.array(z.string()).default(['STRUCTURE.md']),
    // Companion files copied alongside the processed markdown when present
    copyFiles: z.array(z.string()).default(['metadata.yaml', 'unix-style.css']),
});

export const ConfigSchema = z.object({
    logLevel: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
    svg: SvgConfigSchema.default({}),
});

export type SvgConfig = z.infer<typeof SvgConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

export function getConfigPath(): string {
    return process.env[CONFIG_ENV_VAR] ?? path.join(process.cwd(), CONFIG_FILE_NAME);
}

export function loadConfig(configPath: string = getConfigPath()): Config {
    try {
        if (fs.existsSync(configPath)) {
            const configContent = fs.readFileSync(configPath, 'utf8');
            const parsed = ConfigSchema.safeParse(JSON.parse(configContent));
            if (parsed.success) {
                return parsed.data;
            }
            logger.warning(`Invalid config in ${configPath}: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
        }
    } catch (error) {
        logger.error(`Error loading config from ${configPath}:`, error);
    }

    // Return default config if loading fails
    return DEFAULT_CONFIG;
}

let currentConfig: Config | undefined;

/** Configuration for this process, loaded on first use. */
export function getConfig(): Config {
    currentConfig ??= loadConfig();
    return currentConfig;
}

import fs from 'fs/promises';
import path from 'path';
import {getConfig} from '../config.js';
import {extractSvgsFromFile} from '../tools/svg/files.js';
import {ToolErrorCode, withErrorContext} from '../tools/errors.js';
import {ExtractSvgsArgsSchema} from '../tools/schemas.js';
import {ServerResult} from '../types.js';

/**
 * Handle extract_svgs command
 * Images default to the configured directory beside the markdown file.
 */
export async function handleExtractSvgs(args: unknown): Promise<ServerResult> {
    const parsed = ExtractSvgsArgsSchema.parse(args);
    const svgConfig = getConfig().svg;
    const imagesDir = parsed.imagesDir ?? path.join(path.dirname(parsed.path), svgConfig.imagesDirName);

    const result = await extractSvgsFromFile(parsed.path, imagesDir, svgConfig);
    if (parsed.outputPath) {
        const outputPath = parsed.outputPath;
        await withErrorContext(
            () => fs.writeFile(outputPath, result.content, 'utf8'),
            ToolErrorCode.WRITE_FAILED,
            outputPath,
        );
    }

    return {
        content: [{
            type: "text",
            text: JSON.stringify({
                content: result.content,
                figures: result.written,
                count: result.written.length,
            }),
        }],
    };
}

/**
 * File and directory runners for SVG extraction.
 *
 * @module svg/files
 */

import fs from 'fs/promises';
import path from 'path';
import { DEFAULT_CONFIG, type SvgConfig } from '../../config.js';
import { logger } from '../../utils/logger.js';
import { ToolError, ToolErrorCode, withErrorContext } from '../errors.js';
import { extractSvgs } from './extract.js';

export interface FileExtractionResult {
  content: string;
  written: string[];
}

export interface DirectoryExtractionResult {
  imagesDir: string;
  processedDir: string;
  processed: string[];
  copied: string[];
  figures: number;
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Extract the SVG blocks of one markdown file into `imagesDir`.
 * The source file is left untouched; the rewritten text is returned.
 */
export async function extractSvgsFromFile(
  markdownFile: string,
  imagesDir: string,
  config: SvgConfig = DEFAULT_CONFIG.svg
): Promise<FileExtractionResult> {
  const content = await withErrorContext(
    () => fs.readFile(markdownFile, 'utf8'),
    ToolErrorCode.READ_FAILED,
    markdownFile
  );

  const baseName = path.parse(markdownFile).name;
  const extraction = extractSvgs(content, baseName, {
    imagesDirName: config.imagesDirName,
    figureLabel: config.figureLabel,
  });
  if (extraction.figures.length === 0) {
    return { content, written: [] };
  }

  await fs.mkdir(imagesDir, { recursive: true });
  const written: string[] = [];
  for (const figure of extraction.figures) {
    const target = path.join(imagesDir, figure.filename);
    await withErrorContext(() => fs.writeFile(target, figure.svg, 'utf8'), ToolErrorCode.WRITE_FAILED, target);
    written.push(target);
    logger.info(`  Extracted: ${figure.filename}`);
  }

  return { content: extraction.content, written };
}

/**
 * Process every markdown file of a directory: figures go to
 * `<dir>/<imagesDirName>`, rewritten markdown to `<dir>/<processedDirName>`.
 */
export async function processDirectory(
  dir: string,
  config: SvgConfig = DEFAULT_CONFIG.svg
): Promise<DirectoryExtractionResult> {
  const stats = await fs.stat(dir).catch(() => undefined);
  if (!stats?.isDirectory()) {
    throw new ToolError(`Not a directory: ${dir}`, ToolErrorCode.INVALID_PATH, dir);
  }

  const imagesDir = path.join(dir, config.imagesDirName);
  const processedDir = path.join(dir, config.processedDirName);
  await fs.mkdir(imagesDir, { recursive: true });
  await fs.mkdir(processedDir, { recursive: true });

  const entries = await fs.readdir(dir, { withFileTypes: true });
  const markdownFiles = entries
    .filter((entry) => entry.isFile() && entry.name.endsWith('.md'))
    .map((entry) => entry.name)
    .sort();

  const processed: string[] = [];
  let figures = 0;
  for (const name of markdownFiles) {
    const source = path.join(dir, name);
    let content: string;
    if (config.passthroughFiles.includes(name)) {
      content = await fs.readFile(source, 'utf8');
    } else {
      logger.info(`Processing ${name}...`);
      const result = await extractSvgsFromFile(source, imagesDir, config);
      content = result.content;
      figures += result.written.length;
    }
    const target = path.join(processedDir, name);
    await withErrorContext(() => fs.writeFile(target, content, 'utf8'), ToolErrorCode.WRITE_FAILED, target);
    processed.push(target);
  }

  const copied: string[] = [];
  for (const name of config.copyFiles) {
    const source = path.join(dir, name);
    if (await exists(source)) {
      const target = path.join(processedDir, name);
      await withErrorContext(() => fs.copyFile(source, target), ToolErrorCode.WRITE_FAILED, target);
      copied.push(target);
    }
  }

  logger.info(`Extracted SVGs to: ${imagesDir}`);
  logger.info(`Processed markdown in: ${processedDir}`);

  return { imagesDir, processedDir, processed, copied, figures };
}

/**
 * Inline SVG Extraction
 *
 * Pulls `<svg>…</svg>` blocks out of markdown text, turns each into a
 * standalone document and replaces it with an image reference.
 *
 * @module svg/extract
 */

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const SVG_BLOCK = /<svg[^>]*>.*?<\/svg>/gs;
const OPENING_TAG = /^<svg\b[^>]*>/;
const VIEW_BOX = /\bviewBox="([^"]+)"/;
const WIDTH_ATTRIBUTE = /\swidth=/;

export interface SvgFigure {
  /** 1-based position of the block in the source. */
  index: number;
  filename: string;
  /** Standalone SVG document, ready to write. */
  svg: string;
}

export interface SvgExtraction {
  content: string;
  figures: SvgFigure[];
}

export interface ExtractSvgOptions {
  imagesDirName?: string;
  figureLabel?: string;
}

export function figureFilename(baseName: string, index: number): string {
  return `${baseName}-fig${String(index).padStart(2, '0')}.svg`;
}

/**
 * Give a root `<svg>` tag explicit dimensions taken from its viewBox when it
 * declares none of its own.
 */
export function addDimensionsFromViewBox(svg: string): string {
  const openingTag = svg.match(OPENING_TAG)?.[0];
  if (!openingTag || WIDTH_ATTRIBUTE.test(openingTag)) return svg;

  const viewBox = openingTag.match(VIEW_BOX)?.[1];
  const parts = viewBox?.trim().split(/\s+/);
  if (!parts || parts.length !== 4) return svg;

  const [, , width, height] = parts;
  return `<svg width="${width}" height="${height}"${svg.slice('<svg'.length)}`;
}

export function toStandaloneSvg(block: string): string {
  const withDimensions = addDimensionsFromViewBox(block);
  return withDimensions.startsWith('<?xml') ? withDimensions : `${XML_DECLARATION}\n${withDimensions}`;
}

export function extractSvgs(content: string, baseName: string, options: ExtractSvgOptions = {}): SvgExtraction {
  const imagesDirName = options.imagesDirName ?? 'images';
  const figureLabel = options.figureLabel ?? 'Figure';

  const blocks = content.match(SVG_BLOCK) ?? [];
  const figures: SvgFigure[] = [];
  let rewritten = content;

  blocks.forEach((block, i) => {
    const index = i + 1;
    const filename = figureFilename(baseName, index);
    figures.push({ index, filename, svg: toStandaloneSvg(block) });

    const reference = `![${figureLabel} ${index}](${imagesDirName}/${filename})`;
    // Function replacer: `$` sequences in the reference must stay literal
    rewritten = rewritten.replace(block, () => reference);
  });

  return { content: rewritten, figures };
}

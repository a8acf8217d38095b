import { z } from "zod";

// Discovery
export const ListPluginsArgsSchema = z.object({});

// Markdown tools share one shape: the subject text
export const MarkdownArgsSchema = z.object({
  data: z.string(),
});

// Collection qualifiers
export const ApplyQualifierArgsSchema = z.object({
  qualifier: z.string(),
  value: z.unknown(),
  type: z.string().optional(), // declared element type, informational only
});

// SVG extraction
export const ExtractSvgsArgsSchema = z.object({
  path: z.string(),
  imagesDir: z.string().optional(),
  outputPath: z.string().optional(), // write the rewritten markdown here
});

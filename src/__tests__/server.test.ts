import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { callTool, createServer, TOOLS } from "../server.js";
import { setLogLevel } from "../utils/logger.js";
import type { ServerResult } from "../types.js";

function payload(result: ServerResult): unknown {
  return JSON.parse(result.content[0].text);
}

beforeAll(() => {
  setLogLevel("error");
});

describe("tool list", () => {
  it("exposes every tool with a JSON schema", () => {
    expect(TOOLS.map((tool) => tool.name)).toEqual([
      "list_plugins",
      "markdown_to_html",
      "markdown_extract_links",
      "markdown_extract_headings",
      "markdown_word_count",
      "apply_qualifier",
      "extract_svgs",
    ]);
    for (const tool of TOOLS) {
      expect(tool.inputSchema).toMatchObject({ type: "object" });
    }
  });

  it("creates an MCP server", () => {
    expect(createServer()).toBeInstanceOf(Server);
  });
});

describe("callTool", () => {
  it("lists plugins", async () => {
    const result = await callTool("list_plugins", undefined);
    expect(result.isError).toBeUndefined();
    expect(payload(result)).toMatchObject({
      plugins: [{ name: "plugin-markdown" }, { name: "plugin-collection" }],
    });
  });

  it("renders markdown", async () => {
    const result = await callTool("markdown_to_html", { data: "# Hi" });
    expect(result.isError).toBeUndefined();
    expect(payload(result)).toEqual({ html: "<h1>Hi</h1>", input_length: 4, output_length: 11 });
  });

  it("extracts headings and links", async () => {
    expect(payload(await callTool("markdown_extract_headings", { data: "# T1\n## T2" }))).toEqual({
      headings: [
        { level: 1, text: "T1" },
        { level: 2, text: "T2" },
      ],
      count: 2,
    });
    expect(payload(await callTool("markdown_extract_links", { data: "[a](u1)" }))).toEqual({
      links: [{ text: "a", url: "u1" }],
      count: 1,
    });
  });

  it("counts words", async () => {
    expect(payload(await callTool("markdown_word_count", { data: "one two" }))).toEqual({
      words: 2,
      characters: 7,
      characters_no_spaces: 6,
      lines: 1,
    });
  });

  it("applies qualifiers", async () => {
    const result = await callTool("apply_qualifier", { qualifier: "max", value: [5, 2, 8, 1, 9], type: "List" });
    expect(result).toEqual({ content: [{ type: "text", text: '{"result":9}' }] });
  });

  it("flags qualifier errors", async () => {
    const result = await callTool("apply_qualifier", { qualifier: "sum", value: [] });
    expect(result).toEqual({
      content: [{ type: "text", text: '{"error":"sum requires numeric list elements"}' }],
      isError: true,
    });
  });

  it("reports invalid arguments as errors", async () => {
    const result = await callTool("markdown_to_html", {});
    expect(result.isError).toBe(true);
    expect(result.content[0].text.startsWith("Error: ")).toBe(true);
  });

  it("reports unknown tools", async () => {
    expect(await callTool("nope", {})).toEqual({
      content: [{ type: "text", text: "Error: Unknown tool: nope" }],
      isError: true,
    });
  });

  describe("extract_svgs", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "svg-tool-"));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it("extracts figures and writes the rewritten markdown", async () => {
      const source = path.join(dir, "notes.md");
      const output = path.join(dir, "notes.out.md");
      await fs.writeFile(source, "A\n<svg><g/></svg>\nB");

      const result = await callTool("extract_svgs", { path: source, outputPath: output });

      expect(result.isError).toBeUndefined();
      expect(payload(result)).toEqual({
        content: "A\n![Figure 1](images/notes-fig01.svg)\nB",
        figures: [path.join(dir, "images", "notes-fig01.svg")],
        count: 1,
      });
      expect(await fs.readFile(output, "utf8")).toBe("A\n![Figure 1](images/notes-fig01.svg)\nB");
    });

    it("reports a missing file as an error", async () => {
      const missing = path.join(dir, "missing.md");
      const result = await callTool("extract_svgs", { path: missing });
      expect(result.isError).toBe(true);
      expect(result.content[0].text.startsWith(`Error: Cannot read ${missing}: `)).toBe(true);
    });

    it("names the output path when writing it fails", async () => {
      const source = path.join(dir, "notes.md");
      const output = path.join(dir, "no-such-dir", "notes.md");
      await fs.writeFile(source, "plain text");

      const result = await callTool("extract_svgs", { path: source, outputPath: output });

      expect(result.isError).toBe(true);
      expect(result.content[0].text.startsWith(`Error: Cannot write ${output}: `)).toBe(true);
    });
  });
});

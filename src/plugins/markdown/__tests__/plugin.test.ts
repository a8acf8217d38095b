import { describe, it, expect } from "vitest";
import { markdownPlugin, resolveMarkdownAction } from "../plugin.js";

function call(action: string, request: unknown): unknown {
  return JSON.parse(markdownPlugin.execute(action, JSON.stringify(request)));
}

describe("markdownPlugin", () => {
  it("describes itself", () => {
    expect(markdownPlugin.info()).toEqual({
      name: "plugin-markdown",
      version: expect.any(String),
      actions: ["to-html", "extract-links", "extract-headings", "word-count"],
      qualifiers: [],
    });
  });

  it("converts to HTML with lengths", () => {
    expect(call("to-html", { data: "# Hi" })).toEqual({
      html: "<h1>Hi</h1>",
      input_length: 4,
      output_length: 11,
    });
  });

  it("resolves action aliases case-insensitively", () => {
    expect(resolveMarkdownAction("TOHTML")).toBe("to-html");
    expect(resolveMarkdownAction("links")).toBe("extract-links");
    expect(resolveMarkdownAction("wordcount")).toBe("word-count");
    expect(resolveMarkdownAction("constructor")).toBeUndefined();
  });

  it("falls back to the object field", () => {
    expect(call("headings", { object: "## Sub" })).toEqual({
      headings: [{ level: 2, text: "Sub" }],
      count: 1,
    });
  });

  it("extracts links with a count", () => {
    expect(call("extract-links", { data: "[a](b)" })).toEqual({
      links: [{ text: "a", url: "b" }],
      count: 1,
    });
  });

  it("counts words", () => {
    expect(call("word-count", { data: "one two" })).toEqual({
      words: 2,
      characters: 7,
      characters_no_spaces: 6,
      lines: 1,
    });
  });

  it("reports errors instead of throwing", () => {
    expect(call("to-pdf", {})).toEqual({ error: "Unknown action: to-pdf" });
    expect(JSON.parse(markdownPlugin.execute("to-html", "not json"))).toEqual({ error: "Invalid JSON input" });
    expect(call("to-html", [1])).toEqual({ error: "Request must be a JSON object" });
    expect(call("to-html", {})).toEqual({ error: "Missing 'data' field" });
    expect(call("to-html", { data: 5 })).toEqual({ error: "Missing 'data' field" });
  });

  it("has no qualifiers", () => {
    expect(JSON.parse(markdownPlugin.qualifier("sort", "{}"))).toEqual({ error: "Unknown qualifier: sort" });
  });
});

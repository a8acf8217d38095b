import { describe, it, expect } from "vitest";
import { addDimensionsFromViewBox, extractSvgs, figureFilename, XML_DECLARATION } from "../extract.js";

describe("figureFilename", () => {
  it("pads the figure index to two digits", () => {
    expect(figureFilename("chapter1", 3)).toBe("chapter1-fig03.svg");
    expect(figureFilename("chapter1", 12)).toBe("chapter1-fig12.svg");
  });
});

describe("addDimensionsFromViewBox", () => {
  it("adds width and height from the viewBox", () => {
    expect(addDimensionsFromViewBox('<svg viewBox="0 0 200 100"><rect/></svg>')).toBe(
      '<svg width="200" height="100" viewBox="0 0 200 100"><rect/></svg>',
    );
  });

  it("keeps explicit dimensions", () => {
    const svg = '<svg width="50" viewBox="0 0 200 100"></svg>';
    expect(addDimensionsFromViewBox(svg)).toBe(svg);
  });

  it("only looks at the root tag for a width", () => {
    expect(addDimensionsFromViewBox('<svg viewBox="0 0 10 20"><line stroke-width="2"/></svg>')).toBe(
      '<svg width="10" height="20" viewBox="0 0 10 20"><line stroke-width="2"/></svg>',
    );
  });

  it("leaves tags without a usable viewBox alone", () => {
    expect(addDimensionsFromViewBox("<svg><g/></svg>")).toBe("<svg><g/></svg>");
    expect(addDimensionsFromViewBox('<svg viewBox="0 0 10"></svg>')).toBe('<svg viewBox="0 0 10"></svg>');
  });
});

describe("extractSvgs", () => {
  const content = [
    "Intro",
    '<svg viewBox="0 0 4 3">',
    '  <circle r="1"/>',
    "</svg>",
    "Middle",
    '<svg width="5" height="5"></svg>',
    "End",
  ].join("\n");

  it("replaces each block with an image reference", () => {
    const result = extractSvgs(content, "ch1");
    expect(result.content).toBe(
      "Intro\n![Figure 1](images/ch1-fig01.svg)\nMiddle\n![Figure 2](images/ch1-fig02.svg)\nEnd",
    );
  });

  it("produces standalone SVG documents", () => {
    const { figures } = extractSvgs(content, "ch1");
    expect(figures).toEqual([
      {
        index: 1,
        filename: "ch1-fig01.svg",
        svg: `${XML_DECLARATION}\n<svg width="4" height="3" viewBox="0 0 4 3">\n  <circle r="1"/>\n</svg>`,
      },
      {
        index: 2,
        filename: "ch1-fig02.svg",
        svg: `${XML_DECLARATION}\n<svg width="5" height="5"></svg>`,
      },
    ]);
  });

  it("uses the configured directory and label literally", () => {
    const result = extractSvgs("<svg></svg>", "x", { imagesDirName: "assets", figureLabel: "$&" });
    expect(result.content).toBe("![$& 1](assets/x-fig01.svg)");
  });

  it("returns the text unchanged when there is no SVG", () => {
    expect(extractSvgs("plain", "x")).toEqual({ content: "plain", figures: [] });
  });
});

import { describe, it, expect, vi } from "vitest";
import { DefaultMarkdownGenerator } from "../src/markdown/DefaultMarkdownGenerator.js";
import type { ContentFilter } from "../src/markdown/PruningContentFilter.js";

function fixedFilter(blocks: string[]): ContentFilter {
  return { filterContent: vi.fn(() => blocks) };
}

describe("DefaultMarkdownGenerator", () => {
  it("leaves fit output empty without a content filter", () => {
    const generator = new DefaultMarkdownGenerator();

    expect(generator.generate("<h1>Title</h1><p>Body text</p>")).toEqual({
      rawMarkdown: "# Title\n\nBody text",
      fitMarkdown: "",
      fitHtml: "",
    });
  });

  it("builds fit HTML and Markdown from the blocks the filter keeps", () => {
    const filter = fixedFilter(["<p>Kept</p>", "<h2>Also kept</h2>"]);
    const generator = new DefaultMarkdownGenerator({ contentFilter: filter });

    const result = generator.generate("<p>Dropped</p><p>Kept</p><h2>Also kept</h2>");

    expect(filter.filterContent).toHaveBeenCalledWith("<p>Dropped</p><p>Kept</p><h2>Also kept</h2>");
    expect(result.rawMarkdown).toBe("Dropped\n\nKept\n\n## Also kept");
    expect(result.fitHtml).toBe("<div><p>Kept</p></div>\n<div><h2>Also kept</h2></div>");
    expect(result.fitMarkdown).toBe("Kept\n\n## Also kept");
  });

  it("returns empty fit output when the filter keeps nothing", () => {
    const generator = new DefaultMarkdownGenerator({ contentFilter: fixedFilter([]) });
    const result = generator.generate("<p>Only boilerplate</p>");

    expect(result.fitHtml).toBe("");
    expect(result.fitMarkdown).toBe("");
    expect(result.rawMarkdown).toBe("Only boilerplate");
  });

  it("resolves links in both outputs against the base URL", () => {
    const html = `<p><a href="/x">X</a></p>`;
    const generator = new DefaultMarkdownGenerator({ contentFilter: fixedFilter([html]) });

    const result = generator.generate(html, { baseUrl: "https://site.test/page" });

    expect(result.rawMarkdown).toBe("[X](https://site.test/x)");
    expect(result.fitMarkdown).toBe("[X](https://site.test/x)");
  });
});

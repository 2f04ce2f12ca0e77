import { describe, it, expect } from "vitest";
import * as cheerio from "cheerio";
import {
  NO_TITLE,
  buildSummary,
  extractText,
  parseArticle,
  selectorStrategy,
  fullPageStrategy,
} from "../extraction.js";

function page(title: string | null, body: string): string {
  const head = title === null ? "" : `<title>${title}</title>`;
  return `<html><head>${head}</head><body>${body}</body></html>`;
}

describe("parseArticle", () => {
  it("should prefer the <article> element over everything else", () => {
    const parsed = parseArticle(
      page(
        "Launch Notes",
        `<nav>Menu</nav>
         <main><p>Main text</p></main>
         <article>
           <h1>Heading</h1>
           <p>First paragraph</p>
         </article>`,
      ),
    );

    expect(parsed).toEqual({
      title: "Launch Notes",
      text: "Heading\nFirst paragraph",
      strategy: "article",
    });
  });

  it("should fall through the selectors in order", () => {
    const parsed = parseArticle(
      page(
        "T",
        `<div id="content">From id</div>
         <div class="article-body">From class</div>`,
      ),
    );

    expect(parsed?.strategy).toBe(".article-body");
    expect(parsed?.text).toBe("From class");
  });

  it("should skip a matching element that has no visible text", () => {
    const parsed = parseArticle(
      page("T", `<article><script>var x = 1;</script></article><main>Body</main>`),
    );

    expect(parsed?.strategy).toBe("main");
    expect(parsed?.text).toBe("Body");
  });

  it("should fall back to the whole page without script or style text", () => {
    const parsed = parseArticle(
      page(
        "Only Body",
        `<div>Alpha</div><script>track()</script><style>p{}</style><div>Beta</div>`,
      ),
    );

    expect(parsed).toEqual({
      title: "Only Body",
      text: "Only Body\nAlpha\nBeta",
      strategy: "full-page",
    });
  });

  it("should use the placeholder title when <title> is missing or blank", () => {
    expect(parseArticle(page(null, "<article>Text</article>"))?.title).toBe(
      NO_TITLE,
    );
    expect(parseArticle(page("   ", "<article>Text</article>"))?.title).toBe(
      NO_TITLE,
    );
  });

  it("should return null when the page has no text at all", () => {
    expect(parseArticle(page(null, "<div>  </div>"))).toBeNull();
  });
});

describe("extractText", () => {
  it("should honour a custom strategy order", () => {
    const $ = cheerio.load(page("T", "<article>A</article><main>M</main>"));

    expect(
      extractText($, [selectorStrategy("main"), fullPageStrategy]),
    ).toEqual({ text: "M", strategy: "main" });
  });
});

describe("buildSummary", () => {
  it("should join the first N lines with spaces and append an ellipsis", () => {
    expect(buildSummary("one\ntwo\r\nthree\rfour", 3)).toBe("one two three...");
  });

  it("should keep every line when there are fewer than N", () => {
    expect(buildSummary("only line")).toBe("only line...");
  });

  it("should default to fifteen lines", () => {
    const text = Array.from({ length: 20 }, (_, i) => `l${i + 1}`).join("\n");

    expect(buildSummary(text)).toBe(
      "l1 l2 l3 l4 l5 l6 l7 l8 l9 l10 l11 l12 l13 l14 l15...",
    );
  });
});

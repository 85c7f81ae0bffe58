import { describe, it, expect } from "vitest";
import { cleanCaption, convertLinks, formatPost, measureLength } from "./format";

describe("formatPost", () => {
  it("should assemble an uppercase bold title, the body and the footer", () => {
    const text = formatPost({
      title: " Markets rally ",
      body: "Prices are up.",
      footer: "#crypto #news",
    });

    expect(text).toBe("<b>MARKETS RALLY</b>\n\nPrices are up.\n\n#crypto #news");
  });

  it("should omit the footer block when the footer is empty", () => {
    expect(formatPost({ title: "Title", body: "Body", footer: "  " })).toBe(
      "<b>TITLE</b>\n\nBody",
    );
  });

  it("should escape markup characters in the title", () => {
    expect(formatPost({ title: "A & B <c>", body: "Body", footer: "" })).toBe(
      "<b>A &amp; B &lt;C&gt;</b>\n\nBody",
    );
  });
});

describe("convertLinks", () => {
  it("should turn inline markdown links into anchors", () => {
    expect(convertLinks("Read [the report](https://x.example/r?a=1&b=2) now")).toBe(
      'Read <a href="https://x.example/r?a=1&amp;b=2">the report</a> now',
    );
  });

  it("should resolve reference-style links and drop their definitions", () => {
    const text =
      "See [docs][1] and [Guide][].\n\n[1]: https://d.example\n[guide]: https://g.example";

    expect(convertLinks(text)).toBe(
      'See <a href="https://d.example">docs</a> and <a href="https://g.example">Guide</a>.',
    );
  });

  it("should keep raw anchors in the same form", () => {
    expect(convertLinks('Join <a href="https://t.example/c">our channel</a>!')).toBe(
      'Join <a href="https://t.example/c">our channel</a>!',
    );
  });

  it("should keep only the label of a reference without a definition", () => {
    expect(convertLinks("A [missing][nope] link")).toBe("A missing link");
  });

  it("should escape other markup in the body", () => {
    expect(convertLinks("1 < 2 & <i>so</i>")).toBe("1 &lt; 2 &amp; &lt;i&gt;so&lt;/i&gt;");
  });
});

describe("cleanCaption", () => {
  it("should strip quotes, emphasis and extra lines", () => {
    expect(cleanCaption('"**Bitcoin hits a high**"\nsecond line')).toBe(
      "Bitcoin hits a high",
    );
  });

  it("should strip markup tags", () => {
    expect(cleanCaption("<b>Caption</b>")).toBe("Caption");
  });
});

describe("measureLength", () => {
  it("should count code points", () => {
    expect(measureLength("🚀ab")).toBe(3);
    expect(measureLength("")).toBe(0);
  });
});

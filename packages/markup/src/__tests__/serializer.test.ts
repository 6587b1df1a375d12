import { describe, expect, it } from "vitest";
import {
  comment,
  createShell,
  element,
  innerHtml,
  parseDocument,
  processingInstruction,
  rawData,
  text,
  toHtml,
} from "../index.js";

describe("toHtml", () => {
  it("escapes text and attribute values", () => {
    const el = element("div", { title: 'a&"b' }, [text("1 < 2")]);
    expect(toHtml(el)).toBe('<div title="a&amp;&quot;b">1 &lt; 2</div>');
  });

  it("emits raw data verbatim inside script", () => {
    const el = element("script", [], [rawData("if (a < b) {}")]);
    expect(toHtml(el)).toBe("<script>if (a < b) {}</script>");
  });

  it("escapes raw data that would close its element", () => {
    const el = element("style", [], [rawData("</STYLE><img src=x onerror=alert(1)>")]);
    expect(toHtml(el)).toBe("<style>&lt;/STYLE&gt;&lt;img src=x onerror=alert(1)&gt;</style>");
  });

  it("escapes text inside foreign raw-text tags", () => {
    const el = element("svg", [], [element("style", [], [text("</style><img>")], "svg")]);
    expect(toHtml(el)).toBe("<svg><style>&lt;/style&gt;&lt;img&gt;</style></svg>");
  });

  it("writes void elements without end tags", () => {
    expect(toHtml(element("p", [], [text("a"), element("br"), text("b")]))).toBe("<p>a<br>b</p>");
  });

  it("writes comments and processing instructions", () => {
    expect(toHtml(comment(" hi "))).toBe("<!-- hi -->");
    expect(toHtml(processingInstruction("xml"))).toBe("<!--?xml-->");
  });

  it("writes template contents", () => {
    expect(toHtml(element("template", [], [element("b", [], [text("x")])]))).toBe(
      "<template><b>x</b></template>",
    );
  });

  it("writes a document shell", () => {
    expect(toHtml(createShell("", element("body", [], [text("x")])))).toBe(
      "<html><head></head><body>x</body></html>",
    );
  });

  it("round-trips a parsed document", () => {
    expect(toHtml(parseDocument("<!DOCTYPE html><p>a</p>"))).toBe(
      "<!DOCTYPE html><html><head></head><body><p>a</p></body></html>",
    );
  });
});

describe("innerHtml", () => {
  it("serializes children only", () => {
    expect(innerHtml(element("div", [], [element("b", [], [text("ok")])]))).toBe("<b>ok</b>");
  });
});

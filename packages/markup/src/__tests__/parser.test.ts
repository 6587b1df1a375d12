import { describe, expect, it } from "vitest";
import {
  documentBody,
  documentHead,
  type ElementNode,
  htmlParser,
  type MarkupNode,
  parseBodyFragment,
  parseDocument,
} from "../index.js";

function asElement(node: MarkupNode | undefined): ElementNode {
  if (node?.kind !== "element") throw new Error(`expected element, got ${node?.kind}`);
  return node;
}

describe("parseDocument", () => {
  it("splits head and body and keeps the doctype", () => {
    const doc = parseDocument(
      "<!DOCTYPE html><html><head><title>t</title></head><body><p>hi</p></body></html>",
      { baseUri: "https://example.test/" },
    );
    expect(doc.baseUri).toBe("https://example.test/");
    expect(doc.children[0]).toEqual({ kind: "other", type: "doctype", value: "html" });

    const title = asElement(documentHead(doc)?.children[0]);
    expect(title.tagName).toBe("title");
    expect(title.children).toEqual([{ kind: "text", value: "t" }]);

    const p = asElement(documentBody(doc)?.children[0]);
    expect(p.tagName).toBe("p");
    expect(p.children).toEqual([{ kind: "text", value: "hi" }]);
  });

  it("synthesizes missing structure", () => {
    const doc = parseDocument("<b>ok</b>");
    expect(doc.baseUri).toBe("");
    expect(documentHead(doc)?.children).toEqual([]);
    expect(asElement(documentBody(doc)?.children[0]).tagName).toBe("b");
  });

  it("keeps script and style bodies as raw data", () => {
    const doc = parseDocument("<p>a</p><script>if (a < b) go()</script><style>p{}</style>");
    const body = documentBody(doc);
    const script = asElement(body?.children[1]);
    const style = asElement(body?.children[2]);
    expect(script.children).toEqual([{ kind: "raw-data", value: "if (a < b) go()" }]);
    expect(style.children).toEqual([{ kind: "raw-data", value: "p{}" }]);
  });

  it("keeps textarea content as text", () => {
    const doc = parseDocument("<textarea>a < b</textarea>");
    const textarea = asElement(documentBody(doc)?.children[0]);
    expect(textarea.children).toEqual([{ kind: "text", value: "a < b" }]);
  });

  it("has no body for frameset documents", () => {
    const doc = parseDocument("<frameset><frame src='a.html'></frameset>");
    expect(documentBody(doc)).toBeUndefined();
  });
});

describe("parseBodyFragment", () => {
  it("parses well-formed markup without errors", () => {
    const { nodes, errors } = parseBodyFragment('<a href="x" title="y">go</a>');
    expect(errors).toEqual([]);
    const a = asElement(nodes[0]);
    expect(a.attributes).toEqual([
      { name: "href", value: "x" },
      { name: "title", value: "y" },
    ]);
  });

  it("returns comments as opaque nodes", () => {
    const { nodes } = parseBodyFragment("<!-- hi --><b>ok</b>");
    expect(nodes[0]).toEqual({ kind: "other", type: "comment", value: " hi " });
    expect(asElement(nodes[1]).tagName).toBe("b");
  });

  it("reports tokenizer errors", () => {
    const { nodes, errors } = parseBodyFragment("<b title=>ok</b>");
    expect(errors).toHaveLength(1);
    expect(errors[0]?.code).toBe("missing-attribute-value");
    expect(asElement(nodes[0]).tagName).toBe("b");
  });

  it("tracks one error by default", () => {
    const { errors } = parseBodyFragment("<b title=><i title=>x</i></b>");
    expect(errors).toHaveLength(1);
  });

  it("tracks up to maxErrors", () => {
    expect(parseBodyFragment("<b title=><i title=>x</i></b>", { maxErrors: 5 }).errors).toHaveLength(2);
    expect(parseBodyFragment("<b title=><i title=>x</i></b>", { maxErrors: 0 }).errors).toHaveLength(0);
  });

  it("treats template contents as children", () => {
    const { nodes } = parseBodyFragment("<template><b>x</b></template>");
    const template = asElement(nodes[0]);
    expect(asElement(template.children[0]).tagName).toBe("b");
  });

  it("produces frozen nodes", () => {
    const { nodes } = parseBodyFragment("<div><b>x</b></div>");
    const div = asElement(nodes[0]);
    expect(Object.isFrozen(div)).toBe(true);
    expect(Object.isFrozen(div.children)).toBe(true);
  });

  it("records the namespace of foreign elements", () => {
    const { nodes } = parseBodyFragment("<svg><foreignObject><b>x</b></foreignObject></svg><math><mi>y</mi></math>");
    const svg = asElement(nodes[0]);
    const foreignObject = asElement(svg.children[0]);
    const math = asElement(nodes[1]);

    expect(svg.namespace).toBe("svg");
    expect(foreignObject.tagName).toBe("foreignobject");
    expect(foreignObject.namespace).toBe("svg");
    expect(asElement(foreignObject.children[0]).namespace).toBe("html");
    expect(math.namespace).toBe("mathml");
    expect(asElement(math.children[0]).namespace).toBe("mathml");
  });

  it.each(["svg", "math"])("reads style under %s as decoded text", (root) => {
    const { nodes } = parseBodyFragment(`<${root}><style>a &lt; b</style></${root}>`);
    const style = asElement(asElement(nodes[0]).children[0]);

    expect(style.namespace).toBe(root === "svg" ? "svg" : "mathml");
    expect(style.children).toEqual([{ kind: "text", value: "a < b" }]);
  });

  it("keeps an html style inside an integration point as raw data", () => {
    const { nodes } = parseBodyFragment("<svg><desc><style>a &lt; b</style></desc></svg>");
    const desc = asElement(asElement(nodes[0]).children[0]);
    const style = asElement(desc.children[0]);

    expect(style.namespace).toBe("html");
    expect(style.children).toEqual([{ kind: "raw-data", value: "a &lt; b" }]);
  });

  it("is exposed through the default parser", () => {
    expect(htmlParser.parseBodyFragment("<i>x</i>").nodes).toHaveLength(1);
  });
});

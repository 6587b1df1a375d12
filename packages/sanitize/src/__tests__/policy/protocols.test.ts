import { describe, expect, it } from "vitest";
import { extractScheme, normalizeUrl } from "../../policy/index.js";

describe("normalizeUrl", () => {
  it("strips control characters and whitespace", () => {
    expect(normalizeUrl(" java\tscr\nipt:\x00x ")).toBe("javascript:x");
  });
});

describe("extractScheme", () => {
  it("returns the lower-cased scheme", () => {
    expect(extractScheme("HTTPS://example.test/")).toBe("https");
    expect(extractScheme("mailto:someone@example.test")).toBe("mailto");
    expect(extractScheme("java\nscript:alert(1)")).toBe("javascript");
  });

  it("returns undefined for relative references", () => {
    expect(extractScheme("/path")).toBeUndefined();
    expect(extractScheme("page.html#top")).toBeUndefined();
    expect(extractScheme("//host/x")).toBeUndefined();
    expect(extractScheme("")).toBeUndefined();
  });
});

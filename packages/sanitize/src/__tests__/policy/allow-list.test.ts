import { SanitizeConfigurationError } from "@sieve/errors";
import { attribute, element } from "@sieve/markup";
import { describe, expect, it } from "vitest";
import { AllowListPolicy } from "../../policy/index.js";

const anchor = element("a");

describe("AllowListPolicy", () => {
  describe("isSafeTag", () => {
    it("permits listed tags only", () => {
      const policy = new AllowListPolicy({ tags: ["b", "i"] });
      expect(policy.isSafeTag("b")).toBe(true);
      expect(policy.isSafeTag("i")).toBe(true);
      expect(policy.isSafeTag("script")).toBe(false);
    });

    it("normalizes configured names", () => {
      expect(new AllowListPolicy({ tags: [" B "] }).isSafeTag("b")).toBe(true);
    });

    it("permits tags that have attribute or enforced rules", () => {
      const policy = new AllowListPolicy({
        attributes: { a: ["href"], ":all": ["title"] },
        enforcedAttributes: { img: { loading: "lazy" } },
      });
      expect(policy.isSafeTag("a")).toBe(true);
      expect(policy.isSafeTag("img")).toBe(true);
      expect(policy.isSafeTag(":all")).toBe(false);
    });

    it("permits nothing when empty", () => {
      expect(new AllowListPolicy({}).isSafeTag("div")).toBe(false);
    });
  });

  describe("isSafeAttribute", () => {
    const policy = new AllowListPolicy({
      tags: ["p", "b"],
      attributes: { a: ["href"], ":all": ["title"] },
    });

    it("permits per-tag attributes", () => {
      expect(policy.isSafeAttribute("a", anchor, attribute("href", "/x"))).toBe(true);
      expect(policy.isSafeAttribute("p", element("p"), attribute("href", "/x"))).toBe(false);
    });

    it("permits :all attributes on every permitted tag", () => {
      expect(policy.isSafeAttribute("p", element("p"), attribute("title", "t"))).toBe(true);
      expect(policy.isSafeAttribute("a", anchor, attribute("title", "t"))).toBe(true);
    });

    it("rejects attributes of tags that are not permitted", () => {
      expect(policy.isSafeAttribute("span", element("span"), attribute("title", "t"))).toBe(false);
    });

    it("compares attribute names case-insensitively", () => {
      expect(policy.isSafeAttribute("a", anchor, attribute("HREF", "/x"))).toBe(true);
    });
  });

  describe("protocols", () => {
    const rules = {
      attributes: { a: ["href"], img: ["src"] },
      protocols: { a: { href: ["http", "https", "mailto"] } },
    };
    const strict = new AllowListPolicy(rules);
    const relative = new AllowListPolicy({ ...rules, preserveRelativeLinks: true });

    it("permits listed schemes", () => {
      expect(strict.isSafeAttribute("a", anchor, attribute("href", "https://example.test/"))).toBe(true);
      expect(strict.isSafeAttribute("a", anchor, attribute("href", "HTTP://example.test/"))).toBe(true);
      expect(strict.isSafeAttribute("a", anchor, attribute("href", "mailto:someone@example.test"))).toBe(
        true,
      );
    });

    it("rejects other schemes, including obfuscated ones", () => {
      for (const href of [
        "javascript:alert(1)",
        " javascript:alert(1)",
        "java\tscript:alert(1)",
        "JaVaScRiPt:alert(1)",
        "data:text/html,x",
      ]) {
        expect(strict.isSafeAttribute("a", anchor, attribute("href", href)), href).toBe(false);
      }
    });

    it("rejects relative links unless preserved", () => {
      expect(strict.isSafeAttribute("a", anchor, attribute("href", "/path"))).toBe(false);
      expect(relative.isSafeAttribute("a", anchor, attribute("href", "/path"))).toBe(true);
      expect(relative.isSafeAttribute("a", anchor, attribute("href", "//host/x"))).toBe(true);
      expect(relative.isSafeAttribute("a", anchor, attribute("href", "javascript:x"))).toBe(false);
    });

    it("leaves attributes without rules unchecked", () => {
      expect(strict.isSafeAttribute("img", element("img"), attribute("src", "javascript:x"))).toBe(true);
    });
  });

  describe("enforcedAttributes", () => {
    const policy = new AllowListPolicy({
      enforcedAttributes: { a: { rel: "nofollow", target: "_blank" } },
    });

    it("returns the configured attributes in order", () => {
      expect(policy.enforcedAttributes("a")).toEqual([
        { name: "rel", value: "nofollow" },
        { name: "target", value: "_blank" },
      ]);
      expect(Object.isFrozen(policy.enforcedAttributes("a"))).toBe(true);
    });

    it("returns nothing for other tags", () => {
      expect(policy.enforcedAttributes("b")).toEqual([]);
    });
  });

  describe("configuration", () => {
    it("rejects invalid names", () => {
      expect(() => new AllowListPolicy({ tags: ["bad tag"] })).toThrow(
        "Invalid allow-list configuration: tags.0: must be non-empty and free of whitespace, quotes, '/', '=', '>' and NUL",
      );
    });

    it("rejects schemes written with a colon", () => {
      expect(() => new AllowListPolicy({ protocols: { a: { href: ["http:"] } } })).toThrow(
        "Invalid allow-list configuration: protocols.a.href.0: must be a URL scheme without the trailing ':'",
      );
    });

    it("lists every issue", () => {
      let caught: unknown;
      try {
        new AllowListPolicy({ tags: ["", "ok"], attributes: { a: ["x y"] } });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(SanitizeConfigurationError);
      if (!(caught instanceof SanitizeConfigurationError)) return;
      expect(caught.issues.map((issue) => issue.field)).toEqual(["tags.0", "attributes.a.0"]);
    });
  });
});

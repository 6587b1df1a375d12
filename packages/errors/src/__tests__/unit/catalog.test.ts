import { describe, expect, it } from "vitest";
import { ERROR_CATALOG } from "../../index.js";

describe("ERROR_CATALOG", () => {
  it("should have all expected domains", () => {
    const domains = new Set(Object.values(ERROR_CATALOG).map((e) => e.domain));

    expect(domains).toEqual(new Set(["validation", "external", "sanitize", "markup"]));
  });

  it("should prefix domain codes with their domain", () => {
    for (const [code, entry] of Object.entries(ERROR_CATALOG)) {
      if (entry.domain === "sanitize" || entry.domain === "markup") {
        expect(code.startsWith(`${entry.domain.toUpperCase()}_`)).toBe(true);
      }
    }
  });

  it("should mark validation codes as expected except caller-contract violations", () => {
    expect(ERROR_CATALOG.SANITIZE_CONFIGURATION_INVALID.isExpected).toBe(true);
    expect(ERROR_CATALOG.SANITIZE_CONTENT_BLOCKED.isExpected).toBe(true);
    expect(ERROR_CATALOG.SANITIZE_INVALID_ARGUMENT.isExpected).toBe(false);
    expect(ERROR_CATALOG.SANITIZE_POLICY_FAILED.isExpected).toBe(false);
  });

  it("should map each code to a known base type", () => {
    const bases = ["ValidationError", "ExternalError"];
    for (const entry of Object.values(ERROR_CATALOG)) {
      expect(bases).toContain(entry.baseType);
    }
    expect(ERROR_CATALOG.SANITIZE_POLICY_FAILED.baseType).toBe("ExternalError");
  });
});

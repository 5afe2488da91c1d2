import fs from "fs";
import os from "os";
import path from "path";
import { loadPatternCatalog, parsePatternCatalog } from "../patternCatalog";
import { ConfigurationError } from "../../errors";
import bundledCatalog from "../pattern-catalog.json";

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  throw new Error("expected a ConfigurationError");
}

describe("Pattern Catalog", () => {
  describe("loadPatternCatalog (bundled)", () => {
    const catalog = loadPatternCatalog();

    it("should keep keyword tables in file order", () => {
      expect(catalog.version).toBe("v1");
      expect(catalog.keywords.high[0]).toEqual({ keyword: "urgent", weight: 15 });
      expect(catalog.keywords.high).toHaveLength(16);
      expect(catalog.keywords.medium).toHaveLength(12);
      expect(catalog.keywords.negative).toHaveLength(16);
      expect(catalog.keywords.negative.find(k => k.keyword === "spam")?.weight).toBe(-40);
    });

    it("should expose role rules and size multipliers", () => {
      expect(catalog.roles.executive.score).toBe(25);
      expect(catalog.roles.decisionMaker.score).toBe(15);
      expect(catalog.roles.standardScore).toBe(5);
      expect(catalog.companySize.defaultMultiplier).toBe(1.0);
      expect(catalog.companySize.multipliers["1000+"]).toBe(1.5);
      expect(catalog.companySize.multipliers["1-10"]).toBe(0.5);
      expect(Object.hasOwn(catalog.companySize.multipliers, "N/A")).toBe(false);
    });

    it("should compile structural detectors", () => {
      expect(catalog.urgency).toMatchObject({ increment: 10, cap: 25 });
      expect(catalog.urgency.patterns).toHaveLength(4);
      expect(catalog.budget).toMatchObject({ increment: 15, cap: 20 });
      expect(catalog.scale.units.map(u => u.unit)).toEqual(["users", "locations", "teams"]);
      expect(catalog.scale.tiers.map(t => t.min)).toEqual([500, 100, 50]);
    });

    it("should be frozen", () => {
      expect(Object.isFrozen(catalog)).toBe(true);
      expect(Object.isFrozen(catalog.keywords.high)).toBe(true);
      expect(Object.isFrozen(catalog.keywords.high[0])).toBe(true);
      expect(Object.isFrozen(catalog.scale.tiers)).toBe(true);
    });

    it("should not let callers change the size table", () => {
      expect(Object.isFrozen(catalog.companySize.multipliers)).toBe(true);
      expect(Reflect.set(catalog.companySize.multipliers, "N/A", 9)).toBe(false);
      expect(Reflect.set(catalog.companySize.multipliers, "1-10", 9)).toBe(false);
      expect(catalog.companySize.multipliers["1-10"]).toBe(0.5);
      expect(Object.hasOwn(catalog.companySize.multipliers, "N/A")).toBe(false);
    });
  });

  describe("parsePatternCatalog", () => {
    it("should reject non-integer keyword weights", () => {
      const file = structuredClone(bundledCatalog);
      file.keywords.high.urgent = 1.5;

      const issues = issuesOf(() => parsePatternCatalog(file));
      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatch(/^keywords\.high\.urgent: /);
    });

    it("should reject non-positive multipliers", () => {
      const file = structuredClone(bundledCatalog);
      file.company_size.multipliers["1-10"] = 0;

      const issues = issuesOf(() => parsePatternCatalog(file));
      expect(issues[0]).toMatch(/^company_size\.multipliers\.1-10: /);
    });

    it("should reject multipliers with more than two decimals", () => {
      const file = structuredClone(bundledCatalog);
      file.company_size.multipliers["10-50"] = 0.725;

      expect(issuesOf(() => parsePatternCatalog(file))).toEqual([
        "company_size.multipliers.10-50: multiplier must have at most two decimal places",
      ]);
    });

    it("should reject all-digit keywords", () => {
      const file = structuredClone(bundledCatalog);
      Object.assign(file.keywords.medium, { "100": 5 });

      expect(issuesOf(() => parsePatternCatalog(file))).toEqual([
        "keywords.medium.100: keyword must not be all digits",
      ]);
    });

    it("should reject missing sections", () => {
      expect(() => parsePatternCatalog({ version: "v1" })).toThrow(ConfigurationError);
      expect(() => parsePatternCatalog(null)).toThrow(ConfigurationError);
    });

    it("should reject patterns that do not compile", () => {
      const file = structuredClone(bundledCatalog);
      file.urgency.patterns = ["(unclosed"];

      const issues = issuesOf(() => parsePatternCatalog(file));
      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatch(/^urgency\.patterns\.0: /);
    });

    it("should require a head-count group in scale patterns", () => {
      const file = structuredClone(bundledCatalog);
      file.scale.units[0].pattern = "\\d+ users";

      expect(issuesOf(() => parsePatternCatalog(file))).toEqual([
        "scale.units.0.pattern: must capture the head count in group 1",
      ]);
    });

    it("should sort scale tiers by descending minimum", () => {
      const file = structuredClone(bundledCatalog);
      file.scale.tiers.reverse();

      const catalog = parsePatternCatalog(file);
      expect(catalog.scale.tiers.map(t => t.tier)).toEqual(["Enterprise", "Mid-market", "Small-medium"]);
    });

    it("should lowercase keywords so matching stays case-insensitive", () => {
      const file = structuredClone(bundledCatalog);
      file.roles.executive.keywords = ["CTO"];

      const catalog = parsePatternCatalog(file);
      expect(catalog.roles.executive.keywords).toEqual(["cto"]);
    });
  });

  describe("loadPatternCatalog (file)", () => {
    let dir: string;

    beforeAll(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "pattern-catalog-"));
    });

    afterAll(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should load a catalog file", () => {
      const file = structuredClone(bundledCatalog);
      file.version = "custom-1";
      const filePath = path.join(dir, "custom.json");
      fs.writeFileSync(filePath, JSON.stringify(file));

      expect(loadPatternCatalog(filePath).version).toBe("custom-1");
    });

    it("should fail with ConfigurationError when the file is missing", () => {
      expect(() => loadPatternCatalog(path.join(dir, "missing.json")))
        .toThrow(/^Cannot read pattern catalog/);
    });

    it("should fail with ConfigurationError on malformed JSON", () => {
      const filePath = path.join(dir, "broken.json");
      fs.writeFileSync(filePath, "{ not json");

      expect(() => loadPatternCatalog(filePath)).toThrow(ConfigurationError);
      expect(() => loadPatternCatalog(filePath)).toThrow(/is not valid JSON/);
    });
  });
});

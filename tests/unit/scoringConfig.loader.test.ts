/**
 * Unit tests for scoring config validation and compilation
 */

import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  ScoringConfigCompilationError,
  buildKeywordPattern,
  compileScoringConfig,
  loadScoringConfig,
  parseScoringConfig,
  resolveScoringConfigPath,
  splitKeywords,
} from "@/scoringConfig/loader";
import { FileScoringConfigSource } from "@/scoringConfig/fileSource";
import {
  ScoringConfigValidationError,
  parseWeightCell,
  validateScoringConfigRaw,
} from "@/utils/configValidation";
import { createTestConfigRaw } from "../helpers/fixtures";

describe("splitKeywords", () => {
  it("should trim keywords and drop empty entries", () => {
    expect(splitKeywords(" CEO, , Founder ,")).toEqual(["CEO", "Founder"]);
  });

  it("should return an empty list for a missing cell", () => {
    expect(splitKeywords(undefined)).toEqual([]);
    expect(splitKeywords("")).toEqual([]);
  });
});

describe("buildKeywordPattern", () => {
  it("should match keywords on letter boundaries, case-insensitively", () => {
    const pattern = buildKeywordPattern(["Head of", "VP"]);
    expect(pattern.test("head of product")).toBe(true);
    expect(pattern.test("Regional VP, EMEA")).toBe(true);
    expect(pattern.test("svp")).toBe(false);
  });

  it("should escape regex metacharacters", () => {
    const pattern = buildKeywordPattern(["C++"]);
    expect(pattern.test("c++ engineer")).toBe(true);
    expect(pattern.test("cc engineer")).toBe(false);
  });
});

describe("parseWeightCell", () => {
  it("should accept numbers and numeric strings", () => {
    expect(parseWeightCell(0.3, "w")).toBe(0.3);
    expect(parseWeightCell(" 0.4 ", "w")).toBe(0.4);
  });

  it("should return null for a missing cell", () => {
    expect(parseWeightCell(undefined, "w")).toBeNull();
  });

  it("should throw for non-numeric and blank strings", () => {
    expect(() => parseWeightCell("heavy", "w")).toThrow(
      'Scoring config validation failed: w must be numeric, got "heavy"',
    );
    expect(() => parseWeightCell("  ", "w")).toThrow(ScoringConfigValidationError);
  });
});

describe("validateScoringConfigRaw", () => {
  it("should accept the fixture config", () => {
    expect(validateScoringConfigRaw(createTestConfigRaw())).toEqual(
      createTestConfigRaw(),
    );
  });

  it("should reject a non-object document", () => {
    expect(() => validateScoringConfigRaw([])).toThrow(
      "Scoring config validation failed: Scoring config must be an object",
    );
  });

  it("should reject a missing peopleScore section", () => {
    expect(() =>
      validateScoringConfigRaw({ companyScore: { pillars: {} } }),
    ).toThrow("Scoring config validation failed: peopleScore must be an object");
  });

  it("should reject a non-numeric pillar weight", () => {
    const raw = createTestConfigRaw();
    raw.peopleScore.pillars.Seniority.description = "forty";

    expect(() => validateScoringConfigRaw(raw)).toThrow(
      'Scoring config validation failed: peopleScore.pillars["Seniority"].description must be numeric, got "forty"',
    );
  });

  it("should reject a score of the wrong type", () => {
    expect(() =>
      validateScoringConfigRaw({
        peopleScore: {
          pillars: {
            Seniority: {
              description: "1",
              components: { VP: { "Keywords to Match": "VP", Score: true } },
            },
          },
        },
        companyScore: { pillars: {} },
      }),
    ).toThrow(
      'Scoring config validation failed: peopleScore.pillars["Seniority"].components["VP"].Score must be a number or string, got boolean',
    );
  });
});

describe("compileScoringConfig", () => {
  it("should compile pillar weights", () => {
    const config = compileScoringConfig(createTestConfigRaw());

    expect(config.contactWeights).toEqual({
      seniority: 0.5,
      domain: 0.5,
      warmth: 0,
    });
    expect(config.companyWeights).toEqual({
      Alignment: 1,
      Budget: 1,
      Demand: 1,
    });
    expect(config.people["One-Offs"].weight).toBeNull();
  });

  it("should resolve base scores and modifiers", () => {
    const config = compileScoringConfig(createTestConfigRaw());
    const components = config.people.Seniority.components;

    expect(components.map((component) => component.name)).toEqual([
      "Executive",
      "VP",
      "Director",
      "Manager",
      "Senior",
      "Junior",
    ]);
    expect(components[0].score).toEqual({ kind: "base", score: 95 });
    expect(components[0].keywords).toEqual(["CEO", "Founder"]);
    expect(components[4].score).toEqual({ kind: "modifier", delta: 10 });
    expect(components[5].score).toEqual({ kind: "modifier", delta: -15 });
  });

  it("should accept integer strings and truncate fractional numbers", () => {
    const raw = createTestConfigRaw();
    raw.peopleScore.pillars.Domain.components = {
      Product: { "Keywords to Match": "Product", Score: "70" },
      Growth: { "Keywords to Match": "Growth", Score: 72.9 },
    };

    const components = compileScoringConfig(raw).people.Domain.components;

    expect(components.map((component) => component.score)).toEqual([
      { kind: "base", score: 70 },
      { kind: "base", score: 72 },
    ]);
  });

  it("should skip components that can never contribute", () => {
    const raw = createTestConfigRaw();
    raw.peopleScore.pillars.Domain.components = {
      Zero: { "Keywords to Match": "Product", Score: 0 },
      Empty: { "Keywords to Match": "Product", Score: "" },
      NoKeywords: { "Keywords to Match": " , ", Score: 50 },
      BadModifier: { "Keywords to Match": "Senior", Score: "+ten" },
      Kept: { "Keywords to Match": "Growth", Score: 85 },
    };

    const components = compileScoringConfig(raw).people.Domain.components;

    expect(components.map((component) => component.name)).toEqual(["Kept"]);
  });

  it("should throw on a malformed base score", () => {
    const raw = createTestConfigRaw();
    raw.peopleScore.pillars.Domain.components = {
      Product: { "Keywords to Match": "Product", Score: "high" },
    };

    expect(() => compileScoringConfig(raw)).toThrow(
      'Scoring config compilation failed: Domain/Product has non-integer score "high"',
    );
  });

  it("should give an absent people pillar a zero weight", () => {
    const raw = createTestConfigRaw();
    delete raw.peopleScore.pillars.Warmth;

    const config = compileScoringConfig(raw);

    expect(config.contactWeights.warmth).toBe(0);
    expect(config.people.Warmth.components).toEqual([]);
  });

  it("should throw when a present people pillar has no weight", () => {
    const raw = createTestConfigRaw();
    delete raw.peopleScore.pillars.Seniority.description;

    expect(() => compileScoringConfig(raw)).toThrow(
      'Scoring config compilation failed: People pillar "Seniority" has no weight',
    );
  });

  it("should prefer weight over description", () => {
    const raw = createTestConfigRaw();
    raw.peopleScore.pillars.Seniority.weight = 0.25;

    expect(compileScoringConfig(raw).contactWeights.seniority).toBe(0.25);
  });

  it("should throw when a present company pillar has no weight", () => {
    const raw = createTestConfigRaw();
    raw.companyScore.pillars.Budget = {};

    expect(() => compileScoringConfig(raw)).toThrow(
      'Scoring config compilation failed: Company pillar "Budget" has no weight',
    );
  });

  it("should give an absent company pillar a zero weight", () => {
    const raw = createTestConfigRaw();
    delete raw.companyScore.pillars.Demand;

    expect(compileScoringConfig(raw).companyWeights.Demand).toBe(0);
  });

  it("should throw when contact weights sum to zero", () => {
    const raw = createTestConfigRaw();
    raw.peopleScore.pillars.Seniority.description = "0";
    raw.peopleScore.pillars.Domain.description = "0";

    expect(() => compileScoringConfig(raw)).toThrow(ScoringConfigCompilationError);
  });

  it("should throw when company weights sum to zero", () => {
    const raw = createTestConfigRaw();
    raw.companyScore.pillars = {};

    expect(() => compileScoringConfig(raw)).toThrow(
      "Scoring config compilation failed: Alignment, Budget and Demand weights sum to zero",
    );
  });
});

describe("parseScoringConfig", () => {
  it("should validate before compiling", () => {
    expect(() => parseScoringConfig("not a config")).toThrow(
      ScoringConfigValidationError,
    );
  });
});

describe("resolveScoringConfigPath", () => {
  const original = process.env.SCORING_CONFIG_PATH;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.SCORING_CONFIG_PATH;
    } else {
      process.env.SCORING_CONFIG_PATH = original;
    }
  });

  it("should resolve an explicit path against the working directory", () => {
    expect(resolveScoringConfigPath("custom.json")).toBe(
      path.resolve(process.cwd(), "custom.json"),
    );
  });

  it("should fall back to the environment, then the bundled file", () => {
    process.env.SCORING_CONFIG_PATH = "from-env.json";
    expect(resolveScoringConfigPath()).toBe(
      path.resolve(process.cwd(), "from-env.json"),
    );

    delete process.env.SCORING_CONFIG_PATH;
    expect(resolveScoringConfigPath()).toBe(
      path.resolve(process.cwd(), "data/scoring-config.json"),
    );
  });
});

describe("loadScoringConfig", () => {
  let tempDir: string | null = null;

  afterEach(() => {
    if (tempDir) {
      fs.rmSync(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  function writeTempConfig(content: string): string {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "lead-scoring-config-"));
    const file = path.join(tempDir, "scoring-config.json");
    fs.writeFileSync(file, content, "utf-8");
    return file;
  }

  it("should load the bundled config", () => {
    const config = loadScoringConfig("data/scoring-config.json");

    expect(config.contactWeights).toEqual({
      seniority: 0.4,
      domain: 0.4,
      warmth: 0.2,
    });
    expect(config.companyWeights).toEqual({
      Alignment: 0.3,
      Budget: 0.4,
      Demand: 0.3,
    });
    expect(config.people.Seniority.components).toHaveLength(7);
    expect(config.people["One-Offs"].components).toHaveLength(2);
  });

  it("should load a config from a custom path", () => {
    const file = writeTempConfig(JSON.stringify(createTestConfigRaw()));

    expect(loadScoringConfig(file).contactWeights.seniority).toBe(0.5);
  });

  it("should throw on malformed JSON", () => {
    const file = writeTempConfig("{ not json");

    expect(() => loadScoringConfig(file)).toThrow(SyntaxError);
  });

  it("should throw when the file does not exist", () => {
    expect(() => loadScoringConfig("does/not/exist.json")).toThrow();
  });
});

describe("FileScoringConfigSource", () => {
  it("should name itself after the resolved path and load the file", async () => {
    const source = new FileScoringConfigSource("data/scoring-config.json");

    expect(source.name).toBe(
      `file:${path.resolve(process.cwd(), "data/scoring-config.json")}`,
    );
    const config = await source.load();
    expect(config.contactWeights.warmth).toBe(0.2);
  });

  it("should reject when the file is missing", async () => {
    const source = new FileScoringConfigSource("does/not/exist.json");

    await expect(source.load()).rejects.toThrow();
  });
});

import { describe, it, expect } from "vitest";
import { ClassificationError } from "../errors";
import {
  classify,
  compareCategories,
  describeCategory,
  overallCategory,
  validateBreakpoints,
} from "../classifier-service";

describe("classify", () => {
  it.each([
    [0, "GOOD"],
    [12.0, "GOOD"],
    [12.1, "MODERATE"],
    [55.4, "MODERATE"],
    [55.5, "UNHEALTHY"],
    [300, "UNHEALTHY"],
  ])("places PM2.5 %d µg/m³ in %s", (value, expected) => {
    expect(classify("PM25", value)).toBe(expected);
  });

  it("never falls as the concentration rises", () => {
    let previous = classify("NO2", 0);
    for (let value = 0; value <= 800; value += 0.5) {
      const current = classify("NO2", value);
      expect(compareCategories(current, previous)).toBeGreaterThanOrEqual(0);
      previous = current;
    }
    expect(previous).toBe("UNHEALTHY");
  });

  it("uses a caller-supplied table", () => {
    expect(classify("O3", 60, { O3: [50, 100] })).toBe("MODERATE");
  });

  it("fails for a pollutant the table does not cover", () => {
    const attempt = () => classify("O3", 10, { PM25: [12.1, 55.5] });
    expect(attempt).toThrow(ClassificationError);
    expect(attempt).toThrow("unsupported_pollutant: no breakpoint table for O3");
  });

  it.each([-1, Number.NaN, Number.POSITIVE_INFINITY])("rejects %d", (value) => {
    expect(() => classify("PM25", value)).toThrow(/^invalid_value:/);
  });
});

describe("overallCategory", () => {
  it("takes the worst category", () => {
    expect(overallCategory(["GOOD", "UNHEALTHY", "MODERATE"])).toBe("UNHEALTHY");
    expect(overallCategory(["GOOD", "GOOD"])).toBe("GOOD");
  });

  it("is null when nothing was classified", () => {
    expect(overallCategory([])).toBeNull();
  });
});

describe("validateBreakpoints", () => {
  it("accepts increasing edges", () => {
    const table = { PM25: [10, 20] as const };
    expect(validateBreakpoints(table)).toBe(table);
  });

  it("rejects edges that do not increase", () => {
    expect(() => validateBreakpoints({ NO2: [50, 50] })).toThrow(RangeError);
    expect(() => validateBreakpoints({ O3: [-1, 5] })).toThrow(RangeError);
  });
});

describe("describeCategory", () => {
  it("returns a label and description", () => {
    const info = describeCategory("MODERATE");
    expect(info.category).toBe("MODERATE");
    expect(info.label).toBe("Moderate");
    expect(info.description).toMatch(/^Air quality is acceptable/);
  });
});

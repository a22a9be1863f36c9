import {
  CATEGORIES,
  type Category,
  type Pollutant,
} from "../types/air-quality";
import { ClassificationError } from "./errors";

/**
 * Lower edges (µg/m³) of MODERATE and UNHEALTHY for one pollutant.
 * A value sitting exactly on an edge belongs to the higher category.
 */
export type Breakpoints = readonly [moderate: number, unhealthy: number];

export type BreakpointTable = Partial<Record<Pollutant, Breakpoints>>;

// US EPA edges, folded to three levels:
// - PM2.5: good up to 12.0, "unhealthy" from 55.5 (24h)
// - NO2: 54 ppb and 361 ppb (1h) at 25 °C
// - O3: 108.1 and 170.1 µg/m³ (~0.055 and ~0.086 ppm, 8h)
export const DEFAULT_BREAKPOINTS: BreakpointTable = {
  PM25: [12.1, 55.5],
  NO2: [101.6, 679.3],
  O3: [108.1, 170.1],
};

export interface CategoryInfo {
  category: Category;
  label: string;
  description: string;
}

const CATEGORY_INFO: Record<Category, Omit<CategoryInfo, "category">> = {
  GOOD: {
    label: "Good",
    description:
      "Air quality is satisfactory, and air pollution poses little or no risk.",
  },
  MODERATE: {
    label: "Moderate",
    description:
      "Air quality is acceptable. However, there may be a risk for some people, particularly those who are unusually sensitive to air pollution.",
  },
  UNHEALTHY: {
    label: "Unhealthy",
    description:
      "Some members of the general public may experience health effects; members of sensitive groups may experience more serious health effects.",
  },
};

export function categoryRank(category: Category): number {
  return CATEGORIES.indexOf(category);
}

export function compareCategories(a: Category, b: Category): number {
  return categoryRank(a) - categoryRank(b);
}

export function describeCategory(category: Category): CategoryInfo {
  return { category, ...CATEGORY_INFO[category] };
}

/**
 * Reject tables whose edges are not finite, non-negative and strictly
 * increasing.
 */
export function validateBreakpoints(table: BreakpointTable): BreakpointTable {
  for (const [pollutant, edges] of Object.entries(table)) {
    if (!edges) continue;
    const [moderate, unhealthy] = edges;
    if (
      !Number.isFinite(moderate) ||
      !Number.isFinite(unhealthy) ||
      moderate < 0 ||
      unhealthy <= moderate
    ) {
      throw new RangeError(
        `breakpoints for ${pollutant} must be increasing, got [${edges.join(", ")}]`
      );
    }
  }
  return table;
}

export function classify(
  pollutant: Pollutant,
  value: number,
  table: BreakpointTable = DEFAULT_BREAKPOINTS
): Category {
  const edges = table[pollutant];
  if (!edges) {
    throw new ClassificationError(
      "unsupported_pollutant",
      `no breakpoint table for ${pollutant}`,
      pollutant
    );
  }
  if (!Number.isFinite(value) || value < 0) {
    throw new ClassificationError(
      "invalid_value",
      `cannot classify ${pollutant} value ${value}`,
      pollutant
    );
  }

  const [moderate, unhealthy] = edges;
  if (value >= unhealthy) return "UNHEALTHY";
  if (value >= moderate) return "MODERATE";
  return "GOOD";
}

/**
 * Worst category across pollutants. One bad pollutant is never averaged
 * away by clean ones.
 */
export function overallCategory(categories: Iterable<Category>): Category | null {
  let worst: Category | null = null;
  for (const category of categories) {
    if (worst === null || compareCategories(category, worst) > 0) {
      worst = category;
    }
  }
  return worst;
}

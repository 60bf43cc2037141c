import type { FilterCombination, FiltersConfig } from "../types";

export interface FilterAxes {
  useDate: boolean;
  useSize: boolean;
}

/**
 * Build the cross product of the enabled filter axes
 * Date is the outer axis, size the inner one. With no axis enabled the result
 * is a single empty combination.
 *
 * @example
 * generateFilterCombinations(
 *   { dateRestrict: ["d30", "y1"], imgSize: ["large"], useDate: true, useSize: true },
 * )
 * // [{ dateRestrict: "d30", imgSize: "large" }, { dateRestrict: "y1", imgSize: "large" }]
 */
export function generateFilterCombinations(
  filters: Pick<FiltersConfig, "dateRestrict" | "imgSize">,
  axes: FilterAxes,
): FilterCombination[] {
  const dates: Array<string | undefined> = axes.useDate
    ? filters.dateRestrict
    : [undefined];
  const sizes: Array<string | undefined> = axes.useSize
    ? filters.imgSize
    : [undefined];

  const combinations: FilterCombination[] = [];
  for (const dateRestrict of dates) {
    for (const imgSize of sizes) {
      const combination: FilterCombination = {};
      if (dateRestrict) combination.dateRestrict = dateRestrict;
      if (imgSize) combination.imgSize = imgSize;
      combinations.push(combination);
    }
  }

  return combinations;
}

export function formatFilterDisplay(filters: FilterCombination): string {
  const parts: string[] = [];
  if (filters.dateRestrict) {
    parts.push(`dateRestrict=${filters.dateRestrict}`);
  }
  if (filters.imgSize) {
    parts.push(`imgSize=${filters.imgSize}`);
  }
  return parts.length > 0 ? parts.join(", ") : "no filters";
}

export interface FilterFlags {
  filters?: boolean; // false when --no-filters is given
  dateOnly?: boolean;
  sizeOnly?: boolean;
}

/**
 * Decide which filter axes are enabled
 * Precedence: --no-filters > --date-only > --size-only > config defaults
 */
export function resolveFilterAxes(
  flags: FilterFlags,
  defaults: Pick<FiltersConfig, "useDate" | "useSize">,
): FilterAxes {
  if (flags.filters === false) return { useDate: false, useSize: false };
  if (flags.dateOnly) return { useDate: true, useSize: false };
  if (flags.sizeOnly) return { useDate: false, useSize: true };
  return { useDate: defaults.useDate, useSize: defaults.useSize };
}

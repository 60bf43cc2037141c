import { describe, it, expect } from "vitest";
import {
  formatFilterDisplay,
  generateFilterCombinations,
  resolveFilterAxes,
} from "./filter-combinations";

const FILTERS = {
  dateRestrict: ["d30", "y1"],
  imgSize: ["large", "huge"],
};

describe("generateFilterCombinations", () => {
  it("crosses both axes with date outermost", () => {
    expect(
      generateFilterCombinations(FILTERS, { useDate: true, useSize: true }),
    ).toEqual([
      { dateRestrict: "d30", imgSize: "large" },
      { dateRestrict: "d30", imgSize: "huge" },
      { dateRestrict: "y1", imgSize: "large" },
      { dateRestrict: "y1", imgSize: "huge" },
    ]);
  });

  it("uses a single axis when only one is enabled", () => {
    expect(
      generateFilterCombinations(FILTERS, { useDate: false, useSize: true }),
    ).toEqual([{ imgSize: "large" }, { imgSize: "huge" }]);
    expect(
      generateFilterCombinations(FILTERS, { useDate: true, useSize: false }),
    ).toEqual([{ dateRestrict: "d30" }, { dateRestrict: "y1" }]);
  });

  it("yields one empty combination when no axis is enabled", () => {
    expect(
      generateFilterCombinations(FILTERS, { useDate: false, useSize: false }),
    ).toEqual([{}]);
  });
});

describe("resolveFilterAxes", () => {
  const defaults = { useDate: false, useSize: true };

  it("falls back to config defaults", () => {
    expect(resolveFilterAxes({ filters: true }, defaults)).toEqual(defaults);
  });

  it("--no-filters wins over everything", () => {
    expect(
      resolveFilterAxes({ filters: false, dateOnly: true, sizeOnly: true }, defaults),
    ).toEqual({ useDate: false, useSize: false });
  });

  it("--date-only wins over --size-only", () => {
    expect(resolveFilterAxes({ dateOnly: true, sizeOnly: true }, defaults)).toEqual(
      { useDate: true, useSize: false },
    );
  });

  it("--size-only disables dates", () => {
    expect(
      resolveFilterAxes({ sizeOnly: true }, { useDate: true, useSize: true }),
    ).toEqual({ useDate: false, useSize: true });
  });
});

describe("formatFilterDisplay", () => {
  it("lists the active facets", () => {
    expect(formatFilterDisplay({ dateRestrict: "m6", imgSize: "xlarge" })).toBe(
      "dateRestrict=m6, imgSize=xlarge",
    );
    expect(formatFilterDisplay({ imgSize: "large" })).toBe("imgSize=large");
  });

  it("describes an empty combination", () => {
    expect(formatFilterDisplay({})).toBe("no filters");
  });
});

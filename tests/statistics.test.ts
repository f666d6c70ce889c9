import { describe, expect, it } from "vitest";
import {
  groupBy,
  isNonEmpty,
  max,
  mean,
  meanOfDefined,
  median,
  min,
  quantile,
  valueCounts,
} from "../src/analysis/statistics";

describe("quantile", () => {
  it("interpolates linearly between order statistics", () => {
    expect(quantile([1, 2, 3, 4], 0.5)).toBe(2.5);
    expect(quantile([10, 20, 30, 40, 50], 0.9)).toBeCloseTo(46, 10);
    expect(quantile([4, 1, 3, 2], 0.25)).toBeCloseTo(1.75, 10);
  });

  it("returns the extremes at 0 and 1", () => {
    expect(quantile([7, 3, 9], 0)).toBe(3);
    expect(quantile([7, 3, 9], 1)).toBe(9);
  });

  it("returns the only value of a single-element set", () => {
    expect(quantile([42], 0.95)).toBe(42);
  });

  it("rejects levels outside [0, 1]", () => {
    expect(() => quantile([1, 2], 1.2)).toThrow(RangeError);
  });

  it("does not reorder its input", () => {
    const values: [number, ...number[]] = [3, 1, 2];
    quantile(values, 0.5);
    expect(values).toEqual([3, 1, 2]);
  });
});

describe("descriptive statistics", () => {
  it("computes mean, median, min and max", () => {
    const values: [number, ...number[]] = [5, 1, 4, 2];
    expect(mean(values)).toBe(3);
    expect(median(values)).toBe(3);
    expect(min(values)).toBe(1);
    expect(max(values)).toBe(5);
  });

  it("ignores missing values and reports null when none are present", () => {
    expect(meanOfDefined([2, undefined, 4])).toBe(3);
    expect(meanOfDefined([undefined, undefined])).toBeNull();
    expect(meanOfDefined([])).toBeNull();
  });

  it("narrows non-empty arrays", () => {
    expect(isNonEmpty([])).toBe(false);
    expect(isNonEmpty([0])).toBe(true);
  });
});

describe("grouping", () => {
  it("groups values by key in first-seen order", () => {
    const groups = groupBy(["apple", "avocado", "banana", "apricot"], (word) => word[0]);
    expect(Array.from(groups.keys())).toEqual(["a", "b"]);
    expect(groups.get("a")).toEqual(["apple", "avocado", "apricot"]);
  });

  it("orders value counts by frequency with ties in first-seen order", () => {
    expect(valueCounts([3, 5, 5, 0, 3, 7])).toEqual([
      { value: 3, count: 2 },
      { value: 5, count: 2 },
      { value: 0, count: 1 },
      { value: 7, count: 1 },
    ]);
  });
});

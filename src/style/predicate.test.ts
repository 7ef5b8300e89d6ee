import { describe, it, expect } from "vitest";
import { evaluatePredicate, predicateInterval, isEmptyInterval, formatInterval, describePredicate } from "./predicate.js";
import type { Predicate } from "../types.js";

const between: Predicate = {
  type: "and",
  left: { type: "greater_or_equal", threshold: 50000 },
  right: { type: "less_than", threshold: 250000 },
};

const contradictory: Predicate = {
  type: "and",
  left: { type: "greater_or_equal", threshold: 50000 },
  right: { type: "less_than", threshold: 25000 },
};

describe("evaluatePredicate", () => {
  it("greater_or_equal includes the threshold", () => {
    const p: Predicate = { type: "greater_or_equal", threshold: 10 };
    expect(evaluatePredicate(p, 10)).toBe(true);
    expect(evaluatePredicate(p, 9.999)).toBe(false);
  });

  it("less_than excludes the threshold", () => {
    const p: Predicate = { type: "less_than", threshold: 10 };
    expect(evaluatePredicate(p, 10)).toBe(false);
    expect(evaluatePredicate(p, 9.999)).toBe(true);
  });

  it("and requires both sides", () => {
    expect(evaluatePredicate(between, 50000)).toBe(true);
    expect(evaluatePredicate(between, 250000)).toBe(false);
    expect(evaluatePredicate(between, 49999)).toBe(false);
  });

  it("never satisfies contradictory bounds", () => {
    for (const v of [0, 24999, 25000, 50000, 60000]) {
      expect(evaluatePredicate(contradictory, v)).toBe(false);
    }
  });

  it("uses floating point comparison", () => {
    expect(evaluatePredicate({ type: "less_than", threshold: 0.3 }, 0.1 + 0.2)).toBe(false);
  });
});

describe("predicateInterval", () => {
  it("reduces comparisons and conjunctions to one interval", () => {
    expect(predicateInterval({ type: "greater_or_equal", threshold: 5 })).toEqual({ lower: 5, upper: Infinity });
    expect(predicateInterval({ type: "less_than", threshold: 5 })).toEqual({ lower: -Infinity, upper: 5 });
    expect(predicateInterval(between)).toEqual({ lower: 50000, upper: 250000 });
  });

  it("detects empty conjunctions", () => {
    expect(isEmptyInterval(predicateInterval(contradictory))).toBe(true);
    expect(isEmptyInterval(predicateInterval(between))).toBe(false);
  });
});

describe("formatting", () => {
  it("formats half-open intervals", () => {
    expect(formatInterval({ lower: 25000, upper: 250000 })).toBe("[25000, 250000)");
    expect(formatInterval({ lower: -Infinity, upper: 0 })).toBe("[-∞, 0)");
    expect(formatInterval({ lower: 7, upper: Infinity })).toBe("[7, ∞)");
  });

  it("describes predicates against a property", () => {
    expect(describePredicate(contradictory, "number")).toBe("number >= 50000 AND number < 25000");
  });
});

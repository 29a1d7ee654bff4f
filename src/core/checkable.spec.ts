import { describe, it, expect } from "vitest";
import { check, passing, passingPercent, score, total } from "./checkable";
import { DegenerateTotalError } from "./errors";
import { createQuestion } from "./question";

describe("passingPercent", () => {
  it("should pass exactly at the threshold", () => {
    expect(passingPercent(9, 10, 90)).toBe(true);
    expect(passingPercent(1, 3, (100 * 1) / 3)).toBe(true);
    expect(passingPercent(2, 3, (100 * 2) / 3)).toBe(true);
  });

  it("should fail just below the threshold", () => {
    expect(passingPercent(8, 10, 81)).toBe(false);
  });

  it("should refuse a zero total", () => {
    expect(() => passingPercent(0, 0, 50)).toThrow(DegenerateTotalError);
  });
});

describe("checkable helpers", () => {
  it("should dispatch to the checkable", () => {
    const q = createQuestion("Why?", "Why not?");
    expect(check(q, "Why not?")).toEqual({ score: 1, total: 1, passing: true });
    expect(score(q)).toBe(1);
    expect(total(q)).toBe(1);
    expect(passing(q)).toBe(true);
  });
});

import { DegenerateTotalError } from "./errors";
import type { CheckResult } from "./types";

/**
 * Anything that takes part in scoring. Questions and quizzes both implement
 * it, so a quiz aggregates by applying the same four operations to its parts.
 */
export interface Checkable<R> {
  check(response: R): CheckResult;
  /** Throws UncheckedAccessError before `check`. */
  currentScore(): number;
  total(): number;
  /** Throws UncheckedAccessError before `check`, DegenerateTotalError when total is 0. */
  isPassing(): boolean;
}

export function check<R>(obj: Checkable<R>, response: R): CheckResult {
  return obj.check(response);
}

export function score(obj: Checkable<unknown>): number {
  return obj.currentScore();
}

export function total(obj: Checkable<unknown>): number {
  return obj.total();
}

export function passing(obj: Checkable<unknown>): boolean {
  return obj.isPassing();
}

export function passingPercent(score: number, total: number, threshold: number): boolean {
  if (total === 0) throw new DegenerateTotalError();
  return (100 * score) / total >= threshold;
}

export function resultOf(obj: Checkable<unknown>): CheckResult {
  return { score: obj.currentScore(), total: obj.total(), passing: obj.isPassing() };
}

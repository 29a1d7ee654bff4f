import { FUZZY } from "./config";
import { bestVariantSimilarity } from "./utils";
import type { Answer, Response, ScoreFn } from "./types";

/** Flattens a response into the list of values the user gave. */
export function responseValues(response: Response): string[] {
  if (response === undefined) return [];
  if (typeof response === "string") return [response];
  return response.slice();
}

function singleValue(response: Response): string | undefined {
  const values = responseValues(response);
  return values.length === 1 ? values[0] : undefined;
}

/** Full credit when the response is exactly one of the accepted values. */
export const exactMatch: ScoreFn = (answer, response) => {
  const value = singleValue(response);
  return value !== undefined && answer.includes(value) ? 1 : 0;
};

/** Full credit when the selected choices are exactly the accepted ones. */
export const choiceMatch: ScoreFn = (answer, response) => {
  const chosen = new Set(responseValues(response));
  if (chosen.size !== answer.length) return 0;
  return answer.every((a) => chosen.has(a)) ? 1 : 0;
};

/** Fuzzy text scoring: full credit above `acceptFullAt`, linear partial credit down to `acceptPartialAt`. */
export const similarityMatch: ScoreFn = (answer: Answer, response: Response) => {
  const value = singleValue(response);
  if (!value) return 0;
  const sim = bestVariantSimilarity(value, answer);
  if (sim >= FUZZY.acceptFullAt) return 1;
  if (sim >= FUZZY.acceptPartialAt) {
    const t = (sim - FUZZY.acceptPartialAt) / (FUZZY.acceptFullAt - FUZZY.acceptPartialAt);
    return Math.round(t * 100) / 100;
  }
  return 0;
};

/** Scales a scorer's fraction to `points`, clamped into [0, points]. */
export function pointsFor(fraction: number, points: number): number {
  if (!Number.isFinite(fraction)) return 0;
  const clamped = Math.max(0, Math.min(1, fraction));
  return Math.round(clamped * points * 100) / 100;
}

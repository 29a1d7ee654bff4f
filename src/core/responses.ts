import { QUIZ_DEFAULTS } from "./config";
import { questionId } from "./quiz";
import type { Response } from "./types";

/** Submitted form fields as the transport layer hands them over. */
export type FormFields = Readonly<Record<string, string | readonly string[] | undefined>>;

function countFrom(form: FormFields): number | undefined {
  const raw = form[QUIZ_DEFAULTS.COUNT_FIELD];
  const value = typeof raw === "string" ? raw : raw?.[0];
  if (typeof value !== "string") return undefined;
  const n = Number.parseInt(value, 10);
  return Number.isFinite(n) && n >= 0 ? n : undefined;
}

/**
 * Collects responses by position from `q0`, `q1`, ... fields. The count comes
 * from the argument, else the form's `count` field, else the run of
 * consecutive `q{i}` fields present. Absent fields become `undefined`.
 */
export function responsesFromForm(form: FormFields, count?: number): Response[] {
  let n = count ?? countFrom(form);
  if (n === undefined) {
    n = 0;
    while (questionId(n) in form) n++;
  }
  return Array.from({ length: n }, (_, i) => form[questionId(i)]);
}


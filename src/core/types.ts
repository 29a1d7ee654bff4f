import type { Term } from "./vocabulary";

/** A user's response to one question: typed text, one choice, or several checked boxes. */
export type Response = string | readonly string[] | undefined;

/** Accepted values for a question. Plain and single-selection questions hold exactly one. */
export type Answer = readonly string[];

/** Returns the fraction of credit earned, expected in [0, 1]. */
export type ScoreFn = (answer: Answer, response: Response) => number;

export type TermFilter = (term: Term) => boolean;

/** Which side of the answer term is shown as the prompt. */
export type TermSide = "front" | "back";

export type SelectionCategory = "one selection" | "multiple selections";

export type ChoiceSettings = {
  termFilter: TermFilter;
  numChoices: number;
  termSide: TermSide;
};

export type FieldType = "text" | "radio" | "checkbox";

export type FieldVerdict =
  | "chosen-right" // you chose this (right)
  | "chosen-wrong" // you chose this (wrong)
  | "missed-correct" // unselected correct answer
  | "unchosen";

export type FieldState =
  | { status: "editable" }
  | { status: "checked"; verdict: FieldVerdict; expected?: string };

export type Field = {
  name: string;
  type: FieldType;
  label?: string;
  value?: string;
  state: FieldState;
};

export type CheckResult = { score: number; total: number; passing: boolean };

export type ResultSummary = CheckResult & {
  source: string;
  name: string;
  threshold: number;
  /** decimal string of the completion code, present only when passing */
  code?: string;
};

export type ResultSink = (summary: ResultSummary) => void;

import { QUIZ_DEFAULTS } from "./config";
import { AlreadyCheckedError, DegenerateTotalError, UncheckedAccessError } from "./errors";
import { choiceFields, textField } from "./field";
import { choiceMatch, exactMatch, pointsFor } from "./scoring";
import { passingPercent, resultOf, type Checkable } from "./checkable";
import { shuffleRng, type RNG } from "./utils";
import type { Vocabulary } from "./vocabulary";
import type {
  Answer,
  CheckResult,
  ChoiceSettings,
  Field,
  Response,
  ScoreFn,
  SelectionCategory,
} from "./types";

/** What every question carries, whatever its kind. */
export type QuestionCore = {
  prompt: string;
  answer: Answer;
  points: number;
  threshold: number;
  /** sampling source for "more of the same"; not owned */
  vocabulary?: Vocabulary;
  settings?: ChoiceSettings;
  scoreFn: ScoreFn;
};

export type QuestionVariant =
  | { kind: "Question" }
  | { kind: "MultipleChoice"; choices: readonly string[]; category: SelectionCategory };

export type QuestionKind = QuestionVariant["kind"];

export type QuestionOptions = Partial<
  Pick<QuestionCore, "points" | "threshold" | "vocabulary" | "settings" | "scoreFn">
>;

export type MultipleChoiceOptions = QuestionOptions & {
  /** accepted choices; defaults to the first choice */
  answer?: readonly string[];
  category?: SelectionCategory;
};

export class Question implements Checkable<Response> {
  private scored: { response: Response; score: number } | null = null;
  private cachedFields: Field[] | null = null;

  constructor(
    readonly core: QuestionCore,
    private variantValue: QuestionVariant,
    private idValue = ""
  ) {}

  get id(): string {
    return this.idValue;
  }

  get kind(): QuestionKind {
    return this.variantValue.kind;
  }

  get variant(): QuestionVariant {
    return this.variantValue;
  }

  get prompt(): string {
    return this.core.prompt;
  }

  get answer(): Answer {
    return this.core.answer;
  }

  /** Choices in display order; empty for plain questions. */
  get choices(): readonly string[] {
    return this.variantValue.kind === "MultipleChoice" ? this.variantValue.choices : [];
  }

  get checked(): boolean {
    return this.scored !== null;
  }

  get response(): Response {
    return this.scored?.response;
  }

  assignId(id: string): void {
    this.idValue = id;
    this.cachedFields = null;
  }

  /** Permutes display order only; the accepted answer is untouched. */
  shuffleChoices(rng: RNG): void {
    if (this.variantValue.kind !== "MultipleChoice") return;
    this.variantValue = { ...this.variantValue, choices: shuffleRng(this.variantValue.choices, rng) };
    this.cachedFields = null;
  }

  check(response: Response): CheckResult {
    if (this.scored) throw new AlreadyCheckedError(`Question "${this.prompt}"`);
    if (this.total() === 0) throw new DegenerateTotalError();
    this.grade(response);
    return resultOf(this);
  }

  /** Records the score for `response` without evaluating passing. */
  grade(response: Response): number {
    if (this.scored) throw new AlreadyCheckedError(`Question "${this.prompt}"`);
    const score = pointsFor(this.core.scoreFn(this.core.answer, response), this.core.points);
    this.scored = { response, score };
    this.cachedFields = null;
    return score;
  }

  currentScore(): number {
    if (!this.scored) throw new UncheckedAccessError(`Question "${this.prompt}"`);
    return this.scored.score;
  }

  total(): number {
    return this.core.points;
  }

  isPassing(): boolean {
    return passingPercent(this.currentScore(), this.total(), this.core.threshold);
  }

  fields(): readonly Field[] {
    if (!this.cachedFields) this.cachedFields = this.buildFields();
    return this.cachedFields;
  }

  private buildFields(): Field[] {
    const variant = this.variantValue;
    const checked = this.scored
      ? {
          response: this.scored.response,
          answer: this.core.answer,
          earnedFull: this.scored.score >= this.core.points,
        }
      : undefined;
    if (variant.kind === "MultipleChoice") {
      return choiceFields(this.id, variant.choices, variant.category, checked);
    }
    return [textField(this.id, checked)];
  }

  /** Fresh, unchecked question with the same content and display order. */
  copy(): Question {
    return new Question(this.core, this.variantValue, this.idValue);
  }
}

export function createQuestion(prompt: string, answer: string, options: QuestionOptions = {}): Question {
  return new Question(
    {
      prompt,
      answer: [answer],
      points: options.points ?? QUIZ_DEFAULTS.POINTS,
      threshold: options.threshold ?? QUIZ_DEFAULTS.QUESTION_THRESHOLD,
      vocabulary: options.vocabulary,
      settings: options.settings,
      scoreFn: options.scoreFn ?? exactMatch,
    },
    { kind: "Question" }
  );
}

export function createMultipleChoice(
  prompt: string,
  choices: readonly string[],
  options: MultipleChoiceOptions = {}
): Question {
  const answer = options.answer ?? choices.slice(0, 1);
  const category = options.category ?? (answer.length > 1 ? "multiple selections" : "one selection");
  return new Question(
    {
      prompt,
      answer,
      points: options.points ?? QUIZ_DEFAULTS.POINTS,
      threshold: options.threshold ?? QUIZ_DEFAULTS.QUESTION_THRESHOLD,
      vocabulary: options.vocabulary,
      settings: options.settings,
      scoreFn: options.scoreFn ?? choiceMatch,
    },
    { kind: "MultipleChoice", choices: choices.slice(), category }
  );
}

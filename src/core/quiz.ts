import { CODE_GENERATION, QUIZ_DEFAULTS } from "./config";
import { AlreadyCheckedError, CodeGenerationExhaustedError, DegenerateTotalError, UncheckedAccessError } from "./errors";
import { passingPercent, resultOf, type Checkable } from "./checkable";
import { silentLogger, type Logger } from "./logger";
import { randomBits, shuffleRng, type RNG } from "./utils";
import { Vocabulary, type Term } from "./vocabulary";
import type { Question, QuestionKind } from "./question";
import type { CheckResult, Response, ResultSummary, ScoreFn } from "./types";

/** Accepts or rejects a candidate completion code. */
export type CodePredicate = (code: bigint) => boolean;

export type QuizContext = { vocabulary: Vocabulary; rng: RNG };

/**
 * The behavior of a quiz, looked up again by `source` after the quiz has
 * crossed a request boundary. Only data travels in the serialized state.
 */
export interface QuizDefinition {
  source: string;
  name: string;
  url?: string;
  /** passing percent, defaults to QUIZ_DEFAULTS.THRESHOLD */
  threshold?: number;
  shuffle?: boolean;
  codeFilter?: CodePredicate;
  /** scorers re-attached to decoded questions, by kind */
  scoring?: Partial<Record<QuestionKind, ScoreFn>>;
  terms?(): readonly Term[];
  questions(context: QuizContext): readonly Question[];
}

export type CodeOptions = { rng?: RNG; maxAttempts?: number; logger?: Logger };

export const acceptAnyCode: CodePredicate = () => true;

export function reduceCode(value: bigint): bigint {
  return value % CODE_GENERATION.MODULUS;
}

/**
 * Rejection sampling: draws random 128-bit values until one reduces to a code
 * the predicate accepts. Gives up after `maxAttempts` draws.
 */
export function generateCode(predicate: CodePredicate, options: CodeOptions = {}): bigint {
  const rng = options.rng ?? Math.random;
  const maxAttempts = options.maxAttempts ?? CODE_GENERATION.MAX_ATTEMPTS;
  const logger = options.logger ?? silentLogger;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const code = reduceCode(randomBits(rng, CODE_GENERATION.RANDOM_BITS));
    if (predicate(code)) {
      logger.debug("completion code accepted", { attempt });
      return code;
    }
  }
  throw new CodeGenerationExhaustedError(maxAttempts);
}

export function vocabularyFor(definition: QuizDefinition): Vocabulary {
  return new Vocabulary(definition.name, definition.terms?.() ?? []);
}

export function questionId(index: number): string {
  return `${QUIZ_DEFAULTS.FIELD_PREFIX}${index}`;
}

export class Quiz implements Checkable<readonly Response[]> {
  private checkedValue = false;

  private constructor(
    readonly definition: QuizDefinition,
    readonly vocabulary: Vocabulary,
    private items: Question[],
    private shuffledValue: boolean
  ) {
    this.assignIds();
  }

  /** Builds a fresh quiz from its definition, shuffling when the definition asks for it. */
  static generate(definition: QuizDefinition, options: { rng?: RNG } = {}): Quiz {
    const rng = options.rng ?? Math.random;
    const vocabulary = vocabularyFor(definition);
    const quiz = new Quiz(definition, vocabulary, [...definition.questions({ vocabulary, rng })], false);
    if (definition.shuffle) quiz.shuffle(rng);
    return quiz;
  }

  /** Reassembles a quiz from already-built questions, keeping their order. */
  static restore(definition: QuizDefinition, questions: readonly Question[], vocabulary?: Vocabulary): Quiz {
    return new Quiz(definition, vocabulary ?? vocabularyFor(definition), [...questions], false);
  }

  get source(): string {
    return this.definition.source;
  }

  get name(): string {
    return this.definition.name;
  }

  get threshold(): number {
    return this.definition.threshold ?? QUIZ_DEFAULTS.THRESHOLD;
  }

  get checked(): boolean {
    return this.checkedValue;
  }

  get shuffled(): boolean {
    return this.shuffledValue;
  }

  get questions(): readonly Question[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<Question> {
    return this.items[Symbol.iterator]();
  }

  /** Checks each question against the response at its position; missing responses count as no answer. */
  check(responses: readonly Response[]): CheckResult {
    if (this.checkedValue) throw new AlreadyCheckedError(`Quiz "${this.name}"`);
    if (this.total() === 0) throw new DegenerateTotalError();
    this.items.forEach((q, i) => q.grade(responses[i]));
    this.checkedValue = true;
    return resultOf(this);
  }

  currentScore(): number {
    if (!this.checkedValue) throw new UncheckedAccessError(`Quiz "${this.name}"`);
    return this.items.reduce((sum, q) => sum + q.currentScore(), 0);
  }

  total(): number {
    return this.items.reduce((sum, q) => sum + q.total(), 0);
  }

  isPassing(): boolean {
    return passingPercent(this.currentScore(), this.total(), this.threshold);
  }

  /** Permutes question order and each question's choices, then renumbers. */
  shuffle(rng: RNG = Math.random): void {
    this.items = shuffleRng(this.items, rng);
    for (const q of this.items) q.shuffleChoices(rng);
    this.assignIds();
    this.shuffledValue = true;
  }

  generateCode(options: CodeOptions = {}): bigint {
    return generateCode(this.definition.codeFilter ?? acceptAnyCode, options);
  }

  /** Summary for the result sink; a code is issued only to a passing quiz. */
  result(options: CodeOptions = {}): ResultSummary {
    const { score, total, passing } = resultOf(this);
    const summary: ResultSummary = {
      source: this.source,
      name: this.name,
      score,
      total,
      passing,
      threshold: this.threshold,
    };
    if (passing) summary.code = this.generateCode(options).toString();
    return summary;
  }

  /** Unchecked copy with the same questions in the same order. */
  copy(): Quiz {
    return new Quiz(
      this.definition,
      this.vocabulary,
      this.items.map((q) => q.copy()),
      this.shuffledValue
    );
  }

  private assignIds(): void {
    this.items.forEach((q, i) => q.assignId(questionId(i)));
  }
}

/**
 * Typed failures raised by the quiz engine. None of them is retried:
 * each points at bad caller data (a source, a state payload) or at
 * configuration (a code predicate, a threshold) that has to be fixed upstream.
 */

export type QuizErrorCode =
  | "UNCHECKED"
  | "ALREADY_CHECKED"
  | "EMPTY_POOL"
  | "CODE_EXHAUSTED"
  | "MALFORMED_SOURCE"
  | "UNKNOWN_QUESTION_KIND"
  | "DEGENERATE_TOTAL"
  | "INVALID_TERM"
  | "MALFORMED_STATE"
  | "UNKNOWN_SOURCE"
  | "INVALID_CONFIG";

export class QuizError extends Error {
  constructor(
    readonly code: QuizErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UncheckedAccessError extends QuizError {
  constructor(what: string) {
    super("UNCHECKED", `${what} has not yet been checked.`);
  }
}

export class AlreadyCheckedError extends QuizError {
  constructor(what: string) {
    super("ALREADY_CHECKED", `${what} has already been checked.`);
  }
}

export class EmptyPoolError extends QuizError {
  constructor(vocabulary: string) {
    super("EMPTY_POOL", `No terms in vocabulary "${vocabulary}" pass the term filter.`);
  }
}

export class CodeGenerationExhaustedError extends QuizError {
  constructor(readonly attempts: number) {
    super("CODE_EXHAUSTED", `No completion code accepted after ${attempts} attempts.`);
  }
}

export class MalformedSourceError extends QuizError {
  constructor(
    readonly line: number,
    readonly path: string
  ) {
    super("MALFORMED_SOURCE", `Line ${line} in ${path} not a supported format.`);
  }
}

export class UnknownQuestionKindError extends QuizError {
  constructor(readonly kind: string) {
    super("UNKNOWN_QUESTION_KIND", `Unknown question kind "${kind}".`);
  }
}

export class DegenerateTotalError extends QuizError {
  constructor() {
    super("DEGENERATE_TOTAL", "Cannot evaluate passing: total points is 0.");
  }
}

export class InvalidTermError extends QuizError {
  constructor(index: number) {
    super("INVALID_TERM", `Non-Term instance found at index ${index} of vocabulary.`);
  }
}

export class MalformedStateError extends QuizError {
  constructor(detail: string) {
    super("MALFORMED_STATE", `Malformed quiz state: ${detail}`);
  }
}

export class UnknownSourceError extends QuizError {
  constructor(readonly source: string) {
    super("UNKNOWN_SOURCE", `No quiz registered for source "${source}".`);
  }
}

export class InvalidConfigError extends QuizError {
  constructor(detail: string) {
    super("INVALID_CONFIG", `Invalid quiz registry config: ${detail}`);
  }
}

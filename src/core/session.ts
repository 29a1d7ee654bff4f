import { QUIZ_DEFAULTS } from "./config";
import { decodeQuiz, encodeQuiz, fromStateToken, toStateToken, type CodecOptions } from "./codec";
import { MalformedStateError } from "./errors";
import { silentLogger } from "./logger";
import { Quiz, type CodeOptions } from "./quiz";
import { responsesFromForm, type FormFields } from "./responses";
import type { Registry } from "./registry";
import type { ResultSink, ResultSummary } from "./types";
import type { RNG } from "./utils";

export type StartedQuiz = { quiz: Quiz; state: string };

export type Submission = { quiz: Quiz; result: ResultSummary; state: string };

export type SubmitOptions = CodeOptions & { sink?: ResultSink; codec?: CodecOptions };

/** First request: generate the quiz and the state token that will come back with the answers. */
export function startQuiz(
  registry: Registry,
  source: string,
  options: { rng?: RNG; codec?: CodecOptions } = {}
): StartedQuiz {
  const quiz = Quiz.generate(registry.resolve(source), { rng: options.rng });
  return { quiz, state: toStateToken(encodeQuiz(quiz, options.codec)) };
}

/** The state token a rendered quiz page posts back, if any. */
export function stateFromForm(form: FormFields): string | undefined {
  const raw = form[QUIZ_DEFAULTS.STATE_FIELD];
  return typeof raw === "string" ? raw : raw?.[0];
}

/**
 * Second request: restore the quiz from its state, check the positional
 * responses, issue a code when passing and hand the summary to the sink.
 */
export function submitQuiz(
  registry: Registry,
  state: string | undefined,
  form: FormFields,
  options: SubmitOptions = {}
): Submission {
  const logger = options.logger ?? silentLogger;
  if (!state) throw new MalformedStateError("missing state");

  let quiz: Quiz;
  try {
    quiz = decodeQuiz(fromStateToken(state), (source) => registry.resolve(source), options.codec);
  } catch (e) {
    logger.error("could not restore quiz state", e);
    throw e;
  }

  quiz.check(responsesFromForm(form, quiz.length));
  const result = quiz.result({ rng: options.rng, maxAttempts: options.maxAttempts, logger });
  logger.info("quiz checked", { source: result.source, score: result.score, total: result.total, passing: result.passing });
  options.sink?.(result);
  return { quiz, result, state: toStateToken(encodeQuiz(quiz, options.codec)) };
}

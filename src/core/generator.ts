import { QUIZ_DEFAULTS } from "./config";
import { EmptyPoolError } from "./errors";
import { createMultipleChoice, type Question } from "./question";
import { pickOne, shuffleRng, type RNG } from "./utils";
import type { Term, Vocabulary } from "./vocabulary";
import type { ChoiceSettings, TermFilter, TermSide } from "./types";

export type GenerateOptions = Partial<ChoiceSettings> & {
  /** pin the answer term instead of drawing one */
  term?: Term;
};

export const acceptAllTerms: TermFilter = () => true;

export function oppositeSide(side: TermSide): TermSide {
  return side === "front" ? "back" : "front";
}

/**
 * Builds a multiple-choice question from a vocabulary.
 *
 * The prompt is one side of the answer term and the correct choice its other
 * side. Up to `numChoices` distractors are drawn without replacement from the
 * remaining filtered terms; a small pool yields fewer distractors, never an
 * error and never a repeated choice. Choices come back shuffled, while the
 * accepted answer is fixed here.
 */
export function multipleChoiceFromVocabulary(
  vocabulary: Vocabulary,
  options: GenerateOptions = {},
  rng: RNG = Math.random
): Question {
  const termFilter = options.termFilter ?? acceptAllTerms;
  const numChoices = options.numChoices ?? QUIZ_DEFAULTS.NUM_CHOICES;

  const pool = vocabulary.terms.filter(termFilter);
  if (pool.length === 0) throw new EmptyPoolError(vocabulary.name);

  const termSide: TermSide = options.termSide ?? (rng() < 0.5 ? "front" : "back");
  const answerSide = oppositeSide(termSide);
  const answerTerm = options.term ?? pickOne(pool, rng);

  const correct = answerTerm.side(answerSide);
  const choices = [correct];
  const seen = new Set(choices);

  const wanted = Math.min(numChoices, pool.length - 1);
  const remaining = pool.filter((t) => !t.equals(answerTerm));
  while (choices.length - 1 < wanted && remaining.length > 0) {
    const [term] = remaining.splice(Math.floor(rng() * remaining.length), 1);
    const text = term.side(answerSide);
    if (seen.has(text)) continue;
    seen.add(text);
    choices.push(text);
  }

  return createMultipleChoice(answerTerm.side(termSide), shuffleRng(choices, rng), {
    answer: [correct],
    category: "one selection",
    vocabulary,
    settings: { termFilter, numChoices, termSide },
  });
}

/** "More of the same": regenerate from the question's vocabulary and settings, or copy it. */
export function repeatQuestion(question: Question, n: number, rng: RNG = Math.random): Question[] {
  const { vocabulary, settings } = question.core;
  return Array.from({ length: Math.max(0, n) }, () =>
    vocabulary && settings
      ? multipleChoiceFromVocabulary(vocabulary, settings, rng)
      : question.copy()
  );
}

import { describe, it, expect } from "vitest";
import { Quiz } from "../core/quiz";
import { makeRNG } from "../core/utils";
import { SAMPLE_QUIZ } from "./sampleQuizzes";

describe("SAMPLE_QUIZ", () => {
  const quiz = Quiz.generate(SAMPLE_QUIZ, { rng: makeRNG("sample") });
  const fronts = quiz.vocabulary.terms.map((t) => t.front);
  const backs = quiz.vocabulary.terms.map((t) => t.back);

  it("should ask five multiple choice questions", () => {
    expect(quiz.length).toBe(5);
    expect(quiz.questions.every((q) => q.kind === "MultipleChoice")).toBe(true);
  });

  it("should prompt with descriptions and answer with names", () => {
    for (const q of quiz.questions) {
      expect(backs).toContain(q.prompt);
      expect(fronts).toContain(q.answer[0]);
      expect(q.choices).toHaveLength(6);
      expect(q.choices).toContain(q.answer[0]);
    }
  });

  it("should accept codes congruent to 2 mod 35", () => {
    expect(SAMPLE_QUIZ.codeFilter?.(37n)).toBe(true);
    expect(SAMPLE_QUIZ.codeFilter?.(36n)).toBe(false);
  });
});

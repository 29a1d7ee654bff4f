import { repeatQuestion } from "../core/generator";
import { Term } from "../core/vocabulary";
import type { QuizDefinition } from "../core/quiz";

/** Version-control hosting vocabulary: five multiple-choice questions prompting with the description. */
export const SAMPLE_QUIZ: QuizDefinition = {
  source: "sample",
  name: "SampleQuiz",
  url: "/sample",
  threshold: 80,
  codeFilter: (code) => code % 35n === 2n,
  terms: () => [
    new Term("Github", "Hosting service acquired by Microsoft in 2018"),
    new Term("Bitbucket", "Atlassian's hosting service for Git repositories"),
    new Term("Git", "Distributed version control system written for the Linux kernel"),
    new Term("Gitorious", "Open source Git hosting merged into GitLab in 2015"),
    new Term("Gitlab", "Self-hostable DevOps platform built around Git"),
    new Term("Mercurial", "Distributed version control system invoked as hg"),
  ],
  questions: ({ vocabulary, rng }) =>
    repeatQuestion(vocabulary.multipleChoice({ termSide: "back" }, rng), 5, rng),
};

export const SAMPLE_DEFINITIONS: readonly QuizDefinition[] = [SAMPLE_QUIZ];

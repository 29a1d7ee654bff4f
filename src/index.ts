export * from "./core/types";
export * from "./core/errors";
export { ConsoleLogger, silentLogger, type Logger, type LogLevel } from "./core/logger";
export { makeRNG, shuffleRng, type RNG } from "./core/utils";
export { Term, Vocabulary } from "./core/vocabulary";
export { check, score, total, passing, passingPercent, type Checkable } from "./core/checkable";
export { exactMatch, choiceMatch, similarityMatch } from "./core/scoring";
export {
  Question,
  createQuestion,
  createMultipleChoice,
  type QuestionCore,
  type QuestionVariant,
  type QuestionKind,
} from "./core/question";
export { multipleChoiceFromVocabulary, repeatQuestion, acceptAllTerms, type GenerateOptions } from "./core/generator";
export { Quiz, generateCode, acceptAnyCode, type QuizDefinition, type CodePredicate } from "./core/quiz";
export { parseQuizMarkdown, markdownDefinition, renderInline } from "./core/markdown";
export {
  encodeQuiz,
  decodeQuiz,
  toStateToken,
  fromStateToken,
  plainAnswers,
  type AnswerCipher,
  type SerializedQuiz,
} from "./core/codec";
export { responsesFromForm, type FormFields } from "./core/responses";
export { Registry, loadRegistry, parseRegistryConfig } from "./core/registry";
export { loadQuizBank } from "./core/bank";
export { startQuiz, submitQuiz, stateFromForm } from "./core/session";
export { renderQuizPage } from "./render";
export { SAMPLE_QUIZ } from "./samples/sampleQuizzes";

import { z } from "zod";
import { QUIZ_DEFAULTS } from "./config";
import { MalformedStateError, UnknownQuestionKindError } from "./errors";
import { createMultipleChoice, createQuestion, type Question, type QuestionKind } from "./question";
import { Quiz, vocabularyFor, type QuizDefinition } from "./quiz";
import type { Vocabulary } from "./vocabulary";

/** Joins the accepted choices of a multiple-selection question in its `answer` field. */
export const ANSWER_SEPARATOR = "\n";

export const selectionCategorySchema = z.enum(["one selection", "multiple selections"]);

const gradingFields = {
  points: z.number().finite().nonnegative().optional(),
  threshold: z.number().min(0).max(100).optional(),
};

export const plainQuestionRecordSchema = z
  .object({
    class: z.literal("Question"),
    question: z.string(),
    answer: z.string(),
    ...gradingFields,
  })
  .strict();

export const multipleChoiceRecordSchema = z
  .object({
    class: z.literal("MultipleChoice"),
    question: z.string(),
    answer: z.string(),
    choices: z.array(z.string()).min(1),
    category: selectionCategorySchema.optional(),
    ...gradingFields,
  })
  .strict();

export const questionRecordSchema = z.discriminatedUnion("class", [
  plainQuestionRecordSchema,
  multipleChoiceRecordSchema,
]);

const QUESTION_KINDS: ReadonlySet<string> = new Set(["Question", "MultipleChoice"] satisfies QuestionKind[]);

/** Just enough shape to name an unsupported record before full validation. */
const recordKindsSchema = z.object({
  questions: z.array(z.object({ class: z.string() })),
});

export const serializedQuizSchema = z.object({
  source: z.string().min(1),
  questions: z.array(questionRecordSchema),
});

export type QuestionRecord = z.infer<typeof questionRecordSchema>;
export type MultipleChoiceRecord = z.infer<typeof multipleChoiceRecordSchema>;
export type SerializedQuiz = z.infer<typeof serializedQuizSchema>;

/**
 * Transforms answers on their way into the state payload and back out.
 * `open(seal(a))` must return `a`, and `seal` must be deterministic for
 * re-encoding to reproduce the same payload.
 */
export interface AnswerCipher {
  seal(answer: string): string;
  open(sealed: string): string;
}

export const plainAnswers: AnswerCipher = {
  seal: (answer) => answer,
  open: (sealed) => sealed,
};

export type CodecOptions = { answerCipher?: AnswerCipher };

/** Looks a source identifier up and returns the definition that re-attaches behavior. */
export type SourceResolver = (source: string) => QuizDefinition;

/** Points and threshold are written only when they differ from the defaults. */
function withGrading(record: QuestionRecord, q: Question): QuestionRecord {
  if (q.core.points !== QUIZ_DEFAULTS.POINTS) record.points = q.core.points;
  if (q.core.threshold !== QUIZ_DEFAULTS.QUESTION_THRESHOLD) record.threshold = q.core.threshold;
  return record;
}

function encodeQuestion(q: Question, cipher: AnswerCipher): QuestionRecord {
  const variant = q.variant;
  if (variant.kind === "MultipleChoice") {
    const record: MultipleChoiceRecord = {
      class: "MultipleChoice",
      question: q.prompt,
      answer: cipher.seal(q.answer.join(ANSWER_SEPARATOR)),
      choices: [...variant.choices],
    };
    if (variant.category === "multiple selections") record.category = variant.category;
    return withGrading(record, q);
  }
  return withGrading({ class: "Question", question: q.prompt, answer: cipher.seal(q.answer[0] ?? "") }, q);
}

export function toSerialized(quiz: Quiz, options: CodecOptions = {}): SerializedQuiz {
  const cipher = options.answerCipher ?? plainAnswers;
  return {
    source: quiz.source,
    questions: quiz.questions.map((q) => encodeQuestion(q, cipher)),
  };
}

export function encodeQuiz(quiz: Quiz, options: CodecOptions = {}): string {
  return JSON.stringify(toSerialized(quiz, options));
}

function decodeQuestion(
  record: QuestionRecord,
  definition: QuizDefinition,
  vocabulary: Vocabulary,
  cipher: AnswerCipher
): Question {
  const answer = cipher.open(record.answer);
  const grading = { points: record.points, threshold: record.threshold };
  if (record.class === "Question") {
    return createQuestion(record.question, answer, { ...grading, scoreFn: definition.scoring?.Question });
  }
  const category = record.category ?? "one selection";
  return createMultipleChoice(record.question, record.choices, {
    ...grading,
    answer: category === "multiple selections" ? answer.split(ANSWER_SEPARATOR) : [answer],
    category,
    vocabulary: vocabulary.size > 0 ? vocabulary : undefined,
    scoreFn: definition.scoring?.MultipleChoice,
  });
}

export function fromSerialized(data: SerializedQuiz, resolve: SourceResolver, options: CodecOptions = {}): Quiz {
  const cipher = options.answerCipher ?? plainAnswers;
  const definition = resolve(data.source);
  const vocabulary = vocabularyFor(definition);
  const questions = data.questions.map((r) => decodeQuestion(r, definition, vocabulary, cipher));
  return Quiz.restore(definition, questions, vocabulary);
}

/** Parses and validates a state payload, then rebuilds the quiz in its recorded order. */
export function decodeQuiz(payload: string, resolve: SourceResolver, options: CodecOptions = {}): Quiz {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (e) {
    throw new MalformedStateError(e instanceof Error ? e.message : String(e));
  }
  const kinds = recordKindsSchema.safeParse(raw);
  if (kinds.success) {
    const unsupported = kinds.data.questions.find((r) => !QUESTION_KINDS.has(r.class));
    if (unsupported) throw new UnknownQuestionKindError(unsupported.class);
  }
  const parsed = serializedQuizSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new MalformedStateError(detail);
  }
  return fromSerialized(parsed.data, resolve, options);
}

/** base64url wrapper so the state survives a hidden form field or a query string. */
export function toStateToken(payload: string): string {
  return Buffer.from(payload, "utf8").toString("base64url");
}

export function fromStateToken(token: string): string {
  return Buffer.from(token, "base64url").toString("utf8");
}

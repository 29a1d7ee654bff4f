import { QUIZ_DEFAULTS } from "../core/config";
import type { Quiz } from "../core/quiz";
import type { ResultSummary } from "../core/types";
import QuestionCard from "./QuestionCard";
import Results from "./Results";

type Props = {
  quiz: Quiz;
  /** state token posted back with the answers */
  state: string;
  action?: string;
  result?: ResultSummary;
};

export default function QuizPage({ quiz, state, action, result }: Props) {
  return (
    <main className="max-w-3xl mx-auto p-4">
      <h1 className="text-2xl font-semibold mb-4">{quiz.name}</h1>
      {result && <Results result={result} />}
      <form method="post" action={action ?? quiz.definition.url ?? ""}>
        <input type="hidden" name={QUIZ_DEFAULTS.STATE_FIELD} value={state} />
        <input type="hidden" name={QUIZ_DEFAULTS.COUNT_FIELD} value={String(quiz.length)} />
        {quiz.questions.map((q, i) => (
          <QuestionCard key={q.id} question={q} index={i} />
        ))}
        {!quiz.checked && (
          <button type="submit" className="px-4 py-2 rounded-xl bg-blue-600 text-white">
            Submit
          </button>
        )}
      </form>
    </main>
  );
}

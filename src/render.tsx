import { renderToStaticMarkup } from "react-dom/server";
import QuizPage from "./components/QuizPage";
import type { Quiz } from "./core/quiz";
import type { ResultSummary } from "./core/types";

export type RenderOptions = { state: string; action?: string; result?: ResultSummary };

/** Static HTML for a quiz page: the editable form before checking, verdicts and results after. */
export function renderQuizPage(quiz: Quiz, options: RenderOptions): string {
  return renderToStaticMarkup(<QuizPage quiz={quiz} state={options.state} action={options.action} result={options.result} />);
}

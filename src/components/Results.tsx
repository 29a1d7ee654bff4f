import type { ResultSummary } from "../core/types";
import Pill from "./Pill";
import ProgressBar from "./ProgressBar";

function percent(score: number, total: number): number {
  return total === 0 ? 0 : Math.round((score / total) * 1000) / 10;
}

export default function Results({ result }: { result: ResultSummary }) {
  return (
    <div className="results border rounded-xl p-4 mb-4">
      <div className="font-medium mb-2">
        Score: {result.score} / {result.total} ({percent(result.score, result.total)}%){" "}
        {result.passing ? <Pill tone="good">Passed</Pill> : <Pill tone="bad">Not passed</Pill>}
      </div>
      <ProgressBar value={result.score} max={result.total} passAt={result.threshold} />
      <p className="text-sm mt-2">Passing score: {result.threshold}%</p>
      {result.code !== undefined && (
        <p className="completion-code mt-2">
          Completion code: <code>{result.code}</code>
        </p>
      )}
    </div>
  );
}

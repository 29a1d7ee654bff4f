import { renderInline } from "../core/markdown";
import type { Question } from "../core/question";
import FieldView from "./FieldView";
import Pill from "./Pill";

function pointsLabel(points: number): string {
  return points === 1 ? "1 point" : `${points} points`;
}

const QuestionCard = ({ question, index }: { question: Question; index: number }) => {
  return (
    <div className="p-4 mb-4 rounded-lg shadow bg-blue-50" id={question.id}>
      <div className="mb-2 font-semibold text-gray-800">
        <span>{index + 1}. </span>
        <span dangerouslySetInnerHTML={{ __html: renderInline(question.prompt) }} />{" "}
        <Pill>{question.checked ? `${question.currentScore()} / ${pointsLabel(question.total())}` : pointsLabel(question.total())}</Pill>
      </div>
      <div>
        {question.fields().map((field, i) => (
          <FieldView key={`${field.name}-${i}`} field={field} />
        ))}
      </div>
    </div>
  );
};

export default QuestionCard;

import { renderInline } from "../core/markdown";
import type { Field, FieldVerdict } from "../core/types";
import Pill, { type PillTone } from "./Pill";

const VERDICTS: Record<FieldVerdict, { text: string; tone: PillTone } | null> = {
  "chosen-right": { text: "Your answer: correct", tone: "good" },
  "chosen-wrong": { text: "Your answer: incorrect", tone: "bad" },
  "missed-correct": { text: "Correct answer", tone: "info" },
  unchosen: null,
};

function Label({ text }: { text?: string }) {
  if (!text) return null;
  return <span className="font-medium" dangerouslySetInnerHTML={{ __html: renderInline(text) }} />;
}

/** An editable input before checking, a read-only verdict after. */
export default function FieldView({ field }: { field: Field }) {
  const { state } = field;

  if (state.status === "editable") {
    if (field.type === "text") {
      return (
        <p className="field">
          <input className="w-full border rounded-xl px-3 py-2" type="text" name={field.name} placeholder="Type your answer" />
        </p>
      );
    }
    return (
      <p className="field">
        <label className="flex items-center gap-2 cursor-pointer">
          <input type={field.type} name={field.name} value={field.value} />
          <Label text={field.label} />
        </label>
      </p>
    );
  }

  const verdict = VERDICTS[state.verdict];
  return (
    <p className={`field verdict-${state.verdict}`}>
      {field.type === "text" ? (
        <span className="font-medium">{field.value || "No answer"}</span>
      ) : (
        <Label text={field.label} />
      )}
      {verdict && (
        <>
          {" "}
          <Pill tone={verdict.tone}>{verdict.text}</Pill>
        </>
      )}
      {field.type === "text" && state.verdict === "chosen-wrong" && state.expected !== undefined && (
        <span className="expected"> Correct answer: {state.expected}</span>
      )}
    </p>
  );
}

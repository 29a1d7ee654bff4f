import type { Answer, Field, FieldVerdict, Response, SelectionCategory } from "./types";
import { responseValues } from "./scoring";

type Checked = { response: Response; answer: Answer; earnedFull: boolean };

/** A text box. Once checked it shows what was typed and the expected answer. */
export function textField(name: string, checked?: Checked): Field {
  if (!checked) return { name, type: "text", state: { status: "editable" } };
  const [typed] = responseValues(checked.response);
  return {
    name,
    type: "text",
    value: typed,
    state: {
      status: "checked",
      verdict: checked.earnedFull ? "chosen-right" : "chosen-wrong",
      expected: checked.answer[0],
    },
  };
}

export function choiceVerdict(selected: boolean, correct: boolean): FieldVerdict {
  if (selected) return correct ? "chosen-right" : "chosen-wrong";
  return correct ? "missed-correct" : "unchosen";
}

/** One radio (single selection) or checkbox (multiple selections) per choice, labelled by the choice text. */
export function choiceFields(
  name: string,
  choices: readonly string[],
  category: SelectionCategory,
  checked?: Omit<Checked, "earnedFull">
): Field[] {
  const type = category === "one selection" ? "radio" : "checkbox";
  const selected = new Set(responseValues(checked?.response));
  return choices.map((choice): Field => ({
    name,
    type,
    label: choice,
    value: choice,
    state: checked
      ? { status: "checked", verdict: choiceVerdict(selected.has(choice), checked.answer.includes(choice)) }
      : { status: "editable" },
  }));
}

import { describe, it, expect } from "vitest";
import { InvalidTermError } from "./errors";
import { Term, Vocabulary } from "./vocabulary";

describe("Term", () => {
  const term = new Term("Git", "Distributed version control");

  it("should index front and back like a pair", () => {
    expect(term.at(0)).toBe("Git");
    expect(term.at(1)).toBe("Distributed version control");
    expect(term.toTuple()).toEqual(["Git", "Distributed version control"]);
  });

  it("should pick a side by name", () => {
    expect(term.side("front")).toBe("Git");
    expect(term.side("back")).toBe("Distributed version control");
  });

  it("should be immutable", () => {
    expect(Object.isFrozen(term)).toBe(true);
  });

  it("should format as front: back", () => {
    expect(String(term)).toBe("Git: Distributed version control");
  });

  it("should compare by value", () => {
    expect(term.equals(new Term("Git", "Distributed version control"))).toBe(true);
    expect(term.equals(new Term("Git", "something else"))).toBe(false);
  });
});

describe("Vocabulary", () => {
  it("should build from pairs", () => {
    const vocab = Vocabulary.fromPairs("letters", [
      ["A", "1"],
      ["B", "2"],
    ]);
    expect(vocab.size).toBe(2);
    expect(vocab.terms[1].front).toBe("B");
    expect(vocab.toString()).toBe("A: 1\nB: 2");
  });

  it("should reject elements that are not terms", () => {
    expect(() => new Vocabulary("bad", [new Term("A", "1"), ["B", "2"]])).toThrow(InvalidTermError);
  });

  it("should not expose a mutable term list", () => {
    const vocab = Vocabulary.fromPairs("letters", [["A", "1"]]);
    expect(Object.isFrozen(vocab.terms)).toBe(true);
  });

  it("should generate multiple choice questions from itself", () => {
    const vocab = Vocabulary.fromPairs("letters", [
      ["A", "1"],
      ["B", "2"],
    ]);
    const q = vocab.multipleChoice({ termSide: "front", term: vocab.terms[0] });
    expect(q.kind).toBe("MultipleChoice");
    expect(q.prompt).toBe("A");
    expect(q.answer).toEqual(["1"]);
  });
});

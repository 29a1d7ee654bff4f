import { readFileSync } from "node:fs";
import { describe, it, expect } from "vitest";
import { MalformedSourceError } from "./errors";
import { markdownDefinition, parseQuizMarkdown, parseQuizSource, renderInline } from "./markdown";
import { Quiz } from "./quiz";

const GIT_BASICS = readFileSync(new URL("../samples/git-basics.md", import.meta.url), "utf8");

function lineOf(fn: () => unknown): number | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof MalformedSourceError) return e.line;
    throw e;
  }
  return undefined;
}

describe("parseQuizMarkdown", () => {
  it("should read prompts and their options", () => {
    const questions = parseQuizMarkdown(GIT_BASICS, "git-basics.md");
    expect(questions.map((q) => q.prompt)).toEqual([
      "Which command creates a new repository?",
      "Which command records staged changes?",
      "Name the default remote created by `git clone`.",
      "Which of these are distributed version control systems?",
    ]);
  });

  it("should accept the starred option of a multiple choice question", () => {
    const [, commit] = parseQuizMarkdown(GIT_BASICS, "git-basics.md");
    expect(commit.kind).toBe("MultipleChoice");
    expect(commit.choices).toEqual(["git add", "git commit", "git push"]);
    expect(commit.answer).toEqual(["git commit"]);
  });

  it("should turn a single option into a fill-in question", () => {
    const remote = parseQuizMarkdown(GIT_BASICS, "git-basics.md")[2];
    expect(remote.kind).toBe("Question");
    expect(remote.answer).toEqual(["origin"]);
  });

  it("should make several starred options a multiple-selection question", () => {
    const dvcs = parseQuizMarkdown(GIT_BASICS, "git-basics.md")[3];
    expect(dvcs.variant).toEqual({
      kind: "MultipleChoice",
      choices: ["Git", "Mercurial", "Subversion"],
      category: "multiple selections",
    });
    expect(dvcs.answer).toEqual(["Git", "Mercurial"]);
  });

  it("should accept the first option when none is starred", () => {
    const [q] = parseQuizMarkdown("Q: Pick\n- a\n- b", "pick.md");
    expect(q.answer).toEqual(["a"]);
  });

  it("should cite the 0-based line of an unsupported line", () => {
    expect(() => parseQuizMarkdown("Q: a\n- b\n! not a valid line", "quiz.md")).toThrow(MalformedSourceError);
    expect(lineOf(() => parseQuizMarkdown("Q: a\n- b\n! not a valid line", "quiz.md"))).toBe(2);
  });

  it("should count blank lines toward the line index", () => {
    expect(lineOf(() => parseQuizMarkdown("Q: a\n\n- b\n! not a valid line", "quiz.md"))).toBe(3);
  });

  it("should include the path in the error message", () => {
    expect(() => parseQuizMarkdown("! not a valid line", "quizzes/bad.md")).toThrow(
      "Line 0 in quizzes/bad.md not a supported format."
    );
  });

  it("should reject an option before any prompt", () => {
    expect(lineOf(() => parseQuizSource("- orphan\nQ: a\n- b", "quiz.md"))).toBe(0);
  });

  it("should reject a prompt without options", () => {
    expect(lineOf(() => parseQuizSource("Q: a\nQ: b\n- c", "quiz.md"))).toBe(0);
  });
});

describe("markdownDefinition", () => {
  it("should use the path as source and the file name as quiz name", () => {
    const def = markdownDefinition("quizzes/git-basics.md", GIT_BASICS);
    expect(def.source).toBe("quizzes/git-basics.md");
    expect(def.name).toBe("git-basics");
  });

  it("should build fresh questions for every quiz", () => {
    const def = markdownDefinition("git-basics.md", GIT_BASICS, { threshold: 75 });
    const first = Quiz.generate(def);
    const second = Quiz.generate(def);
    first.check([]);
    expect(second.questions[0].checked).toBe(false);
    expect(second.threshold).toBe(75);
  });

  it("should fail eagerly on a malformed source", () => {
    expect(() => markdownDefinition("bad.md", "nope")).toThrow(MalformedSourceError);
  });
});

describe("renderInline", () => {
  it("should render inline markdown without a wrapping paragraph", () => {
    expect(renderInline("**bold**")).toBe("<strong>bold</strong>");
    expect(renderInline("plain")).toBe("plain");
    expect(renderInline("`git clone`")).toBe("<code>git clone</code>");
  });
});

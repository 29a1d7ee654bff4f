import { marked } from "marked";
import { MalformedSourceError } from "./errors";
import { createMultipleChoice, createQuestion, type Question } from "./question";
import type { QuizDefinition } from "./quiz";

export type ParsedOption = { text: string; starred: boolean };
export type ParsedPrompt = { prompt: string; line: number; options: ParsedOption[] };

/**
 * Parses the markdown-like quiz format:
 *
 *   Q: What does `git init` create?
 *   * a repository
 *   - a branch
 *
 * Blank lines are skipped; any other line that is neither a `Q:` prompt nor a
 * `-`/`*` option is rejected with its 0-based line index.
 */
export function parseQuizSource(text: string, path: string): ParsedPrompt[] {
  const prompts: ParsedPrompt[] = [];
  let current: ParsedPrompt | null = null;

  text.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.trim();
    if (!line) return;
    if (line.startsWith("Q:")) {
      current = { prompt: line.slice(2).trim(), line: i, options: [] };
      prompts.push(current);
    } else if ((line[0] === "-" || line[0] === "*") && current) {
      current.options.push({ text: line.slice(1).trim(), starred: line[0] === "*" });
    } else {
      throw new MalformedSourceError(i, path);
    }
  });

  for (const p of prompts) {
    if (p.options.length === 0) throw new MalformedSourceError(p.line, path);
  }
  return prompts;
}

/** One option: a fill-in question. Several: multiple choice, starred options accepted (first option if none starred). */
export function questionFromPrompt(parsed: ParsedPrompt): Question {
  const { prompt, options } = parsed;
  if (options.length === 1) return createQuestion(prompt, options[0].text);
  const starred = options.filter((o) => o.starred).map((o) => o.text);
  return createMultipleChoice(
    prompt,
    options.map((o) => o.text),
    { answer: starred.length ? starred : [options[0].text] }
  );
}

export function parseQuizMarkdown(text: string, path: string): Question[] {
  return parseQuizSource(text, path).map(questionFromPrompt);
}

export type MarkdownQuizOptions = Partial<Pick<QuizDefinition, "name" | "url" | "threshold" | "shuffle" | "codeFilter">>;

function baseName(path: string): string {
  const file = path.split(/[\\/]/).pop() ?? path;
  return file.replace(/\.md$/i, "");
}

/** Wraps a markdown source as a quiz definition whose source identifier is its path. */
export function markdownDefinition(path: string, text: string, options: MarkdownQuizOptions = {}): QuizDefinition {
  const prompts = parseQuizSource(text, path);
  return {
    source: path,
    name: options.name ?? baseName(path),
    url: options.url,
    threshold: options.threshold,
    shuffle: options.shuffle,
    codeFilter: options.codeFilter,
    questions: () => prompts.map(questionFromPrompt),
  };
}

/** Renders inline markdown (prompts, choice labels) to HTML without the wrapping paragraph. */
export function renderInline(text: string): string {
  const html = marked.parse(text, { async: false });
  if (typeof html !== "string") throw new TypeError("marked returned a promise for a synchronous parse");
  const trimmed = html.trim();
  if (trimmed.startsWith("<p>") && trimmed.endsWith("</p>")) return trimmed.slice(3, -4);
  return trimmed;
}

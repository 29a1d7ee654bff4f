import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { loadQuizBank } from "./bank";
import { UnknownSourceError } from "./errors";
import { createQuestion } from "./question";
import type { Logger } from "./logger";

describe("loadQuizBank", () => {
  let dir: string;
  let logger: Logger;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "quiz-bank-"));
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should load built-in and markdown quizzes listed in the config", async () => {
    await mkdir(join(dir, "quizzes"));
    await writeFile(join(dir, "quizzes", "git.md"), "Q: Init?\n* git init\n- git add\n");
    await writeFile(
      join(dir, "quizzes.yml"),
      "quizzes:\n  - source: sample\n    threshold: 60\n  - source: quizzes/git.md\n    name: Git\n"
    );

    const registry = await loadQuizBank(join(dir, "quizzes.yml"), undefined, logger);

    expect(registry.sources()).toEqual(["sample", "quizzes/git.md"]);
    expect(registry.resolve("sample").threshold).toBe(60);
    expect(registry.resolve("quizzes/git.md").name).toBe("Git");
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("should fall back to the sample quizzes when the config is missing", async () => {
    const registry = await loadQuizBank(join(dir, "missing.yml"), undefined, logger);
    expect(registry.sources()).toEqual(["sample"]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("should fall back to the caller's built-in quizzes", async () => {
    const own = { source: "own", name: "Own", questions: () => [createQuestion("Why?", "Why not?")] };
    const registry = await loadQuizBank(join(dir, "missing.yml"), [own], logger);
    expect(registry.sources()).toEqual(["own"]);
  });

  it("should reject entries that are neither built in nor markdown", async () => {
    await writeFile(join(dir, "quizzes.yml"), "quizzes:\n  - source: nowhere\n");
    await expect(loadQuizBank(join(dir, "quizzes.yml"), [], logger)).rejects.toBeInstanceOf(UnknownSourceError);
  });

  it("should surface a missing markdown file", async () => {
    await writeFile(join(dir, "quizzes.yml"), "quizzes:\n  - source: gone.md\n");
    await expect(loadQuizBank(join(dir, "quizzes.yml"), [], logger)).rejects.toThrow(/ENOENT/);
  });
});

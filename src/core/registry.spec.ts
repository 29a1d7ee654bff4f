import { describe, it, expect, vi } from "vitest";
import { InvalidConfigError, UnknownSourceError } from "./errors";
import { createQuestion } from "./question";
import { loadRegistry, parseRegistryConfig, Registry } from "./registry";
import type { Logger } from "./logger";
import type { QuizDefinition } from "./quiz";

const WHY: QuizDefinition = {
  source: "why",
  name: "Why",
  url: "/why",
  questions: () => [createQuestion("Why?", "Why not?")],
};

function mockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("parseRegistryConfig", () => {
  it("should read quiz entries", () => {
    const config = parseRegistryConfig(
      ["quizzes:", "  - source: sample", "  - source: quizzes/git.md", "    url: /git", "    threshold: 75", "    shuffle: true"].join("\n")
    );
    expect(config.quizzes).toEqual([
      { source: "sample" },
      { source: "quizzes/git.md", url: "/git", threshold: 75, shuffle: true },
    ]);
  });

  it("should reject thresholds outside 0..100", () => {
    expect(() => parseRegistryConfig("quizzes:\n  - source: sample\n    threshold: 150")).toThrow(InvalidConfigError);
  });

  it("should reject a missing quiz list", () => {
    expect(() => parseRegistryConfig("other: 1")).toThrow(InvalidConfigError);
  });

  it("should reject invalid YAML", () => {
    expect(() => parseRegistryConfig("quizzes: [")).toThrow(InvalidConfigError);
  });
});

describe("loadRegistry", () => {
  it("should register definitions and markdown sources", () => {
    const logger = mockLogger();
    const registry = loadRegistry(
      { definitions: [WHY], markdown: [{ path: "git.md", text: "Q: Init?\n* git init\n- git add", options: { url: "/git" } }] },
      logger
    );
    expect(registry.sources()).toEqual(["why", "git.md"]);
    expect(registry.resolve("git.md").name).toBe("git");
    expect(registry.byUrl("/git")?.source).toBe("git.md");
    expect(logger.info).toHaveBeenCalledWith("quiz registry loaded", { sources: ["why", "git.md"] });
  });

  it("should fail on unknown sources only through resolve", () => {
    const registry = loadRegistry({ definitions: [WHY] });
    expect(registry.get("missing")).toBeUndefined();
    expect(registry.has("why")).toBe(true);
    expect(() => registry.resolve("missing")).toThrow(UnknownSourceError);
  });

  it("should reject duplicate sources", () => {
    expect(() => Registry.of([WHY, { ...WHY }])).toThrow(InvalidConfigError);
  });

  it("should hand out frozen definitions", () => {
    const registry = loadRegistry({ definitions: [WHY] });
    expect(Object.isFrozen(registry.resolve("why"))).toBe(true);
  });
});

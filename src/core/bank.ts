import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { UnknownSourceError } from "./errors";
import { silentLogger, type Logger } from "./logger";
import { loadRegistry, parseRegistryConfig, type MarkdownSource, type Registry, type RegistryEntry } from "./registry";
import type { QuizDefinition } from "./quiz";
import { SAMPLE_DEFINITIONS } from "../samples/sampleQuizzes";

function withOverrides(definition: QuizDefinition, entry: RegistryEntry): QuizDefinition {
  return {
    ...definition,
    name: entry.name ?? definition.name,
    url: entry.url ?? definition.url,
    threshold: entry.threshold ?? definition.threshold,
    shuffle: entry.shuffle ?? definition.shuffle,
  };
}

/**
 * Host-side startup: reads the YAML registry config and the markdown files it
 * lists (paths relative to the config file), and matches the other entries
 * against built-in definitions. Falls back to the sample quizzes when the
 * config itself cannot be read.
 */
export async function loadQuizBank(
  configPath: string,
  builtins: readonly QuizDefinition[] = SAMPLE_DEFINITIONS,
  logger: Logger = silentLogger
): Promise<Registry> {
  let configText: string;
  try {
    configText = await readFile(configPath, "utf8");
  } catch (e) {
    logger.warn("could not read quiz config, using sample quizzes", {
      configPath,
      reason: e instanceof Error ? e.message : String(e),
    });
    return loadRegistry({ definitions: builtins }, logger);
  }

  const config = parseRegistryConfig(configText);
  const baseDir = dirname(configPath);
  const definitions: QuizDefinition[] = [];
  const markdown: MarkdownSource[] = [];

  for (const entry of config.quizzes) {
    const builtin = builtins.find((d) => d.source === entry.source);
    if (builtin) {
      definitions.push(withOverrides(builtin, entry));
    } else if (entry.source.toLowerCase().endsWith(".md")) {
      const text = await readFile(resolve(baseDir, entry.source), "utf8");
      markdown.push({
        path: entry.source,
        text,
        options: { name: entry.name, url: entry.url, threshold: entry.threshold, shuffle: entry.shuffle },
      });
    } else {
      throw new UnknownSourceError(entry.source);
    }
  }

  return loadRegistry({ definitions, markdown }, logger);
}

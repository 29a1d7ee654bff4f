import * as yaml from "js-yaml";
import { z } from "zod";
import { InvalidConfigError, UnknownSourceError } from "./errors";
import { silentLogger, type Logger } from "./logger";
import { markdownDefinition, type MarkdownQuizOptions } from "./markdown";
import type { QuizDefinition } from "./quiz";

export const registryEntrySchema = z.object({
  source: z.string().min(1),
  url: z.string().startsWith("/").optional(),
  name: z.string().min(1).optional(),
  threshold: z.number().min(0).max(100).optional(),
  shuffle: z.boolean().optional(),
});

export const registryConfigSchema = z.object({
  quizzes: z.array(registryEntrySchema),
});

export type RegistryEntry = z.infer<typeof registryEntrySchema>;
export type RegistryConfig = z.infer<typeof registryConfigSchema>;

/** Parses the YAML listing of quiz sources. */
export function parseRegistryConfig(text: string): RegistryConfig {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (e) {
    throw new InvalidConfigError(e instanceof Error ? e.message : String(e));
  }
  const parsed = registryConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ")
    );
  }
  return parsed.data;
}

export type MarkdownSource = { path: string; text: string; options?: MarkdownQuizOptions };

/** Already-resolved quiz sources handed over by the host. */
export type RegistrySource = {
  definitions?: readonly QuizDefinition[];
  markdown?: readonly MarkdownSource[];
};

/** Read-only lookup of quiz definitions by source identifier. */
export class Registry {
  private constructor(private readonly bySource: ReadonlyMap<string, QuizDefinition>) {}

  static of(definitions: readonly QuizDefinition[]): Registry {
    const map = new Map<string, QuizDefinition>();
    for (const d of definitions) {
      if (map.has(d.source)) throw new InvalidConfigError(`duplicate source "${d.source}"`);
      map.set(d.source, Object.freeze({ ...d }));
    }
    return new Registry(map);
  }

  has(source: string): boolean {
    return this.bySource.has(source);
  }

  get(source: string): QuizDefinition | undefined {
    return this.bySource.get(source);
  }

  /** Like `get`, but an unknown source is an error. */
  resolve(source: string): QuizDefinition {
    const definition = this.bySource.get(source);
    if (!definition) throw new UnknownSourceError(source);
    return definition;
  }

  byUrl(url: string): QuizDefinition | undefined {
    return this.entries().find((d) => d.url === url);
  }

  sources(): string[] {
    return [...this.bySource.keys()];
  }

  entries(): QuizDefinition[] {
    return [...this.bySource.values()];
  }
}

/** Builds the registry once at startup; it is never mutated afterwards. */
export function loadRegistry(source: RegistrySource, logger: Logger = silentLogger): Registry {
  const definitions = [
    ...(source.definitions ?? []),
    ...(source.markdown ?? []).map((m) => markdownDefinition(m.path, m.text, m.options)),
  ];
  const registry = Registry.of(definitions);
  logger.info("quiz registry loaded", { sources: registry.sources() });
  return registry;
}

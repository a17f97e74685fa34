// Loads the phrase data the heuristics run on: the self-speech catalog, the
// trigger-phrase table and the per-locale phrase lists. All three are plain JSON
// under data/ so they can be extended without touching filter or session logic.

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LocalePack, SelfSpeechCatalog, TriggerPhraseTable } from "./types.js";

/** data/ at the repository root, resolved from src/ or dist/ alike. */
export const DEFAULT_DATA_DIR = fileURLToPath(new URL("../data/", import.meta.url));

const phraseList = z.array(z.string().trim().min(1)).min(1);

const selfSpeechCatalogSchema = z.object({
  version: z.number().int().positive(),
  phrases: phraseList,
});

const triggerPhraseTableSchema = z
  .object({
    version: z.number().int().positive(),
    identities: z
      .array(
        z.object({
          identity: z.string().trim().min(1),
          phrases: phraseList,
        }),
      )
      .min(1),
  })
  .refine(
    (table) => new Set(table.identities.map((entry) => entry.identity)).size === table.identities.length,
    { message: "identities must be unique" },
  );

const localePackSchema = z.object({
  incompleteOpeners: phraseList,
  lexicalRepairs: z.array(z.tuple([z.string().min(1), z.string()])),
  endOfSessionPhrases: phraseList,
  interruptPhrases: phraseList,
});

export interface DataPacks {
  selfSpeechCatalog: SelfSpeechCatalog;
  triggerPhrases: TriggerPhraseTable;
  locale: LocalePack;
}

async function readJson<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read data file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Data file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigError(`Data file ${filePath} is invalid: ${issues.join("; ")}`);
  }
  return result.data;
}

export function loadSelfSpeechCatalog(dataDir = DEFAULT_DATA_DIR): Promise<SelfSpeechCatalog> {
  return readJson(path.join(dataDir, "self-speech-catalog.json"), selfSpeechCatalogSchema);
}

export function loadTriggerPhrases(dataDir = DEFAULT_DATA_DIR): Promise<TriggerPhraseTable> {
  return readJson(path.join(dataDir, "trigger-phrases.json"), triggerPhraseTableSchema);
}

export function loadLocalePack(locale: string, dataDir = DEFAULT_DATA_DIR): Promise<LocalePack> {
  if (!/^[a-z]{2,3}(-[A-Za-z]{2,4})?$/.test(locale)) {
    return Promise.reject(new ConfigError(`Invalid locale "${locale}"`));
  }
  return readJson(path.join(dataDir, "locales", `${locale}.json`), localePackSchema);
}

export async function loadDataPacks(locale: string, dataDir = DEFAULT_DATA_DIR): Promise<DataPacks> {
  const [selfSpeechCatalog, triggerPhrases, localePack] = await Promise.all([
    loadSelfSpeechCatalog(dataDir),
    loadTriggerPhrases(dataDir),
    loadLocalePack(locale, dataDir),
  ]);
  return { selfSpeechCatalog, triggerPhrases, locale: localePack };
}

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import { WordDictionary, type Logger } from "../core.js";

export const FALLBACK_DICTIONARY_PATH = fileURLToPath(
  new URL("../../data/fallback-words.txt", import.meta.url),
);

export interface DictionaryLoadOptions {
  readonly logger?: Logger;
  readonly fallbackPath?: string;
}

/**
 * Loads the newline-delimited word list at `path`. A missing, unreadable or empty file falls back
 * to the bundled list with a warning.
 */
export async function loadDictionary(
  path: string,
  { logger, fallbackPath = FALLBACK_DICTIONARY_PATH }: DictionaryLoadOptions = {},
): Promise<WordDictionary> {
  try {
    const dictionary = new WordDictionary(splitLines(await readFile(path, "utf8")));
    if (dictionary.size > 0) {
      logger?.info?.("Dictionary loaded", { path, words: dictionary.size });
      return dictionary;
    }
    logger?.warn?.("Dictionary file has no usable words; using fallback list", { path });
  } catch (error) {
    logger?.warn?.("Dictionary file unavailable; using fallback list", { path, error });
  }

  const fallback = new WordDictionary(splitLines(await readFile(fallbackPath, "utf8")));
  logger?.info?.("Fallback dictionary loaded", { path: fallbackPath, words: fallback.size });
  return fallback;
}

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

import type { Settings, TranslateFn } from "../utils/types";
import { isNonTranslatable, preserveWhitespace } from "../utils/text";
import { errorMessage } from "./errors";
import type { Logger } from "./logger";
import { MyMemoryBackend } from "./mymemory";
import { OpenAIBackend } from "./openai";

export interface TranslationBackend {
  translate(text: string): Promise<string>;
}

export function createBackend(settings: Settings): TranslationBackend {
  switch (settings.provider) {
    case "openai":
      return new OpenAIBackend(settings);
    case "mymemory":
      return new MyMemoryBackend(settings);
  }
}

/**
 * Wraps a backend so that a translation never fails: text with nothing to
 * translate is returned untouched, and any backend error yields the
 * original text plus a warning.
 */
export function createTranslateFn(backend: TranslationBackend, logger?: Logger): TranslateFn {
  return async (text: string) => {
    if (isNonTranslatable(text)) return text;
    try {
      const translated = await backend.translate(text.trim());
      return preserveWhitespace(text, translated);
    } catch (error) {
      logger?.log(`Failed to translate text: ${JSON.stringify(text)} (${errorMessage(error)})`, "warn");
      return text;
    }
  };
}

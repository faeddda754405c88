import { z } from "zod";
import type { Settings } from "../utils/types";
import { myMemoryCode } from "../utils/language";
import type { TranslationBackend } from "./translator";

const ENDPOINT = "https://api.mymemory.translated.net/get";

// The free endpoint rejects queries over 500 bytes of UTF-8.
export const MAX_QUERY_BYTES = 500;

export class MyMemoryError extends Error {
  constructor(
    message: string,
    public status?: number,
    public detail?: unknown
  ) {
    super(message);
    this.name = "MyMemoryError";
  }
}

const responseSchema = z.object({
  responseData: z.object({ translatedText: z.string().nullable() }).nullable(),
  responseStatus: z.union([z.number(), z.string()]),
  responseDetails: z.string().optional()
});

export function buildQueryUrl(text: string, settings: Pick<Settings, "fromLang" | "toLang" | "myMemoryEmail">): string {
  const url = new URL(ENDPOINT);
  url.searchParams.set("q", text);
  url.searchParams.set("langpair", `${myMemoryCode(settings.fromLang)}|${myMemoryCode(settings.toLang)}`);
  if (settings.myMemoryEmail) url.searchParams.set("de", settings.myMemoryEmail);
  return url.toString();
}

/** The free MyMemory translation memory; no key, rate limited per day. */
export class MyMemoryBackend implements TranslationBackend {
  constructor(private readonly settings: Settings) {}

  async translate(text: string): Promise<string> {
    if (Buffer.byteLength(text, "utf8") > MAX_QUERY_BYTES) {
      throw new MyMemoryError(`Text longer than ${MAX_QUERY_BYTES} bytes`);
    }

    const res = await fetch(buildQueryUrl(text, this.settings));
    const json: unknown = await res.json().catch(() => ({}));
    if (!res.ok) {
      throw new MyMemoryError(`MyMemory request failed (${res.status})`, res.status, json);
    }

    const parsed = responseSchema.safeParse(json);
    if (!parsed.success) {
      throw new MyMemoryError("Unexpected MyMemory response.", res.status, json);
    }

    const status = Number(parsed.data.responseStatus);
    const translated = parsed.data.responseData?.translatedText;
    if (status !== 200 || !translated) {
      throw new MyMemoryError(parsed.data.responseDetails || `MyMemory status ${status}`, status, json);
    }
    return translated;
  }
}

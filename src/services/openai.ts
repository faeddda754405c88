import { z } from "zod";
import type { Settings } from "../utils/types";
import { labelFor } from "../utils/language";
import type { TranslationBackend } from "./translator";

const RESPONSES_URL = "https://api.openai.com/v1/responses";

export class OpenAIError extends Error {
  constructor(
    message: string,
    public status?: number,
    public detail?: unknown
  ) {
    super(message);
    this.name = "OpenAIError";
  }
}

const responseSchema = z.object({
  output: z
    .array(
      z.object({
        type: z.string(),
        content: z.array(z.object({ type: z.string(), text: z.string().optional() })).optional()
      })
    )
    .optional()
});

const errorSchema = z.object({
  error: z.object({ message: z.string() })
});

const translationSchema = z.object({
  translation: z.string()
});

function extractOutputText(resp: unknown): string {
  const parsed = responseSchema.safeParse(resp);
  if (!parsed.success) return "";
  const chunks: string[] = [];
  for (const item of parsed.data.output ?? []) {
    if (item.type !== "message") continue;
    for (const c of item.content ?? []) {
      if (c.type === "output_text" && typeof c.text === "string") {
        chunks.push(c.text);
      }
    }
  }
  return chunks.join("\n").trim();
}

function errorMessageOf(json: unknown): string {
  const parsed = errorSchema.safeParse(json);
  return parsed.success ? parsed.data.error.message : "OpenAI request failed";
}

export function buildInstructions(settings: Pick<Settings, "fromLang" | "toLang">): string {
  return [
    "You are a high-precision translation engine for PowerPoint slides.",
    `Translate the user's text from ${labelFor(settings.fromLang)} to ${labelFor(settings.toLang)}.`,
    "The text is one styled run of a slide, possibly a fragment of a sentence; translate it as-is.",
    "Do NOT translate protected tokens like {0}, {{name}}, %s, URLs, email addresses, or product codes; keep them unchanged.",
    "Reply with the translation only, in the `translation` field."
  ].join("\n");
}

/** One Responses API call per string. */
export class OpenAIBackend implements TranslationBackend {
  constructor(private readonly settings: Settings) {
    if (!settings.apiKey) throw new OpenAIError("No OpenAI API key configured.");
  }

  async translate(text: string): Promise<string> {
    const { settings } = this;
    const res = await fetch(RESPONSES_URL, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${settings.apiKey}`
      },
      body: JSON.stringify({
        model: settings.model,
        temperature: settings.temperature,
        store: false,
        input: [
          { role: "system", content: buildInstructions(settings) },
          { role: "user", content: text }
        ],
        text: {
          format: {
            type: "json_schema",
            name: "slide_translation",
            strict: true,
            schema: {
              type: "object",
              additionalProperties: false,
              properties: { translation: { type: "string" } },
              required: ["translation"]
            }
          }
        }
      })
    });

    const json: unknown = await res.json().catch(() => ({}));
    if (!res.ok) {
      throw new OpenAIError(errorMessageOf(json), res.status, json);
    }

    const out = extractOutputText(json);
    if (!out) throw new OpenAIError("Empty response from the model.", res.status, json);

    let raw: unknown;
    try {
      raw = JSON.parse(out);
    } catch {
      throw new OpenAIError("Could not parse the model's JSON output.", res.status, { out });
    }

    const parsed = translationSchema.safeParse(raw);
    if (!parsed.success) {
      throw new OpenAIError("Unexpected JSON output.", res.status, raw);
    }
    return parsed.data.translation;
  }
}

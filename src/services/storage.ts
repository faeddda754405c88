import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { Settings } from "../utils/types";
import { ConfigError, errorMessage } from "./errors";

export const DEFAULT_CONFIG_FILE = "pptx-localize.config.json";

export function defaultSettings(): Settings {
  return {
    provider: "openai",
    apiKey: "",
    model: "gpt-4o-mini",
    temperature: 0,
    fromLang: "en",
    toLang: "zh",
    ignoreShapes: "",
    myMemoryEmail: ""
  };
}

const settingsFileSchema = z
  .object({
    provider: z.enum(["openai", "mymemory"]),
    apiKey: z.string(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    fromLang: z.string().min(1),
    toLang: z.string().min(1),
    ignoreShapes: z.string(),
    myMemoryEmail: z.string()
  })
  .partial()
  .strict();

export type SettingsOverrides = z.infer<typeof settingsFileSchema>;

export interface LoadSettingsOptions {
  /** Explicit config file; it must exist. Without it the default file is read when present. */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: SettingsOverrides;
}

async function readConfigFile(path: string, required: boolean): Promise<SettingsOverrides> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (!required) return {};
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = settingsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${path}`, parsed.error.issues);
  }
  return parsed.data;
}

function fromEnv(env: NodeJS.ProcessEnv): SettingsOverrides {
  const out: SettingsOverrides = {};
  if (env.OPENAI_API_KEY) out.apiKey = env.OPENAI_API_KEY;
  if (env.PPTX_LOCALIZE_MODEL) out.model = env.PPTX_LOCALIZE_MODEL;
  if (env.PPTX_LOCALIZE_FROM) out.fromLang = env.PPTX_LOCALIZE_FROM;
  if (env.PPTX_LOCALIZE_TO) out.toLang = env.PPTX_LOCALIZE_TO;
  const provider = env.PPTX_LOCALIZE_PROVIDER;
  if (provider) {
    if (provider !== "openai" && provider !== "mymemory") {
      throw new ConfigError(`Unknown provider in PPTX_LOCALIZE_PROVIDER: ${provider}`);
    }
    out.provider = provider;
  }
  return out;
}

/** defaults ← config file ← environment ← overrides */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {
  const cwd = options.cwd ?? process.cwd();
  const file = options.configPath
    ? await readConfigFile(options.configPath, true)
    : await readConfigFile(`${cwd}/${DEFAULT_CONFIG_FILE}`, false);

  const settings: Settings = {
    ...defaultSettings(),
    ...file,
    ...fromEnv(options.env ?? process.env),
    ...options.overrides
  };

  if (settings.provider === "openai" && !settings.apiKey) {
    throw new ConfigError("The openai provider needs an API key (set OPENAI_API_KEY).");
  }
  return settings;
}

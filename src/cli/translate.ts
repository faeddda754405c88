import { join, parse, resolve } from "node:path";
import { parseArgs } from "node:util";
import type { Settings } from "../utils/types";
import { ConfigError, errorMessage } from "../services/errors";
import { Logger } from "../services/logger";
import { analyzePresentation, translatePresentation } from "../services/ppt";
import { Presentation } from "../services/pptx/presentation";
import type { SettingsOverrides } from "../services/storage";
import { loadSettings } from "../services/storage";
import type { TranslationBackend } from "../services/translator";
import { createBackend, createTranslateFn } from "../services/translator";
import type { CliIO } from "./io";
import { isArgsError, isFile, processIO } from "./io";

export const TRANSLATE_USAGE = `Usage: pptx-translate <input.pptx> [options]

Translate a deck, keeping paragraph and run formatting.

Options:
  -o, --output <file>      Deck to write (default: <input>_<to>.pptx)
      --from <code>        Source language (default: en)
      --to <code>          Target language (default: zh)
      --provider <name>    openai | mymemory (default: openai)
      --config <file>      Settings file (default: ./pptx-localize.config.json)
  -v, --verbose            Log progress details
  -h, --help               Show this help
`;

export interface TranslateCliDeps {
  createBackend?: (settings: Settings) => TranslationBackend;
}

/** `deck.pptx` → `deck_zh.pptx`, next to the input. */
export function defaultOutputPath(input: string, toLang: string): string {
  const { dir, name, ext } = parse(input);
  return join(dir, `${name}_${toLang}${ext}`);
}

function parseTranslateArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      output: { type: "string", short: "o" },
      from: { type: "string" },
      to: { type: "string" },
      provider: { type: "string" },
      config: { type: "string" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false }
    }
  });
}

function overridesFrom(values: ReturnType<typeof parseTranslateArgs>["values"]): SettingsOverrides {
  const out: SettingsOverrides = {};
  if (values.from) out.fromLang = values.from;
  if (values.to) out.toLang = values.to;
  if (values.provider) {
    if (values.provider !== "openai" && values.provider !== "mymemory") {
      throw new ConfigError(`Unknown provider: ${values.provider}`);
    }
    out.provider = values.provider;
  }
  return out;
}

export async function runTranslate(
  argv: string[],
  io: CliIO = processIO(),
  deps: TranslateCliDeps = {}
): Promise<number> {
  let parsed: ReturnType<typeof parseTranslateArgs>;
  try {
    parsed = parseTranslateArgs(argv);
  } catch (error) {
    if (!isArgsError(error)) throw error;
    io.stderr.write(`${error.message}\n\n${TRANSLATE_USAGE}`);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    io.stdout.write(TRANSLATE_USAGE);
    return 0;
  }
  const [input] = positionals;
  if (!input || positionals.length > 1) {
    io.stderr.write(TRANSLATE_USAGE);
    return 2;
  }

  const inputPath = resolve(io.cwd, input);
  if (!(await isFile(inputPath))) {
    io.stderr.write(`Input file not found: ${input}\n`);
    return 1;
  }

  const logger = new Logger(io.stderr, { verbose: values.verbose === true });
  try {
    const settings = await loadSettings({
      configPath: values.config ? resolve(io.cwd, values.config) : undefined,
      cwd: io.cwd,
      env: io.env,
      overrides: overridesFrom(values)
    });
    const output = values.output ?? defaultOutputPath(input, settings.toLang);

    const backend = (deps.createBackend ?? createBackend)(settings);
    const translate = createTranslateFn(backend, logger);

    const presentation = await Presentation.open(inputPath);
    analyzePresentation(presentation, logger);
    const { summary } = await translatePresentation(presentation, translate, {
      logger,
      ignoreShapes: settings.ignoreShapes
    });
    if (summary.failures.length) {
      logger.log(`${summary.failures.length} run(s) kept their original text`, "warn");
    }

    await presentation.save(resolve(io.cwd, output));
    io.stdout.write(`Created translated presentation: ${output}\n`);
    return 0;
  } catch (error) {
    logger.log(errorMessage(error), "error");
    return 1;
  }
}

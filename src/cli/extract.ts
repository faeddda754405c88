import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { errorMessage } from "../services/errors";
import { Logger } from "../services/logger";
import { extractPresentation } from "../services/ppt";
import { Presentation } from "../services/pptx/presentation";
import type { CliIO } from "./io";
import { isArgsError, isFile, processIO } from "./io";

export const EXTRACT_USAGE = `Usage: pptx-extract <input.pptx> [options]

Extract English text (titles, body text, tables and notes) from a deck.

Options:
  -o, --output <file>  JSON file to write (default: extracted.json)
      --dedupe         Deduplicate strings (always on)
  -v, --verbose        Log progress details
  -h, --help           Show this help
`;

function parseExtractArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      output: { type: "string", short: "o", default: "extracted.json" },
      dedupe: { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false }
    }
  });
}

export async function runExtract(argv: string[], io: CliIO = processIO()): Promise<number> {
  let parsed: ReturnType<typeof parseExtractArgs>;
  try {
    parsed = parseExtractArgs(argv);
  } catch (error) {
    if (!isArgsError(error)) throw error;
    io.stderr.write(`${error.message}\n\n${EXTRACT_USAGE}`);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    io.stdout.write(EXTRACT_USAGE);
    return 0;
  }
  const [input] = positionals;
  if (!input || positionals.length > 1) {
    io.stderr.write(EXTRACT_USAGE);
    return 2;
  }

  const inputPath = resolve(io.cwd, input);
  if (!(await isFile(inputPath))) {
    io.stderr.write(`Input file not found: ${input}\n`);
    return 1;
  }

  const logger = new Logger(io.stderr, { verbose: values.verbose === true });
  const output = values.output ?? "extracted.json";
  try {
    const presentation = await Presentation.open(inputPath);
    const record = extractPresentation(presentation, { logger });
    await writeFile(resolve(io.cwd, output), `${JSON.stringify(record, null, 2)}\n`, "utf8");
    io.stdout.write(`Wrote ${record.strings.length} candidate strings to ${output}\n`);
    return 0;
  } catch (error) {
    logger.log(errorMessage(error), "error");
    return 1;
  }
}

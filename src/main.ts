#!/usr/bin/env node
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { ProcessOptionsInput, readEnvironment } from "./config";
import { describeError } from "./errors";
import { Logger, createLogger } from "./logger";
import { processEpub } from "./pipeline";

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

interface CliOptions {
  maxTitleLength?: number;
  stylesheet?: string;
  trim?: number;
  debug?: boolean;
}

export function createProgram(): Command {
  return new Command()
    .name("epub-eink")
    .description(
      "Rewrite an EPUB for an e-ink reader: drop the leading pages, strip images, shorten table of contents titles.",
    )
    .argument("<input>", "EPUB to process")
    .argument("<output>", "where to write the processed EPUB")
    .option(
      "--max-title-length <n>",
      "longest table of contents title, in characters",
      parseInteger,
    )
    .option("--stylesheet <path>", "replacement stylesheet")
    .option("--trim <n>", "leading spine entries to remove", parseInteger)
    .option("--debug", "verbose logging")
    .exitOverride();
}

/** Runs the command line and returns the process exit code. */
export async function run(argv: string[], logger?: Logger): Promise<number> {
  const program = createProgram();

  try {
    program.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed the usage error.
      return error.exitCode;
    }
    throw error;
  }

  const [inputPath, outputPath] = program.args;
  const flags = program.opts<CliOptions>();

  let options: ProcessOptionsInput;
  try {
    const environment = readEnvironment();
    options = {
      ...environment,
      debug: flags.debug ?? environment.debug,
      maxTitleLength: flags.maxTitleLength ?? environment.maxTitleLength,
      stylesheetPath: flags.stylesheet ?? environment.stylesheetPath,
      trimLeadingPages: flags.trim,
    };
  } catch (error) {
    process.stderr.write(`${describeError(error)}\n`);
    return 1;
  }

  try {
    await processEpub(inputPath, outputPath, {
      ...options,
      logger: logger ?? createLogger({ debug: options.debug }),
    });
    return 0;
  } catch (error) {
    const name = error instanceof Error ? error.name : "Error";
    process.stderr.write(`${name}: ${describeError(error)}\n`);
    return 1;
  }
}

if (require.main === module) {
  run(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${describeError(error)}\n`);
      process.exitCode = 1;
    },
  );
}

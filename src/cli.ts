#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { loadCliSettings, OUTPUT_FORMATS, type CliSettings, type OutputFormat } from "./config/settings.js";
import type { ToposortResult } from "./graph/toposort.js";
import { detectDocumentFormat, GraphDocumentError, parseGraphDocument, solveGraphDocument } from "./io/document.js";
import { StructuredLogger } from "./logger.js";
import { ERROR_CODES, type ErrorCode } from "./types.js";

/** Exit status when every vertex was ordered. */
export const EXIT_SORTED = 0;
/** Exit status for usage and input errors. */
export const EXIT_FAILURE = 1;
/** Exit status when the graph contains cycles. */
export const EXIT_CYCLES = 2;

interface CliOptions {
  readonly file: string;
  readonly format: OutputFormat;
  readonly transpose: boolean;
  readonly logFile?: string;
}

/** Output channels used by {@link runCli}; tests substitute in-memory sinks. */
export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/** Error raised for malformed command lines. */
export class CliUsageError extends Error {
  public readonly code: ErrorCode = ERROR_CODES.CLI_USAGE;

  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const USAGE = [
  "Usage: toposcc <file.json|file.yaml> [--format text|json] [--transpose] [--log-file path]",
  "",
  "Examples:",
  "  toposcc deps.json",
  "  toposcc deps.yaml --format json",
  "  toposcc deps.json --transpose",
];

/**
 * Runs the command line front end and resolves with the exit status: 0 when
 * the graph sorts, 2 when it contains cycles, 1 on usage or input errors.
 */
export async function runCli(
  argv: string[],
  io: CliIo = processIo,
  settings: CliSettings = loadCliSettings(),
): Promise<number> {
  if (argv.length === 0) {
    io.stderr(`${USAGE.join("\n")}\n`);
    return EXIT_FAILURE;
  }

  let options: CliOptions;
  try {
    options = parseArgs(argv, settings);
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.stderr(`${error.message}\n${USAGE[0]}\n`);
      return EXIT_FAILURE;
    }
    throw error;
  }

  const logger = new StructuredLogger({
    level: settings.logLevel,
    ...(options.logFile === undefined ? {} : { logFile: options.logFile }),
    write: io.stderr,
  });

  try {
    const contents = await readFile(options.file, "utf8");
    const document = parseGraphDocument(contents, detectDocumentFormat(options.file));
    const result = solveGraphDocument(document, { transpose: options.transpose, logger });
    io.stdout(options.format === "json" ? formatJsonReport(options.file, result) : formatTextReport(result));
    return result.ok ? EXIT_SORTED : EXIT_CYCLES;
  } catch (error) {
    if (error instanceof GraphDocumentError || isFileError(error)) {
      logger.error("cli_input_rejected", { file: options.file, message: error.message });
      io.stderr(`${options.file}: ${error.message}\n`);
      return EXIT_FAILURE;
    }
    throw error;
  } finally {
    await logger.flush();
  }
}

function formatTextReport(result: ToposortResult<number | string>): string {
  if (result.ok) {
    return `order: ${result.order.join(", ")}\n`;
  }
  const lines = ["cycles:"];
  result.components.forEach((component, index) => {
    lines.push(`  ${index + 1}. ${component.join(", ")}`);
  });
  return `${lines.join("\n")}\n`;
}

function formatJsonReport(file: string, result: ToposortResult<number | string>): string {
  return `${JSON.stringify({ file, ...result }, null, 2)}\n`;
}

function parseArgs(argv: string[], settings: CliSettings): CliOptions {
  const [file, ...rest] = argv;
  if (!file || file.startsWith("--")) {
    throw new CliUsageError("first positional argument must be the path to a graph document");
  }
  let format = settings.format;
  let transpose = settings.transpose;
  let logFile = settings.logFile;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--format": {
        const value = rest[++i];
        const match = OUTPUT_FORMATS.find((candidate) => candidate === value);
        if (!match) {
          throw new CliUsageError("--format must be 'json' or 'text'");
        }
        format = match;
        break;
      }
      case "--transpose":
        transpose = true;
        break;
      case "--log-file": {
        const value = rest[++i];
        if (!value) {
          throw new CliUsageError("--log-file expects a path");
        }
        logFile = value;
        break;
      }
      default:
        throw new CliUsageError(`unknown argument '${token}'`);
    }
  }

  return {
    file,
    format,
    transpose,
    ...(logFile === undefined ? {} : { logFile }),
  };
}

function isFileError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && "syscall" in error;
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }

  // npm links the `bin` entry, so compare resolved paths.
  const thisModulePath = fileURLToPath(import.meta.url);
  try {
    return thisModulePath === realpathSync(executedFromCli);
  } catch {
    return false;
  }
})();

if (isCliEntryPoint) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = EXIT_FAILURE;
    });
}

/**
 * Exposes internal helpers for the test suite without exporting them as part
 * of the runtime API surface.
 */
export const __testing = {
  parseArgs,
  formatTextReport,
};

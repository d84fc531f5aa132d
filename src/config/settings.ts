import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { readBool, readEnum, readOptionalString } from "./env.js";

export const OUTPUT_FORMATS = ["text", "json"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Defaults applied by the CLI before command line flags are considered. */
export interface CliSettings {
  readonly format: OutputFormat;
  readonly logLevel: LogLevel;
  readonly logFile?: string;
  readonly transpose: boolean;
}

/**
 * Resolves {@link CliSettings} from the `TOPOSCC_*` environment variables.
 * Invalid values fall back to the defaults instead of failing.
 */
export function loadCliSettings(): CliSettings {
  const logFile = readOptionalString("TOPOSCC_LOG_FILE");
  return {
    format: readEnum("TOPOSCC_FORMAT", OUTPUT_FORMATS, "text"),
    logLevel: readEnum("TOPOSCC_LOG_LEVEL", LOG_LEVELS, "warn"),
    transpose: readBool("TOPOSCC_TRANSPOSE", false),
    ...(logFile === undefined ? {} : { logFile }),
  };
}

import { StructuredLogger, type LogLevel } from "../../src/logger.js";

/**
 * Logger for tests that need to observe structured entries without writing to
 * stderr. It subclasses {@link StructuredLogger} so it can be passed wherever
 * the production logger is accepted.
 */
export class RecordingLogger extends StructuredLogger {
  /** Entries emitted via `debug`/`info`/`warn`/`error` during the test. */
  public readonly entries: Array<{ level: LogLevel; message: string; payload?: unknown }> = [];

  constructor() {
    super({ logFile: null, write: () => undefined });
  }

  private record(level: LogLevel, message: string, payload?: unknown): void {
    this.entries.push({ level, message, payload });
  }

  override debug(message: string, payload?: unknown): void {
    this.record("debug", message, payload);
  }

  override info(message: string, payload?: unknown): void {
    this.record("info", message, payload);
  }

  override warn(message: string, payload?: unknown): void {
    this.record("warn", message, payload);
  }

  override error(message: string, payload?: unknown): void {
    this.record("error", message, payload);
  }
}

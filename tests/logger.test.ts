import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";
import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { StructuredLogger, type LogEntry } from "../src/logger.js";

function parseLines(text: string): LogEntry[] {
  return text
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line): LogEntry => JSON.parse(line));
}

describe("StructuredLogger", () => {
  it("writes one JSON line per entry to the configured sink", () => {
    const write = sinon.spy();
    const logger = new StructuredLogger({ write });

    logger.info("graph_document_loaded", { vertices: 3 });
    logger.debug("graph_toposort_completed");

    expect(write.callCount).to.equal(2);
    const [loaded, completed] = write.getCalls().map((call) => parseLines(String(call.args[0]))[0]);
    expect(loaded).to.include({ level: "info", message: "graph_document_loaded" });
    expect(loaded?.payload).to.deep.equal({ vertices: 3 });
    expect(completed).to.include({ level: "debug", message: "graph_toposort_completed" });
    expect(completed).to.not.have.property("payload");
  });

  it("drops entries below the configured level", () => {
    const messages: string[] = [];
    const logger = new StructuredLogger({
      level: "warn",
      write: () => undefined,
      onEntry: (entry) => messages.push(entry.message),
    });

    logger.debug("skipped_debug");
    logger.info("skipped_info");
    logger.warn("kept_warn");
    logger.error("kept_error");

    expect(messages).to.deep.equal(["kept_warn", "kept_error"]);
    expect(logger.isEnabled("info")).to.equal(false);
    expect(logger.isEnabled("error")).to.equal(true);
  });

  it("hands listeners a copy of the entry", () => {
    const payload = { components: [[1, 2]] };
    const received: LogEntry[] = [];
    const logger = new StructuredLogger({ write: () => undefined, onEntry: (entry) => received.push(entry) });

    logger.warn("graph_cycles_detected", payload);
    payload.components.push([3]);

    expect(received[0]?.payload).to.deep.equal({ components: [[1, 2]] });
  });

  it("mirrors entries to the log file", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "toposcc-logger-"));
    const logFile = path.join(directory, "nested", "toposcc.log");

    try {
      const logger = new StructuredLogger({ logFile, write: () => undefined });
      logger.info("first_entry", { index: 0 });
      logger.error("second_entry", { index: 1 });
      await logger.flush();

      const entries = parseLines(await readFile(logFile, "utf8"));
      expect(entries.map((entry) => [entry.level, entry.message, entry.payload])).to.deep.equal([
        ["info", "first_entry", { index: 0 }],
        ["error", "second_entry", { index: 1 }],
      ]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("rotates the log file when the configured size is exceeded", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "toposcc-logger-"));
    const logFile = path.join(directory, "toposcc.log");

    try {
      const logger = new StructuredLogger({
        logFile,
        maxFileSizeBytes: 256,
        maxFileCount: 3,
        write: () => undefined,
      });

      for (let index = 0; index < 6; index += 1) {
        logger.info("rotation_test_entry", { index, padding: "x".repeat(160) });
      }
      await logger.flush();

      const files = (await readdir(directory)).sort();
      expect(files).to.deep.equal(["toposcc.log", "toposcc.log.1", "toposcc.log.2"]);

      const indices = await Promise.all(
        files.map(async (file) =>
          parseLines(await readFile(path.join(directory, file), "utf8")).map((entry) => {
            const payload = entry.payload;
            return typeof payload === "object" && payload !== null && "index" in payload ? payload.index : null;
          }),
        ),
      );
      expect(indices).to.deep.equal([[5], [4], [3]]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("reports file mirroring failures through the configured sink", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "toposcc-logger-"));
    const blocker = path.join(directory, "blocker");
    await writeFile(blocker, "not a directory", "utf8");

    try {
      const lines: string[] = [];
      const logger = new StructuredLogger({
        logFile: path.join(blocker, "toposcc.log"),
        write: (line) => lines.push(line),
      });
      logger.info("mirrored_entry");
      await logger.flush();

      const entries = parseLines(lines.join(""));
      expect(entries.map((entry) => [entry.level, entry.message])).to.deep.equal([
        ["info", "mirrored_entry"],
        ["error", "log_file_write_failed"],
      ]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("creates no file when mirroring is disabled", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "toposcc-logger-"));
    try {
      const logger = new StructuredLogger({ logFile: null, write: () => undefined });
      logger.warn("no_mirror");
      await logger.flush();

      expect(await readdir(directory)).to.deep.equal([]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});

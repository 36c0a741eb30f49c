import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { RuntimeLogWriter } from "../src/app/logging.js";

const FIXED_NOW = new Date(2024, 0, 2, 3, 4, 5, 6);
const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

function createWriter(lines: string[], options: { logDir?: string; debug?: boolean } = {}): RuntimeLogWriter {
  return new RuntimeLogWriter({
    ...options,
    nowProvider: () => FIXED_NOW,
    stdout: {
      write: (chunk: string | Uint8Array) => {
        lines.push(String(chunk));
        return true;
      },
    },
  });
}

describe("RuntimeLogWriter", () => {
  it("writes timestamped lines with logger name and level", () => {
    const lines: string[] = [];
    const logger = createWriter(lines).getLogger("goplay.test");

    logger.info("Connected!");
    logger.warn("Slow reply", "target=#go", { ms: 1200 });

    expect(lines).toEqual([
      "2024-01-02 03:04:05,006 - goplay.test - INFO - Connected!\n",
      "2024-01-02 03:04:05,006 - goplay.test - WARNING - Slow reply target=#go { ms: 1200 }\n",
    ]);
  });

  it("only echoes DEBUG when debug is enabled", () => {
    const quiet: string[] = [];
    const verbose: string[] = [];

    createWriter(quiet).getLogger("goplay").debug("details");
    createWriter(verbose, { debug: true }).getLogger("goplay").debug("details");

    expect(quiet).toEqual([]);
    expect(verbose).toEqual(["2024-01-02 03:04:05,006 - goplay - DEBUG - details\n"]);
  });

  it("writes ERROR lines to stdout", () => {
    const lines: string[] = [];

    createWriter(lines).getLogger("goplay.rooms").error("failed");

    expect(lines).toEqual(["2024-01-02 03:04:05,006 - goplay.rooms - ERROR - failed\n"]);
  });

  it("tags lines logged inside an invocation context", async () => {
    const lines: string[] = [];
    const logger = createWriter(lines).getLogger("goplay");

    await logger.withInvocationContext({ target: "#go", nick: "alice" }, async () => {
      logger.info("inside");
    });
    logger.info("outside");

    expect(lines).toEqual([
      "2024-01-02 03:04:05,006 - goplay - INFO - [#go alice] inside\n",
      "2024-01-02 03:04:05,006 - goplay - INFO - outside\n",
    ]);
  });

  it("appends every line to the dated system log", async () => {
    const logDir = await mkdtemp(join(tmpdir(), "goplay-logs-"));
    tempDirs.push(logDir);
    const lines: string[] = [];
    const writer = createWriter(lines, { logDir });
    const logger = writer.getLogger("goplay");

    logger.debug("hidden on stdout");
    logger.info("shown");

    const path = writer.getSystemLogPath();
    expect(path).toBe(join(logDir, FIXED_NOW.toISOString().slice(0, 10), "system.log"));
    await expect(readFile(path ?? "", "utf-8")).resolves.toBe(
      "2024-01-02 03:04:05,006 - goplay - DEBUG - hidden on stdout\n"
        + "2024-01-02 03:04:05,006 - goplay - INFO - shown\n",
    );
    expect(lines).toEqual(["2024-01-02 03:04:05,006 - goplay - INFO - shown\n"]);
  });

  it("has no system log without a log directory", () => {
    expect(createWriter([]).getSystemLogPath()).toBeNull();
  });
});

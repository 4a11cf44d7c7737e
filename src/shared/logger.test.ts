import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFileLogger, formatTimestamp } from "./logger.js";

describe("formatTimestamp", () => {
  it("uses local date and time with seconds", () => {
    expect(formatTimestamp(new Date(2026, 9, 19, 15, 4, 5))).toBe("2026-10-19 15:04:05");
  });
});

describe("createFileLogger", () => {
  let dir: string;
  const now = () => new Date(2026, 9, 19, 15, 0, 0);

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "rankharvest-log-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes one formatted line per message", () => {
    const filePath = path.join(dir, "run.log");
    const logger = createFileLogger({ filePath, maxBytes: 0, backupCount: 3, now });

    logger.info("Run started");
    logger.warn("Skipping row");
    logger.error("Run failed", "boom");

    expect(fs.readFileSync(filePath, "utf-8")).toBe(
      "2026-10-19 15:00:00 - INFO - Run started\n" +
        "2026-10-19 15:00:00 - WARNING - Skipping row\n" +
        "2026-10-19 15:00:00 - ERROR - Run failed: boom\n"
    );
  });

  it("rotates when the file would exceed maxBytes and keeps backupCount backups", () => {
    const filePath = path.join(dir, "run.log");
    // Each line is 39 bytes, so every write after the first rotates.
    const logger = createFileLogger({ filePath, maxBytes: 60, backupCount: 2, now });

    logger.info("message 1");
    logger.info("message 2");
    logger.info("message 3");
    logger.info("message 4");

    expect(fs.readdirSync(dir).sort()).toEqual(["run.log", "run.log.1", "run.log.2"]);
    expect(fs.readFileSync(filePath, "utf-8")).toBe("2026-10-19 15:00:00 - INFO - message 4\n");
    expect(fs.readFileSync(`${filePath}.1`, "utf-8")).toBe("2026-10-19 15:00:00 - INFO - message 3\n");
    expect(fs.readFileSync(`${filePath}.2`, "utf-8")).toBe("2026-10-19 15:00:00 - INFO - message 2\n");
  });
});

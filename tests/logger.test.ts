import { promises as fs } from "fs";
import os from "os";
import path from "path";
import assert from "node:assert/strict";

import { Logger } from "../src/core/Logger";

const withTempDir = async (fn: (dir: string) => Promise<void>): Promise<void> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "logger-"));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
};

export const tests = [
  {
    name: "Logger appends every level to app.log and keeps info off the console when quiet",
    run: async () => {
      await withTempDir(async (dir) => {
        const logDir = path.join(dir, "logs");
        const logger = new Logger(logDir, { quiet: true });
        assert.equal(logger.filePath, path.join(logDir, "app.log"));

        const printed: string[] = [];
        const originalLog = console.log;
        const originalError = console.error;
        console.log = (line: string) => printed.push(line);
        console.error = (line: string) => printed.push(line);
        try {
          await logger.info("Saved allocation");
          await logger.error("History table is empty.");
        } finally {
          console.log = originalLog;
          console.error = originalError;
        }

        assert.equal(printed.length, 1);
        assert.ok(printed[0].endsWith(" [ERROR] History table is empty."));

        const lines = (await fs.readFile(logger.filePath, "utf-8")).trimEnd().split("\n");
        assert.equal(lines.length, 2);
        assert.ok(lines[0].endsWith(" [INFO] Saved allocation"));
        assert.ok(lines[1].endsWith(" [ERROR] History table is empty."));
      });
    },
  },
];

import { promises as fs } from "fs";
import os from "os";
import path from "path";
import assert from "node:assert/strict";

import { HistoryCache } from "../src/core/HistoryCache";
import type { IUsageRecord } from "../src/types";
import { makeRecord } from "./fixtures";

const withTempDir = async (fn: (dir: string) => Promise<void>): Promise<void> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "history-cache-"));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
};

const countingLoader = (records: IUsageRecord[]) => {
  const state = { calls: 0 };
  const load = async (): Promise<IUsageRecord[]> => {
    state.calls += 1;
    return records;
  };
  return { state, load };
};

export const tests = [
  {
    name: "HistoryCache reuses a snapshot younger than maxAge",
    run: async () => {
      const { state, load } = countingLoader([makeRecord({ quantity: 3 })]);
      let now = 1_000;
      const cache = new HistoryCache({ load, clock: () => now });
      const first = await cache.get(60_000);
      now = 30_000;
      const second = await cache.get(60_000);
      assert.equal(state.calls, 1);
      assert.equal(second, first);
    },
  },
  {
    name: "HistoryCache reloads once the snapshot is stale",
    run: async () => {
      const { state, load } = countingLoader([makeRecord()]);
      let now = 0;
      const cache = new HistoryCache({ load, clock: () => now });
      await cache.get(60_000);
      now = 60_000;
      await cache.get(60_000);
      assert.equal(state.calls, 2);
    },
  },
  {
    name: "HistoryCache shares snapshots through its file",
    run: async () => {
      await withTempDir(async (dir) => {
        const filePath = path.join(dir, "history.json");
        const date = new Date(2026, 2, 4);
        const first = countingLoader([makeRecord({ date, department: "Kitchen", quantity: 8 })]);
        await new HistoryCache({ load: first.load, filePath, clock: () => 0 }).get(60_000);

        const second = countingLoader([]);
        const records = await new HistoryCache({
          load: second.load,
          filePath,
          clock: () => 1_000,
        }).get(60_000);
        assert.equal(second.state.calls, 0);
        assert.equal(records.length, 1);
        assert.ok(records[0].date instanceof Date);
        assert.equal(records[0].date.getTime(), date.getTime());
        assert.equal(records[0].department, "Kitchen");
      });
    },
  },
  {
    name: "HistoryCache reloads after invalidate and ignores a corrupt file",
    run: async () => {
      await withTempDir(async (dir) => {
        const filePath = path.join(dir, "history.json");
        const { state, load } = countingLoader([makeRecord()]);
        const cache = new HistoryCache({ load, filePath, clock: () => 0 });
        await cache.get(60_000);
        await cache.invalidate();
        await cache.get(60_000);
        assert.equal(state.calls, 2);

        await fs.writeFile(filePath, "not json", "utf-8");
        const fresh = countingLoader([makeRecord()]);
        await new HistoryCache({ load: fresh.load, filePath, clock: () => 0 }).get(60_000);
        assert.equal(fresh.state.calls, 1);
      });
    },
  },
];

import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";

import type { IUsageRecord } from "../types";
import { Logger } from "./Logger";

const UsageRecordSchema = z.object({
  date: z.coerce.date(),
  itemSerial: z.string(),
  itemName: z.string(),
  department: z.string(),
  issuedTo: z.string(),
  quantity: z.number().finite(),
  unitOfMeasure: z.string(),
  itemCategory: z.string(),
  week: z.string(),
  reference: z.string(),
  departmentCategory: z.string(),
  batchNumber: z.string(),
  store: z.string(),
  receivedBy: z.string(),
});

const SnapshotSchema = z.object({
  fetchedAt: z.number().int().nonnegative(),
  records: z.array(UsageRecordSchema),
});

type Snapshot = {
  fetchedAt: number;
  records: readonly IUsageRecord[];
};

export interface HistoryCacheOptions {
  load: () => Promise<IUsageRecord[]>;
  filePath?: string;
  clock?: () => number;
  logger?: Logger;
}

/**
 * Time-boxed holder for the issuance history. A snapshot is kept in memory and,
 * when `filePath` is set, on disk so separate CLI runs can share it.
 */
export class HistoryCache {
  private readonly load: () => Promise<IUsageRecord[]>;
  private readonly filePath?: string;
  private readonly clock: () => number;
  private readonly logger?: Logger;
  private snapshot: Snapshot | null = null;

  constructor(options: HistoryCacheOptions) {
    this.load = options.load;
    this.filePath = options.filePath;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger;
  }

  async get(maxAgeMs: number): Promise<readonly IUsageRecord[]> {
    const now = this.clock();
    const current = this.snapshot ?? (await this.readSnapshot());
    if (current && now - current.fetchedAt < maxAgeMs) {
      this.snapshot = current;
      return current.records;
    }

    const records = Object.freeze(await this.load());
    this.snapshot = { fetchedAt: now, records };
    await this.writeSnapshot(this.snapshot);
    await this.logger?.info(`Loaded ${records.length} history records.`);
    return records;
  }

  async invalidate(): Promise<void> {
    this.snapshot = null;
    if (!this.filePath) {
      return;
    }
    await fs.rm(this.filePath, { force: true });
  }

  private async readSnapshot(): Promise<Snapshot | null> {
    if (!this.filePath) {
      return null;
    }
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      await this.logger?.warn(`Ignoring unreadable history cache ${this.filePath}: ${message}`);
      return null;
    }
    const result = SnapshotSchema.safeParse(parsed);
    if (!result.success) {
      await this.logger?.warn(`Ignoring invalid history cache ${this.filePath}.`);
      return null;
    }
    return { fetchedAt: result.data.fetchedAt, records: Object.freeze(result.data.records) };
  }

  private async writeSnapshot(snapshot: Snapshot): Promise<void> {
    if (!this.filePath) {
      return;
    }
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(snapshot), "utf-8");
  }
}

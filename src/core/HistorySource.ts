import path from "path";

import type { IAppConfig, IUsageRecord } from "../types";
import { parseHistoryTable, readTableFile } from "../utils/history-table";
import { HistoryCache } from "./HistoryCache";
import { Logger } from "./Logger";
import { SheetClient } from "./SheetClient";

export const HISTORY_CACHE_FILE = "history.json";

export const loadHistory = async (
  config: IAppConfig,
  options: { logger?: Logger; sheetClient?: SheetClient; now?: Date; cwd?: string } = {}
): Promise<IUsageRecord[]> => {
  const source = config.source;
  let rows: unknown[][];
  if (source.type === "sheet") {
    await options.logger?.info(`Loading history from sheet ${source.sheetName}...`);
    const client = options.sheetClient ?? new SheetClient();
    rows = await client.fetchTable(source.spreadsheetId, source.sheetName);
  } else {
    const filePath = path.resolve(options.cwd ?? process.cwd(), source.path);
    await options.logger?.info(`Loading history from ${filePath}...`);
    rows = await readTableFile(filePath, source.sheetName);
  }

  const parsed = parseHistoryTable(rows, {
    now: options.now,
    retentionYears: config.history.retentionYears,
  });
  if (!parsed.ok) {
    throw new Error(`Error loading data: ${parsed.error.message}`);
  }
  return parsed.value;
};

export const createHistoryCache = (
  config: IAppConfig,
  options: { logger?: Logger; sheetClient?: SheetClient; cwd?: string } = {}
): HistoryCache =>
  new HistoryCache({
    load: () => loadHistory(config, options),
    filePath: path.resolve(options.cwd ?? process.cwd(), config.cache.dir, HISTORY_CACHE_FILE),
    logger: options.logger,
  });

import { promises as fs } from "fs";
import path from "path";
import * as XLSX from "xlsx";

import type { CoreResult, IUsageRecord } from "../types";
import { fail, ok } from "../types/result";

type RecordField = Exclude<keyof IUsageRecord, "date" | "quantity">;

const EXCEL_EPOCH_OFFSET_DAYS = 25569;
const MS_PER_DAY = 86_400_000;
const DATE_ONLY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const TEXT_COLUMNS: Array<{ field: RecordField; header: string; required: boolean }> = [
  { field: "itemSerial", header: "ITEM_SERIAL", required: true },
  { field: "itemName", header: "ITEM NAME", required: true },
  { field: "department", header: "DEPARTMENT", required: true },
  { field: "issuedTo", header: "ISSUED_TO", required: true },
  { field: "unitOfMeasure", header: "UNIT_OF_MEASURE", required: true },
  { field: "itemCategory", header: "ITEM_CATEGORY", required: true },
  { field: "week", header: "WEEK", required: false },
  { field: "reference", header: "REFERENCE", required: true },
  { field: "departmentCategory", header: "DEPARTMENT_CAT", required: true },
  { field: "batchNumber", header: "BATCH NO.", required: true },
  { field: "store", header: "STORE", required: true },
  { field: "receivedBy", header: "RECEIVED BY", required: true },
];

export interface ParseHistoryOptions {
  now?: Date;
  retentionYears?: number;
}

export const normalizeHeader = (value: unknown): string =>
  String(value ?? "")
    .replace(/^\uFEFF/, "")
    .toUpperCase()
    .replace(/[\s_.]+/g, "");

export const coerceQuantity = (cell: unknown): number | null => {
  if (typeof cell === "number") {
    return Number.isFinite(cell) ? cell : null;
  }
  if (typeof cell !== "string" || cell.trim().length === 0) {
    return null;
  }
  const parsed = Number(cell.trim());
  return Number.isFinite(parsed) ? parsed : null;
};

export const coerceDate = (cell: unknown): Date | null => {
  if (cell instanceof Date) {
    return Number.isNaN(cell.getTime()) ? null : cell;
  }
  if (typeof cell === "number" && Number.isFinite(cell)) {
    // spreadsheet serial day number, read as local wall-clock time
    const utc = new Date(Math.round((cell - EXCEL_EPOCH_OFFSET_DAYS) * MS_PER_DAY));
    return new Date(
      utc.getUTCFullYear(),
      utc.getUTCMonth(),
      utc.getUTCDate(),
      utc.getUTCHours(),
      utc.getUTCMinutes(),
      utc.getUTCSeconds()
    );
  }
  if (typeof cell === "string" && cell.trim().length > 0) {
    const dateOnly = cell.trim().match(DATE_ONLY_PATTERN);
    if (dateOnly) {
      const [, year, month, day] = dateOnly;
      const local = new Date(Number(year), Number(month) - 1, Number(day));
      return local.getDate() === Number(day) ? local : null;
    }
    const parsed = new Date(cell.trim());
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
};

const cellText = (cell: unknown): string => {
  if (cell === null || cell === undefined) {
    return "";
  }
  if (cell instanceof Date) {
    return cell.toISOString();
  }
  return String(cell);
};

/**
 * Converts raw sheet cells (header row first) into usage records.
 *
 * Rows without a numeric quantity or a parseable date are skipped, as are rows
 * older than the retention window (the current year plus the previous
 * `retentionYears - 1` years).
 */
export const parseHistoryTable = (
  rows: unknown[][],
  options: ParseHistoryOptions = {}
): CoreResult<IUsageRecord[]> => {
  const [header, ...body] = rows;
  if (!header || header.length === 0) {
    return fail("DataError", "History table is empty.");
  }

  const positions = new Map<string, number>();
  header.forEach((cell, index) => {
    const key = normalizeHeader(cell);
    if (key && !positions.has(key)) {
      positions.set(key, index);
    }
  });

  const required = ["DATE", "QUANTITY", ...TEXT_COLUMNS.filter((c) => c.required).map((c) => c.header)];
  const missing = required.filter((name) => !positions.has(normalizeHeader(name)));
  if (missing.length > 0) {
    return fail("DataError", `History table is missing columns: ${missing.join(", ")}`);
  }

  const now = options.now ?? new Date();
  const retentionYears = Math.max(1, options.retentionYears ?? 2);
  const earliestYear = now.getFullYear() - (retentionYears - 1);
  const column = (row: unknown[], name: string): unknown => {
    const index = positions.get(normalizeHeader(name));
    return index === undefined ? undefined : row[index];
  };

  const records: IUsageRecord[] = [];
  for (const row of body) {
    const quantity = coerceQuantity(column(row, "QUANTITY"));
    if (quantity === null) {
      continue;
    }
    const date = coerceDate(column(row, "DATE"));
    if (!date || date.getFullYear() < earliestYear) {
      continue;
    }
    const record: IUsageRecord = {
      date,
      quantity,
      itemSerial: "",
      itemName: "",
      department: "",
      issuedTo: "",
      unitOfMeasure: "",
      itemCategory: "",
      week: "",
      reference: "",
      departmentCategory: "",
      batchNumber: "",
      store: "",
      receivedBy: "",
    };
    for (const { field, header: name } of TEXT_COLUMNS) {
      record[field] = cellText(column(row, name));
    }
    records.push(record);
  }
  return ok(records);
};

export const readWorkbookRows = (workbook: XLSX.WorkBook, sheetName?: string): unknown[][] => {
  const name = sheetName ?? workbook.SheetNames[0];
  const sheet = name ? workbook.Sheets[name] : undefined;
  if (!sheet) {
    throw new Error(`Sheet "${name ?? ""}" not found in workbook.`);
  }
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: "",
    blankrows: false,
  });
};

/** CSV cells stay strings; DATE and QUANTITY are coerced by `parseHistoryTable`. */
export const parseCsvText = (text: string): unknown[][] =>
  readWorkbookRows(XLSX.read(text, { type: "string", raw: true }));

export const readTableFile = async (filePath: string, sheetName?: string): Promise<unknown[][]> => {
  if (path.extname(filePath).toLowerCase() === ".csv") {
    return parseCsvText(await fs.readFile(filePath, "utf-8"));
  }
  const buffer = await fs.readFile(filePath);
  return readWorkbookRows(XLSX.read(buffer, { type: "buffer", cellDates: true }), sheetName);
};

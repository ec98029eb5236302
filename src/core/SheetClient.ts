import axios, { AxiosInstance } from "axios";
import dotenv from "dotenv";

import { parseCsvText } from "../utils/history-table";

dotenv.config();

export interface SheetClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  initialBackoffMs?: number;
  http?: AxiosInstance;
}

const DEFAULT_BASE_URL = "https://docs.google.com/spreadsheets/d";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

export const buildExportPath = (spreadsheetId: string, sheetName: string): string =>
  `/${encodeURIComponent(spreadsheetId)}/gviz/tq?tqx=out:csv&sheet=${encodeURIComponent(
    sheetName
  )}`;

/** Downloads a worksheet through the Google Sheets CSV export endpoint. */
export class SheetClient {
  private readonly client: AxiosInstance;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;

  constructor(options: SheetClientOptions = {}) {
    const token = process.env.GOOGLE_SHEETS_TOKEN;
    this.client =
      options.http ??
      axios.create({
        baseURL: options.baseUrl ?? DEFAULT_BASE_URL,
        timeout: options.timeoutMs ?? 30_000,
        responseType: "text",
        headers: {
          Accept: "text/csv",
          ...(token ? { Authorization: `Bearer ${token}` } : {}),
        },
      });
    this.maxRetries = options.maxRetries ?? 4;
    this.initialBackoffMs = options.initialBackoffMs ?? 1_000;
  }

  async fetchCsv(spreadsheetId: string, sheetName: string): Promise<string> {
    let attempt = 0;
    let backoff = this.initialBackoffMs;
    while (true) {
      try {
        const response = await this.client.get<string>(
          buildExportPath(spreadsheetId, sheetName),
          { responseType: "text" }
        );
        if (typeof response.data !== "string") {
          throw new Error("Sheet export did not return CSV text.");
        }
        return response.data;
      } catch (error) {
        const status = axios.isAxiosError(error) ? error.response?.status : undefined;
        const isTimeout =
          axios.isAxiosError(error) &&
          (error.code === "ECONNABORTED" || error.message.includes("timeout"));
        const shouldRetry =
          isTimeout || status === 429 || status === 500 || status === 503;
        if (!shouldRetry || attempt >= this.maxRetries) {
          const message = error instanceof Error ? error.message : String(error);
          const statusInfo = status ? ` (status ${status})` : "";
          throw new Error(`Sheet request failed${statusInfo}: ${message}`);
        }
        const retryAfter = axios.isAxiosError(error)
          ? Number(error.response?.headers?.["retry-after"])
          : NaN;
        const retryAfterMs = Number.isFinite(retryAfter) ? retryAfter * 1000 : 0;
        await sleep(Math.max(backoff, retryAfterMs));
        backoff *= 2;
        attempt += 1;
      }
    }
  }

  async fetchTable(spreadsheetId: string, sheetName: string): Promise<unknown[][]> {
    const csv = await this.fetchCsv(spreadsheetId, sheetName);
    const rows = parseCsvText(csv);
    if (rows.length === 0) {
      throw new Error(`No data found in sheet "${sheetName}".`);
    }
    return rows;
  }
}

import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import assert from "node:assert/strict";

import { buildExportPath, SheetClient } from "../src/core/SheetClient";

type Reply = { status: number; data: string };

const scriptedHttp = (replies: Reply[]) => {
  const requested: string[] = [];
  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      requested.push(config.url ?? "");
      const reply = replies.shift() ?? { status: 500, data: "" };
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      };
      if (reply.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${reply.status}`,
          "ERR_BAD_RESPONSE",
          config,
          null,
          response
        );
      }
      return response;
    },
  });
  return { http, requested };
};

export const tests = [
  {
    name: "buildExportPath encodes the sheet name",
    run: () => {
      assert.equal(
        buildExportPath("sheet-123", "CHECK OUT"),
        "/sheet-123/gviz/tq?tqx=out:csv&sheet=CHECK%20OUT"
      );
    },
  },
  {
    name: "SheetClient retries transient failures and parses the CSV",
    run: async () => {
      const { http, requested } = scriptedHttp([
        { status: 503, data: "" },
        { status: 200, data: "DATE,QUANTITY\nx,3\n" },
      ]);
      const client = new SheetClient({ http, initialBackoffMs: 0 });
      const rows = await client.fetchTable("sheet-123", "CHECK_OUT");
      assert.equal(requested.length, 2);
      assert.equal(requested[1], "/sheet-123/gviz/tq?tqx=out:csv&sheet=CHECK_OUT");
      assert.deepEqual(rows, [
        ["DATE", "QUANTITY"],
        ["x", "3"],
      ]);
    },
  },
  {
    name: "SheetClient surfaces non-retryable failures",
    run: async () => {
      const { http } = scriptedHttp([{ status: 404, data: "missing" }]);
      const client = new SheetClient({ http, initialBackoffMs: 0 });
      await assert.rejects(
        client.fetchCsv("sheet-123", "CHECK_OUT"),
        /Sheet request failed \(status 404\)/
      );
    },
  },
  {
    name: "SheetClient gives up after maxRetries",
    run: async () => {
      const { http, requested } = scriptedHttp([
        { status: 429, data: "" },
        { status: 429, data: "" },
        { status: 429, data: "" },
      ]);
      const client = new SheetClient({ http, initialBackoffMs: 0, maxRetries: 2 });
      await assert.rejects(client.fetchCsv("sheet-123", "CHECK_OUT"), /status 429/);
      assert.equal(requested.length, 3);
    },
  },
];

import { promises as fs } from "fs";
import path from "path";
import { createObjectCsvWriter } from "csv-writer";

import type { AllocationRow } from "./format";
import { buildExportName, formatRunTimestamp } from "./run-naming";

export const writeAllocationCsv = async (params: {
  outputDir: string;
  itemName: string;
  rows: AllocationRow[];
  now?: Date;
}): Promise<string> => {
  await fs.mkdir(params.outputDir, { recursive: true });
  const filePath = path.join(
    params.outputDir,
    buildExportName({
      timestamp: formatRunTimestamp(params.now ?? new Date()),
      kind: "allocation",
      subject: params.itemName,
    })
  );
  const writer = createObjectCsvWriter({
    path: filePath,
    header: [
      { id: "department", title: "Department" },
      { id: "proportion", title: "Proportion (%)" },
      { id: "allocatedQuantity", title: "Allocated Quantity" },
    ],
  });
  await writer.writeRecords(params.rows);
  return filePath;
};

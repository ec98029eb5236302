import type { CoreResult, IUsageRecord } from "../types";
import { fail, ok } from "../types/result";

export interface UsagePoint {
  date: Date;
  quantity: number;
}

export interface QuarterTotal {
  quarter: string;
  quantity: number;
}

export interface UsageHistory {
  itemName: string;
  points: UsagePoint[];
  quarters: QuarterTotal[];
}

export const quarterLabel = (date: Date): string =>
  `${date.getFullYear()}Q${Math.floor(date.getMonth() / 3) + 1}`;

export const buildUsageHistory = (
  history: readonly IUsageRecord[],
  itemName: string
): CoreResult<UsageHistory> => {
  const needle = itemName.trim().toLowerCase();
  const points = history
    .filter((record) => record.itemName.toLowerCase() === needle)
    .map((record) => ({ date: record.date, quantity: record.quantity }))
    .sort((a, b) => a.date.getTime() - b.date.getTime());
  if (points.length === 0) {
    return fail("NotFound", `No historical usage data found for ${itemName}.`);
  }

  const quarters = new Map<string, number>();
  for (const point of points) {
    const label = quarterLabel(point.date);
    quarters.set(label, (quarters.get(label) ?? 0) + point.quantity);
  }

  return ok({
    itemName,
    points,
    quarters: Array.from(quarters.entries()).map(([quarter, quantity]) => ({ quarter, quantity })),
  });
};

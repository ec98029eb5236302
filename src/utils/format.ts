import type { IAllocationResult } from "../types";
import { roundTo } from "./rounding";

export interface AllocationRow {
  department: string;
  proportion: number;
  allocatedQuantity: number;
}

export const formatAllocationRows = (results: IAllocationResult[]): AllocationRow[] =>
  results.map((result) => ({
    department: result.department,
    proportion: roundTo(result.proportion, 2),
    allocatedQuantity: Math.trunc(result.allocatedQuantity),
  }));

export const formatNumber = (value: number, decimals = 2): string =>
  roundTo(value, decimals).toLocaleString("en-US", {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  });

export const formatDate = (date: Date): string => {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
};

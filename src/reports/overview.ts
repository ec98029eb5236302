import type { IUsageRecord } from "../types";
import { formatDate } from "../utils/format";

export const PREVIEW_LIMIT = 100;

export interface OverviewFilters {
  /** Inclusive calendar dates, compared as YYYY-MM-DD. */
  from?: string;
  to?: string;
  categories?: string[];
  items?: string[];
  departments?: string[];
}

export interface DepartmentUsage {
  department: string;
  quantity: number;
}

export interface UsageOverview {
  preview: IUsageRecord[];
  totalQuantity: number;
  uniqueItems: number;
  transactions: number;
  departmentUsage: DepartmentUsage[];
}

const inList = (value: string, list?: string[]): boolean =>
  !list || list.length === 0 || list.includes(value);

export const filterHistory = (
  history: readonly IUsageRecord[],
  filters: OverviewFilters
): IUsageRecord[] =>
  history.filter((record) => {
    const key = formatDate(record.date);
    if (filters.from && key < filters.from) {
      return false;
    }
    if (filters.to && key > filters.to) {
      return false;
    }
    return (
      inList(record.itemCategory, filters.categories) &&
      inList(record.itemName, filters.items) &&
      inList(record.department, filters.departments)
    );
  });

export const summarizeByDepartment = (records: readonly IUsageRecord[]): DepartmentUsage[] => {
  const totals = new Map<string, number>();
  for (const record of records) {
    totals.set(record.department, (totals.get(record.department) ?? 0) + record.quantity);
  }
  return Array.from(totals.entries())
    .map(([department, quantity]) => ({ department, quantity }))
    .sort((a, b) => b.quantity - a.quantity || (a.department < b.department ? -1 : 1));
};

export const buildOverview = (
  history: readonly IUsageRecord[],
  filters: OverviewFilters = {}
): UsageOverview => {
  const filtered = filterHistory(history, filters);
  return {
    preview: filtered.slice(0, PREVIEW_LIMIT),
    totalQuantity: filtered.reduce((sum, record) => sum + record.quantity, 0),
    uniqueItems: new Set(filtered.map((record) => record.itemName)).size,
    transactions: filtered.length,
    departmentUsage: summarizeByDepartment(filtered),
  };
};

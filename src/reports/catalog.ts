import type { IUsageRecord } from "../types";
import { ALL_DEPARTMENTS } from "../types/usage";

const uniqueSorted = (values: string[]): string[] =>
  Array.from(new Set(values)).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

export const listItemNames = (history: readonly IUsageRecord[]): string[] =>
  uniqueSorted(history.map((record) => record.itemName));

export const listDepartments = (history: readonly IUsageRecord[]): string[] => [
  ALL_DEPARTMENTS,
  ...uniqueSorted(history.map((record) => record.department)),
];

export const listCategories = (history: readonly IUsageRecord[]): string[] =>
  uniqueSorted(history.map((record) => record.itemCategory));

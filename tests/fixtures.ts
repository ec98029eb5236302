import type { IUsageRecord } from "../src/types";

export const makeRecord = (overrides: Partial<IUsageRecord> = {}): IUsageRecord => ({
  date: new Date(2026, 0, 5),
  itemSerial: "1001",
  itemName: "Sugar",
  department: "Bakery",
  issuedTo: "Line A",
  quantity: 1,
  unitOfMeasure: "KG",
  itemCategory: "Dry Goods",
  week: "2",
  reference: "REQ-100",
  departmentCategory: "Production",
  batchNumber: "B-01",
  store: "Main Store",
  receivedBy: "Sam",
  ...overrides,
});

export const usage = (
  itemName: string,
  entries: Array<[department: string, quantity: number]>
): IUsageRecord[] =>
  entries.map(([department, quantity]) => makeRecord({ itemName, department, quantity }));

export const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0);

export const assertClose = (actual: number, expected: number, tolerance = 1e-6): void => {
  if (Math.abs(actual - expected) > tolerance) {
    throw new Error(`Expected ${actual} to be within ${tolerance} of ${expected}`);
  }
};

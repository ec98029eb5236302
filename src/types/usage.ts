export interface IUsageRecord {
  date: Date;
  itemSerial: string;
  itemName: string;
  department: string;
  issuedTo: string;
  quantity: number;
  unitOfMeasure: string;
  itemCategory: string;
  week: string;
  reference: string;
  departmentCategory: string;
  batchNumber: string;
  store: string;
  receivedBy: string;
}

export type Identifier =
  | { kind: "serial"; value: string }
  | { kind: "name"; value: string };

export interface IDepartmentShare {
  department: string;
  quantity: number;
  proportion: number;
  weight: number;
}

export interface IAllocationResult {
  department: string;
  proportion: number;
  allocatedQuantity: number;
}

export const ALL_DEPARTMENTS = "All Departments";

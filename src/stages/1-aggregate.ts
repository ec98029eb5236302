import type { CoreResult, IDepartmentShare, Identifier, IUsageRecord } from "../types";
import { fail, ok } from "../types/result";
import { ALL_DEPARTMENTS } from "../types/usage";
import { describeIdentifier } from "../utils/identifier";

export const DEFAULT_MIN_PROPORTION = 1.0;

export interface AggregateOptions {
  department?: string;
  minProportion?: number;
}

const matchesIdentifier = (record: IUsageRecord, identifier: Identifier): boolean => {
  const needle = identifier.value.toLowerCase();
  if (identifier.kind === "serial") {
    return String(record.itemSerial).toLowerCase() === needle;
  }
  return typeof record.itemName === "string" && record.itemName.toLowerCase() === needle;
};

const compareDepartments = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const sumByDepartment = (
  records: IUsageRecord[]
): CoreResult<Array<{ department: string; quantity: number }>> => {
  const totals = new Map<string, number>();
  for (const record of records) {
    if (typeof record.department !== "string") {
      return fail("DataError", "Usage record is missing its department.");
    }
    if (typeof record.quantity !== "number" || !Number.isFinite(record.quantity)) {
      return fail(
        "DataError",
        `Usage record for ${record.department} has a non-numeric quantity.`
      );
    }
    totals.set(record.department, (totals.get(record.department) ?? 0) + record.quantity);
  }
  return ok(
    Array.from(totals.entries())
      .map(([department, quantity]) => ({ department, quantity }))
      .sort((a, b) => compareDepartments(a.department, b.department))
  );
};

/**
 * Turns an item's issuance history into per-department shares.
 *
 * Departments under `minProportion` percent are dropped and the rest are
 * renormalized to 100. When every department falls under the threshold the
 * largest one is kept on its own.
 */
export const aggregateUsage = (
  history: readonly IUsageRecord[],
  identifier: Identifier,
  options: AggregateOptions = {}
): CoreResult<IDepartmentShare[]> => {
  const minProportion = options.minProportion ?? DEFAULT_MIN_PROPORTION;
  if (!Number.isFinite(minProportion)) {
    return fail("InvalidInput", "Minimum proportion must be a finite number.");
  }

  const label = describeIdentifier(identifier);
  let matched = history.filter((record) => matchesIdentifier(record, identifier));
  if (matched.length === 0) {
    return fail("NotFound", `Item ${label} not found in historical data.`);
  }

  const department = options.department;
  if (department && department !== ALL_DEPARTMENTS) {
    matched = matched.filter((record) => record.department === department);
    if (matched.length === 0) {
      return fail("NotFound", `Item ${label} has no usage data for ${department}.`);
    }
  }

  const grouped = sumByDepartment(matched);
  if (!grouped.ok) {
    return grouped;
  }

  const totalUsage = grouped.value.reduce((sum, group) => sum + group.quantity, 0);
  if (totalUsage === 0) {
    return fail("NotFound", `Item ${label} has zero total usage.`);
  }

  const withProportions = grouped.value.map((group) => ({
    ...group,
    proportion: (group.quantity / totalUsage) * 100,
  }));

  let significant = withProportions.filter((group) => group.proportion >= minProportion);
  if (significant.length === 0) {
    const largest = withProportions.reduce((best, group) =>
      group.proportion > best.proportion ? group : best
    );
    significant = [largest];
  }

  const proportionSum = significant.reduce((sum, group) => sum + group.proportion, 0);
  const absoluteSum = significant.reduce((sum, group) => sum + Math.abs(group.quantity), 0);

  const shares: IDepartmentShare[] = significant.map((group) => ({
    department: group.department,
    quantity: group.quantity,
    proportion: (group.proportion / proportionSum) * 100,
    weight: absoluteSum === 0 ? 0 : Math.abs(group.quantity) / absoluteSum,
  }));

  shares.sort(
    (a, b) => b.proportion - a.proportion || compareDepartments(a.department, b.department)
  );
  return ok(shares);
};

import type { CoreResult, IAllocationResult, Identifier, IUsageRecord } from "../types";
import { fail, ok } from "../types/result";
import { reconcileDrift } from "../utils/allocations";
import { roundHalfAwayFromZero } from "../utils/rounding";
import { aggregateUsage, DEFAULT_MIN_PROPORTION } from "./1-aggregate";

export const allocateQuantity = (
  history: readonly IUsageRecord[],
  identifier: Identifier,
  availableQuantity: number,
  options: { department?: string } = {}
): CoreResult<IAllocationResult[]> => {
  if (!Number.isFinite(availableQuantity) || availableQuantity <= 0) {
    return fail("InvalidInput", "Available quantity must be a positive number.");
  }

  const shares = aggregateUsage(history, identifier, {
    department: options.department,
    minProportion: DEFAULT_MIN_PROPORTION,
  });
  if (!shares.ok) {
    return shares;
  }

  const counts = reconcileDrift(
    shares.value.map((share) =>
      roundHalfAwayFromZero((share.proportion / 100) * availableQuantity)
    ),
    roundHalfAwayFromZero(availableQuantity)
  );

  return ok(
    shares.value.map((share, index) => ({
      department: share.department,
      proportion: share.proportion,
      allocatedQuantity: counts[index],
    }))
  );
};

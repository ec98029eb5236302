/**
 * Moves the whole rounding drift onto the largest count so the counts add up
 * to `total`. Ties go to the earliest index.
 */
export const reconcileDrift = (counts: number[], total: number): number[] => {
  const reconciled = [...counts];
  if (reconciled.length === 0) {
    return reconciled;
  }

  const drift = total - reconciled.reduce((sum, count) => sum + count, 0);
  if (drift === 0) {
    return reconciled;
  }

  let largestIndex = 0;
  reconciled.forEach((count, index) => {
    if (count > reconciled[largestIndex]) {
      largestIndex = index;
    }
  });
  reconciled[largestIndex] += drift;
  return reconciled;
};

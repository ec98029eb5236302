/** Rounds to the nearest integer, with exact halves moving away from zero (2.5 → 3, -2.5 → -3). */
export const roundHalfAwayFromZero = (value: number): number =>
  Math.sign(value) * Math.round(Math.abs(value));

export const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return roundHalfAwayFromZero(value * factor) / factor;
};

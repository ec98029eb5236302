export interface AllocationEntry {
  identifier: string;
  quantity: number;
}

/** Parses an `item=quantity` pair; the last "=" separates the two so names may contain "=". */
export const parseAllocationEntry = (raw: string): AllocationEntry => {
  const separator = raw.lastIndexOf("=");
  if (separator <= 0) {
    throw new Error(`Invalid allocation entry "${raw}". Use item=quantity.`);
  }
  const identifier = raw.slice(0, separator).trim();
  const quantityText = raw.slice(separator + 1).trim();
  const quantity = Number(quantityText);
  if (!identifier || !quantityText || !Number.isFinite(quantity) || quantity <= 0) {
    throw new Error(`Invalid allocation entry "${raw}". Quantity must be a positive number.`);
  }
  return { identifier, quantity };
};

import { z } from "zod";

import type { CoreResult, IUsageRecord } from "../types";
import { fail, ok } from "../types/result";

const IssuanceDraftSchema = z.object({
  date: z.date(),
  itemName: z.string().min(1),
  quantity: z.number().finite().positive(),
  department: z.string().min(1),
  issuedTo: z.string(),
  unitOfMeasure: z.string(),
  itemCategory: z.string(),
  reference: z.string(),
  departmentCategory: z.string(),
  batchNumber: z.string(),
  store: z.string(),
  receivedBy: z.string(),
});

export type IssuanceDraft = z.infer<typeof IssuanceDraftSchema>;

export type IssuanceInput = Partial<Omit<IssuanceDraft, "itemName" | "quantity">> & {
  itemName: string;
  quantity: number;
};

/**
 * Prefills an issuance entry from the item's first recorded issuance. The draft
 * is for display only; nothing is written back to the source.
 */
export const buildIssuanceDraft = (
  history: readonly IUsageRecord[],
  input: IssuanceInput,
  now: Date = new Date()
): CoreResult<IssuanceDraft> => {
  const template = history.find((record) => record.itemName === input.itemName);
  if (!template) {
    return fail("NotFound", `Item ${input.itemName} not found in historical data.`);
  }

  const result = IssuanceDraftSchema.safeParse({
    date: input.date ?? now,
    itemName: template.itemName,
    quantity: input.quantity,
    department: input.department ?? template.department,
    issuedTo: input.issuedTo ?? template.issuedTo,
    unitOfMeasure: input.unitOfMeasure ?? template.unitOfMeasure,
    itemCategory: input.itemCategory ?? template.itemCategory,
    reference: input.reference ?? template.reference,
    departmentCategory: input.departmentCategory ?? template.departmentCategory,
    batchNumber: input.batchNumber ?? template.batchNumber,
    store: input.store ?? template.store,
    receivedBy: input.receivedBy ?? template.receivedBy,
  });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return fail("InvalidInput", `Invalid issuance: ${details}`);
  }
  return ok(result.data);
};

import type { CoreResult, Identifier } from "../types";
import { fail, ok } from "../types/result";

const NUMERIC_PATTERN = /^\d+$/;

export const resolveIdentifier = (raw: string): CoreResult<Identifier> => {
  const value = raw.trim();
  if (!value) {
    return fail("InvalidInput", "Item identifier must not be empty.");
  }
  return ok(NUMERIC_PATTERN.test(value) ? { kind: "serial", value } : { kind: "name", value });
};

export const describeIdentifier = (identifier: Identifier): string =>
  identifier.kind === "serial" ? `serial ${identifier.value}` : identifier.value;

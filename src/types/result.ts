export type CoreErrorKind = "NotFound" | "InvalidInput" | "DataError";

export interface CoreError {
  kind: CoreErrorKind;
  message: string;
}

export type CoreResult<T> = { ok: true; value: T } | { ok: false; error: CoreError };

export const ok = <T>(value: T): CoreResult<T> => ({ ok: true, value });

export const fail = <T = never>(kind: CoreErrorKind, message: string): CoreResult<T> => ({
  ok: false,
  error: { kind, message },
});

// Errors raised by Node's fs can come from another realm (Jest's sandbox), so
// `instanceof Error` is not reliable for them; read the fields structurally.

export const errorCode = (err: unknown): string | undefined =>
  typeof err === "object" &&
  err !== null &&
  "code" in err &&
  typeof err.code === "string"
    ? err.code
    : undefined;

export const isNotFound = (err: unknown): boolean => errorCode(err) === "ENOENT";

export const errorMessage = (err: unknown): string =>
  typeof err === "object" &&
  err !== null &&
  "message" in err &&
  typeof err.message === "string"
    ? err.message
    : String(err);

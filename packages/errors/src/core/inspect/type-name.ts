/** Type name reported for thrown values that are not `Error` instances. */
export const NON_ERROR_TYPE_NAME = "NonErrorThrown"

/**
 * Runtime type name of an error: the name of the class it was constructed from,
 * so `class PaymentDeclined extends Error` reports `PaymentDeclined` even when
 * `error.name` was left as `"Error"`.
 */
export function errorTypeName(error: Error): string {
  const ctorName: unknown = Object.getPrototypeOf(error)?.constructor?.name

  if (typeof ctorName === "string" && ctorName.length > 0) return ctorName

  return error.name || "Error"
}

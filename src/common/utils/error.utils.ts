/**
 * Error Utilities
 */

export function asError(e: unknown): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(typeof e === "string" ? e : `Unknown object thrown as error: ${JSON.stringify(e)}`);
}

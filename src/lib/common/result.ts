import { DateConversionError } from "./errors";

export type ConversionResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DateConversionError };

/** Runs fn and returns its value or the conversion error it threw.
 * - Any other error is rethrown.
 */
export function attempt<T>(fn: () => T): ConversionResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    if (err instanceof DateConversionError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

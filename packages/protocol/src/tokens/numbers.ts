/**
 * Numeric token readers. Both return undefined instead of NaN.
 */

const UNSIGNED = /^\d+$/;
const SIGNED = /^[-+]?\d+$/;

/**
 * Read a non-negative decimal integer
 */
export function readUnsigned(token: string): number | undefined {
  if (!UNSIGNED.test(token)) return undefined;
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Read a decimal integer with an optional sign
 */
export function readSigned(token: string): number | undefined {
  if (!SIGNED.test(token)) return undefined;
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : undefined;
}

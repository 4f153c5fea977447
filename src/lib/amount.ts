/**
 * Currency amount helpers
 * Amounts are integers in the smallest unit (18 decimals), held as bigint
 * in memory and as decimal strings in JSON.
 */

export const AMOUNT_DECIMALS = 18;

const INTEGER_PATTERN = /^\d+$/;

/**
 * Parse a non-negative decimal integer string
 */
export function parseAmount(value: string): bigint {
  if (!INTEGER_PATTERN.test(value)) {
    throw new RangeError(`Invalid amount: "${value}"`);
  }
  return BigInt(value);
}

/**
 * Convert a whole-unit decimal ("0.01") into the smallest unit
 */
export function parseUnits(value: string, decimals = AMOUNT_DECIMALS): bigint {
  const match = /^(\d+)(?:\.(\d+))?$/.exec(value.trim());
  if (!match) {
    throw new RangeError(`Invalid decimal amount: "${value}"`);
  }
  const [, whole, fraction = ""] = match;
  if (fraction.length > decimals) {
    throw new RangeError(`Too many decimal places in "${value}"`);
  }
  return BigInt(whole + fraction.padEnd(decimals, "0"));
}

/**
 * Render an amount in whole units, trimming trailing zeros ("0.04")
 */
export function formatUnits(amount: bigint, decimals = AMOUNT_DECIMALS): string {
  const negative = amount < 0n;
  const digits = (negative ? -amount : amount).toString().padStart(decimals + 1, "0");
  const whole = digits.slice(0, digits.length - decimals);
  const fraction = digits.slice(digits.length - decimals).replace(/0+$/, "");
  const sign = negative ? "-" : "";
  return fraction ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
}

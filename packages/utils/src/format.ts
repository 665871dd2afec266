/**
 * Group the digits of an integer by thousands with underscores: `1234567` -> `1_234_567`
 */
export function groupDigits(value: bigint | number): string {
  const str = BigInt(value).toString();
  const negative = str.startsWith("-");
  const digits = negative ? str.slice(1) : str;
  const grouped = digits.replace(/\B(?=(\d{3})+(?!\d))/g, "_");
  return negative ? `-${grouped}` : grouped;
}

/**
 * Engineering notation with two decimals and an exponent padded to two digits.
 * The exponent is always a multiple of 3: `123456789` -> `123.46e06`
 */
export function engineeringNotation(value: bigint): string {
  const negative = value < BigInt(0);
  const abs = negative ? -value : value;
  if (abs === BigInt(0)) {
    return "0.00e00";
  }

  const order = abs.toString().length - 1;
  const exponent = 3 * Math.floor(order / 3);
  const divisor = BigInt(10) ** BigInt(exponent);
  // Mantissa scaled by 100, rounded half up
  const scaled = (abs * BigInt(100) + divisor / BigInt(2)) / divisor;
  const whole = scaled / BigInt(100);
  const fraction = (scaled % BigInt(100)).toString().padStart(2, "0");

  return `${negative ? "-" : ""}${whole}.${fraction}e${String(exponent).padStart(2, "0")}`;
}

/**
 * Format an integer for logs. Small values are printed in full, large ones (eg. token amounts)
 * are printed as `18.45e18 (18_446_744_073_709_551_615)`
 */
export function prettyInt(value: bigint | number): string {
  const big = BigInt(value);
  const abs = big < BigInt(0) ? -big : big;
  if (abs < BigInt(100_000)) {
    return groupDigits(big);
  }
  return `${engineeringNotation(big)} (${groupDigits(big)})`;
}

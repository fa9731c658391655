export const VALUE_TOLERANCE = 1e-4;

const wholeNumber = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });
const twoDecimals = new Intl.NumberFormat("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export function isNearlyEqual(a: number, b: number, tolerance = VALUE_TOLERANCE): boolean {
  return Math.abs(a - b) < tolerance;
}

/** Whole values get thousands grouping, anything else two decimals. */
export function formatStatValue(value: number): string {
  const whole = Math.trunc(value);
  return isNearlyEqual(0, value - whole) ? wholeNumber.format(whole) : twoDecimals.format(value);
}

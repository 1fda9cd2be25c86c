/**
 * Rounds a monetary value to 2 decimals.
 *
 * The result is the nearest cent to the exact binary value of `value`
 * (so 2.675, stored as 2.67499..., becomes 2.67). Exact ties can only occur
 * for multiples of 1/8 and go to the even cent: 0.125 -> 0.12, 0.375 -> 0.38.
 */
export function roundMoney(value: number): number {
  if (!Number.isFinite(value)) {
    return value;
  }

  const eighths = value * 8;
  if (Number.isInteger(eighths)) {
    const thousandths = Math.abs(eighths * 125);
    if (thousandths % 10 === 5) {
      const cents = Math.floor(thousandths / 10);
      const even = cents % 2 === 0 ? cents : cents + 1;
      return (Math.sign(value) * even) / 100;
    }
  }

  return Number(value.toFixed(2));
}

// Left-to-right, unrounded.
export function sumMoney(values: Iterable<number>): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}

export function hasAtMostTwoDecimals(value: number): boolean {
  return Number.isFinite(value) && roundMoney(value) === value;
}

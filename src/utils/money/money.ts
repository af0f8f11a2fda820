/**
 * Rounds a monetary amount to whole cents
 */
export function roundCurrency(amount: number): number {
  return Math.round((amount + Number.EPSILON) * 100) / 100;
}

/**
 * Sums amounts and rounds the total to cents
 */
export function sumAmounts(amounts: number[]): number {
  return roundCurrency(amounts.reduce((total, amount) => total + amount, 0));
}

// src/budget/money.ts
// Totals are summed in integer cents; floats only at the edges.

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

export function formatMoney(amount: number, currency = "BRL"): string {
  const symbol = currency === "BRL" ? "R$" : currency;
  return `${symbol} ${amount.toFixed(2)}`;
}

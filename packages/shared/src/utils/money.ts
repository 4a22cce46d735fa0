function toCents(dollars: number): number {
  return Math.round(dollars * 100);
}

function toDollars(cents: number): number {
  return cents / 100;
}

function addMoney(...amounts: number[]): number {
  const totalCents = amounts.reduce((sum, amt) => sum + toCents(amt), 0);
  return toDollars(totalCents);
}

function subtractMoney(a: number, b: number): number {
  return toDollars(toCents(a) - toCents(b));
}

function multiplyMoney(amount: number, qty: number): number {
  return toDollars(Math.round(toCents(amount) * qty));
}

/** Round half away from zero to `decimals` places (0 for JPY-style currencies). */
function roundMoney(amount: number, decimals: number = 2): number {
  const factor = 10 ** decimals;
  const scaled = Math.round((Math.abs(amount) + Number.EPSILON) * factor);
  return (Math.sign(amount) * scaled) / factor;
}

function formatMoney(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

export { toCents, toDollars, addMoney, subtractMoney, multiplyMoney, roundMoney, formatMoney };

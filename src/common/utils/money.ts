import Decimal from 'decimal.js';

export type MoneyInput = Decimal.Value | null | undefined;

/**
 * Rounds to cents (half-up) and returns a plain number.
 * Every balance written to a loan, payment or installment goes through here.
 */
export function toMoney(value: MoneyInput): number {
  if (value === null || value === undefined) return 0;
  return new Decimal(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}

export function addMoney(...values: MoneyInput[]): number {
  const total = values.reduce<Decimal>(
    (sum, value) => sum.plus(value ?? 0),
    new Decimal(0),
  );
  return toMoney(total);
}

export function subtractMoney(minuend: MoneyInput, subtrahend: MoneyInput): number {
  return toMoney(new Decimal(minuend ?? 0).minus(subtrahend ?? 0));
}

export function minMoney(a: MoneyInput, b: MoneyInput): number {
  return toMoney(Decimal.min(a ?? 0, b ?? 0));
}

export function compareMoney(a: MoneyInput, b: MoneyInput): number {
  return new Decimal(toMoney(a)).comparedTo(toMoney(b));
}

export function isZero(value: MoneyInput): boolean {
  return compareMoney(value, 0) === 0;
}

export function formatMoney(value: MoneyInput): string {
  return new Decimal(toMoney(value)).toFixed(2);
}

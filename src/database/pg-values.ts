import { toMoney } from '../common/utils/money';

// NUMERIC and BIGINT arrive from pg as strings; DATE is kept as 'YYYY-MM-DD' (see DatabaseService).

export function numeric(value: string | number | null): number {
  return value === null ? 0 : toMoney(value);
}

export function nullableNumeric(value: string | number | null): number | null {
  return value === null ? null : toMoney(value);
}

export function dateOnly(value: string | Date): Date {
  if (value instanceof Date) return value;
  return new Date(`${value}T00:00:00.000Z`);
}

export function nullableDate(value: string | Date | null): Date | null {
  if (value === null) return null;
  return value instanceof Date ? value : new Date(value);
}

export function toDateOnlyString(value: Date): string {
  return value.toISOString().slice(0, 10);
}

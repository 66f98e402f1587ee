export type Row = Record<string, unknown>;

export function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toRows(values: unknown[]): Row[] {
  return values.filter(isRow);
}

export const nullableString = (value: unknown): string | null => (value == null ? null : String(value));
export const nullableNumber = (value: unknown): number | null => (value == null ? null : Number(value));

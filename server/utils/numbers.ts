// Value coercion for rows coming back from either driver: pg returns
// numeric/boolean natively, SQLite returns 0/1 and plain numbers.

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function parseNum(val: unknown): number {
  if (typeof val === 'number') return Number.isFinite(val) ? val : 0;
  if (typeof val === 'bigint') return Number(val);
  if (typeof val === 'string') {
    const n = parseFloat(val);
    return Number.isNaN(n) ? 0 : n;
  }
  return 0;
}

export function parseIntSafe(val: unknown): number {
  return Math.trunc(parseNum(val));
}

export function toBool(val: unknown): boolean {
  return val === true || val === 1 || val === '1' || val === 't' || val === 'true';
}

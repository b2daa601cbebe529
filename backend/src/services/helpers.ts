// ═══════════════════════════════════════════════════════
// helpers.ts — Pure utility functions (zero dependencies)
// ═══════════════════════════════════════════════════════

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const POSITIVE_INT = /^\+?\d+$/;
const DECIMAL = /^\+?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Largest value of an INTEGER (int4) id column. */
export const MAX_ID = 2_147_483_647;

/** True for a real calendar date in YYYY-MM-DD form ("2025-02-30" is false). */
export function isIsoDate(value: string): boolean {
  const m = ISO_DATE.exec(value);
  if (!m) return false;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (month < 1 || month > 12 || day < 1) return false;
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

/** Local calendar date as YYYY-MM-DD */
export function toIsoDate(d: Date): string {
  return `${d.getFullYear()}-${String(d.getMonth() + 1).padStart(2, '0')}-${String(d.getDate()).padStart(2, '0')}`;
}

/** Parse "42" → 42. Zero, ids above MAX_ID, signs other than +, decimals and blanks → null. */
export function parsePositiveInt(raw: string): number | null {
  const s = raw.trim();
  if (!POSITIVE_INT.test(s)) return null;
  const n = Number(s);
  return Number.isSafeInteger(n) && n > 0 && n <= MAX_ID ? n : null;
}

/** Parse a non-negative decimal ("12", "0.5", "1e3"). Anything else → null. */
export function parseAmount(raw: string): number | null {
  const s = raw.trim();
  if (!DECIMAL.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/** First string of a query/form value (repeated keys arrive as arrays). */
export function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === 'string' ? first : undefined;
  }
  return undefined;
}

/** Safe division with configurable decimal places */
export function safeDiv(num: number, den: number, decimals = 2): number {
  if (den === 0) return 0;
  return +((num / den).toFixed(decimals));
}

export const byName = <T extends { name: string }>(a: T, b: T): number => a.name.localeCompare(b.name);

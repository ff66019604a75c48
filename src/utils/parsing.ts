export const MAX_SCALE_FACTOR = 10;
export const MAX_PAGE_LIMIT = 500;

const WALLET_ADDRESS_PATTERN = /^0x[a-fA-F0-9]{40}$/;

/**
 * Loose boolean from JSON bodies and query strings ("true", "1", "on", ...).
 * Returns undefined for absent values and for anything it cannot read.
 */
export function parseBooleanInput(v: unknown): boolean | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'boolean') return v;
  if (typeof v === 'number') return v !== 0;
  if (typeof v === 'string') {
    const normalized = v.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  }
  return undefined;
}

/**
 * Scale factor in (0, 10]. Absent means 1.0; invalid means null.
 */
export function parseScaleFactor(v: unknown): number | null {
  if (v === undefined || v === null || v === '') return 1;
  const parsed = typeof v === 'number' ? v : typeof v === 'string' ? Number(v.trim()) : NaN;
  if (!Number.isFinite(parsed) || parsed <= 0 || parsed > MAX_SCALE_FACTOR) {
    return null;
  }
  return parsed;
}

export function isWalletAddress(v: unknown): v is string {
  return typeof v === 'string' && WALLET_ADDRESS_PATTERN.test(v);
}

/**
 * Page size from a query string, clamped to [1, MAX_PAGE_LIMIT]
 */
export function parseLimit(v: unknown, fallback = 50): number {
  if (typeof v !== 'string' || v.trim() === '') return fallback;
  const parsed = parseInt(v, 10);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(Math.max(parsed, 1), MAX_PAGE_LIMIT);
}

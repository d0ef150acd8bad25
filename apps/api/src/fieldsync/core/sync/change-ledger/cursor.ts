const CURSOR_PREFIX = 'chg_';
const CURSOR_DIGITS = 12;

/**
 * Encodes a change_log id as a wire cursor: 42 -> "chg_000000000042".
 */
export function encodeCursor(changeId: number): string {
  return `${CURSOR_PREFIX}${String(changeId).padStart(CURSOR_DIGITS, '0')}`;
}

/**
 * Decodes a wire cursor back to a change_log id.
 *
 * Accepts "chg_<digits>" or a bare non-negative integer. Anything else,
 * including null/undefined, decodes to 0 ("from the beginning").
 */
export function decodeCursor(cursor: string | null | undefined): number {
  if (!cursor) {
    return 0;
  }

  const trimmed = cursor.trim();
  const digits = trimmed.startsWith(CURSOR_PREFIX)
    ? trimmed.slice(CURSOR_PREFIX.length)
    : trimmed;

  if (!/^\d+$/.test(digits)) {
    return 0;
  }

  const value = Number(digits);
  return Number.isSafeInteger(value) ? value : 0;
}

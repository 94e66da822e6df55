const CHANNEL_PREFIX = /^\s*whatsapp:/i;

/** Suffix matching only applies when the shorter number has at least this many digits. */
export const MIN_SUFFIX_MATCH_DIGITS = 7;

/**
 * Turns the gateway's `From` field into the canonical sender identifier:
 * "whatsapp:+50760000000 " => "+50760000000".
 */
export function normalizeSender(raw: string | undefined | null): string {
  return (raw ?? "").replace(CHANNEL_PREFIX, "").trim();
}

/**
 * Digits used for matching. Strips "+", whitespace, hyphens, dots and parentheses,
 * so "+507 6000-0000" => "50760000000".
 */
export function phoneDigits(value: string | undefined | null): string {
  return (value ?? "").replace(/[+\s\-.()]/g, "");
}

/**
 * Phone matching rule shared by every store:
 * - equal digits match
 * - otherwise one side may be a suffix of the other (missing/extra country code),
 *   as long as the shorter side has at least MIN_SUFFIX_MATCH_DIGITS digits
 */
export function phonesMatch(incoming: string, stored: string): boolean {
  const a = phoneDigits(incoming);
  const b = phoneDigits(stored);
  if (!a || !b) return false;
  if (a === b) return true;

  const shorter = a.length <= b.length ? a : b;
  const longer = shorter === a ? b : a;
  if (shorter.length < MIN_SUFFIX_MATCH_DIGITS) return false;

  return longer.endsWith(shorter);
}

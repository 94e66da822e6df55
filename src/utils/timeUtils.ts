import { DateTime } from "luxon";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * UTC ISO-8601 timestamp at second precision, e.g. "2026-10-19T11:28:00Z".
 * This is the format written to the consent and message stores.
 */
export function toIsoSeconds(date: Date): string {
  const iso = DateTime.fromJSDate(date, { zone: "utc" })
    .startOf("second")
    .toISO({ suppressMilliseconds: true });
  if (!iso) {
    throw new Error(`Invalid date: ${String(date)}`);
  }
  return iso;
}

export function isoNow(clock: Clock = systemClock): string {
  return toIsoSeconds(clock());
}

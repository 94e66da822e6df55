import type { ConsentCommand } from "../types";

// Closed sets; English plus the Spanish keywords customers actually send.
export const UNSUBSCRIBE_KEYWORDS: ReadonlySet<string> = new Set([
  "STOP",
  "STOPALL",
  "UNSUBSCRIBE",
  "CANCEL",
  "END",
  "QUIT",
  "SALIR",
  "BAJA",
  "ALTO",
]);

export const RESUBSCRIBE_KEYWORDS: ReadonlySet<string> = new Set(["START", "UNSTOP", "YES", "SI", "SÍ"]);

export function normalizeCommandBody(body: string | undefined | null): string {
  return (body ?? "").trim().toUpperCase();
}

/**
 * Exact keyword match only: "STOP" unsubscribes, "PLEASE STOP" does not.
 */
export function classifyCommand(body: string): ConsentCommand {
  const normalized = normalizeCommandBody(body);
  if (UNSUBSCRIBE_KEYWORDS.has(normalized)) return "unsubscribe";
  if (RESUBSCRIBE_KEYWORDS.has(normalized)) return "resubscribe";
  return "other";
}

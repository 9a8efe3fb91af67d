import { InvalidRequestError } from "../errors/catalog.js";

const HOUR_MS = 60 * 60 * 1000;

/** ISO timestamp `lookbackHours` before `now`. */
export function getSinceIso(lookbackHours: number, now: Date = new Date()): string {
  return new Date(now.getTime() - lookbackHours * HOUR_MS).toISOString();
}

/** Accept a Date or an ISO 8601 string; anything unparseable is an InvalidRequestError. */
export function parseSince(since: Date | string): Date {
  const date = typeof since === "string" ? new Date(since) : since;
  if (Number.isNaN(date.getTime())) {
    throw new InvalidRequestError(`Invalid since timestamp: ${String(since)}`, {
      since: String(since),
    });
  }
  return date;
}

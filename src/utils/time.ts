import { DateTime, FixedOffsetZone, type DateTimeUnit } from "luxon";
import type { CivilDateTime } from "../types.js";

// Wall-clock values live in a fixed frame so no zone rule ever shifts them.
const CIVIL_ZONE = "UTC";
const LABEL_LOCALE = "en-US";

export function parseCivil(iso: string): CivilDateTime | null {
  const dt = DateTime.fromISO(iso, { zone: CIVIL_ZONE });
  return dt.isValid ? dt : null;
}

/**
 * Current wall-clock time in `timezone`, re-expressed in the civil frame.
 * When the runtime does not know `timezone`, the fixed `utcOffsetSeconds` the
 * forecast reported is used instead, and the machine's zone only without one.
 */
export function nowCivil(
  timezone?: string,
  now: DateTime = DateTime.now(),
  utcOffsetSeconds?: number
): CivilDateTime {
  let local = timezone ? now.setZone(timezone) : now.toLocal();
  if (!local.isValid) {
    local =
      utcOffsetSeconds !== undefined
        ? now.setZone(FixedOffsetZone.instance(utcOffsetSeconds / 60))
        : now.toLocal();
  }
  return local.setZone(CIVIL_ZONE, { keepLocalTime: true });
}

export function truncateTo(time: CivilDateTime, unit: DateTimeUnit): CivilDateTime {
  return time.startOf(unit);
}

export function civilDateKey(time: CivilDateTime): string {
  return time.toFormat("yyyy-LL-dd");
}

export function formatHourLabel(time: CivilDateTime): string {
  return time.toFormat("ccc HH:mm", { locale: LABEL_LOCALE });
}

export function formatDayLabel(time: CivilDateTime): string {
  return time.toFormat("cccc, LLL dd", { locale: LABEL_LOCALE });
}

import { DateTime } from "luxon";
import type { Weekday } from "../types/helpdesk";

const HHMM = /^([01]\d|2[0-3]):([0-5]\d)$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const DAY_NAMES = ["Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday"] as const;

export function isTimeOfDay(value: string): boolean {
  return HHMM.test(value);
}

/** Minutes since midnight for an HH:mm string. */
export function toMinutes(value: string): number {
  const m = HHMM.exec(value);
  if (!m) throw new Error(`Invalid time of day: ${value}`);
  return Number(m[1]) * 60 + Number(m[2]);
}

export function isBefore(a: string, b: string): boolean {
  return toMinutes(a) < toMinutes(b);
}

/** "13:05" -> "01:05 PM" */
export function formatTime12h(value: string): string {
  const minutes = toMinutes(value);
  const h24 = Math.floor(minutes / 60);
  const mm = String(minutes % 60).padStart(2, "0");
  const suffix = h24 < 12 ? "AM" : "PM";
  const h12 = h24 % 12 === 0 ? 12 : h24 % 12;
  return `${String(h12).padStart(2, "0")}:${mm} ${suffix}`;
}

export function dayName(day: Weekday): string {
  return DAY_NAMES[day];
}

export function isIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && DateTime.fromISO(value).isValid;
}

export type LocalMoment = {
  date: string; // YYYY-MM-DD
  day: Weekday;
  /** Milliseconds since local midnight. */
  msOfDay: number;
};

function weekdayFromLuxon(weekday: number): Weekday {
  // luxon: 1=Mon..7=Sun
  switch (weekday) {
    case 1:
      return 0;
    case 2:
      return 1;
    case 3:
      return 2;
    case 4:
      return 3;
    case 5:
      return 4;
    case 6:
      return 5;
    default:
      return 6;
  }
}

export function toLocalMoment(now: Date, timeZone: string): LocalMoment {
  const local = DateTime.fromJSDate(now, { zone: timeZone });
  // wall-clock time, so DST transition days still line up with HH:mm entries
  const msOfDay = ((local.hour * 60 + local.minute) * 60 + local.second) * 1000 + local.millisecond;
  return {
    date: local.toISODate() ?? "",
    day: weekdayFromLuxon(local.weekday),
    msOfDay,
  };
}

export function minutesToMs(minutes: number): number {
  return minutes * 60_000;
}

/** Inclusive at both ends, compared at millisecond precision. */
export function isWithinWindow(msOfDay: number, openTime: string, closeTime: string): boolean {
  return minutesToMs(toMinutes(openTime)) <= msOfDay && msOfDay <= minutesToMs(toMinutes(closeTime));
}

import { WEEKDAYS, type ScheduleOverride, type Weekday, type WeeklyScheduleEntry } from "../types/helpdesk";
import { dayName, formatTime12h, isWithinWindow, minutesToMs, toLocalMoment, toMinutes } from "./timeOfDay";

export type ScheduleSnapshot = {
  weekly: WeeklyScheduleEntry[];
  /** Overrides to consider; only the one dated on the local day of `now` takes effect. */
  overrides: ScheduleOverride[];
};

export type Availability = {
  available: boolean;
  reason: string;
};

export const SCHEDULE_NOT_AVAILABLE = "Schedule not available";

function hoursLabel(openTime: string, closeTime: string) {
  return `${formatTime12h(openTime)} - ${formatTime12h(closeTime)}`;
}

function resolveOverride(override: ScheduleOverride, msOfDay: number): Availability {
  if (!override.isOpen) return { available: false, reason: override.reason };
  if (!override.openTime || !override.closeTime) {
    return { available: true, reason: `Support is available (${override.reason})` };
  }
  if (isWithinWindow(msOfDay, override.openTime, override.closeTime)) {
    return { available: true, reason: `Support is currently available (${override.reason})` };
  }
  return {
    available: false,
    reason: `Special hours: ${hoursLabel(override.openTime, override.closeTime)} (${override.reason})`,
  };
}

function resolveWeekly(entry: WeeklyScheduleEntry | undefined, msOfDay: number): Availability {
  if (!entry) return { available: false, reason: "Schedule not configured for this day" };
  if (!entry.isOpen) return { available: false, reason: `Support is closed on ${dayName(entry.day)}s` };
  if (!entry.openTime || !entry.closeTime) return { available: true, reason: "Support is available" };
  if (isWithinWindow(msOfDay, entry.openTime, entry.closeTime)) {
    return { available: true, reason: "Support is currently available" };
  }
  return { available: false, reason: `Support hours: ${hoursLabel(entry.openTime, entry.closeTime)}` };
}

/**
 * Whether support is open at `now`. A date override for the local day wins
 * over the weekly entry for that weekday.
 */
export function isAvailable(now: Date, snapshot: ScheduleSnapshot, timeZone: string): Availability {
  const moment = toLocalMoment(now, timeZone);
  const override = snapshot.overrides.find((o) => o.date === moment.date);
  if (override) return resolveOverride(override, moment.msOfDay);
  return resolveWeekly(
    snapshot.weekly.find((e) => e.day === moment.day),
    moment.msOfDay
  );
}

/**
 * Describes the next time support opens according to the weekly schedule.
 * Date overrides are deliberately not consulted here.
 */
export function nextAvailable(now: Date, weekly: WeeklyScheduleEntry[], timeZone: string): string {
  const moment = toLocalMoment(now, timeZone);
  const openOn = (day: Weekday) => weekly.find((e) => e.day === day && e.isOpen);

  const today = openOn(moment.day);
  if (today?.openTime && today.closeTime && moment.msOfDay < minutesToMs(toMinutes(today.openTime))) {
    return `Today at ${formatTime12h(today.openTime)}`;
  }

  for (let offset = 1; offset <= 7; offset++) {
    const day = WEEKDAYS[(moment.day + offset) % 7];
    const entry = openOn(day);
    if (!entry?.openTime) continue;
    if (offset === 1) return `Tomorrow (${dayName(day)}) at ${formatTime12h(entry.openTime)}`;
    return `${dayName(day)} at ${formatTime12h(entry.openTime)}`;
  }

  return SCHEDULE_NOT_AVAILABLE;
}

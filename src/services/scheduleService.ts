import { DateTime } from "luxon";
import type { OverrideInput, ScheduleRepository } from "../repositories/types";
import { WEEKDAYS, type ScheduleOverride, type Weekday, type WeeklyScheduleEntry } from "../types/helpdesk";
import { NotFoundError, PastDateError, ValidationError } from "../utils/errors";
import { isAvailable, nextAvailable, type Availability } from "./availability";
import { isBefore, isIsoDate, isTimeOfDay } from "./timeOfDay";

export type PresetName = "business_hours" | "extended_hours" | "weekend_support" | "finals_week" | "all_closed";

type Hours = { isOpen: true; openTime: string; closeTime: string } | { isOpen: false; openTime: null; closeTime: null };

export const SCHEDULE_PRESETS: Record<PresetName, Hours> = {
  business_hours: { isOpen: true, openTime: "09:00", closeTime: "16:30" },
  extended_hours: { isOpen: true, openTime: "09:00", closeTime: "18:00" },
  weekend_support: { isOpen: true, openTime: "10:00", closeTime: "15:00" },
  finals_week: { isOpen: true, openTime: "09:00", closeTime: "19:00" },
  all_closed: { isOpen: false, openTime: null, closeTime: null },
};

export function isPresetName(value: string): value is PresetName {
  return Object.prototype.hasOwnProperty.call(SCHEDULE_PRESETS, value);
}

// Mon-Fri 09:00-17:00, weekend closed
const DEFAULT_WEEK: Record<Weekday, Hours> = {
  0: { isOpen: true, openTime: "09:00", closeTime: "17:00" },
  1: { isOpen: true, openTime: "09:00", closeTime: "17:00" },
  2: { isOpen: true, openTime: "09:00", closeTime: "17:00" },
  3: { isOpen: true, openTime: "09:00", closeTime: "17:00" },
  4: { isOpen: true, openTime: "09:00", closeTime: "17:00" },
  5: { isOpen: false, openTime: null, closeTime: null },
  6: { isOpen: false, openTime: null, closeTime: null },
};

const WORKING_DAYS: readonly Weekday[] = [0, 1, 2, 3, 4];

export type WindowInput = {
  isOpen: boolean;
  openTime?: string | null;
  closeTime?: string | null;
};

export type ScheduleStatus = Availability & {
  nextAvailable: string;
  override: ScheduleOverride | null;
};

/**
 * Normalizes an open/close window: open days need both times with
 * open < close, closed days drop their times.
 */
export function checkWindow(input: WindowInput, label: string): { openTime: string | null; closeTime: string | null } {
  const openTime = input.openTime || null;
  const closeTime = input.closeTime || null;
  for (const t of [openTime, closeTime]) {
    if (t !== null && !isTimeOfDay(t)) throw new ValidationError(`Invalid time "${t}", expected HH:mm`);
  }
  if (!input.isOpen) return { openTime: null, closeTime: null };
  if (!openTime || !closeTime) {
    throw new ValidationError(`${label} must have both start and end times specified.`);
  }
  if (!isBefore(openTime, closeTime)) throw new ValidationError("Start time must be before end time.");
  return { openTime, closeTime };
}

export class ScheduleService {
  constructor(
    private readonly repo: ScheduleRepository,
    readonly timeZone: string
  ) {}

  localDate(now: Date): string {
    return DateTime.fromJSDate(now, { zone: this.timeZone }).toISODate() ?? "";
  }

  /** Creates entries for missing days only; existing days are untouched. */
  async seedDefaults(): Promise<number> {
    let created = 0;
    for (const day of WEEKDAYS) {
      const hours = DEFAULT_WEEK[day];
      if (await this.repo.insertWeeklyIfMissing({ day, ...hours, updatedBy: null })) created++;
    }
    if (created > 0) {
      // eslint-disable-next-line no-console
      console.log(`[schedule] seeded ${created} default day(s)`);
    }
    return created;
  }

  async getWeeklySchedule(): Promise<WeeklyScheduleEntry[]> {
    const existing = await this.repo.listWeekly();
    if (existing.length < WEEKDAYS.length) {
      await this.seedDefaults();
      return await this.repo.listWeekly();
    }
    return existing;
  }

  async upsertWeeklyEntry(
    day: Weekday,
    window: WindowInput,
    updatedBy: string | null = null
  ): Promise<WeeklyScheduleEntry> {
    const times = checkWindow(window, "Active days");
    return await this.repo.upsertWeekly({ day, isOpen: window.isOpen, ...times, updatedBy });
  }

  /** Resolves to the number of days written. */
  async applyPreset(presetName: string, days: Weekday[], updatedBy: string | null = null): Promise<number> {
    if (!isPresetName(presetName)) throw new ValidationError(`Unknown preset "${presetName}"`);
    const hours = SCHEDULE_PRESETS[presetName];
    let updated = 0;
    for (const day of new Set(days)) {
      await this.repo.upsertWeekly({ day, ...hours, updatedBy });
      updated++;
    }
    return updated;
  }

  /**
   * Writes a whole week: working days get the preset hours, the weekend is
   * closed. Without `force`, nothing is written once any day is configured.
   */
  async initializeSchedule(
    presetName: "business_hours" | "extended_hours" | "finals_week",
    options: { force?: boolean; updatedBy?: string | null } = {}
  ): Promise<{ created: number; updated: number; existing: number }> {
    const existing = new Set((await this.repo.listWeekly()).map((e) => e.day));
    if (existing.size > 0 && !options.force) return { created: 0, updated: 0, existing: existing.size };
    const preset = SCHEDULE_PRESETS[presetName];
    let created = 0;
    let updated = 0;
    for (const day of WEEKDAYS) {
      const hours = WORKING_DAYS.includes(day) ? preset : SCHEDULE_PRESETS.all_closed;
      const input = { day, ...hours, updatedBy: options.updatedBy ?? null };
      await this.repo.upsertWeekly(input);
      if (existing.has(day)) updated++;
      else created++;
    }
    return { created, updated, existing: existing.size };
  }

  async createOverride(
    input: { date: string; reason: string; createdBy?: string | null } & WindowInput,
    now: Date
  ): Promise<ScheduleOverride> {
    if (!isIsoDate(input.date)) throw new ValidationError(`Invalid date "${input.date}", expected YYYY-MM-DD`);
    // ISO dates compare lexicographically
    if (input.date < this.localDate(now)) throw new PastDateError(input.date);
    const reason = input.reason.trim();
    if (!reason) throw new ValidationError("A reason is required");

    const times = checkWindow(input, "Active override days");
    const record: OverrideInput = {
      date: input.date,
      isOpen: input.isOpen,
      ...times,
      reason,
      createdBy: input.createdBy ?? null,
    };
    const created = await this.repo.createOverride(record);
    // eslint-disable-next-line no-console
    console.log(`[schedule] override created for ${created.date} (${created.reason})`);
    return created;
  }

  async deleteOverride(id: string): Promise<void> {
    const removed = await this.repo.deleteOverride(id);
    if (!removed) throw new NotFoundError("Override not found");
  }

  /** Upcoming overrides from today on, and the ten most recent past ones. */
  async listOverrides(now: Date): Promise<{ upcoming: ScheduleOverride[]; past: ScheduleOverride[] }> {
    const local = DateTime.fromJSDate(now, { zone: this.timeZone });
    const [upcoming, past] = await Promise.all([
      this.repo.listOverrides({ from: local.toISODate() ?? "" }),
      this.repo.listOverrides({ to: local.minus({ days: 1 }).toISODate() ?? "" }),
    ]);
    return { upcoming, past: past.reverse().slice(0, 10) };
  }

  async getOverrideForDate(date: string): Promise<ScheduleOverride | null> {
    if (!isIsoDate(date)) throw new ValidationError(`Invalid date "${date}", expected YYYY-MM-DD`);
    return await this.repo.getOverrideByDate(date);
  }

  async isAvailable(now: Date): Promise<Availability> {
    const [weekly, override] = await Promise.all([
      this.repo.listWeekly(),
      this.getOverrideForDate(this.localDate(now)),
    ]);
    return isAvailable(now, { weekly, overrides: override ? [override] : [] }, this.timeZone);
  }

  async nextAvailable(now: Date): Promise<string> {
    return nextAvailable(now, await this.repo.listWeekly(), this.timeZone);
  }

  async getStatus(now: Date): Promise<ScheduleStatus> {
    const [weekly, override] = await Promise.all([
      this.repo.listWeekly(),
      this.getOverrideForDate(this.localDate(now)),
    ]);
    return {
      ...isAvailable(now, { weekly, overrides: override ? [override] : [] }, this.timeZone),
      nextAvailable: nextAvailable(now, weekly, this.timeZone),
      override,
    };
  }
}

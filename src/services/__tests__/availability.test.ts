import { describe, it, expect } from "vitest";
import { SCHEDULE_NOT_AVAILABLE, isAvailable, nextAvailable } from "../availability";
import { WEEKDAYS, type ScheduleOverride, type Weekday, type WeeklyScheduleEntry } from "../../types/helpdesk";

const stamp = new Date("2025-01-01T00:00:00Z");

function week(openDays: Weekday[], openTime = "09:00", closeTime = "17:00"): WeeklyScheduleEntry[] {
  return WEEKDAYS.map((day) => {
    const isOpen = openDays.includes(day);
    return {
      day,
      isOpen,
      openTime: isOpen ? openTime : null,
      closeTime: isOpen ? closeTime : null,
      createdAt: stamp,
      updatedAt: stamp,
      updatedBy: null,
    };
  });
}

function override(date: string, fields: Partial<ScheduleOverride> & { reason: string }): ScheduleOverride {
  return {
    id: `override-${date}`,
    date,
    isOpen: false,
    openTime: null,
    closeTime: null,
    createdAt: stamp,
    createdBy: null,
    ...fields,
  };
}

const WEEKDAYS_OPEN: Weekday[] = [0, 1, 2, 3, 4];

// 2025-03-03 is a Monday
describe("isAvailable", () => {
  it("is open inside the weekly window", () => {
    const weekly = week(WEEKDAYS_OPEN);
    expect(isAvailable(new Date("2025-03-03T10:00:00Z"), { weekly, overrides: [] }, "UTC")).toEqual({
      available: true,
      reason: "Support is currently available",
    });
  });

  it("treats both ends of the window as inclusive", () => {
    const weekly = week(WEEKDAYS_OPEN);
    const at = (iso: string) => isAvailable(new Date(iso), { weekly, overrides: [] }, "UTC");

    expect(at("2025-03-03T09:00:00.000Z").available).toBe(true);
    expect(at("2025-03-03T17:00:00.000Z").available).toBe(true);
    expect(at("2025-03-03T08:59:59.999Z").available).toBe(false);
    expect(at("2025-03-03T17:00:00.001Z")).toEqual({
      available: false,
      reason: "Support hours: 09:00 AM - 05:00 PM",
    });
  });

  it("reports closed weekdays by name", () => {
    const weekly = week(WEEKDAYS_OPEN);
    expect(isAvailable(new Date("2025-03-08T12:00:00Z"), { weekly, overrides: [] }, "UTC")).toEqual({
      available: false,
      reason: "Support is closed on Saturdays",
    });
  });

  it("reports a day without an entry as not configured", () => {
    expect(isAvailable(new Date("2025-03-03T10:00:00Z"), { weekly: [], overrides: [] }, "UTC")).toEqual({
      available: false,
      reason: "Schedule not configured for this day",
    });
  });

  it("treats an open day without times as open all day", () => {
    const weekly = week([]).map((e) => (e.day === 0 ? { ...e, isOpen: true } : e));
    expect(isAvailable(new Date("2025-03-03T23:30:00Z"), { weekly, overrides: [] }, "UTC")).toEqual({
      available: true,
      reason: "Support is available",
    });
  });

  it("lets a closing override for today win over the weekly entry", () => {
    const weekly = week(WEEKDAYS_OPEN);
    const overrides = [override("2025-03-03", { reason: "Holiday" })];
    expect(isAvailable(new Date("2025-03-03T10:00:00Z"), { weekly, overrides }, "UTC")).toEqual({
      available: false,
      reason: "Holiday",
    });
  });

  it("ignores overrides dated on other days", () => {
    const weekly = week(WEEKDAYS_OPEN);
    const overrides = [override("2025-03-04", { reason: "Holiday" })];
    expect(isAvailable(new Date("2025-03-03T10:00:00Z"), { weekly, overrides }, "UTC").available).toBe(true);
  });

  it("opens a closed week for a special event override", () => {
    const weekly = week([]);
    const overrides = [
      override("2025-12-25", { isOpen: true, openTime: "10:00", closeTime: "14:00", reason: "Special Event" }),
    ];
    expect(isAvailable(new Date("2025-12-25T11:00:00Z"), { weekly, overrides }, "UTC")).toEqual({
      available: true,
      reason: "Support is currently available (Special Event)",
    });
    expect(isAvailable(new Date("2025-12-25T15:00:00Z"), { weekly, overrides }, "UTC")).toEqual({
      available: false,
      reason: "Special hours: 10:00 AM - 02:00 PM (Special Event)",
    });
  });

  it("treats an open override without times as open all day", () => {
    const overrides = [override("2025-03-08", { isOpen: true, reason: "Exam week" })];
    expect(isAvailable(new Date("2025-03-08T22:00:00Z"), { weekly: week([]), overrides }, "UTC")).toEqual({
      available: true,
      reason: "Support is available (Exam week)",
    });
  });

  it("evaluates the window in the support time zone", () => {
    const weekly = week(WEEKDAYS_OPEN);
    // Chicago is UTC-6 until 2025-03-09
    expect(isAvailable(new Date("2025-03-03T15:30:00Z"), { weekly, overrides: [] }, "America/Chicago").available).toBe(
      true
    );
    expect(isAvailable(new Date("2025-03-03T14:30:00Z"), { weekly, overrides: [] }, "America/Chicago").available).toBe(
      false
    );
  });
});

describe("nextAvailable", () => {
  const weekly = week(WEEKDAYS_OPEN);

  it("returns today when the day has not opened yet", () => {
    expect(nextAvailable(new Date("2025-03-03T08:00:00Z"), weekly, "UTC")).toBe("Today at 09:00 AM");
  });

  it("returns tomorrow after today's window", () => {
    expect(nextAvailable(new Date("2025-03-03T18:00:00Z"), weekly, "UTC")).toBe("Tomorrow (Tuesday) at 09:00 AM");
  });

  it("skips closed days", () => {
    // Friday evening -> Monday
    expect(nextAvailable(new Date("2025-03-07T18:00:00Z"), weekly, "UTC")).toBe("Monday at 09:00 AM");
  });

  it("wraps around to the same weekday a week later", () => {
    expect(nextAvailable(new Date("2025-03-03T18:00:00Z"), week([0], "08:30"), "UTC")).toBe("Monday at 08:30 AM");
  });

  it("returns the sentinel when nothing opens within a week", () => {
    expect(nextAvailable(new Date("2025-03-03T08:00:00Z"), week([]), "UTC")).toBe(SCHEDULE_NOT_AVAILABLE);
  });
});

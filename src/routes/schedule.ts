import { Router } from "express";
import { z } from "zod";

import type { AppServices } from "../container";
import { currentStaff, requireAuth, requireRole } from "../middleware/auth";
import { isTimeOfDay } from "../services/timeOfDay";
import { WEEKDAYS, type ScheduleOverride } from "../types/helpdesk";
import { asyncHandler } from "../utils/asyncHandler";
import { presentScheduleEntry } from "./presenters";

const TimeOfDay = z.string().refine(isTimeOfDay, "Expected HH:mm");

const DayParam = z.coerce
  .number()
  .int()
  .transform((n, ctx) => {
    const day = WEEKDAYS.find((d) => d === n);
    if (day === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Day must be 0 (Monday) to 6 (Sunday)" });
      return z.NEVER;
    }
    return day;
  });

const WindowSchema = z.object({
  isOpen: z.boolean(),
  openTime: TimeOfDay.nullish(),
  closeTime: TimeOfDay.nullish(),
});

const PresetSchema = z.object({
  preset: z.string().min(1),
  days: z.array(DayParam).min(1),
});

const OverrideSchema = WindowSchema.extend({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD"),
  reason: z.string().trim().min(1).max(200),
});

function presentOverride(o: ScheduleOverride) {
  return {
    id: o.id,
    date: o.date,
    isOpen: o.isOpen,
    openTime: o.openTime,
    closeTime: o.closeTime,
    reason: o.reason,
    createdBy: o.createdBy,
    createdAt: o.createdAt.toISOString(),
  };
}

export function scheduleRouter({ schedule, clock }: AppServices) {
  const router = Router();

  // Public: the chat widget asks this before offering a new chat.
  router.get(
    "/status",
    asyncHandler(async (_req, res) => {
      const status = await schedule.getStatus(clock());
      return res.json({
        isAvailable: status.available,
        message: status.reason,
        nextAvailable: status.nextAvailable,
        override: status.override ? presentOverride(status.override) : null,
      });
    })
  );

  router.use(requireAuth, requireRole("manager"));

  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      const now = clock();
      const [weekly, overrides, status] = await Promise.all([
        schedule.getWeeklySchedule(),
        schedule.listOverrides(now),
        schedule.getStatus(now),
      ]);
      return res.json({
        timeZone: schedule.timeZone,
        weekly: weekly.map(presentScheduleEntry),
        upcomingOverrides: overrides.upcoming.map(presentOverride),
        status: { isAvailable: status.available, message: status.reason, nextAvailable: status.nextAvailable },
      });
    })
  );

  router.put(
    "/:day",
    asyncHandler(async (req, res) => {
      const day = DayParam.safeParse(req.params.day);
      const body = WindowSchema.safeParse(req.body);
      if (!day.success) return res.status(400).json({ error: "Invalid input", details: day.error.flatten() });
      if (!body.success) return res.status(400).json({ error: "Invalid input", details: body.error.flatten() });

      const entry = await schedule.upsertWeeklyEntry(day.data, body.data, currentStaff(req).id);
      return res.json({ entry: presentScheduleEntry(entry) });
    })
  );

  router.post(
    "/presets",
    asyncHandler(async (req, res) => {
      const parsed = PresetSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ error: "Invalid input", details: parsed.error.flatten() });

      const updated = await schedule.applyPreset(parsed.data.preset, parsed.data.days, currentStaff(req).id);
      return res.json({ ok: true, updated });
    })
  );

  router.get(
    "/overrides",
    asyncHandler(async (_req, res) => {
      const { upcoming, past } = await schedule.listOverrides(clock());
      return res.json({ upcoming: upcoming.map(presentOverride), past: past.map(presentOverride) });
    })
  );

  router.get(
    "/overrides/:date",
    asyncHandler(async (req, res) => {
      const override = await schedule.getOverrideForDate(req.params.date);
      if (!override) return res.status(404).json({ error: "Override not found" });
      return res.json({ override: presentOverride(override) });
    })
  );

  router.post(
    "/overrides",
    asyncHandler(async (req, res) => {
      const parsed = OverrideSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ error: "Invalid input", details: parsed.error.flatten() });

      const override = await schedule.createOverride({ ...parsed.data, createdBy: currentStaff(req).id }, clock());
      return res.status(201).json({ override: presentOverride(override) });
    })
  );

  router.delete(
    "/overrides/:id",
    asyncHandler(async (req, res) => {
      await schedule.deleteOverride(req.params.id);
      return res.json({ ok: true });
    })
  );

  return router;
}

import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import { manager, openWeek, tech } from "../../test/fixtures";
import { bearer, buildTestApp } from "../../test/http";

describe("schedule routes", () => {
  let t: ReturnType<typeof buildTestApp>;

  beforeEach(async () => {
    // Monday 2025-03-03 10:00 UTC
    t = buildTestApp();
    await openWeek(t.scheduleRepo, [0, 1, 2, 3, 4]);
  });

  it("publishes the current status without authentication", async () => {
    const res = await request(t.app).get("/schedule/status");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      isAvailable: true,
      message: "Support is currently available",
      nextAvailable: "Tomorrow (Tuesday) at 09:00 AM",
      override: null,
    });
  });

  it("keeps management to managers", async () => {
    const res = await request(t.app).get("/schedule").set("Authorization", bearer(tech));
    expect(res.status).toBe(403);
    expect(res.body).toEqual({ error: "Forbidden" });
  });

  it("lists the week with display labels", async () => {
    const res = await request(t.app).get("/schedule").set("Authorization", bearer(manager));
    expect(res.status).toBe(200);
    expect(res.body.timeZone).toBe("UTC");
    expect(res.body.weekly.map((e: { display: string }) => e.display)).toEqual([
      "Monday: 09:00 AM - 05:00 PM",
      "Tuesday: 09:00 AM - 05:00 PM",
      "Wednesday: 09:00 AM - 05:00 PM",
      "Thursday: 09:00 AM - 05:00 PM",
      "Friday: 09:00 AM - 05:00 PM",
      "Saturday: Closed",
      "Sunday: Closed",
    ]);
  });

  it("updates a single day", async () => {
    const res = await request(t.app)
      .put("/schedule/5")
      .set("Authorization", bearer(manager))
      .send({ isOpen: true, openTime: "10:00", closeTime: "14:00" });

    expect(res.status).toBe(200);
    expect(res.body.entry).toMatchObject({
      day: 5,
      dayName: "Saturday",
      updatedBy: manager.id,
      display: "Saturday: 10:00 AM - 02:00 PM",
    });
  });

  it("rejects bad days and inverted windows", async () => {
    const badDay = await request(t.app)
      .put("/schedule/7")
      .set("Authorization", bearer(manager))
      .send({ isOpen: false });
    expect(badDay.status).toBe(400);

    const inverted = await request(t.app)
      .put("/schedule/1")
      .set("Authorization", bearer(manager))
      .send({ isOpen: true, openTime: "17:00", closeTime: "09:00" });
    expect(inverted.status).toBe(400);
    expect(inverted.body).toEqual({ error: "Start time must be before end time.", code: "validation_error" });
  });

  it("applies presets", async () => {
    const res = await request(t.app)
      .post("/schedule/presets")
      .set("Authorization", bearer(manager))
      .send({ preset: "weekend_support", days: [5, 6] });
    expect(res.body).toEqual({ ok: true, updated: 2 });

    const saturday = await t.scheduleRepo.listWeekly();
    expect(saturday[5]).toMatchObject({ isOpen: true, openTime: "10:00", closeTime: "15:00" });
  });

  it("creates, applies and deletes a date override", async () => {
    const created = await request(t.app)
      .post("/schedule/overrides")
      .set("Authorization", bearer(manager))
      .send({ date: "2025-03-03", isOpen: false, reason: "Holiday" });
    expect(created.status).toBe(201);
    expect(created.body.override).toMatchObject({ date: "2025-03-03", reason: "Holiday", createdBy: manager.id });

    const status = await request(t.app).get("/schedule/status");
    expect(status.body).toMatchObject({ isAvailable: false, message: "Holiday", override: { reason: "Holiday" } });

    const byDate = await request(t.app).get("/schedule/overrides/2025-03-03").set("Authorization", bearer(manager));
    expect(byDate.body.override.reason).toBe("Holiday");

    const id = String(created.body.override.id);
    const removed = await request(t.app).delete(`/schedule/overrides/${id}`).set("Authorization", bearer(manager));
    expect(removed.body).toEqual({ ok: true });

    const again = await request(t.app).delete(`/schedule/overrides/${id}`).set("Authorization", bearer(manager));
    expect(again.status).toBe(404);
  });

  it("refuses overrides in the past", async () => {
    const res = await request(t.app)
      .post("/schedule/overrides")
      .set("Authorization", bearer(manager))
      .send({ date: "2025-03-01", isOpen: false, reason: "Too late" });
    expect(res.status).toBe(400);
    expect(res.body.code).toBe("past_date");
  });
});

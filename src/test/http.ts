import { createApp } from "../app";
import { signStaffToken } from "../middleware/auth";
import type { StaffMember } from "../types/helpdesk";
import { buildHarness } from "./fixtures";

export function buildTestApp(start?: string) {
  const harness = buildHarness(start);
  const app = createApp(
    { schedule: harness.schedule, chats: harness.chats, clock: harness.clock.now },
    { logRequests: false }
  );
  return { ...harness, app };
}

export function bearer(staff: StaffMember) {
  return `Bearer ${signStaffToken(staff)}`;
}

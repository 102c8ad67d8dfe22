import { ChatService } from "../services/chatService";
import { ScheduleService } from "../services/scheduleService";
import type { IncomingAttachment, StaffMember, Weekday } from "../types/helpdesk";
import { MemoryBlobStore } from "./memoryBlobStore";
import { MemoryChatRepository } from "./memoryChatRepository";
import { MemoryScheduleRepository } from "./memoryScheduleRepository";
import { MemoryStaffDirectory } from "./memoryStaffDirectory";

export const tech: StaffMember = { id: "u-tech-1", name: "Tina Tech", email: "tina@helpdesk.test", role: "technician" };
export const tech2: StaffMember = { id: "u-tech-2", name: "Theo Tech", email: "theo@helpdesk.test", role: "technician" };
export const manager: StaffMember = { id: "u-mgr-1", name: "Mia Manager", email: "mia@helpdesk.test", role: "manager" };

export const MiB = 1024 * 1024;

export function file(filename: string, sizeBytes: number, mimeType = "application/octet-stream"): IncomingAttachment {
  return { filename, sizeBytes, mimeType, data: Buffer.from(filename) };
}

/** A fake clock that callers move forward by hand. */
export function fakeClock(start: string) {
  let current = new Date(start);
  return {
    now: () => new Date(current),
    set: (iso: string) => {
      current = new Date(iso);
    },
  };
}

export async function openWeek(repo: MemoryScheduleRepository, days: Weekday[], openTime = "09:00", closeTime = "17:00") {
  for (const day of [0, 1, 2, 3, 4, 5, 6] as const) {
    const isOpen = days.includes(day);
    await repo.upsertWeekly({
      day,
      isOpen,
      openTime: isOpen ? openTime : null,
      closeTime: isOpen ? closeTime : null,
      updatedBy: null,
    });
  }
}

export function buildHarness(start = "2025-03-03T10:00:00Z") {
  const clock = fakeClock(start);
  const scheduleRepo = new MemoryScheduleRepository();
  const chatRepo = new MemoryChatRepository();
  const blobs = new MemoryBlobStore();
  const staff = new MemoryStaffDirectory([tech, tech2, manager]);
  const schedule = new ScheduleService(scheduleRepo, "UTC");
  const chats = new ChatService({ chats: chatRepo, staff, blobs, schedule, clock: clock.now });
  return { clock, scheduleRepo, chatRepo, blobs, staff, schedule, chats };
}

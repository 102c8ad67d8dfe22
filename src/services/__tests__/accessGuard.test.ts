import { describe, it, expect } from "vitest";
import { canAccessAsStudent, canClose, canJoin, canReadAsStaff, canSendAsStaff } from "../accessGuard";
import { tech, tech2 } from "../../test/fixtures";
import type { ChatSession } from "../../types/helpdesk";

function session(overrides: Partial<ChatSession> = {}): ChatSession {
  return {
    chatId: "CHAT-20250303100000-AB12",
    studentName: "Sam Student",
    initialMessage: "I cannot log in to the portal",
    createdAt: new Date("2025-03-03T10:00:00Z"),
    status: "active",
    studentToken: "student-token-0001",
    technicianIds: [tech.id],
    ...overrides,
  };
}

describe("canAccessAsStudent", () => {
  it("grants the bound token and denies others", () => {
    expect(canAccessAsStudent(session(), "student-token-0001", "write")).toBe("granted");
    expect(canAccessAsStudent(session(), "student-token-0002", "read")).toBe("denied");
  });

  it("offers an unbound chat to its first reader only", () => {
    const unbound = session({ studentToken: "" });
    expect(canAccessAsStudent(unbound, "student-token-0001", "read")).toBe("bind");
    expect(canAccessAsStudent(unbound, "student-token-0001", "write")).toBe("denied");
  });

  it("never matches an empty token", () => {
    expect(canAccessAsStudent(session({ studentToken: "" }), "", "read")).toBe("denied");
  });
});

describe("staff checks", () => {
  it("lets any technician join", () => {
    expect(canJoin(tech2, session())).toBe(true);
  });

  it("limits reading and closing to members", () => {
    expect(canReadAsStaff(tech, session())).toBe(true);
    expect(canReadAsStaff(tech2, session())).toBe(false);
    expect(canClose(tech2, session())).toBe(false);
  });

  it("only lets members send while the chat is active", () => {
    expect(canSendAsStaff(tech, session())).toBe(true);
    expect(canSendAsStaff(tech, session({ status: "student_left" }))).toBe(false);
    expect(canSendAsStaff(tech2, session())).toBe(false);
  });
});

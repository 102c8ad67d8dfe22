import type { ChatSession, StaffMember } from "../types/helpdesk";

export type StudentAccess = "granted" | "bind" | "denied";

/**
 * A matching token is granted. An unbound session may be claimed by the
 * first reader; the caller performs the bind.
 */
export function canAccessAsStudent(session: ChatSession, token: string, mode: "read" | "write"): StudentAccess {
  if (!token) return "denied";
  if (session.studentToken) return session.studentToken === token ? "granted" : "denied";
  return mode === "read" ? "bind" : "denied";
}

export function isMember(staff: StaffMember, session: ChatSession): boolean {
  return session.technicianIds.includes(staff.id);
}

// Any technician or manager may join any chat; no department restriction.
export function canJoin(staff: StaffMember, _session: ChatSession): boolean {
  return staff.role === "technician" || staff.role === "manager";
}

export function canClose(staff: StaffMember, session: ChatSession): boolean {
  return isMember(staff, session);
}

export function canSendAsStaff(staff: StaffMember, session: ChatSession): boolean {
  return isMember(staff, session) && session.status === "active";
}

export function canReadAsStaff(staff: StaffMember, session: ChatSession): boolean {
  return isMember(staff, session);
}

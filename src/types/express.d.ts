import type { StaffMember } from "./helpdesk";

declare global {
  namespace Express {
    interface Request {
      user?: StaffMember;
      studentToken?: string;
    }
  }
}

export {};

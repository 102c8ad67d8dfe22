import type { NextFunction, Request, Response } from "express";
import jwt from "jsonwebtoken";
import { env } from "../config/env";
import type { StaffMember, StaffRole } from "../types/helpdesk";
import { AppError } from "../utils/errors";

const ROLES: readonly StaffRole[] = ["technician", "manager"];

function isRole(value: unknown): value is StaffRole {
  return typeof value === "string" && ROLES.some((r) => r === value);
}

export function signStaffToken(staff: StaffMember) {
  return jwt.sign({ sub: staff.id, role: staff.role, email: staff.email, name: staff.name }, env.JWT_SECRET, {
    expiresIn: "12h",
  });
}

function decodeStaff(token: string): StaffMember | null {
  const decoded = jwt.verify(token, env.JWT_SECRET);
  if (typeof decoded === "string") return null;
  const id = String(decoded.sub || "");
  const email = typeof decoded.email === "string" ? decoded.email : "";
  const name = typeof decoded.name === "string" ? decoded.name : email;
  if (!id || !email || !isRole(decoded.role)) return null;
  return { id, email, name, role: decoded.role };
}

export function requireAuth(req: Request, res: Response, next: NextFunction) {
  const header = req.header("authorization") || "";
  const m = /^Bearer\s+(.+)$/.exec(header);
  if (!m) return res.status(401).json({ error: "Missing token" });

  try {
    const staff = decodeStaff(m[1]);
    if (!staff) return res.status(401).json({ error: "Invalid token" });
    req.user = staff;
    return next();
  } catch {
    return res.status(401).json({ error: "Invalid token" });
  }
}

export function requireRole(...roles: StaffRole[]) {
  return (req: Request, res: Response, next: NextFunction) => {
    const user = req.user;
    if (!user) return res.status(401).json({ error: "Unauthorized" });
    if (!roles.includes(user.role)) return res.status(403).json({ error: "Forbidden" });
    return next();
  };
}

/** The authenticated staff member; only valid behind requireAuth. */
export function currentStaff(req: Request): StaffMember {
  if (!req.user) throw new AppError("Unauthorized", 401, "unauthorized");
  return req.user;
}

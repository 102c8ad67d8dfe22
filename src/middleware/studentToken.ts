import type { NextFunction, Request, Response } from "express";
import { randomBytes } from "crypto";

export const STUDENT_TOKEN_HEADER = "x-student-token";

const TOKEN_RE = /^[A-Za-z0-9_-]{16,128}$/;

/**
 * Anonymous students carry an opaque token instead of an account. A missing
 * or malformed token is replaced with a fresh one, echoed in the response.
 */
export function studentToken(req: Request, res: Response, next: NextFunction) {
  const provided = (req.header(STUDENT_TOKEN_HEADER) || "").trim();
  const token = TOKEN_RE.test(provided) ? provided : randomBytes(24).toString("hex");
  req.studentToken = token;
  res.setHeader(STUDENT_TOKEN_HEADER, token);
  next();
}

export function currentStudentToken(req: Request): string {
  return req.studentToken ?? "";
}

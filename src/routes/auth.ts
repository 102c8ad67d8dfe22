import { Router } from "express";
import bcrypt from "bcrypt";
import { z } from "zod";

import { UserModel } from "../models/User";
import { currentStaff, requireAuth, signStaffToken } from "../middleware/auth";
import { asyncHandler } from "../utils/asyncHandler";

export const authRouter = Router();

const LoginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

authRouter.post("/login", asyncHandler(async (req, res) => {
  const parsed = LoginSchema.safeParse(req.body);
  if (!parsed.success) return res.status(400).json({ error: "Invalid input", details: parsed.error.flatten() });

  const { email, password } = parsed.data;
  const normalizedEmail = email.trim().toLowerCase();

  const user = await UserModel.findOne({ email: normalizedEmail });
  if (!user) return res.status(401).json({ error: "Invalid credentials" });
  if (user.status !== "active") return res.status(403).json({ error: "Account disabled" });

  const ok = await bcrypt.compare(password, user.passwordHash);
  if (!ok) return res.status(401).json({ error: "Invalid credentials" });

  user.lastLoginAt = new Date();
  await user.save();

  const staff = { id: String(user._id), name: user.name, email: user.email, role: user.role };
  return res.json({ token: signStaffToken(staff), user: staff });
}));

authRouter.get("/me", requireAuth, asyncHandler(async (req, res) => {
  const { id } = currentStaff(req);
  const user = await UserModel.findById(id).select("name email role department status lastLoginAt").lean();
  if (!user || user.status !== "active") return res.status(401).json({ error: "Unauthorized" });

  return res.json({
    user: {
      id: String(user._id),
      name: user.name,
      email: user.email,
      role: user.role,
      department: user.department,
      lastLoginAt: user.lastLoginAt ?? null,
    },
  });
}));

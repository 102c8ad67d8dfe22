import { Router } from "express";
import bcrypt from "bcrypt";
import { Types } from "mongoose";
import { z } from "zod";

import { UserModel, type IUser } from "../models/User";
import { currentStaff, requireAuth, requireRole } from "../middleware/auth";
import { isDuplicateKeyError } from "../repositories/mongo/util";
import { asyncHandler } from "../utils/asyncHandler";

export const usersRouter = Router();
usersRouter.use(requireAuth, requireRole("manager"));

type UserRow = Pick<IUser, "_id" | "name" | "email" | "role" | "department" | "status" | "lastLoginAt" | "createdAt">;

function presentUser(u: UserRow) {
  return {
    id: String(u._id),
    name: u.name,
    email: u.email,
    role: u.role,
    department: u.department,
    status: u.status,
    lastLoginAt: u.lastLoginAt ?? null,
    createdAt: u.createdAt,
  };
}

const ListQuery = z.object({
  role: z.enum(["technician", "manager"]).optional(),
  status: z.enum(["active", "disabled"]).optional(),
});

// GET /users - staff accounts, managers first
usersRouter.get("/", asyncHandler(async (req, res) => {
  const parsed = ListQuery.safeParse(req.query);
  if (!parsed.success) return res.status(400).json({ error: "Invalid input", details: parsed.error.flatten() });

  const users = await UserModel.find(parsed.data)
    .select("name email role department status lastLoginAt createdAt")
    .sort({ role: 1, name: 1 })
    .lean();
  return res.json({ users: users.map(presentUser) });
}));

const CreateUserSchema = z.object({
  name: z.string().trim().min(1).max(150),
  email: z.string().email(),
  password: z.string().min(8),
  role: z.enum(["technician", "manager"]).default("technician"),
  department: z.string().trim().max(150).optional(),
});

// POST /users - create a technician or manager account
usersRouter.post("/", asyncHandler(async (req, res) => {
  const parsed = CreateUserSchema.safeParse(req.body);
  if (!parsed.success) return res.status(400).json({ error: "Invalid input", details: parsed.error.flatten() });

  const { name, email, password, role, department } = parsed.data;
  const passwordHash = await bcrypt.hash(password, 10);
  try {
    const user = await UserModel.create({
      name,
      email: email.trim().toLowerCase(),
      passwordHash,
      role,
      department: department ?? "",
      status: "active",
    });
    // eslint-disable-next-line no-console
    console.log(`[users] ${currentStaff(req).email} created ${role} ${user.email}`);
    return res.status(201).json({ user: presentUser(user.toObject()) });
  } catch (err) {
    if (isDuplicateKeyError(err)) return res.status(409).json({ error: "Email already exists" });
    throw err;
  }
}));

// POST /users/:id/toggle-active - enable/disable an account
usersRouter.post("/:id/toggle-active", asyncHandler(async (req, res) => {
  if (!Types.ObjectId.isValid(req.params.id)) return res.status(404).json({ error: "User not found" });
  if (req.params.id === currentStaff(req).id) {
    return res.status(400).json({ error: "You cannot deactivate your own account" });
  }

  const user = await UserModel.findById(req.params.id);
  if (!user) return res.status(404).json({ error: "User not found" });

  user.status = user.status === "active" ? "disabled" : "active";
  await user.save();
  return res.json({ ok: true, user: { id: String(user._id), status: user.status } });
}));

// DELETE /users/:id
usersRouter.delete("/:id", asyncHandler(async (req, res) => {
  if (!Types.ObjectId.isValid(req.params.id)) return res.status(404).json({ error: "User not found" });
  if (req.params.id === currentStaff(req).id) {
    return res.status(400).json({ error: "You cannot delete your own account" });
  }

  const result = await UserModel.deleteOne({ _id: req.params.id });
  if (result.deletedCount === 0) return res.status(404).json({ error: "User not found" });
  return res.json({ ok: true });
}));

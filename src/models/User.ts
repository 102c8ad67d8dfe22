import mongoose, { Schema, type Model, type Types } from "mongoose";
import type { StaffRole } from "../types/helpdesk";

export type UserStatus = "active" | "disabled";

export interface IUser {
  _id: Types.ObjectId;
  role: StaffRole;
  name: string;
  email: string;
  passwordHash: string;
  department: string;
  status: UserStatus;
  lastLoginAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

const UserSchema = new Schema<IUser>(
  {
    role: { type: String, enum: ["technician", "manager"], required: true, default: "technician" },
    name: { type: String, required: true, trim: true, maxlength: 150 },
    email: { type: String, required: true, trim: true, lowercase: true },
    passwordHash: { type: String, required: true },
    department: { type: String, trim: true, default: "" },
    status: { type: String, enum: ["active", "disabled"], required: true, default: "active" },
    lastLoginAt: { type: Date },
  },
  { timestamps: true }
);

UserSchema.index({ email: 1 }, { unique: true });
UserSchema.index({ role: 1, status: 1 });

export const UserModel: Model<IUser> = mongoose.models.User || mongoose.model<IUser>("User", UserSchema);

import mongoose, { Schema, type Model, type Types } from "mongoose";
import type { Weekday } from "../types/helpdesk";

export interface IHelpdeskSchedule {
  _id: Types.ObjectId;
  day: Weekday; // 0=Monday .. 6=Sunday
  isOpen: boolean;
  openTime: string | null; // HH:mm
  closeTime: string | null; // HH:mm
  updatedBy: Types.ObjectId | null;
  createdAt: Date;
  updatedAt: Date;
}

const HelpdeskScheduleSchema = new Schema<IHelpdeskSchedule>(
  {
    day: { type: Number, min: 0, max: 6, required: true },
    isOpen: { type: Boolean, required: true, default: false },
    openTime: { type: String, trim: true, default: null },
    closeTime: { type: String, trim: true, default: null },
    updatedBy: { type: Schema.Types.ObjectId, ref: "User", default: null },
  },
  { timestamps: true }
);

HelpdeskScheduleSchema.index({ day: 1 }, { unique: true });

export const HelpdeskScheduleModel: Model<IHelpdeskSchedule> =
  mongoose.models.HelpdeskSchedule || mongoose.model<IHelpdeskSchedule>("HelpdeskSchedule", HelpdeskScheduleSchema);

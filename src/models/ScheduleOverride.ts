import mongoose, { Schema, type Model, type Types } from "mongoose";

export interface IScheduleOverride {
  _id: Types.ObjectId;
  date: string; // YYYY-MM-DD
  isOpen: boolean;
  openTime: string | null;
  closeTime: string | null;
  reason: string;
  createdBy: Types.ObjectId | null;
  createdAt: Date;
  updatedAt: Date;
}

const ScheduleOverrideSchema = new Schema<IScheduleOverride>(
  {
    date: { type: String, required: true, trim: true },
    isOpen: { type: Boolean, required: true, default: false },
    openTime: { type: String, trim: true, default: null },
    closeTime: { type: String, trim: true, default: null },
    reason: { type: String, required: true, trim: true, maxlength: 200 },
    createdBy: { type: Schema.Types.ObjectId, ref: "User", default: null },
  },
  { timestamps: true }
);

ScheduleOverrideSchema.index({ date: 1 }, { unique: true });

export const ScheduleOverrideModel: Model<IScheduleOverride> =
  mongoose.models.ScheduleOverride || mongoose.model<IScheduleOverride>("ScheduleOverride", ScheduleOverrideSchema);

import mongoose, { Schema, type Model, type Types } from "mongoose";
import type { ChatStatus } from "../types/helpdesk";

export interface IChatSession {
  _id: Types.ObjectId;
  chatId: string;
  studentName: string;
  initialMessage: string;
  status: ChatStatus;
  // Anonymous student binding; empty until first access.
  studentToken: string;
  technicians: Types.ObjectId[];
  createdAt: Date;
  updatedAt: Date;
}

const ChatSessionSchema = new Schema<IChatSession>(
  {
    chatId: { type: String, required: true, trim: true, maxlength: 30 },
    studentName: { type: String, required: true, trim: true, maxlength: 100 },
    initialMessage: { type: String, required: true },
    status: {
      type: String,
      enum: ["waiting", "active", "student_left", "closed"],
      required: true,
      default: "waiting",
    },
    studentToken: { type: String, trim: true, default: "" },
    technicians: [{ type: Schema.Types.ObjectId, ref: "User" }],
    createdAt: { type: Date, required: true },
  },
  // createdAt is assigned by the chat service clock
  { timestamps: { createdAt: false, updatedAt: true } }
);

ChatSessionSchema.index({ chatId: 1 }, { unique: true });
ChatSessionSchema.index({ status: 1, createdAt: -1 });
ChatSessionSchema.index({ technicians: 1, status: 1 });

export const ChatSessionModel: Model<IChatSession> =
  mongoose.models.ChatSession || mongoose.model<IChatSession>("ChatSession", ChatSessionSchema);

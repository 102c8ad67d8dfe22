import mongoose, { Schema, type Model, type Types } from "mongoose";
import type { MessageKind } from "../types/helpdesk";

export interface IChatMessage {
  _id: Types.ObjectId;
  chatId: string;
  senderName: string;
  senderUserId: Types.ObjectId | null;
  content: string;
  timestamp: Date;
  isFromStudent: boolean;
  kind: MessageKind;
}

const ChatMessageSchema = new Schema<IChatMessage>({
  chatId: { type: String, required: true },
  senderName: { type: String, required: true, trim: true, maxlength: 100 },
  senderUserId: { type: Schema.Types.ObjectId, ref: "User", default: null },
  content: { type: String, required: true },
  timestamp: { type: Date, required: true },
  isFromStudent: { type: Boolean, default: false },
  kind: { type: String, enum: ["text", "emoji", "system"], required: true, default: "text" },
});

ChatMessageSchema.index({ chatId: 1, timestamp: 1 });

export const ChatMessageModel: Model<IChatMessage> =
  mongoose.models.ChatMessage || mongoose.model<IChatMessage>("ChatMessage", ChatMessageSchema);

import mongoose, { Schema, type Model, type Types } from "mongoose";

export interface IChatAttachment {
  _id: Types.ObjectId;
  chatId: string;
  messageId: Types.ObjectId;
  // Blob store handle (Cloudinary public id)
  fileRef: string;
  originalFilename: string;
  sizeBytes: number;
  mimeType: string;
  uploadedAt: Date;
  uploadedByStudent: boolean;
}

const ChatAttachmentSchema = new Schema<IChatAttachment>({
  chatId: { type: String, required: true },
  messageId: { type: Schema.Types.ObjectId, ref: "ChatMessage", required: true },
  fileRef: { type: String, required: true, trim: true },
  originalFilename: { type: String, required: true, trim: true, maxlength: 255 },
  sizeBytes: { type: Number, required: true, min: 0 },
  mimeType: { type: String, trim: true, default: "application/octet-stream" },
  uploadedAt: { type: Date, required: true },
  uploadedByStudent: { type: Boolean, default: false },
});

ChatAttachmentSchema.index({ chatId: 1, messageId: 1 });
ChatAttachmentSchema.index({ fileRef: 1 }, { unique: true });

export const ChatAttachmentModel: Model<IChatAttachment> =
  mongoose.models.ChatAttachment || mongoose.model<IChatAttachment>("ChatAttachment", ChatAttachmentSchema);

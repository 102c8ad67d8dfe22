import { Types, type FilterQuery } from "mongoose";
import { ChatAttachmentModel, type IChatAttachment } from "../../models/ChatAttachment";
import { ChatMessageModel, type IChatMessage } from "../../models/ChatMessage";
import { ChatSessionModel, type IChatSession } from "../../models/ChatSession";
import type {
  ChatAttachment,
  ChatMessage,
  ChatMessageWithAttachments,
  ChatSession,
  ChatStatus,
} from "../../types/helpdesk";
import type { ChatRepository, NewAttachment, NewMessage, SessionFilter } from "../types";
import { idString, isDuplicateKeyError, toObjectIdOrNull } from "./util";

type LeanSession = Pick<
  IChatSession,
  "chatId" | "studentName" | "initialMessage" | "status" | "studentToken" | "technicians" | "createdAt"
>;
type LeanMessage = Pick<
  IChatMessage,
  "_id" | "chatId" | "senderName" | "senderUserId" | "content" | "timestamp" | "isFromStudent" | "kind"
>;
type LeanAttachment = Pick<
  IChatAttachment,
  | "_id"
  | "chatId"
  | "messageId"
  | "fileRef"
  | "originalFilename"
  | "sizeBytes"
  | "mimeType"
  | "uploadedAt"
  | "uploadedByStudent"
>;

function toSession(doc: LeanSession): ChatSession {
  return {
    chatId: doc.chatId,
    studentName: doc.studentName,
    initialMessage: doc.initialMessage,
    createdAt: doc.createdAt,
    status: doc.status,
    studentToken: doc.studentToken ?? "",
    technicianIds: (doc.technicians ?? []).map((t) => String(t)),
  };
}

function toMessage(doc: LeanMessage): ChatMessage {
  return {
    id: String(doc._id),
    chatId: doc.chatId,
    senderName: doc.senderName,
    senderUserId: idString(doc.senderUserId),
    content: doc.content,
    timestamp: doc.timestamp,
    isFromStudent: Boolean(doc.isFromStudent),
    kind: doc.kind,
  };
}

function toAttachment(doc: LeanAttachment): ChatAttachment {
  return {
    id: String(doc._id),
    chatId: doc.chatId,
    messageId: String(doc.messageId),
    fileRef: doc.fileRef,
    originalFilename: doc.originalFilename,
    sizeBytes: doc.sizeBytes,
    mimeType: doc.mimeType,
    uploadedAt: doc.uploadedAt,
    uploadedByStudent: Boolean(doc.uploadedByStudent),
  };
}

function sessionQuery(filter: SessionFilter): FilterQuery<IChatSession> {
  const q: FilterQuery<IChatSession> = {};
  if (filter.status) q.status = filter.status;
  if (filter.technicianId) q.technicians = toObjectIdOrNull(filter.technicianId);
  if (filter.createdBefore) q.createdAt = { $lt: filter.createdBefore };
  return q;
}

export class MongoChatRepository implements ChatRepository {
  async createSession(session: ChatSession) {
    try {
      await ChatSessionModel.create({
        chatId: session.chatId,
        studentName: session.studentName,
        initialMessage: session.initialMessage,
        status: session.status,
        studentToken: session.studentToken,
        technicians: session.technicianIds.map((id) => new Types.ObjectId(id)),
        createdAt: session.createdAt,
      });
      return true;
    } catch (err) {
      if (isDuplicateKeyError(err)) return false;
      throw err;
    }
  }

  async findSession(chatId: string) {
    const doc = await ChatSessionModel.findOne({ chatId }).lean();
    return doc ? toSession(doc) : null;
  }

  async bindStudentToken(chatId: string, token: string) {
    // compare-and-set: only an unbound session accepts a token
    const doc = await ChatSessionModel.findOneAndUpdate(
      { chatId, studentToken: "" },
      { $set: { studentToken: token } },
      { new: true }
    ).lean();
    return doc ? toSession(doc) : null;
  }

  async addTechnician(chatId: string, userId: string) {
    const doc = await ChatSessionModel.findOneAndUpdate(
      { chatId },
      { $addToSet: { technicians: new Types.ObjectId(userId) } },
      { new: true }
    ).lean();
    return doc ? toSession(doc) : null;
  }

  async setStatus(chatId: string, status: ChatStatus) {
    const doc = await ChatSessionModel.findOneAndUpdate({ chatId }, { $set: { status } }, { new: true }).lean();
    return doc ? toSession(doc) : null;
  }

  async listSessions(filter: SessionFilter) {
    const rows = await ChatSessionModel.find(sessionQuery(filter)).sort({ createdAt: -1 }).lean();
    return rows.map(toSession);
  }

  async countSessions(filter: SessionFilter) {
    return await ChatSessionModel.countDocuments(sessionQuery(filter));
  }

  async deleteSession(chatId: string) {
    await ChatSessionModel.deleteOne({ chatId });
  }

  async appendMessage(message: NewMessage, attachments: NewAttachment[]): Promise<ChatMessageWithAttachments> {
    const created = await ChatMessageModel.create({
      chatId: message.chatId,
      senderName: message.senderName,
      senderUserId: toObjectIdOrNull(message.senderUserId),
      content: message.content,
      timestamp: message.timestamp,
      isFromStudent: message.isFromStudent,
      kind: message.kind,
    });

    if (attachments.length === 0) return { ...toMessage(created.toObject()), attachments: [] };

    try {
      const rows = await ChatAttachmentModel.insertMany(
        attachments.map((a) => ({ ...a, messageId: created._id }))
      );
      return {
        ...toMessage(created.toObject()),
        attachments: rows.map((r) => toAttachment(r.toObject())),
      };
    } catch (err) {
      // no transaction here: undo the message so the write is all-or-nothing
      await ChatAttachmentModel.deleteMany({ messageId: created._id });
      await ChatMessageModel.deleteOne({ _id: created._id });
      throw err;
    }
  }

  async lastMessageTimestamp(chatId: string) {
    const doc = await ChatMessageModel.findOne({ chatId }).sort({ timestamp: -1 }).select("timestamp").lean();
    return doc ? doc.timestamp : null;
  }

  async listMessages(chatId: string) {
    const [messages, attachments] = await Promise.all([
      ChatMessageModel.find({ chatId }).sort({ timestamp: 1, _id: 1 }).lean(),
      ChatAttachmentModel.find({ chatId }).sort({ uploadedAt: 1, _id: 1 }).lean(),
    ]);
    const byMessage = new Map<string, ChatAttachment[]>();
    for (const row of attachments) {
      const att = toAttachment(row);
      const list = byMessage.get(att.messageId) ?? [];
      list.push(att);
      byMessage.set(att.messageId, list);
    }
    return messages.map((m) => {
      const msg = toMessage(m);
      return { ...msg, attachments: byMessage.get(msg.id) ?? [] };
    });
  }

  async deleteMessages(chatId: string) {
    const res = await ChatMessageModel.deleteMany({ chatId });
    return res.deletedCount;
  }

  async listAttachments(chatId: string) {
    const rows = await ChatAttachmentModel.find({ chatId }).sort({ uploadedAt: 1 }).lean();
    return rows.map(toAttachment);
  }

  async findAttachment(chatId: string, attachmentId: string) {
    if (!Types.ObjectId.isValid(attachmentId)) return null;
    const doc = await ChatAttachmentModel.findOne({ _id: attachmentId, chatId }).lean();
    return doc ? toAttachment(doc) : null;
  }

  async deleteAttachment(attachmentId: string) {
    await ChatAttachmentModel.deleteOne({ _id: attachmentId });
  }
}

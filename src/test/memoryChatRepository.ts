import type { ChatRepository, NewAttachment, NewMessage, SessionFilter } from "../repositories/types";
import type { ChatAttachment, ChatMessage, ChatSession, ChatStatus } from "../types/helpdesk";

function matches(session: ChatSession, filter: SessionFilter) {
  if (filter.status && session.status !== filter.status) return false;
  if (filter.technicianId && !session.technicianIds.includes(filter.technicianId)) return false;
  if (filter.createdBefore && !(session.createdAt < filter.createdBefore)) return false;
  return true;
}

export class MemoryChatRepository implements ChatRepository {
  readonly sessions = new Map<string, ChatSession>();
  readonly messages = new Map<string, ChatMessage>();
  readonly attachments = new Map<string, ChatAttachment>();
  /** Set to make the next attachment write fail. */
  failNextAttachmentWrite = false;
  private seq = 0;

  private nextId(prefix: string) {
    return `${prefix}-${++this.seq}`;
  }

  async createSession(session: ChatSession) {
    if (this.sessions.has(session.chatId)) return false;
    this.sessions.set(session.chatId, structuredClone(session));
    return true;
  }

  async findSession(chatId: string) {
    const s = this.sessions.get(chatId);
    return s ? structuredClone(s) : null;
  }

  async bindStudentToken(chatId: string, token: string) {
    const s = this.sessions.get(chatId);
    if (!s || s.studentToken !== "") return null;
    s.studentToken = token;
    return structuredClone(s);
  }

  async addTechnician(chatId: string, userId: string) {
    const s = this.sessions.get(chatId);
    if (!s) return null;
    if (!s.technicianIds.includes(userId)) s.technicianIds.push(userId);
    return structuredClone(s);
  }

  async setStatus(chatId: string, status: ChatStatus) {
    const s = this.sessions.get(chatId);
    if (!s) return null;
    s.status = status;
    return structuredClone(s);
  }

  async listSessions(filter: SessionFilter) {
    return [...this.sessions.values()]
      .filter((s) => matches(s, filter))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((s) => structuredClone(s));
  }

  async countSessions(filter: SessionFilter) {
    return [...this.sessions.values()].filter((s) => matches(s, filter)).length;
  }

  async deleteSession(chatId: string) {
    this.sessions.delete(chatId);
  }

  async appendMessage(message: NewMessage, attachments: NewAttachment[]) {
    if (attachments.length > 0 && this.failNextAttachmentWrite) {
      this.failNextAttachmentWrite = false;
      throw new Error("attachment write failed");
    }
    const stored: ChatMessage = { ...message, id: this.nextId("msg") };
    this.messages.set(stored.id, stored);
    const atts = attachments.map((a) => {
      const att: ChatAttachment = { ...a, id: this.nextId("att"), messageId: stored.id };
      this.attachments.set(att.id, att);
      return structuredClone(att);
    });
    return { ...structuredClone(stored), attachments: atts };
  }

  async lastMessageTimestamp(chatId: string) {
    let last: Date | null = null;
    for (const m of this.messages.values()) {
      if (m.chatId === chatId && (!last || m.timestamp > last)) last = m.timestamp;
    }
    return last ? new Date(last) : null;
  }

  async listMessages(chatId: string) {
    return [...this.messages.values()]
      .filter((m) => m.chatId === chatId)
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
      .map((m) => ({
        ...structuredClone(m),
        attachments: [...this.attachments.values()]
          .filter((a) => a.messageId === m.id)
          .map((a) => structuredClone(a)),
      }));
  }

  async deleteMessages(chatId: string) {
    let removed = 0;
    for (const [id, m] of this.messages) {
      if (m.chatId === chatId) {
        this.messages.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async listAttachments(chatId: string) {
    return [...this.attachments.values()].filter((a) => a.chatId === chatId).map((a) => structuredClone(a));
  }

  async findAttachment(chatId: string, attachmentId: string) {
    const a = this.attachments.get(attachmentId);
    return a && a.chatId === chatId ? structuredClone(a) : null;
  }

  async deleteAttachment(attachmentId: string) {
    this.attachments.delete(attachmentId);
  }
}

import { attachmentLimits, type AttachmentLimits } from "../config/attachments";
import type { ChatRepository, NewAttachment, StaffDirectory } from "../repositories/types";
import type {
  Caller,
  ChatAttachment,
  ChatMessageWithAttachments,
  ChatSession,
  IncomingAttachment,
  MessageKind,
  StaffMember,
} from "../types/helpdesk";
import {
  ForbiddenError,
  InvalidStateError,
  InvalidUserError,
  NotFoundError,
  StorageError,
  UnauthorizedError,
  errorMessage,
} from "../utils/errors";
import { canAccessAsStudent, canClose, canJoin, canReadAsStaff, canSendAsStaff, isMember } from "./accessGuard";
import { validateAttachments } from "./attachmentPolicy";
import type { BlobStore } from "./blobStore";
import { generateChatId } from "./chatId";
import { KeyedMutex } from "./keyedMutex";
import { classifyContent, normalizeContent } from "./messageContent";
import type { ScheduleService, ScheduleStatus } from "./scheduleService";

export const SYSTEM_SENDER = "System";
const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_ID_ATTEMPTS = 5;

export type ChatServiceDeps = {
  chats: ChatRepository;
  staff: StaffDirectory;
  blobs: BlobStore;
  schedule: ScheduleService;
  limits?: AttachmentLimits;
  clock?: () => Date;
  locks?: KeyedMutex;
};

export type JoinResult = { session: ChatSession; joined: boolean };

export type CloseResult = { chatId: string; messagesRemoved: number; attachmentsRemoved: number };

export type CleanupResult = { count: number; chatIds: string[]; dryRun: boolean };

export type TechnicianDashboard = {
  waitingChats: ChatSession[];
  activeChats: ChatSession[];
  metrics: { totalWaiting: number; totalActive: number; userActive: number };
  schedule: ScheduleStatus;
};

// A denied student sees the same answer as for an unknown chat id.
function chatNotFound() {
  return new NotFoundError("Chat not found");
}

export class ChatService {
  private readonly chats: ChatRepository;
  private readonly staff: StaffDirectory;
  private readonly blobs: BlobStore;
  private readonly schedule: ScheduleService;
  private readonly limits: AttachmentLimits;
  private readonly clock: () => Date;
  private readonly locks: KeyedMutex;

  constructor(deps: ChatServiceDeps) {
    this.chats = deps.chats;
    this.staff = deps.staff;
    this.blobs = deps.blobs;
    this.schedule = deps.schedule;
    this.limits = deps.limits ?? attachmentLimits;
    this.clock = deps.clock ?? (() => new Date());
    this.locks = deps.locks ?? new KeyedMutex();
  }

  // -----------------------
  // Lookup & access
  // -----------------------

  async getChat(chatId: string): Promise<ChatSession> {
    const session = await this.chats.findSession(chatId);
    if (!session) throw chatNotFound();
    return session;
  }

  async listMessages(chatId: string): Promise<ChatMessageWithAttachments[]> {
    await this.getChat(chatId);
    return await this.chats.listMessages(chatId);
  }

  /**
   * Student read access. An unbound chat is claimed by the first reader; the
   * bind is a compare-and-set, so only one token can ever win it.
   */
  async accessAsStudent(chatId: string, token: string): Promise<ChatSession> {
    const session = await this.getChat(chatId);
    const access = canAccessAsStudent(session, token, "read");
    if (access === "granted") return session;
    if (access === "bind") {
      const bound = await this.chats.bindStudentToken(chatId, token);
      if (bound) {
        // eslint-disable-next-line no-console
        console.log(`[chat] student token bound to ${chatId}`);
        return bound;
      }
      const current = await this.chats.findSession(chatId);
      if (current && current.studentToken === token) return current;
    }
    throw chatNotFound();
  }

  /**
   * Tokens outlive account changes, so staff callers are looked up again:
   * a disabled or deleted account is refused.
   */
  private async activeStaff(staff: StaffMember): Promise<StaffMember> {
    const current = await this.staff.findActiveById(staff.id);
    if (!current) throw new UnauthorizedError("Account is not active");
    return current;
  }

  private async resolveCaller(caller: Caller): Promise<Caller> {
    if (caller.kind === "student") return caller;
    return { kind: "staff", staff: await this.activeStaff(caller.staff) };
  }

  async authorizeRead(chatId: string, caller: Caller): Promise<ChatSession> {
    if (caller.kind === "student") return await this.accessAsStudent(chatId, caller.token);
    const staff = await this.activeStaff(caller.staff);
    const session = await this.getChat(chatId);
    if (!canReadAsStaff(staff, session)) throw new ForbiddenError("You are not part of this chat");
    return session;
  }

  async transcript(chatId: string, caller: Caller): Promise<{ session: ChatSession; messages: ChatMessageWithAttachments[] }> {
    const session = await this.authorizeRead(chatId, caller);
    return { session, messages: await this.chats.listMessages(chatId) };
  }

  async getAttachment(chatId: string, attachmentId: string, caller: Caller): Promise<{ attachment: ChatAttachment; url: string }> {
    await this.authorizeRead(chatId, caller);
    const attachment = await this.chats.findAttachment(chatId, attachmentId);
    if (!attachment) throw new NotFoundError("Attachment not found");
    return { attachment, url: this.blobs.urlFor(attachment.fileRef) };
  }

  // -----------------------
  // Lifecycle
  // -----------------------

  async startChat(input: { studentName: string; initialMessage: string; studentToken?: string }): Promise<ChatSession> {
    const now = this.clock();
    const status = await this.schedule.getStatus(now);

    let session: ChatSession | null = null;
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS && !session; attempt++) {
      const candidate: ChatSession = {
        chatId: generateChatId(now, this.schedule.timeZone),
        studentName: input.studentName,
        initialMessage: input.initialMessage,
        createdAt: now,
        status: "waiting",
        studentToken: input.studentToken ?? "",
        technicianIds: [],
      };
      if (await this.chats.createSession(candidate)) session = candidate;
    }
    if (!session) throw new Error("Could not allocate a unique chat id");
    const created = session;

    await this.locks.runExclusive(created.chatId, async () => {
      let intro = `Chat started by ${created.studentName}. `;
      if (status.available) {
        intro += "Support is currently available!";
      } else {
        intro += "Support is currently offline - a technician will respond when available.";
        if (status.override) intro += ` (Special schedule: ${status.override.reason})`;
      }
      await this.appendSystem(created.chatId, intro);

      await this.append(created.chatId, {
        senderName: created.studentName,
        senderUserId: null,
        content: created.initialMessage,
        isFromStudent: true,
        kind: "text",
      });

      if (!status.available) {
        await this.appendSystem(created.chatId, `${status.reason}. Next available: ${status.nextAvailable}`);
      }
    });

    // eslint-disable-next-line no-console
    console.log(`[chat] ${created.chatId} started by ${created.studentName} (support ${status.available ? "open" : "closed"})`);
    return created;
  }

  /**
   * Adds a technician. The first join flips a waiting chat to active; joining
   * twice is a no-op.
   */
  async addTechnician(chatId: string, userId: string): Promise<JoinResult> {
    const staff = await this.staff.findActiveById(userId);
    if (!staff) throw new InvalidUserError(userId);

    return await this.locks.runExclusive(chatId, async () => {
      const session = await this.getChat(chatId);
      if (!canJoin(staff, session)) throw new ForbiddenError("Only technicians and managers can join chats");
      if (session.status !== "waiting" && session.status !== "active") {
        throw new InvalidStateError("Cannot join this chat in its current state");
      }

      const alreadyMember = isMember(staff, session);
      let updated = alreadyMember ? session : await this.chats.addTechnician(chatId, staff.id);
      if (!updated) throw chatNotFound();
      if (updated.status === "waiting") {
        updated = await this.chats.setStatus(chatId, "active");
        if (!updated) throw chatNotFound();
      }

      if (!alreadyMember) {
        await this.append(chatId, {
          senderName: staff.name,
          senderUserId: staff.id,
          content: `${staff.name} has joined the chat`,
          isFromStudent: false,
          kind: "system",
        });
        // eslint-disable-next-line no-console
        console.log(`[chat] ${staff.email} joined ${chatId}`);
      }
      return { session: updated, joined: !alreadyMember };
    });
  }

  async leaveAsStudent(chatId: string, token: string): Promise<ChatSession> {
    return await this.locks.runExclusive(chatId, async () => {
      const session = await this.getChat(chatId);
      if (canAccessAsStudent(session, token, "write") !== "granted") throw chatNotFound();
      if (session.status === "student_left") return session;
      if (session.status === "closed") throw new InvalidStateError("This chat has been closed");

      const updated = await this.chats.setStatus(chatId, "student_left");
      if (!updated) throw chatNotFound();
      await this.appendSystem(chatId, `${session.studentName} has left the chat`);
      return updated;
    });
  }

  /**
   * Closing purges the chat: attachments (and their blobs), then messages,
   * then the session record. Later lookups report not found.
   */
  async closeChat(chatId: string, requestedBy: StaffMember): Promise<CloseResult> {
    return await this.locks.runExclusive(chatId, async () => {
      const closedBy = await this.activeStaff(requestedBy);
      const session = await this.getChat(chatId);
      if (!canClose(closedBy, session)) throw new ForbiddenError("You are not part of this chat");
      if (session.status !== "active" && session.status !== "student_left") {
        throw new InvalidStateError("Cannot close this chat in its current state");
      }

      await this.chats.setStatus(chatId, "closed");
      await this.appendSystem(chatId, `Chat closed by ${closedBy.name}`);
      const result = await this.purge(chatId);
      // eslint-disable-next-line no-console
      console.log(`[chat] ${chatId} closed by ${closedBy.email} and purged`, result);
      return result;
    });
  }

  // -----------------------
  // Messages
  // -----------------------

  async postMessage(
    chatId: string,
    caller: Caller,
    rawContent: string,
    files: IncomingAttachment[] = []
  ): Promise<ChatMessageWithAttachments> {
    const content = normalizeContent(rawContent);
    validateAttachments(files, this.limits);

    return await this.locks.runExclusive(chatId, async () => {
      const sender = await this.resolveCaller(caller);
      const session = await this.getChat(chatId);
      this.assertCanPost(session, sender);

      const now = this.clock();
      const fromStudent = sender.kind === "student";
      const stored = await this.storeBlobs(chatId, files, fromStudent, now);

      let message: ChatMessageWithAttachments;
      try {
        message = await this.append(
          chatId,
          {
            senderName: sender.kind === "student" ? session.studentName : sender.staff.name,
            senderUserId: sender.kind === "student" ? null : sender.staff.id,
            content,
            isFromStudent: fromStudent,
            kind: classifyContent(content),
          },
          stored
        );
      } catch (err) {
        await this.releaseBlobs(chatId, stored);
        throw err;
      }

      // eslint-disable-next-line no-console
      console.log(`[chat] new message in ${chatId} from ${message.senderName} (${stored.length} attachment(s))`);

      if (fromStudent && session.status === "waiting") {
        const availability = await this.schedule.isAvailable(now);
        if (!availability.available) {
          await this.appendSystem(chatId, `Your message has been received. ${availability.reason}`);
        }
      }
      return message;
    });
  }

  private assertCanPost(session: ChatSession, sender: Caller) {
    if (sender.kind === "student") {
      if (canAccessAsStudent(session, sender.token, "write") !== "granted") throw chatNotFound();
      if (session.status === "student_left" || session.status === "closed") {
        throw new InvalidStateError("You can no longer send messages in this chat");
      }
      return;
    }
    if (canSendAsStaff(sender.staff, session)) return;
    if (!isMember(sender.staff, session)) throw new ForbiddenError("You are not part of this chat");
    throw new InvalidStateError("Messages can only be sent while the chat is active");
  }

  private async storeBlobs(
    chatId: string,
    files: IncomingAttachment[],
    uploadedByStudent: boolean,
    now: Date
  ): Promise<NewAttachment[]> {
    const stored: NewAttachment[] = [];
    try {
      for (const file of files) {
        const fileRef = await this.blobs.put({ ...file, chatId });
        stored.push({
          chatId,
          fileRef,
          originalFilename: file.filename,
          sizeBytes: file.sizeBytes,
          mimeType: file.mimeType || "application/octet-stream",
          uploadedAt: now,
          uploadedByStudent,
        });
      }
    } catch (err) {
      await this.releaseBlobs(chatId, stored);
      if (err instanceof StorageError) throw err;
      throw new StorageError(`Attachment upload failed: ${errorMessage(err)}`, err);
    }
    return stored;
  }

  private async releaseBlobs(chatId: string, stored: Array<Pick<ChatAttachment, "fileRef" | "originalFilename">>) {
    let released = 0;
    for (const att of stored) {
      try {
        await this.blobs.delete(att.fileRef);
        released++;
      } catch (err) {
        // eslint-disable-next-line no-console
        console.error(`[attachments] could not delete ${att.originalFilename} from ${chatId}:`, errorMessage(err));
      }
    }
    return released;
  }

  private async nextTimestamp(chatId: string): Promise<Date> {
    const now = this.clock();
    const last = await this.chats.lastMessageTimestamp(chatId);
    if (last && last.getTime() >= now.getTime()) return new Date(last.getTime() + 1);
    return now;
  }

  private async append(
    chatId: string,
    message: { senderName: string; senderUserId: string | null; content: string; isFromStudent: boolean; kind: MessageKind },
    attachments: NewAttachment[] = []
  ): Promise<ChatMessageWithAttachments> {
    const timestamp = await this.nextTimestamp(chatId);
    return await this.chats.appendMessage({ chatId, timestamp, ...message }, attachments);
  }

  private async appendSystem(chatId: string, content: string) {
    return await this.append(chatId, {
      senderName: SYSTEM_SENDER,
      senderUserId: null,
      content,
      isFromStudent: false,
      kind: "system",
    });
  }

  // -----------------------
  // Cascade & maintenance
  // -----------------------

  /** Caller holds the session lock. Blob failures are logged and skipped. */
  private async purge(chatId: string): Promise<CloseResult> {
    const attachments = await this.chats.listAttachments(chatId);
    let attachmentsRemoved = 0;
    for (const att of attachments) {
      attachmentsRemoved += await this.releaseBlobs(chatId, [att]);
      await this.chats.deleteAttachment(att.id);
    }
    const messagesRemoved = await this.chats.deleteMessages(chatId);
    await this.chats.deleteSession(chatId);
    return { chatId, messagesRemoved, attachmentsRemoved };
  }

  async deleteClosedChatsOlderThan(days: number, options: { dryRun?: boolean } = {}): Promise<CleanupResult> {
    const cutoff = new Date(this.clock().getTime() - days * DAY_MS);
    const stale = await this.chats.listSessions({ status: "closed", createdBefore: cutoff });
    const chatIds = stale.map((s) => s.chatId);
    if (options.dryRun) return { count: chatIds.length, chatIds, dryRun: true };

    let filesRemoved = 0;
    for (const chatId of chatIds) {
      await this.locks.runExclusive(chatId, async () => {
        if (!(await this.chats.findSession(chatId))) return;
        filesRemoved += (await this.purge(chatId)).attachmentsRemoved;
      });
    }
    // eslint-disable-next-line no-console
    console.log(`[cleanup] removed ${chatIds.length} closed chat(s) older than ${days} day(s), ${filesRemoved} file(s)`);
    return { count: chatIds.length, chatIds, dryRun: false };
  }

  async technicianDashboard(caller: StaffMember): Promise<TechnicianDashboard> {
    const staff = await this.activeStaff(caller);
    const now = this.clock();
    const [waitingChats, activeChats, totalActive, schedule] = await Promise.all([
      this.chats.listSessions({ status: "waiting" }),
      this.chats.listSessions({ status: "active", technicianId: staff.id }),
      this.chats.countSessions({ status: "active" }),
      this.schedule.getStatus(now),
    ]);
    return {
      waitingChats,
      activeChats,
      metrics: { totalWaiting: waitingChats.length, totalActive, userActive: activeChats.length },
      schedule,
    };
  }
}

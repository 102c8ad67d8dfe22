import type {
  ChatAttachment,
  ChatMessage,
  ChatMessageWithAttachments,
  ChatSession,
  ChatStatus,
  ScheduleOverride,
  StaffMember,
  Weekday,
  WeeklyScheduleEntry,
} from "../types/helpdesk";

export type WeeklyEntryInput = {
  day: Weekday;
  isOpen: boolean;
  openTime: string | null;
  closeTime: string | null;
  updatedBy: string | null;
};

export type OverrideInput = {
  date: string;
  isOpen: boolean;
  openTime: string | null;
  closeTime: string | null;
  reason: string;
  createdBy: string | null;
};

export interface ScheduleRepository {
  /** Ordered by day. */
  listWeekly(): Promise<WeeklyScheduleEntry[]>;
  upsertWeekly(input: WeeklyEntryInput): Promise<WeeklyScheduleEntry>;
  /** Inserts only when the day has no entry yet; resolves true when it inserted. */
  insertWeeklyIfMissing(input: WeeklyEntryInput): Promise<boolean>;
  /** Ordered by date; `from`/`to` are inclusive YYYY-MM-DD bounds. */
  listOverrides(range?: { from?: string; to?: string }): Promise<ScheduleOverride[]>;
  getOverrideByDate(date: string): Promise<ScheduleOverride | null>;
  /** Rejects with a ValidationError when the date already has an override. */
  createOverride(input: OverrideInput): Promise<ScheduleOverride>;
  deleteOverride(id: string): Promise<boolean>;
}

export type SessionFilter = {
  status?: ChatStatus;
  technicianId?: string;
  createdBefore?: Date;
};

export type NewMessage = Omit<ChatMessage, "id">;
export type NewAttachment = Omit<ChatAttachment, "id" | "messageId">;

export interface ChatRepository {
  /** Resolves false when the chat id is already taken. */
  createSession(session: ChatSession): Promise<boolean>;
  findSession(chatId: string): Promise<ChatSession | null>;
  /** Binds the token only while the session has none; resolves null if another token won. */
  bindStudentToken(chatId: string, token: string): Promise<ChatSession | null>;
  addTechnician(chatId: string, userId: string): Promise<ChatSession | null>;
  setStatus(chatId: string, status: ChatStatus): Promise<ChatSession | null>;
  /** Newest first. */
  listSessions(filter: SessionFilter): Promise<ChatSession[]>;
  countSessions(filter: SessionFilter): Promise<number>;
  deleteSession(chatId: string): Promise<void>;

  /** Writes a message and its attachments together, or nothing. */
  appendMessage(message: NewMessage, attachments: NewAttachment[]): Promise<ChatMessageWithAttachments>;
  lastMessageTimestamp(chatId: string): Promise<Date | null>;
  /** Ascending by timestamp. */
  listMessages(chatId: string): Promise<ChatMessageWithAttachments[]>;
  deleteMessages(chatId: string): Promise<number>;

  listAttachments(chatId: string): Promise<ChatAttachment[]>;
  findAttachment(chatId: string, attachmentId: string): Promise<ChatAttachment | null>;
  deleteAttachment(attachmentId: string): Promise<void>;
}

export interface StaffDirectory {
  /** Active staff accounts only. */
  findActiveById(id: string): Promise<StaffMember | null>;
}

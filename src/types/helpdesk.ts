/** 0 = Monday ... 6 = Sunday */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export const WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6];

export type WeeklyScheduleEntry = {
  day: Weekday;
  isOpen: boolean;
  openTime: string | null; // HH:mm
  closeTime: string | null; // HH:mm
  createdAt: Date;
  updatedAt: Date;
  updatedBy: string | null;
};

export type ScheduleOverride = {
  id: string;
  date: string; // YYYY-MM-DD in the support time zone
  isOpen: boolean;
  openTime: string | null;
  closeTime: string | null;
  reason: string;
  createdAt: Date;
  createdBy: string | null;
};

export type ChatStatus = "waiting" | "active" | "student_left" | "closed";

export type ChatSession = {
  chatId: string;
  studentName: string;
  initialMessage: string;
  createdAt: Date;
  status: ChatStatus;
  studentToken: string; // "" until bound
  technicianIds: string[];
};

export type MessageKind = "text" | "emoji" | "system";

export type ChatMessage = {
  id: string;
  chatId: string;
  senderName: string;
  senderUserId: string | null;
  content: string;
  timestamp: Date;
  isFromStudent: boolean;
  kind: MessageKind;
};

export type ChatAttachment = {
  id: string;
  chatId: string;
  messageId: string;
  fileRef: string;
  originalFilename: string;
  sizeBytes: number;
  mimeType: string;
  uploadedAt: Date;
  uploadedByStudent: boolean;
};

export type ChatMessageWithAttachments = ChatMessage & { attachments: ChatAttachment[] };

export type StaffRole = "technician" | "manager";

export type StaffMember = {
  id: string;
  name: string;
  email: string;
  role: StaffRole;
};

export type Caller =
  | { kind: "student"; token: string }
  | { kind: "staff"; staff: StaffMember };

/** A file received from the client, not yet stored. */
export type IncomingAttachment = {
  filename: string;
  sizeBytes: number;
  mimeType?: string;
  data: Buffer;
};

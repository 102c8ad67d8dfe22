import type { ChatAttachment, ChatMessageWithAttachments, ChatSession, WeeklyScheduleEntry } from "../types/helpdesk";
import { displaySize } from "../services/attachmentPolicy";
import { dayName, formatTime12h } from "../services/timeOfDay";

// Never exposes studentToken.
export function presentChat(session: ChatSession) {
  return {
    chatId: session.chatId,
    studentName: session.studentName,
    initialMessage: session.initialMessage,
    createdAt: session.createdAt.toISOString(),
    status: session.status,
    technicianIds: session.technicianIds,
  };
}

export function presentAttachment(att: ChatAttachment) {
  return {
    id: att.id,
    filename: att.originalFilename,
    sizeBytes: att.sizeBytes,
    size: displaySize(att.sizeBytes),
    mimeType: att.mimeType,
    isImage: att.mimeType.startsWith("image/"),
    uploadedByStudent: att.uploadedByStudent,
  };
}

export function presentMessage(message: ChatMessageWithAttachments) {
  return {
    id: message.id,
    sender: message.senderName,
    content: message.content,
    timestamp: message.timestamp.toISOString(),
    isFromStudent: message.isFromStudent,
    kind: message.kind,
    attachments: message.attachments.map(presentAttachment),
  };
}

export function presentScheduleEntry(entry: WeeklyScheduleEntry) {
  let display = `${dayName(entry.day)}: Closed`;
  if (entry.isOpen && entry.openTime && entry.closeTime) {
    display = `${dayName(entry.day)}: ${formatTime12h(entry.openTime)} - ${formatTime12h(entry.closeTime)}`;
  } else if (entry.isOpen) {
    display = `${dayName(entry.day)}: Active (no time restrictions)`;
  }
  return {
    day: entry.day,
    dayName: dayName(entry.day),
    isOpen: entry.isOpen,
    openTime: entry.openTime,
    closeTime: entry.closeTime,
    updatedAt: entry.updatedAt.toISOString(),
    updatedBy: entry.updatedBy,
    display,
  };
}

import { Router } from "express";
import { z } from "zod";

import type { AppServices } from "../container";
import { currentStudentToken, studentToken } from "../middleware/studentToken";
import { incomingAttachments, receiveAttachments } from "../middleware/uploads";
import { MAX_MESSAGE_LENGTH } from "../services/messageContent";
import { asyncHandler } from "../utils/asyncHandler";
import { presentAttachment, presentChat, presentMessage } from "./presenters";

const FORBIDDEN_NAMES = ["system", "admin", "technician", "bot", "null", "undefined"];

export const StartChatSchema = z.object({
  studentName: z
    .string()
    .trim()
    .min(2, "Name must be at least 2 characters long")
    .max(100)
    .refine((name) => !FORBIDDEN_NAMES.includes(name.toLowerCase()), "Please choose a different name"),
  initialMessage: z
    .string()
    .trim()
    .min(10, "Please provide more details about what you need help with (at least 10 characters)")
    .max(1000, "Initial message too long (max 1000 characters)"),
});

export const MessageBodySchema = z.object({
  content: z.string().trim().min(1, "Message cannot be empty").max(MAX_MESSAGE_LENGTH),
});

/** Anonymous student endpoints, identified by the X-Student-Token header. */
export function chatRouter({ chats, schedule, clock }: AppServices) {
  const router = Router();
  router.use(studentToken);

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const parsed = StartChatSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ error: "Invalid input", details: parsed.error.flatten() });

      const chat = await chats.startChat({ ...parsed.data, studentToken: currentStudentToken(req) });
      return res.status(201).json({ chat: presentChat(chat), token: currentStudentToken(req) });
    })
  );

  router.get(
    "/:chatId",
    asyncHandler(async (req, res) => {
      const chat = await chats.accessAsStudent(req.params.chatId, currentStudentToken(req));
      const status = await schedule.getStatus(clock());
      return res.json({
        chat: presentChat(chat),
        canMessage: chat.status !== "student_left" && chat.status !== "closed",
        support: { available: status.available, message: status.reason, nextAvailable: status.nextAvailable },
      });
    })
  );

  router.get(
    "/:chatId/messages",
    asyncHandler(async (req, res) => {
      const { session, messages } = await chats.transcript(req.params.chatId, {
        kind: "student",
        token: currentStudentToken(req),
      });
      return res.json({ chatId: session.chatId, chatStatus: session.status, messages: messages.map(presentMessage) });
    })
  );

  router.post(
    "/:chatId/messages",
    receiveAttachments,
    asyncHandler(async (req, res) => {
      const parsed = MessageBodySchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ error: "Invalid input", details: parsed.error.flatten() });

      const message = await chats.postMessage(
        req.params.chatId,
        { kind: "student", token: currentStudentToken(req) },
        parsed.data.content,
        incomingAttachments(req)
      );
      return res.status(201).json({ message: presentMessage(message) });
    })
  );

  router.post(
    "/:chatId/leave",
    asyncHandler(async (req, res) => {
      const chat = await chats.leaveAsStudent(req.params.chatId, currentStudentToken(req));
      return res.json({ chat: presentChat(chat) });
    })
  );

  router.get(
    "/:chatId/attachments/:attachmentId",
    asyncHandler(async (req, res) => {
      const { attachment, url } = await chats.getAttachment(req.params.chatId, req.params.attachmentId, {
        kind: "student",
        token: currentStudentToken(req),
      });
      return res.json({ attachment: presentAttachment(attachment), url });
    })
  );

  return router;
}

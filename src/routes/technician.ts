import { Router } from "express";

import type { AppServices } from "../container";
import { currentStaff, requireAuth, requireRole } from "../middleware/auth";
import { incomingAttachments, receiveAttachments } from "../middleware/uploads";
import { asyncHandler } from "../utils/asyncHandler";
import { MessageBodySchema } from "./chat";
import { presentAttachment, presentChat, presentMessage } from "./presenters";

export function technicianRouter({ chats }: AppServices) {
  const router = Router();
  router.use(requireAuth, requireRole("technician", "manager"));

  router.get(
    "/dashboard",
    asyncHandler(async (req, res) => {
      const dashboard = await chats.technicianDashboard(currentStaff(req));
      return res.json({
        waitingChats: dashboard.waitingChats.map(presentChat),
        activeChats: dashboard.activeChats.map(presentChat),
        metrics: dashboard.metrics,
        scheduleStatus: {
          isAvailable: dashboard.schedule.available,
          message: dashboard.schedule.reason,
          nextAvailable: dashboard.schedule.nextAvailable,
        },
      });
    })
  );

  router.post(
    "/chats/:chatId/join",
    asyncHandler(async (req, res) => {
      const { session, joined } = await chats.addTechnician(req.params.chatId, currentStaff(req).id);
      return res.json({ chat: presentChat(session), joined });
    })
  );

  router.get(
    "/chats/:chatId",
    asyncHandler(async (req, res) => {
      const staff = currentStaff(req);
      const { session, messages } = await chats.transcript(req.params.chatId, { kind: "staff", staff });
      return res.json({
        chat: presentChat(session),
        messages: messages.map(presentMessage),
        otherTechnicianIds: session.technicianIds.filter((id) => id !== staff.id),
      });
    })
  );

  router.get(
    "/chats/:chatId/messages",
    asyncHandler(async (req, res) => {
      const { session, messages } = await chats.transcript(req.params.chatId, {
        kind: "staff",
        staff: currentStaff(req),
      });
      return res.json({ chatId: session.chatId, chatStatus: session.status, messages: messages.map(presentMessage) });
    })
  );

  router.post(
    "/chats/:chatId/messages",
    receiveAttachments,
    asyncHandler(async (req, res) => {
      const parsed = MessageBodySchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ error: "Invalid input", details: parsed.error.flatten() });

      const message = await chats.postMessage(
        req.params.chatId,
        { kind: "staff", staff: currentStaff(req) },
        parsed.data.content,
        incomingAttachments(req)
      );
      return res.status(201).json({ message: presentMessage(message) });
    })
  );

  router.post(
    "/chats/:chatId/close",
    asyncHandler(async (req, res) => {
      const result = await chats.closeChat(req.params.chatId, currentStaff(req));
      return res.json({ ok: true, ...result });
    })
  );

  router.get(
    "/chats/:chatId/attachments/:attachmentId",
    asyncHandler(async (req, res) => {
      const { attachment, url } = await chats.getAttachment(req.params.chatId, req.params.attachmentId, {
        kind: "staff",
        staff: currentStaff(req),
      });
      return res.json({ attachment: presentAttachment(attachment), url });
    })
  );

  return router;
}

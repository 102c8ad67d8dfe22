import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import { attachmentLimits } from "../config/attachments";
import type { IncomingAttachment } from "../types/helpdesk";
import { AttachmentLimitExceededError, ValidationError } from "../utils/errors";

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: attachmentLimits.maxFileBytes,
    files: attachmentLimits.maxFiles,
  },
}).array("attachments");

/** Multipart parsing for message posts; multer limit errors become attachment errors. */
export function receiveAttachments(req: Request, res: Response, next: NextFunction) {
  upload(req, res, (err: unknown) => {
    if (!err) return next();
    if (err instanceof multer.MulterError) {
      if (err.code === "LIMIT_FILE_SIZE") {
        return next(new AttachmentLimitExceededError("A file is too large. Maximum size is 5MB per file."));
      }
      if (err.code === "LIMIT_FILE_COUNT") {
        return next(new AttachmentLimitExceededError(`Maximum ${attachmentLimits.maxFiles} files per message`));
      }
      return next(new ValidationError(err.message));
    }
    return next(err);
  });
}

export function incomingAttachments(req: Request): IncomingAttachment[] {
  const files = Array.isArray(req.files) ? req.files : [];
  return files.map((f) => ({
    filename: f.originalname,
    sizeBytes: f.size,
    mimeType: f.mimetype,
    data: f.buffer,
  }));
}

import { attachmentLimits, type AttachmentLimits } from "../config/attachments";
import type { IncomingAttachment } from "../types/helpdesk";
import { AttachmentLimitExceededError, UnsupportedFileTypeError } from "../utils/errors";

const MiB = 1024 * 1024;

export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf(".");
  if (dot <= 0 || dot === filename.length - 1) return "";
  return filename.slice(dot + 1).toLowerCase();
}

function mib(bytes: number) {
  return `${Math.round((bytes / MiB) * 10) / 10}MB`;
}

/**
 * Checks a whole batch before anything is stored; throws on the first
 * violation so the message is rejected as a unit.
 */
export function validateAttachments(files: IncomingAttachment[], limits: AttachmentLimits = attachmentLimits): void {
  if (files.length > limits.maxFiles) {
    throw new AttachmentLimitExceededError(`Maximum ${limits.maxFiles} files per message`);
  }

  let total = 0;
  for (const file of files) {
    if (!limits.allowedExtensions.has(fileExtension(file.filename))) {
      throw new UnsupportedFileTypeError(file.filename);
    }
    if (file.sizeBytes > limits.maxFileBytes) {
      throw new AttachmentLimitExceededError(
        `File "${file.filename}" is too large. Maximum size is ${mib(limits.maxFileBytes)} per file.`
      );
    }
    total += file.sizeBytes;
  }

  if (total > limits.maxTotalBytes) {
    throw new AttachmentLimitExceededError(`Total file size exceeds ${mib(limits.maxTotalBytes)} limit`);
  }
}

/** "1536" -> "1.5 KB" */
export function displaySize(bytes: number): string {
  let size = bytes;
  for (const unit of ["B", "KB", "MB", "GB"]) {
    if (size < 1024) return `${size.toFixed(1)} ${unit}`;
    size /= 1024;
  }
  return `${size.toFixed(1)} TB`;
}

export type AttachmentLimits = {
  maxFileBytes: number;
  maxFiles: number;
  maxTotalBytes: number;
  allowedExtensions: ReadonlySet<string>;
};

const MiB = 1024 * 1024;

export const ALLOWED_EXTENSIONS = [
  // images
  "png", "jpg", "jpeg", "gif", "bmp", "webp",
  // documents
  "doc", "docx", "odp", "ods", "odt", "pdf", "txt", "rtf", "xls", "xlsx",
  // code & data
  "py", "java", "cpp", "js", "html", "css", "json", "csv",
  // media
  "mp3", "wav", "mp4", "avi", "mov",
  // archives
  "zip", "7z",
] as const;

export const attachmentLimits: AttachmentLimits = {
  maxFileBytes: 5 * MiB,
  maxFiles: 10,
  maxTotalBytes: 25 * MiB,
  allowedExtensions: new Set<string>(ALLOWED_EXTENSIONS),
};

export class AppError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, code = "validation_error") {
    super(message, 400, code);
  }
}

export class PastDateError extends ValidationError {
  constructor(date: string) {
    super(`Date ${date} is in the past`, "past_date");
  }
}

export class InvalidUserError extends ValidationError {
  constructor(userId: string) {
    super(`Cannot add unknown or inactive user ${userId} to a chat`, "invalid_user");
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Unauthorized") {
    super(message, 401, "unauthorized");
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not Found") {
    super(message, 404, "not_found");
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Forbidden") {
    super(message, 403, "forbidden");
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string) {
    super(message, 409, "invalid_state");
  }
}

export class AttachmentLimitExceededError extends AppError {
  constructor(message: string) {
    super(message, 413, "attachment_limit_exceeded");
  }
}

export class UnsupportedFileTypeError extends AppError {
  constructor(filename: string) {
    super(`File type of "${filename}" is not supported`, 415, "unsupported_file_type");
  }
}

export class StorageError extends AppError {
  constructor(message: string, readonly originalError?: unknown) {
    super(message, 502, "storage_error");
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}

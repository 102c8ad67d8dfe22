import { mongo, Types } from "mongoose";

export function isDuplicateKeyError(err: unknown): boolean {
  return err instanceof mongo.MongoServerError && err.code === 11000;
}

export function toObjectIdOrNull(id: string | null | undefined): Types.ObjectId | null {
  if (!id || !Types.ObjectId.isValid(id)) return null;
  return new Types.ObjectId(id);
}

export function idString(id: Types.ObjectId | null | undefined): string | null {
  return id ? String(id) : null;
}

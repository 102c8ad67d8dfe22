import { Types, type FilterQuery } from "mongoose";
import { HelpdeskScheduleModel, type IHelpdeskSchedule } from "../../models/HelpdeskSchedule";
import { ScheduleOverrideModel, type IScheduleOverride } from "../../models/ScheduleOverride";
import type { ScheduleOverride, WeeklyScheduleEntry } from "../../types/helpdesk";
import { ValidationError } from "../../utils/errors";
import type { OverrideInput, ScheduleRepository, WeeklyEntryInput } from "../types";
import { idString, isDuplicateKeyError, toObjectIdOrNull } from "./util";

type LeanSchedule = Pick<IHelpdeskSchedule, "day" | "isOpen" | "openTime" | "closeTime" | "updatedBy" | "createdAt" | "updatedAt">;
type LeanOverride = Pick<
  IScheduleOverride,
  "_id" | "date" | "isOpen" | "openTime" | "closeTime" | "reason" | "createdBy" | "createdAt"
>;

function toEntry(doc: LeanSchedule): WeeklyScheduleEntry {
  return {
    day: doc.day,
    isOpen: doc.isOpen,
    openTime: doc.openTime ?? null,
    closeTime: doc.closeTime ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
    updatedBy: idString(doc.updatedBy),
  };
}

function toOverride(doc: LeanOverride): ScheduleOverride {
  return {
    id: String(doc._id),
    date: doc.date,
    isOpen: doc.isOpen,
    openTime: doc.openTime ?? null,
    closeTime: doc.closeTime ?? null,
    reason: doc.reason,
    createdAt: doc.createdAt,
    createdBy: idString(doc.createdBy),
  };
}

export class MongoScheduleRepository implements ScheduleRepository {
  async listWeekly() {
    const rows = await HelpdeskScheduleModel.find().sort({ day: 1 }).lean();
    return rows.map(toEntry);
  }

  async upsertWeekly(input: WeeklyEntryInput) {
    const doc = await HelpdeskScheduleModel.findOneAndUpdate(
      { day: input.day },
      {
        $set: {
          isOpen: input.isOpen,
          openTime: input.openTime,
          closeTime: input.closeTime,
          updatedBy: toObjectIdOrNull(input.updatedBy),
        },
      },
      { upsert: true, new: true, setDefaultsOnInsert: true }
    ).lean();
    if (!doc) throw new Error(`Schedule upsert for day ${input.day} returned nothing`);
    return toEntry(doc);
  }

  async insertWeeklyIfMissing(input: WeeklyEntryInput) {
    const res = await HelpdeskScheduleModel.updateOne(
      { day: input.day },
      {
        $setOnInsert: {
          day: input.day,
          isOpen: input.isOpen,
          openTime: input.openTime,
          closeTime: input.closeTime,
          updatedBy: toObjectIdOrNull(input.updatedBy),
        },
      },
      { upsert: true }
    );
    return res.upsertedCount > 0;
  }

  async listOverrides(range: { from?: string; to?: string } = {}) {
    const dateRange: { $gte?: string; $lte?: string } = {};
    if (range.from) dateRange.$gte = range.from;
    if (range.to) dateRange.$lte = range.to;
    const q: FilterQuery<IScheduleOverride> = range.from || range.to ? { date: dateRange } : {};
    const rows = await ScheduleOverrideModel.find(q).sort({ date: 1 }).lean();
    return rows.map(toOverride);
  }

  async getOverrideByDate(date: string) {
    const doc = await ScheduleOverrideModel.findOne({ date }).lean();
    return doc ? toOverride(doc) : null;
  }

  async createOverride(input: OverrideInput) {
    try {
      const created = await ScheduleOverrideModel.create({
        date: input.date,
        isOpen: input.isOpen,
        openTime: input.openTime,
        closeTime: input.closeTime,
        reason: input.reason,
        createdBy: toObjectIdOrNull(input.createdBy),
      });
      return toOverride(created.toObject());
    } catch (err) {
      if (isDuplicateKeyError(err)) throw new ValidationError(`An override for ${input.date} already exists`);
      throw err;
    }
  }

  async deleteOverride(id: string) {
    if (!Types.ObjectId.isValid(id)) return false;
    const res = await ScheduleOverrideModel.deleteOne({ _id: id });
    return res.deletedCount > 0;
  }
}

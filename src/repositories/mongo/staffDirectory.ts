import { Types } from "mongoose";
import { UserModel } from "../../models/User";
import type { StaffMember } from "../../types/helpdesk";
import type { StaffDirectory } from "../types";

export class MongoStaffDirectory implements StaffDirectory {
  async findActiveById(id: string): Promise<StaffMember | null> {
    if (!Types.ObjectId.isValid(id)) return null;
    const user = await UserModel.findOne({ _id: id, status: "active" }).select("name email role").lean();
    if (!user) return null;
    return { id: String(user._id), name: user.name, email: user.email, role: user.role };
  }
}

import { env } from "./config/env";
import { connectDb } from "./config/db";
import { MongoChatRepository } from "./repositories/mongo/chatRepository";
import { MongoScheduleRepository } from "./repositories/mongo/scheduleRepository";
import { MongoStaffDirectory } from "./repositories/mongo/staffDirectory";
import { CloudinaryBlobStore } from "./services/blobStore";
import { ChatService } from "./services/chatService";
import { ScheduleService } from "./services/scheduleService";

export type AppServices = {
  schedule: ScheduleService;
  chats: ChatService;
  clock: () => Date;
};

export async function buildServices(): Promise<AppServices> {
  await connectDb();

  const clock = () => new Date();
  const schedule = new ScheduleService(new MongoScheduleRepository(), env.SUPPORT_TIME_ZONE);
  const chats = new ChatService({
    chats: new MongoChatRepository(),
    staff: new MongoStaffDirectory(),
    blobs: new CloudinaryBlobStore({
      cloudName: env.CLOUDINARY_CLOUD_NAME,
      apiKey: env.CLOUDINARY_API_KEY,
      apiSecret: env.CLOUDINARY_API_SECRET,
      folder: env.CLOUDINARY_FOLDER,
    }),
    schedule,
    clock,
  });
  return { schedule, chats, clock };
}

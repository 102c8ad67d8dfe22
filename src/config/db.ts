import mongoose from "mongoose";
import { env } from "./env";

let connecting: Promise<typeof mongoose> | null = null;

/** Opens the shared connection once; concurrent callers wait on the same attempt. */
export async function connectDb(uri: string = env.MONGO_URI) {
  if (mongoose.connection.readyState === mongoose.ConnectionStates.connected) return;

  mongoose.set("strictQuery", true);
  connecting ??= mongoose
    .connect(uri)
    .then((conn) => {
      console.log(`[db] connected to ${conn.connection.host}/${conn.connection.name}`);
      return conn;
    })
    .catch((err: unknown) => {
      connecting = null;
      throw err;
    });

  await connecting;
}

export async function disconnectDb() {
  connecting = null;
  if (mongoose.connection.readyState === mongoose.ConnectionStates.disconnected) return;
  await mongoose.disconnect();
  console.log("[db] disconnected");
}

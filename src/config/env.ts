import dotenv from "dotenv";
import { z } from "zod";
import path from "path";
import { DateTime } from "luxon";

// Load .env file - try the working directory first, then its parent
if (process.env.NODE_ENV !== "production") {
  dotenv.config();
  dotenv.config({ path: path.resolve(process.cwd(), "../.env") });
}

const RawEnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  // Support either name
  MONGO_URI: z.string().min(1).optional(),
  MONGODB_URI: z.string().min(1).optional(),
  JWT_SECRET: z.string().optional(),
  CORS_ORIGIN: z.string().min(1).default("http://localhost:3000"),
  // IANA zone the weekly schedule and overrides are expressed in.
  SUPPORT_TIME_ZONE: z
    .string()
    .min(1)
    .default("UTC")
    .refine((tz) => DateTime.now().setZone(tz).isValid, { message: "Unknown time zone" }),
  // --- Cloudinary (chat attachments) ---
  CLOUDINARY_CLOUD_NAME: z.string().optional(),
  CLOUDINARY_API_KEY: z.string().optional(),
  CLOUDINARY_API_SECRET: z.string().optional(),
  CLOUDINARY_FOLDER: z.string().min(1).default("chat_attachments"),
});

export type Env = {
  PORT: number;
  MONGO_URI: string;
  JWT_SECRET: string;
  CORS_ORIGIN: string;
  SUPPORT_TIME_ZONE: string;
  CLOUDINARY_CLOUD_NAME?: string;
  CLOUDINARY_API_KEY?: string;
  CLOUDINARY_API_SECRET?: string;
  CLOUDINARY_FOLDER: string;
};

const raw = RawEnvSchema.parse(process.env);

const mongoUri = raw.MONGO_URI ?? raw.MONGODB_URI;
if (!mongoUri) {
  throw new Error("Missing Mongo connection string. Set MONGO_URI (or MONGODB_URI) in .env");
}

let jwtSecret = (raw.JWT_SECRET ?? "").trim();
if (jwtSecret.length < 16) {
  // Dev fallback so the server can start. Tokens will be invalidated on restart if you change this.
  // eslint-disable-next-line no-console
  console.warn("JWT_SECRET is missing/too short; using a development fallback. Set JWT_SECRET (>= 16 chars) in .env");
  jwtSecret = "dev_jwt_secret_change_me_123456";
}

export const env: Env = {
  PORT: raw.PORT,
  MONGO_URI: mongoUri,
  JWT_SECRET: jwtSecret,
  CORS_ORIGIN: raw.CORS_ORIGIN,
  SUPPORT_TIME_ZONE: raw.SUPPORT_TIME_ZONE,
  CLOUDINARY_CLOUD_NAME: raw.CLOUDINARY_CLOUD_NAME,
  CLOUDINARY_API_KEY: raw.CLOUDINARY_API_KEY,
  CLOUDINARY_API_SECRET: raw.CLOUDINARY_API_SECRET,
  CLOUDINARY_FOLDER: raw.CLOUDINARY_FOLDER,
};

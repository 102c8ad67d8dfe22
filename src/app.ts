import express from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";

import { env } from "./config/env";
import type { AppServices } from "./container";
import { STUDENT_TOKEN_HEADER } from "./middleware/studentToken";
import { AppError } from "./utils/errors";

import { healthRouter } from "./routes/health";
import { authRouter } from "./routes/auth";
import { usersRouter } from "./routes/users";
import { chatRouter } from "./routes/chat";
import { technicianRouter } from "./routes/technician";
import { scheduleRouter } from "./routes/schedule";

export function createApp(services: AppServices, options: { logRequests?: boolean } = {}) {
  const app = express();
  app.disable("x-powered-by");

  app.use(helmet());
  app.use(
    cors({
      origin: env.CORS_ORIGIN.split(",").map((o) => o.trim()),
      credentials: true,
      exposedHeaders: [STUDENT_TOKEN_HEADER],
    })
  );
  app.use(express.json({ limit: "1mb" }));
  if (options.logRequests ?? true) app.use(morgan("dev"));

  app.use("/health", healthRouter);
  app.use("/auth", authRouter);
  app.use("/users", usersRouter);
  app.use("/chats", chatRouter(services));
  app.use("/technician", technicianRouter(services));
  app.use("/schedule", scheduleRouter(services));

  app.use((req, res) => {
    res.status(404).json({ error: "Not Found" });
  });

  // Error handler (prevents crashes from async route errors)
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof AppError) {
      return res.status(err.status).json({ error: err.message, code: err.code });
    }
    // eslint-disable-next-line no-console
    console.error(err);
    return res.status(500).json({ error: "Internal Server Error" });
  });

  return app;
}

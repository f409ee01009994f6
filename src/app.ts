import express, { type Express } from "express";
import morgan from "morgan";
import type { AppConfig } from "./config/appConfig";
import { createPassthroughHandler } from "./controllers/proxyController";
import { createUploadRouter } from "./routes/uploadRoutes";
import { errorMiddleware } from "./utils/errors";
import { logger } from "./utils/logger";

export function createApp(config: AppConfig): Express {
  const app = express();
  app.disable("x-powered-by");

  // No body parsers here: passthrough requests are streamed as they arrive.
  app.use(
    morgan("combined", {
      stream: { write: (message) => logger.info(message.trim()) },
    })
  );

  app.get("/healthz", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use(createUploadRouter(config));
  app.use(createPassthroughHandler(config));
  app.use(errorMiddleware);

  return app;
}

import { Router } from "express";
import type { AppConfig } from "../config/appConfig";
import { createUploadHandler } from "../controllers/uploadController";
import { isMultipart, rejectOversizedBody } from "../middlewares/upload";

export function createUploadRouter(config: AppConfig): Router {
  const router = Router();

  router.all(
    config.listenPath,
    (req, _res, next) => (isMultipart(req) ? next() : next("route")),
    rejectOversizedBody(config.uploadMaxSize),
    createUploadHandler(config)
  );

  return router;
}

// upload-reformer/src/index.ts
import "dotenv/config";
import { createApp } from "./app";
import { loadConfig } from "./config/appConfig";
import { toError } from "./utils/errors";
import { logger } from "./utils/logger";

function startServer() {
  const config = loadConfig();

  logger.info(
    `Image limits: ${config.maxWidth}x${config.maxHeight}, narrow side ${
      config.maxNarrowSide || "disabled"
    }, convert to ${config.convertToFormat || "original format"}`
  );
  logger.info(
    `Quality: JPEG ${config.jpegQuality}, WebP ${config.webpQuality} | Normalize extensions: ${config.normalizeExtensions}`
  );
  logger.info(
    `Uploads on ${config.listenPath} (field "${config.fileUploadFieldName}", max ${config.uploadMaxSize} bytes) → ${config.forwardDestination}`
  );

  const app = createApp(config);
  app.listen(config.port, () => {
    logger.info(`Upload proxy listening on port ${config.port}`);
  });
}

try {
  startServer();
} catch (err) {
  const error = toError(err);
  logger.error("Failed to start server", {
    message: error.message,
    stack: error.stack,
  });
  process.exit(1);
}

// Global error handling for uncaught exceptions and unhandled rejections.
process.on("uncaughtException", (error) => {
  logger.error("Uncaught Exception:", {
    message: error.message,
    stack: error.stack,
  });
  process.exit(1);
});
process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled Rejection:", { reason });
});

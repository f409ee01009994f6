import type { Response as FetchResponse } from "node-fetch";
import { toProcessingSettings, type AppConfig } from "../config/appConfig";
import { readMultipart } from "../middlewares/upload";
import { asyncWrap, toError } from "../utils/errors";
import { forwardUpload, relayResponse } from "../utils/forwarder";
import { logger } from "../utils/logger";
import { createRequestLogger } from "../utils/logService";
import { reformat, type UploadFormData } from "../utils/multipartReformer";

export function createUploadHandler(config: AppConfig) {
  // One immutable snapshot shared by every request.
  const settings = toProcessingSettings(config);

  return asyncWrap(async (req, res) => {
    const { fields, files } = await readMultipart(req, config.uploadMaxSize);
    const upload = files.find((f) => f.fieldName === config.fileUploadFieldName);

    const { requestId, logEvent } = createRequestLogger({
      filename: upload?.filename ?? "(missing)",
    });
    logEvent({
      status: "received",
      message: `Incoming file upload (${upload?.bytes.length ?? 0} bytes, ${fields.length} fields)`,
    });

    const formData: UploadFormData = { fields, file: upload };

    const { contentType, body } = await reformat(formData, settings, {
      logEventFn: logEvent,
    });

    let downstream: FetchResponse;
    try {
      downstream = await forwardUpload({
        destination: config.forwardDestination,
        method: req.method,
        inboundHeaders: req.headers,
        contentType,
        body,
        timeoutMs: config.forwardTimeoutMs,
      });
    } catch (err) {
      const error = toError(err);
      logEvent({
        status: "failed",
        message: `Forwarding to ${config.forwardDestination} failed`,
        error: error.message,
      });
      res.status(424).json({ error: error.message });
      return;
    }

    logEvent({
      status: "forwarded",
      message: `Downstream answered ${downstream.status}`,
    });
    logger.debug(`Relaying downstream response | Request ID: ${requestId}`);
    await relayResponse(res, downstream);
  });
}

import type { Response as FetchResponse } from "node-fetch";
import type { AppConfig } from "../config/appConfig";
import { asyncWrap, toError } from "../utils/errors";
import { forwardRaw, relayResponse } from "../utils/forwarder";
import { logger } from "../utils/logger";

// Everything that isn't a multipart upload on the listen path goes through untouched.
export function createPassthroughHandler(config: AppConfig) {
  return asyncWrap(async (req, res) => {
    logger.debug(`Forwarding ${req.method} request on ${req.path}`);

    let downstream: FetchResponse;
    try {
      downstream = await forwardRaw({
        destination: config.forwardDestination,
        req,
        timeoutMs: config.forwardTimeoutMs,
      });
    } catch (err) {
      const error = toError(err);
      logger.error(`❌ Passthrough ${req.method} ${req.originalUrl} failed: ${error.message}`);
      res.status(502).json({ error: "Bad Gateway" });
      return;
    }

    await relayResponse(res, downstream);
  });
}

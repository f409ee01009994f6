import type { IncomingHttpHeaders } from "http";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import type { Request, Response } from "express";
import fetch, { Headers, type Response as FetchResponse } from "node-fetch";

// Never copied from the inbound request to the downstream one.
const IGNORED_REQUEST_HEADERS = new Set(
  [
    "Connection",
    "Keep-Alive",
    "Proxy-Authenticate",
    "Proxy-Authorization",
    "Te",
    "Trailer",
    "Trailers",
    "Transfer-Encoding",
    "Upgrade",
    "Accept-Encoding",
    "Host",
    "Cf-Ipcountry",
    "Cf-Connecting-Ip",
    "X-Forwarded-Proto",
    "X-Forwarded-For",
    "Cf-Ray",
    "Cf-Visitor",
    "Cf-Warp-Tag-Id",
    "Content-Type",
    "Content-Length",
    "Origin",
    "X-Amzn-Trace-Id",
  ].map((h) => h.toLowerCase())
);

// Hop-by-hop headers, stripped on the raw passthrough in both directions.
const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "trailers",
  "transfer-encoding",
  "upgrade",
]);

function copyHeaders(src: IncomingHttpHeaders, ignored: Set<string>): Headers {
  const dst = new Headers();
  for (const [key, value] of Object.entries(src)) {
    if (value === undefined || ignored.has(key.toLowerCase())) continue;
    for (const v of Array.isArray(value) ? value : [value]) {
      dst.append(key, v);
    }
  }
  return dst;
}

/** Headers for the rebuilt multipart request sent downstream. */
export function buildUploadHeaders(
  inbound: IncomingHttpHeaders,
  contentType: string,
  contentLength: number
): Headers {
  const headers = copyHeaders(inbound, IGNORED_REQUEST_HEADERS);
  headers.set("Content-Type", contentType);
  headers.set("Content-Length", String(contentLength));
  return headers;
}

/** Headers for a request relayed untouched to the downstream origin. */
export function buildPassthroughHeaders(inbound: IncomingHttpHeaders): Headers {
  const headers = copyHeaders(inbound, new Set([...HOP_BY_HOP_HEADERS, "host"]));
  if (inbound.host) {
    headers.set("X-Forwarded-Host", inbound.host);
  }
  return headers;
}

/** Response headers worth relaying back to the client. */
export function relayableResponseHeaders(
  headers: Headers
): Array<[string, string[]]> {
  const relayed: Array<[string, string[]]> = [];
  for (const name of new Set(headers.keys())) {
    if (HOP_BY_HOP_HEADERS.has(name)) continue;
    const values = name === "set-cookie" ? headers.raw()[name] : [headers.get(name) ?? ""];
    relayed.push([name, values]);
  }
  return relayed;
}

/** Downstream URL for a passthrough request: destination origin + inbound path. */
export function passthroughUrl(destination: string, originalUrl: string): string {
  return new URL(originalUrl, new URL(destination).origin).toString();
}

export async function forwardUpload({
  destination,
  method,
  inboundHeaders,
  contentType,
  body,
  timeoutMs,
}: {
  destination: string;
  method: string;
  inboundHeaders: IncomingHttpHeaders;
  contentType: string;
  body: Buffer;
  timeoutMs: number;
}): Promise<FetchResponse> {
  return fetch(destination, {
    method,
    headers: buildUploadHeaders(inboundHeaders, contentType, body.length),
    body,
    redirect: "manual",
    compress: false,
    signal: AbortSignal.timeout(timeoutMs),
  });
}

export async function forwardRaw({
  destination,
  req,
  timeoutMs,
}: {
  destination: string;
  req: Request;
  timeoutMs: number;
}): Promise<FetchResponse> {
  const hasBody = req.method !== "GET" && req.method !== "HEAD";
  return fetch(passthroughUrl(destination, req.originalUrl), {
    method: req.method,
    headers: buildPassthroughHeaders(req.headers),
    body: hasBody ? req : undefined,
    redirect: "manual",
    compress: false,
    signal: AbortSignal.timeout(timeoutMs),
  });
}

/** Streams a downstream response (status, headers, body) back to the client. */
export async function relayResponse(
  res: Response,
  downstream: FetchResponse
): Promise<void> {
  res.status(downstream.status);
  for (const [name, values] of relayableResponseHeaders(downstream.headers)) {
    res.setHeader(name, values.length === 1 ? values[0] : values);
  }
  if (downstream.body instanceof Readable) {
    await pipeline(downstream.body, res);
    return;
  }
  res.end(Buffer.from(await downstream.arrayBuffer()));
}

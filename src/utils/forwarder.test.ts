import { Headers } from "node-fetch";
import { describe, expect, it } from "vitest";
import {
  buildPassthroughHeaders,
  buildUploadHeaders,
  passthroughUrl,
  relayableResponseHeaders,
} from "./forwarder";

describe("buildUploadHeaders", () => {
  it("drops proxy and body headers and sets the new body's type and length", () => {
    const headers = buildUploadHeaders(
      {
        host: "photos.example.test",
        "content-type": "multipart/form-data; boundary=old",
        "content-length": "123456",
        "accept-encoding": "gzip",
        "cf-ray": "abc",
        "x-forwarded-for": "10.0.0.1",
        connection: "keep-alive",
        origin: "https://photos.example.test",
        "x-api-key": "test-secret",
        "x-test": "hello",
        cookie: "session=placeholder",
      },
      "multipart/form-data; boundary=new",
      42
    );

    expect([...headers.entries()].sort(([a], [b]) => a.localeCompare(b))).toEqual([
      ["content-length", "42"],
      ["content-type", "multipart/form-data; boundary=new"],
      ["cookie", "session=placeholder"],
      ["x-api-key", "test-secret"],
      ["x-test", "hello"],
    ]);
  });
});

describe("buildPassthroughHeaders", () => {
  it("keeps end-to-end headers and records the original host", () => {
    const headers = buildPassthroughHeaders({
      host: "proxy.local:6743",
      "content-type": "application/json",
      "content-length": "17",
      connection: "keep-alive",
      "transfer-encoding": "chunked",
      authorization: "Bearer test-token",
    });

    expect(headers.get("x-forwarded-host")).toBe("proxy.local:6743");
    expect(headers.get("content-type")).toBe("application/json");
    expect(headers.get("content-length")).toBe("17");
    expect(headers.get("authorization")).toBe("Bearer test-token");
    expect(headers.has("host")).toBe(false);
    expect(headers.has("connection")).toBe(false);
    expect(headers.has("transfer-encoding")).toBe(false);
  });
});

describe("passthroughUrl", () => {
  it("keeps the inbound path and query on the destination's origin", () => {
    expect(passthroughUrl("https://httpbin.org/anything", "/api/server/ping?x=1")).toBe(
      "https://httpbin.org/api/server/ping?x=1"
    );
    expect(passthroughUrl("http://immich:2283/api/assets", "/")).toBe("http://immich:2283/");
  });
});

describe("relayableResponseHeaders", () => {
  it("skips hop-by-hop headers and keeps every cookie", () => {
    const headers = new Headers();
    headers.append("Content-Type", "application/json");
    headers.append("Transfer-Encoding", "chunked");
    headers.append("Connection", "close");
    headers.append("Set-Cookie", "a=1");
    headers.append("Set-Cookie", "b=2");

    expect(relayableResponseHeaders(headers)).toEqual([
      ["content-type", ["application/json"]],
      ["set-cookie", ["a=1", "b=2"]],
    ]);
  });
});

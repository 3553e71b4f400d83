import { describe, it, expect } from "vitest";
import Fastify from "fastify";
import { getOrCreateRequestId } from "../../src/request_id.js";

function appWithRequestIds() {
  const app = Fastify({
    logger: false,
    genReqId: (req) => getOrCreateRequestId(req.headers)
  });

  app.addHook("onSend", async (req, reply) => {
    reply.header("X-Request-Id", req.id);
  });

  app.get("/health", async () => ({ ok: true }));
  return app;
}

describe("request id", () => {
  it("getOrCreateRequestId uses incoming header when present", () => {
    expect(getOrCreateRequestId({ "x-request-id": "demo-123" })).toBe("demo-123");
  });

  it("getOrCreateRequestId trims the incoming header", () => {
    expect(getOrCreateRequestId({ "x-request-id": "  demo-123 " })).toBe("demo-123");
  });

  it("getOrCreateRequestId takes the first of repeated headers", () => {
    expect(getOrCreateRequestId({ "x-request-id": ["first", "second"] })).toBe("first");
  });

  it("getOrCreateRequestId generates when missing or blank", () => {
    expect(getOrCreateRequestId({})).toMatch(/^[0-9a-f-]{36}$/);
    expect(getOrCreateRequestId({ "x-request-id": "   " })).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("getOrCreateRequestId replaces oversized ids", () => {
    expect(getOrCreateRequestId({ "x-request-id": "x".repeat(129) })).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("echoes X-Request-Id when provided", async () => {
    const res = await appWithRequestIds().inject({
      method: "GET",
      url: "/health",
      headers: { "x-request-id": "demo-123" }
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers["x-request-id"]).toBe("demo-123");
  });

  it("generates X-Request-Id when missing", async () => {
    const res = await appWithRequestIds().inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(String(res.headers["x-request-id"])).toMatch(/^[0-9a-f-]{36}$/);
  });
});

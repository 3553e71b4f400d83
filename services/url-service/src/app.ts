import Fastify from "fastify";
import type { FastifyError } from "fastify";
import cookie from "@fastify/cookie";
import helmet from "@fastify/helmet";
import type { Logger } from "pino";
import type { Config } from "./config.js";
import { GoneError, NotFoundError, StoreError } from "./errors.js";
import { resolveUser } from "./identity.js";
import { registry, httpRequestsTotal, httpRequestDurationSeconds, shortUrlsCreatedTotal } from "./metrics.js";
import { getOrCreateRequestId } from "./request_id.js";
import type { SaveResult, UrlStore } from "./storage.js";
import { MAX_URL_LENGTH, validateHttpUrl } from "./validate_url.js";

export interface AppDeps {
  config: Config;
  store: UrlStore;
  logger: Logger;
}

interface BatchRequestItem {
  correlation_id: string;
  original_url: string;
}

const TEXT_PLAIN = "text/plain; charset=utf-8";

const errorBody = {
  type: "object",
  properties: { error: { type: "string" } }
};

const resultBody = {
  type: "object",
  properties: { result: { type: "string" } }
};

function statusFor(res: SaveResult): 201 | 409 {
  return res.status === "created" ? 201 : 409;
}

export async function buildApp({ config, store, logger }: AppDeps) {
  const startedAt = new Date().toISOString();
  const buildInfo = {
    service: "url-service",
    version: config.appVersion,
    storage: config.storageMode,
    started_at: startedAt
  };

  const app = Fastify({
    loggerInstance: logger,
    bodyLimit: config.bodyLimitBytes,
    trustProxy: true,
    genReqId: (req) => getOrCreateRequestId(req.headers)
  });

  const requestStarts = new WeakMap<object, bigint>();
  const storeCtx = () => ({ signal: AbortSignal.timeout(config.storeTimeoutMs) });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("X-Request-Id", req.id);
    requestStarts.set(req, process.hrtime.bigint());
  });

  app.addHook("onResponse", async (req, reply) => {
    const start = requestStarts.get(req);
    if (start === undefined) return;

    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;
    const labels = {
      method: req.method,
      route: req.routeOptions.url ?? "unknown",
      status_code: String(reply.statusCode)
    };

    httpRequestsTotal.inc(labels);
    httpRequestDurationSeconds.observe(labels, durationSeconds);
  });

  await app.register(helmet, {
    // API only, nothing here renders HTML
    contentSecurityPolicy: false
  });
  await app.register(cookie, { secret: config.secretKey });

  app.decorateRequest("userId", "");
  app.decorateRequest("isNewUser", false);
  app.addHook("onRequest", async (req, reply) => {
    resolveUser(req, reply);
  });

  app.get("/health", async () => {
    return { status: "ok", ...buildInfo };
  });

  app.get("/ping", async (_req, reply) => {
    await store.ping(storeCtx());
    return reply.code(200).send();
  });

  app.get("/version/", async (_req, reply) => {
    return reply.type("text/plain").send(config.appVersion);
  });

  app.get("/metrics", async (_req, reply) => {
    try {
      const metrics = await registry.metrics();
      reply.header("Content-Type", registry.contentType).code(200).send(metrics);
    } catch (err) {
      app.log.error({ err }, "metrics failed");
      reply.code(500).send("metrics_error");
    }
  });

  app.post<{ Body: string }>(
    "/",
    {
      schema: {
        body: { type: "string", minLength: 1, maxLength: MAX_URL_LENGTH }
      }
    },
    async (req, reply) => {
      const longUrl = req.body.trim();
      const check = validateHttpUrl(longUrl);
      if (!check.ok) {
        return reply.code(400).type(TEXT_PLAIN).send(check.error);
      }

      const res = await store.save(req.userId, longUrl, config.baseUrl, storeCtx());
      shortUrlsCreatedTotal.inc({ outcome: res.status });
      return reply.code(statusFor(res)).type(TEXT_PLAIN).send(res.shortUrl);
    }
  );

  app.post<{ Body: { url: string } }>(
    "/api/shorten",
    {
      schema: {
        body: {
          type: "object",
          required: ["url"],
          properties: {
            url: { type: "string", minLength: 1, maxLength: MAX_URL_LENGTH }
          }
        },
        response: {
          201: resultBody,
          409: resultBody,
          400: errorBody
        }
      }
    },
    async (req, reply) => {
      const check = validateHttpUrl(req.body.url);
      if (!check.ok) {
        return reply.code(400).send({ error: check.error });
      }

      const res = await store.save(req.userId, req.body.url, config.baseUrl, storeCtx());
      shortUrlsCreatedTotal.inc({ outcome: res.status });
      return reply.code(statusFor(res)).send({ result: res.shortUrl });
    }
  );

  app.post<{ Body: BatchRequestItem[] }>(
    "/api/shorten/batch",
    {
      schema: {
        body: {
          type: "array",
          minItems: 1,
          items: {
            type: "object",
            required: ["correlation_id", "original_url"],
            properties: {
              correlation_id: { type: "string" },
              original_url: { type: "string", minLength: 1, maxLength: MAX_URL_LENGTH }
            }
          }
        },
        response: {
          201: {
            type: "array",
            items: {
              type: "object",
              properties: {
                correlation_id: { type: "string" },
                short_url: { type: "string" }
              }
            }
          },
          400: errorBody
        }
      }
    },
    async (req, reply) => {
      const items = req.body;
      for (const item of items) {
        const check = validateHttpUrl(item.original_url);
        if (!check.ok) {
          return reply.code(400).send({ error: `${item.correlation_id}: ${check.error}` });
        }
      }

      const results = await store.saveBatch(
        req.userId,
        items.map((item) => item.original_url),
        config.baseUrl,
        storeCtx()
      );
      for (const res of results) shortUrlsCreatedTotal.inc({ outcome: res.status });

      return reply.code(201).send(
        results.map((res, i) => ({ correlation_id: items[i].correlation_id, short_url: res.shortUrl }))
      );
    }
  );

  app.get(
    "/api/user/urls",
    {
      schema: {
        response: {
          200: {
            type: "array",
            items: {
              type: "object",
              properties: {
                short_url: { type: "string" },
                original_url: { type: "string" }
              }
            }
          },
          401: errorBody
        }
      }
    },
    async (req, reply) => {
      if (req.isNewUser) {
        return reply.code(401).send({ error: "unauthorized" });
      }

      const list = await store.loadUserUrls(req.userId, config.baseUrl, storeCtx());
      if (list.length === 0) {
        return reply.code(204).send();
      }
      return reply.send(list.map((e) => ({ short_url: e.shortUrl, original_url: e.originalUrl })));
    }
  );

  app.delete<{ Body: string[] }>(
    "/api/user/urls",
    {
      schema: {
        body: { type: "array", items: { type: "string", minLength: 1, maxLength: 64 } },
        response: { 401: errorBody }
      }
    },
    async (req, reply) => {
      if (req.isNewUser) {
        return reply.code(401).send({ error: "unauthorized" });
      }

      // Answer right away; tombstoning finishes in the background.
      const log = req.log;
      void store.deleteBatch(req.userId, req.body, storeCtx()).then(
        (res) => log.info({ deleted: res.deleted.length, skipped: res.skipped.length }, "urls marked deleted"),
        (err: unknown) => log.error({ err }, "failed to mark urls as deleted")
      );
      return reply.code(202).send();
    }
  );

  app.get<{ Params: { id: string } }>(
    "/:id",
    {
      schema: {
        params: {
          type: "object",
          required: ["id"],
          properties: { id: { type: "string", minLength: 1, maxLength: 64 } }
        }
      }
    },
    async (req, reply) => {
      const { id } = req.params;
      const rec = await store.loadFull(id, storeCtx());
      if (!rec) throw new NotFoundError(id);
      if (rec.isDeleted) throw new GoneError(id);

      return reply.redirect(rec.originalUrl, 307);
    }
  );

  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof StoreError) {
      if (err.statusCode >= 500) {
        req.log.error({ err }, "store operation failed");
      }
      return reply.code(err.statusCode).send({ error: err.kind });
    }

    req.log.error({ err }, "request failed");

    const statusCode = err.statusCode ?? 500;
    return reply.code(statusCode).send({
      error: statusCode < 500 ? "bad_request" : "internal_error"
    });
  });

  return app;
}

import Fastify from "fastify";
import cors from "@fastify/cors";
import { ZodError } from "zod";
import { HttpError } from "./errors.js";
import { registerAdminRoutes } from "./routes/admin.js";
import { registerCheckRoutes } from "./routes/checks.js";
import type { IngestDeps } from "./services/ingest.js";
import type { CheckStore } from "./store/types.js";

export type ServerDeps = {
  store: CheckStore;
  timeZone: string;
  dailyLimitOverride?: number | undefined;
  fetchTimeoutMs?: number;
  adminToken?: string | undefined;
  botApiToken?: string | undefined;
  logLevel?: string;
  // Pipeline seams; tests swap the QR decoder, the fiscal fetch and the clock.
  ingest?: Pick<IngestDeps, "decodeQr" | "fetchCheck" | "fetchImpl" | "now">;
};

export function buildServer(deps: ServerDeps) {
  const app = Fastify({
    logger: {
      level: deps.logLevel ?? "info"
    },
    bodyLimit: 15 * 1024 * 1024 // base64 receipt photos
  });

  void app.register(cors, { origin: true });

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof HttpError) {
      return reply.code(err.statusCode).send({ ok: false, error: err.code, message: err.message });
    }
    if (err instanceof ZodError) {
      const message = err.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
      return reply.code(400).send({ ok: false, error: "bad_request", message });
    }
    // Fastify's own client errors: malformed JSON, oversized body, unsupported media type.
    if (typeof err.statusCode === "number" && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ ok: false, error: "bad_request", message: err.message });
    }
    req.log.error({ err }, "unhandled error");
    return reply.code(500).send({ ok: false, error: "internal_error", message: "Internal Server Error" });
  });

  app.get("/health", async () => {
    return { ok: true, service: "qr-cashback-api", ts: new Date().toISOString() };
  });

  registerCheckRoutes(app, deps);
  registerAdminRoutes(app, deps);

  return app;
}

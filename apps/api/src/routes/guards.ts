import crypto from "node:crypto";
import type { FastifyRequest } from "fastify";
import { HttpError, unauthorized } from "../errors.js";

function headerValue(req: FastifyRequest, name: string): string | undefined {
  const v = req.headers[name];
  return Array.isArray(v) ? v[0] : v;
}

export function tokenMatches(given: string | undefined, expected: string): boolean {
  if (given === undefined) return false;
  const a = Buffer.from(given, "utf8");
  const b = Buffer.from(expected, "utf8");
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

// Open when no token is configured (local development).
export function requireBotToken(req: FastifyRequest, expected: string | undefined): void {
  if (!expected) return;
  if (!tokenMatches(headerValue(req, "x-bot-token"), expected)) throw unauthorized();
}

// Accepts the x-admin-token header or ?token=. Without a configured token the dashboard is disabled.
export function requireDashboardToken(req: FastifyRequest, expected: string | undefined, queryToken?: string): void {
  if (!expected) throw new HttpError(501, "dashboard_disabled", "ADMIN_DASHBOARD_TOKEN is not configured");
  if (tokenMatches(headerValue(req, "x-admin-token"), expected) || tokenMatches(queryToken, expected)) return;
  throw unauthorized();
}

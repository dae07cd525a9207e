import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createClient } from "@supabase/supabase-js";
import { isSupportedTimezone } from "@qrcashback/shared";

function loadEnvLocal() {
  // Optional env.local next to the app; real environment variables win.
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const envPath = path.resolve(__dirname, "..", "env.local");
  if (!fs.existsSync(envPath)) return;
  const raw = fs.readFileSync(envPath, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const idx = s.indexOf("=");
    if (idx < 0) continue;
    const key = s.slice(0, idx).trim();
    const value = s.slice(idx + 1).trim();
    if (!key) continue;
    if (process.env[key] === undefined && value !== "") {
      process.env[key] = value;
    }
  }
}

loadEnvLocal();

export type Env = {
  SUPABASE_URL: string;
  SUPABASE_SERVICE_ROLE_KEY: string;
  PORT: number;
  APP_TIMEZONE: string;
  DAILY_CHECK_LIMIT?: number | undefined; // overrides the daily_check_limit setting
  FISCAL_FETCH_TIMEOUT_MS: number;
  ADMIN_DASHBOARD_TOKEN?: string | undefined;
  BOT_API_TOKEN?: string | undefined; // if set, /bot/* requires x-bot-token
  LOG_LEVEL: string;
};

function required(key: string): string {
  const value = process.env[key]?.trim();
  if (!value) throw new Error(`Missing env: ${key}`);
  return value;
}

function optional(key: string): string | undefined {
  return process.env[key]?.trim() || undefined;
}

function nonNegativeInt(key: string): number | undefined {
  const raw = optional(key);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) throw new Error(`Invalid env ${key}: expected a non-negative integer, got "${raw}"`);
  return Number(raw);
}

function getEnv(): Env {
  const tz = optional("APP_TIMEZONE") ?? "Europe/Moscow";
  if (!isSupportedTimezone(tz)) throw new Error(`Invalid env APP_TIMEZONE: "${tz}"`);
  return {
    SUPABASE_URL: required("SUPABASE_URL"),
    SUPABASE_SERVICE_ROLE_KEY: required("SUPABASE_SERVICE_ROLE_KEY"),
    PORT: nonNegativeInt("PORT") ?? 3001,
    APP_TIMEZONE: tz,
    DAILY_CHECK_LIMIT: nonNegativeInt("DAILY_CHECK_LIMIT"),
    FISCAL_FETCH_TIMEOUT_MS: nonNegativeInt("FISCAL_FETCH_TIMEOUT_MS") ?? 10_000,
    ADMIN_DASHBOARD_TOKEN: optional("ADMIN_DASHBOARD_TOKEN"),
    BOT_API_TOKEN: optional("BOT_API_TOKEN"),
    LOG_LEVEL: optional("LOG_LEVEL") ?? "info"
  };
}

export const env = getEnv();

export const supabaseAdmin = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
  auth: { persistSession: false }
});

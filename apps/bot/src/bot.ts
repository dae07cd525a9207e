import { Bot } from "grammy";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createApiClient } from "./apiClient.js";
import { registerCommandHandlers, registerFallbackHandler } from "./handlers/commands.js";
import { registerReceiptHandlers } from "./handlers/receipts.js";

function loadEnvLocal() {
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
    if (key && process.env[key] === undefined && value !== "") {
      process.env[key] = value;
    }
  }
}

type Env = {
  TELEGRAM_BOT_TOKEN: string;
  API_BASE_URL: string;
  BOT_API_TOKEN?: string | undefined;
};

function env(): Env {
  loadEnvLocal();
  const token = process.env.TELEGRAM_BOT_TOKEN?.trim();
  if (!token) throw new Error("Missing TELEGRAM_BOT_TOKEN");
  return {
    TELEGRAM_BOT_TOKEN: token,
    API_BASE_URL: (process.env.API_BASE_URL?.trim() || "http://localhost:3001").replace(/\/+$/, ""),
    BOT_API_TOKEN: process.env.BOT_API_TOKEN?.trim() || undefined
  };
}

export async function startBot() {
  const E = env();
  const bot = new Bot(E.TELEGRAM_BOT_TOKEN);
  const api = createApiClient(E.API_BASE_URL, { botApiToken: E.BOT_API_TOKEN });

  // One JSON line per command or receipt so production logs show updates arriving.
  bot.use(async (ctx, next) => {
    const msg = ctx.message;
    const text = msg?.text;
    const isCommand = typeof text === "string" && text.trimStart().startsWith("/");
    if (msg && (isCommand || msg.photo || msg.document)) {
      console.log(
        JSON.stringify({
          t: isCommand ? "cmd" : "upload",
          update_id: ctx.update.update_id,
          chat_id: ctx.chat?.id,
          from_id: ctx.from?.id,
          text: isCommand ? text.slice(0, 120) : undefined
        })
      );
    }
    return await next();
  });

  registerCommandHandlers({ bot, api });
  registerReceiptHandlers({ bot, api, botToken: E.TELEGRAM_BOT_TOKEN });
  registerFallbackHandler({ bot });

  bot.catch((err) => {
    console.error("Bot error:", err.error);
  });

  // Long polling: make sure no webhook is registered, and publish the command list.
  await bot.api.deleteWebhook({ drop_pending_updates: true });
  await bot.api.setMyCommands([
    { command: "start", description: "начать" },
    { command: "balance", description: "баланс кэшбэка" },
    { command: "help", description: "помощь" }
  ]);

  console.log("Bot started (long polling)...");
  await bot.start();
}

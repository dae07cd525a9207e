import type { Bot } from "grammy";
import { readBalance, type ApiClient } from "../apiClient.js";
import { TEXTS } from "../texts.js";

export async function balanceReply(api: ApiClient, telegramUserId: number): Promise<string> {
  const r = await api(`/bot/balance/${telegramUserId}`, { method: "GET" });
  if (!r.ok) {
    console.error("balance failed", r.status, r.text.slice(0, 200));
    return TEXTS.apiUnavailable;
  }
  const total = readBalance(r.json);
  return total === null ? TEXTS.notRegistered : TEXTS.balance(total);
}

export function registerCommandHandlers(params: { bot: Bot; api: ApiClient }) {
  const { bot, api } = params;

  bot.command("start", async (ctx) => {
    await ctx.reply(TEXTS.welcome);
  });

  bot.command("help", async (ctx) => {
    await ctx.reply(TEXTS.help);
  });

  bot.command("balance", async (ctx) => {
    if (!ctx.from) return;
    try {
      await ctx.reply(await balanceReply(api, ctx.from.id));
    } catch (e) {
      console.error("balance error", e);
      await ctx.reply(TEXTS.apiUnavailable);
    }
  });
}

export function fallbackReply(message: { text?: string }): string {
  return message.text !== undefined ? TEXTS.fallback : TEXTS.sendPhoto;
}

// Must be registered after every other message handler.
export function registerFallbackHandler(params: { bot: Bot }) {
  params.bot.on("message", async (ctx) => {
    await ctx.reply(fallbackReply(ctx.message));
  });
}

import type { Bot } from "grammy";
import type { PhotoSize } from "grammy/types";
import { telegramDownloadFileById } from "@qrcashback/telegram";
import { readSubmissionMessage, type ApiClient, type ApiResponse } from "../apiClient.js";
import { TEXTS } from "../texts.js";

export function largestPhoto(sizes: readonly PhotoSize[]): PhotoSize | null {
  let best: PhotoSize | null = null;
  for (const p of sizes) {
    if (!best || p.width * p.height > best.width * best.height) best = p;
  }
  return best;
}

export function isImageDocument(mimeType: string | undefined): boolean {
  return typeof mimeType === "string" && mimeType.toLowerCase().startsWith("image/");
}

/**
 * Download the image, hand it to the API and relay the API's message.
 * Replies are sent through `reply` so the flow can run without a live bot.
 */
export async function submitReceipt(params: {
  telegramUserId: number;
  fileId: string;
  reply: (text: string) => Promise<unknown>;
  download: (fileId: string) => Promise<Uint8Array>;
  api: ApiClient;
}): Promise<void> {
  const { reply, api } = params;
  await reply(TEXTS.processing);

  let image: Uint8Array;
  try {
    image = await params.download(params.fileId);
  } catch (e) {
    console.error("receipt download failed", e);
    await reply(TEXTS.downloadFailed);
    return;
  }

  let r: ApiResponse;
  try {
    r = await api("/bot/checks", {
      method: "POST",
      body: JSON.stringify({
        telegram_user_id: params.telegramUserId,
        image_base64: Buffer.from(image).toString("base64")
      })
    });
  } catch (e) {
    console.error("receipt submit failed", e);
    await reply(TEXTS.apiUnavailable);
    return;
  }
  console.log(JSON.stringify({ t: "receipt", from_id: params.telegramUserId, status: r.status, bytes: image.length }));
  await reply(readSubmissionMessage(r.json) ?? TEXTS.apiUnavailable);
}

export function registerReceiptHandlers(params: { bot: Bot; api: ApiClient; botToken: string }) {
  const { bot, api, botToken } = params;
  const download = (fileId: string) => telegramDownloadFileById(botToken, fileId);

  bot.on("message:photo", async (ctx) => {
    if (!ctx.from) return;
    const photo = largestPhoto(ctx.message.photo);
    if (!photo) {
      await ctx.reply(TEXTS.downloadFailed);
      return;
    }
    await submitReceipt({
      telegramUserId: ctx.from.id,
      fileId: photo.file_id,
      reply: (text) => ctx.reply(text),
      download,
      api
    });
  });

  bot.on("message:document", async (ctx) => {
    if (!ctx.from) return;
    const doc = ctx.message.document;
    if (!isImageDocument(doc.mime_type)) {
      await ctx.reply(TEXTS.notAnImage);
      return;
    }
    await submitReceipt({
      telegramUserId: ctx.from.id,
      fileId: doc.file_id,
      reply: (text) => ctx.reply(text),
      download,
      api
    });
  });
}

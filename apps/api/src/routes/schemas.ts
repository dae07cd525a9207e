import { z } from "zod";

const telegramUserId = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);

export const checkSubmissionSchema = z.object({
  telegram_user_id: telegramUserId,
  image_base64: z
    .string()
    .transform((s) => s.replace(/\s+/g, ""))
    .pipe(z.string().min(1, "image_base64 is empty").regex(/^[A-Za-z0-9+/]+={0,2}$/, "image_base64 is not base64"))
});

export const balanceParamsSchema = z.object({
  telegramUserId: z
    .string()
    .regex(/^\d+$/, "telegramUserId must be numeric")
    .transform((s) => Number(s))
    .pipe(telegramUserId)
});

export const dashboardQuerySchema = z.object({
  token: z.string().optional()
});

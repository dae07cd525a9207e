import type { FastifyInstance } from "fastify";
import type { BalanceResponse, CheckSubmissionResponse } from "@qrcashback/shared";
import { processFiscalCheck } from "../services/ingest.js";
import type { ServerDeps } from "../server.js";
import { requireBotToken } from "./guards.js";
import { balanceParamsSchema, checkSubmissionSchema } from "./schemas.js";

export function registerCheckRoutes(app: FastifyInstance, deps: ServerDeps) {
  app.post("/bot/checks", async (req): Promise<CheckSubmissionResponse> => {
    requireBotToken(req, deps.botApiToken);
    const body = checkSubmissionSchema.parse(req.body);
    const image = Buffer.from(body.image_base64, "base64");

    const result = await processFiscalCheck(
      { image, telegramId: body.telegram_user_id },
      {
        ...deps.ingest,
        store: deps.store,
        timeZone: deps.timeZone,
        dailyLimitOverride: deps.dailyLimitOverride,
        fetchTimeoutMs: deps.fetchTimeoutMs,
        log: req.log
      }
    );

    if (!result.success) {
      return { ok: false, message: result.message, error: result.error, check: null, cashback: null };
    }
    return {
      ok: true,
      message: result.message,
      error: null,
      check: result.check,
      cashback: result.cashback.toFixed(2)
    };
  });

  app.get("/bot/balance/:telegramUserId", async (req): Promise<BalanceResponse> => {
    requireBotToken(req, deps.botApiToken);
    const { telegramUserId } = balanceParamsSchema.parse(req.params);
    const user = await deps.store.findUserByTelegramId(telegramUserId);
    if (!user) return { user: null };
    return {
      user: {
        telegram_id: user.telegram_id,
        total_cashback: user.total_cashback,
        registration_date: user.registration_date
      }
    };
  });
}

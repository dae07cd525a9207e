import type { DbUser } from "@qrcashback/shared";
import { MESSAGES } from "../messages.js";
import type { CheckStore } from "../store/types.js";
import { localDateKey, utcRangeForLocalDay } from "../utils/time.js";

export type ValidationFailureKind = "duplicate" | "stale" | "quota_exceeded";

export type ValidationFailure = { ok: false; kind: ValidationFailureKind; message: string };

export type ValidationResult = { ok: true; user: DbUser | null } | ValidationFailure;

export type QuotaResult = { ok: true; count: number } | ValidationFailure;

type ValidatorStore = Pick<CheckStore, "fiscalIdExists" | "findUserByTelegramId" | "countChecksSince">;

export async function checkDailyQuota(params: {
  store: Pick<CheckStore, "countChecksSince">;
  userId: string;
  dailyLimit: number;
  timeZone: string;
  now: Date;
}): Promise<QuotaResult> {
  const { startUtcIso } = utcRangeForLocalDay({ now: params.now, timeZone: params.timeZone });
  const count = await params.store.countChecksSince(params.userId, startUtcIso);
  if (count >= params.dailyLimit) {
    return { ok: false, kind: "quota_exceeded", message: MESSAGES.quotaExceeded(params.dailyLimit) };
  }
  return { ok: true, count };
}

/**
 * Business rules, first failure wins: duplicate fiscal id, receipt not from
 * today (local calendar), daily quota. The quota rule is skipped when the
 * account does not exist yet; the caller re-runs it after creating it.
 */
export async function validateFiscalCheck(params: {
  store: ValidatorStore;
  fiscalId: string;
  checkDatetime: Date;
  telegramId: number;
  dailyLimit: number;
  timeZone: string;
  now: Date;
}): Promise<ValidationResult> {
  const { store, timeZone, now } = params;

  if (await store.fiscalIdExists(params.fiscalId)) {
    return { ok: false, kind: "duplicate", message: MESSAGES.duplicate };
  }

  const checkDate = localDateKey(params.checkDatetime, timeZone);
  if (checkDate !== localDateKey(now, timeZone)) {
    return { ok: false, kind: "stale", message: MESSAGES.stale(checkDate) };
  }

  const user = await store.findUserByTelegramId(params.telegramId);
  if (!user) return { ok: true, user: null };

  const quota = await checkDailyQuota({ store, userId: user.id, dailyLimit: params.dailyLimit, timeZone, now });
  if (!quota.ok) return quota;
  return { ok: true, user };
}

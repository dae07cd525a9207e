import { Decimal } from "decimal.js";
import { formatRub, type DbCheck, type DbUser, type RejectionKind } from "@qrcashback/shared";
import { MESSAGES } from "../messages.js";
import type { CheckStore, CommitFailureReason } from "../store/types.js";
import { utcRangeForLocalDay } from "../utils/time.js";
import { computeCashbackBreakdown, toCashbackRule, type CashbackRule } from "./cashback.js";
import { fetchFiscalCheck, type FetchFiscalOptions, type FiscalFetchResult } from "./fiscal.js";
import { decodeQrFromImage, type QrDecodeResult } from "./qr.js";
import { resolveDailyCheckLimit } from "./settings.js";
import { checkDailyQuota, validateFiscalCheck } from "./validator.js";

export type IngestStage = "received" | "decoded" | "fetched" | "validated" | "user_resolved" | "computed" | "committed";

export interface IngestLogger {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

export type IngestDeps = {
  store: CheckStore;
  timeZone: string;
  dailyLimitOverride?: number | undefined;
  fetchTimeoutMs?: number;
  fetchImpl?: typeof fetch;
  decodeQr?: (bytes: Uint8Array) => Promise<QrDecodeResult>;
  fetchCheck?: (url: string, opts: FetchFiscalOptions) => Promise<FiscalFetchResult>;
  now?: () => Date;
  log?: IngestLogger;
};

export type IngestSuccess = {
  success: true;
  message: string;
  check: DbCheck;
  user: DbUser;
  cashback: Decimal;
  error: null;
};

export type IngestRejection = {
  success: false;
  message: string;
  check: null;
  cashback: null;
  error: RejectionKind;
  stage: IngestStage;
};

export type IngestResult = IngestSuccess | IngestRejection;

const silentLogger: IngestLogger = {
  info: () => {},
  warn: () => {},
  error: () => {}
};

function reject(stage: IngestStage, error: RejectionKind, message: string): IngestRejection {
  return { success: false, message, check: null, cashback: null, error, stage };
}

function commitRejection(reason: CommitFailureReason, dailyLimit: number): IngestRejection {
  switch (reason) {
    case "quota_exceeded":
      return reject("computed", "quota_exceeded", MESSAGES.quotaExceeded(dailyLimit));
    case "duplicate":
      return reject("computed", "persistence_conflict", MESSAGES.duplicate);
    case "storage_error":
      return reject("computed", "persistence_conflict", MESSAGES.storageError);
  }
}

async function loadRules(store: CheckStore, log: IngestLogger): Promise<CashbackRule[]> {
  const rows = await store.listActiveRules();
  const rules: CashbackRule[] = [];
  for (const row of rows) {
    const rule = toCashbackRule(row);
    if (rule) rules.push(rule);
    else log.warn({ rule_id: row.id, rule_type: row.rule_type }, "skipping invalid cashback rule");
  }
  return rules;
}

/**
 * Receipt photo in, credited cashback out:
 * decode QR -> fetch receipt -> validate -> get-or-create user -> compute -> commit.
 *
 * Every failure, including storage faults, comes back as a rejection result.
 */
export async function processFiscalCheck(
  input: { image: Uint8Array; telegramId: number },
  deps: IngestDeps
): Promise<IngestResult> {
  const log = deps.log ?? silentLogger;
  const progress: { stage: IngestStage } = { stage: "received" };
  try {
    const result = await runPipeline(input, deps, log, progress);
    if (result.success) {
      log.info(
        { telegram_id: input.telegramId, fiskal_id: result.check.fiskal_id, cashback: result.cashback.toFixed(2) },
        "check committed"
      );
    } else {
      log.info({ telegram_id: input.telegramId, stage: result.stage, error: result.error }, "check rejected");
    }
    return result;
  } catch (err) {
    log.error({ err, telegram_id: input.telegramId, stage: progress.stage }, "check ingestion failed");
    return reject(progress.stage, "persistence_conflict", MESSAGES.storageError);
  }
}

async function runPipeline(
  input: { image: Uint8Array; telegramId: number },
  deps: IngestDeps,
  log: IngestLogger,
  progress: { stage: IngestStage }
): Promise<IngestResult> {
  const { store, timeZone } = deps;
  const now = (deps.now ?? (() => new Date()))();
  const decodeQr = deps.decodeQr ?? decodeQrFromImage;
  const fetchCheck = deps.fetchCheck ?? fetchFiscalCheck;

  const qr = await decodeQr(input.image);
  if (!qr.found) {
    log.warn({ reason: qr.reason, detail: qr.detail }, "qr decode failed");
    return reject(progress.stage, "decode_failed", MESSAGES.qrNotFound);
  }
  progress.stage = "decoded";

  const fetched = await fetchCheck(qr.text, {
    timeZone,
    timeoutMs: deps.fetchTimeoutMs,
    fetchImpl: deps.fetchImpl,
    now: () => now
  });
  if (!fetched.ok) {
    log.warn({ reason: fetched.reason, detail: fetched.detail, url: qr.text.slice(0, 200) }, "fiscal fetch failed");
    return reject(progress.stage, "fetch_failed", MESSAGES.fetchFailed);
  }
  progress.stage = "fetched";
  const data = fetched.data;

  const dailyLimit = await resolveDailyCheckLimit({ override: deps.dailyLimitOverride, store });
  const validation = await validateFiscalCheck({
    store,
    fiscalId: data.fiscalId,
    checkDatetime: data.datetime,
    telegramId: input.telegramId,
    dailyLimit,
    timeZone,
    now
  });
  if (!validation.ok) return reject(progress.stage, validation.kind, validation.message);
  progress.stage = "validated";

  const { user, created } = await store.getOrCreateUser(input.telegramId);
  if (created) {
    // A concurrent first submission may have committed while we were creating the account.
    const quota = await checkDailyQuota({ store, userId: user.id, dailyLimit, timeZone, now });
    if (!quota.ok) return reject(progress.stage, quota.kind, quota.message);
  }
  progress.stage = "user_resolved";

  const rules = await loadRules(store, log);
  const breakdown = computeCashbackBreakdown(data.amount, rules);
  progress.stage = "computed";

  const { startUtcIso } = utcRangeForLocalDay({ now, timeZone });
  const committed = await store.commitCheck({
    userId: user.id,
    fiscalId: data.fiscalId,
    amount: data.amount.toDecimalPlaces(2, Decimal.ROUND_HALF_EVEN).toFixed(2),
    checkDatetime: data.datetime.toISOString(),
    sourceUrl: data.sourceUrl,
    cashbackAmount: breakdown.cashback.toFixed(2),
    rawData: data.rawData,
    dailyLimit,
    dayStartIso: startUtcIso
  });
  if (!committed.ok) {
    log.error({ reason: committed.reason, detail: committed.detail, fiskal_id: data.fiscalId }, "check commit failed");
    return commitRejection(committed.reason, dailyLimit);
  }
  progress.stage = "committed";

  return {
    success: true,
    message: MESSAGES.success({
      amount: formatRub(committed.check.amount),
      cashback: breakdown.cashback.toFixed(2),
      total: formatRub(committed.user.total_cashback)
    }),
    check: committed.check,
    user: committed.user,
    cashback: breakdown.cashback,
    error: null
  };
}

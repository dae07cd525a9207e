import { describe, expect, it } from "vitest";
import { MESSAGES } from "../messages.js";
import { processFiscalCheck, type IngestDeps, type IngestLogger, type IngestResult } from "../services/ingest.js";
import type { QrDecodeResult } from "../services/qr.js";
import { MemoryCheckStore } from "./helpers/memoryStore.js";

const TZ = "Europe/Moscow";
const NOW = new Date("2026-10-19T09:00:00Z"); // 12:00 local
const BASE_URL = "https://receipts.example.test/r/";

type LogLine = { level: "info" | "warn" | "error"; obj: object; msg: string | undefined };

function harness(overrides: Partial<IngestDeps> = {}) {
  const store = new MemoryCheckStore({ now: () => NOW });
  const receipts = new Map<string, unknown>();
  const lines: LogLine[] = [];

  const fetchImpl: typeof fetch = async (input) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const body = receipts.get(url);
    if (body === undefined) return new Response("not found", { status: 404 });
    return new Response(JSON.stringify(body), { status: 200 });
  };

  // The "image" is the QR payload itself; anything that is not a URL has no code.
  const decodeQr = async (bytes: Uint8Array): Promise<QrDecodeResult> => {
    const text = new TextDecoder().decode(bytes);
    return text.startsWith("https://") ? { found: true, text } : { found: false, reason: "no_qr" };
  };

  const log: IngestLogger = {
    info: (obj, msg) => lines.push({ level: "info", obj, msg }),
    warn: (obj, msg) => lines.push({ level: "warn", obj, msg }),
    error: (obj, msg) => lines.push({ level: "error", obj, msg })
  };

  const deps: IngestDeps = { store, timeZone: TZ, decodeQr, fetchImpl, now: () => NOW, log, ...overrides };

  function receipt(fiscalId: string, fields: { amount?: string; datetime?: string } = {}): Uint8Array {
    const url = `${BASE_URL}${fiscalId}`;
    receipts.set(url, {
      RRN: fiscalId,
      amount: fields.amount ?? "150.00",
      datetime: fields.datetime ?? "2026-10-19 11:30:00"
    });
    return new TextEncoder().encode(url);
  }

  const submit = (image: Uint8Array, telegramId = 42): Promise<IngestResult> =>
    processFiscalCheck({ image, telegramId }, deps);

  return { store, lines, receipt, submit };
}

function expectSuccess(res: IngestResult) {
  if (!res.success) throw new Error(`expected success, got ${res.error}: ${res.message}`);
  return res;
}

describe("processFiscalCheck", () => {
  it("credits cashback and persists check, visit and balance together", async () => {
    const h = harness();
    h.store.addRule({ rule_type: "tiered", threshold: "0", percentage: "2", priority: 10 });
    h.store.addRule({ rule_type: "tiered", threshold: "100", percentage: "3", priority: 5 });

    const first = expectSuccess(await h.submit(h.receipt("F-1")));
    expect(first.cashback.toFixed(2)).toBe("4.50");
    expect(first.check.amount).toBe("150.00");
    expect(first.check.cashback_amount).toBe("4.50");
    expect(first.check.check_datetime).toBe("2026-10-19T08:30:00.000Z");
    expect(first.message).toBe(
      "✅ Чек успешно обработан!\n\n" +
        "💰 Сумма чека: 150.00 руб.\n" +
        "🎁 Кэшбэк: 4.50 руб.\n" +
        "📊 Ваш общий кэшбэк: 4.50 руб.\n\n" +
        "Спасибо за покупку!"
    );

    // 200: 2% of 200 = 4.00, 3% of (200 - 100) = 3.00
    const second = expectSuccess(await h.submit(h.receipt("F-2", { amount: "200" })));
    expect(second.cashback.toFixed(2)).toBe("7.00");
    expect(second.user.total_cashback).toBe("11.50");

    expect(h.store.tables.checks.map((c) => c.fiskal_id)).toEqual(["F-1", "F-2"]);
    expect(h.store.tables.visits.map((v) => v.check_id)).toEqual(h.store.tables.checks.map((c) => c.id));
    expect(h.store.tables.users).toHaveLength(1);
    expect(h.lines.filter((l) => l.msg === "check committed")).toHaveLength(2);
  });

  it("stores the amount at two decimals and computes cashback on the exact value", async () => {
    const h = harness();
    h.store.addRule({ rule_type: "percentage", percentage: "10" });
    const res = expectSuccess(await h.submit(h.receipt("F-1", { amount: "10.005" })));
    expect(res.check.amount).toBe("10.00");
    expect(res.cashback.toFixed(2)).toBe("1.00");
  });

  it("rejects an image without a QR code before touching storage", async () => {
    const h = harness();
    const res = await h.submit(new TextEncoder().encode("blurry photo"));
    expect(res).toEqual({
      success: false,
      message: MESSAGES.qrNotFound,
      check: null,
      cashback: null,
      error: "decode_failed",
      stage: "received"
    });
    expect(h.store.tables.users).toEqual([]);
  });

  it("rejects when the receipt cannot be fetched", async () => {
    const h = harness();
    const res = await h.submit(new TextEncoder().encode(`${BASE_URL}unknown`));
    expect(res).toEqual({
      success: false,
      message: MESSAGES.fetchFailed,
      check: null,
      cashback: null,
      error: "fetch_failed",
      stage: "decoded"
    });
    expect(h.lines.some((l) => l.level === "warn" && l.msg === "fiscal fetch failed")).toBe(true);
  });

  it("rejects the second submission of a receipt regardless of user", async () => {
    const h = harness();
    const image = h.receipt("F-1");
    expectSuccess(await h.submit(image, 42));

    const again = await h.submit(image, 43);
    expect(again.success ? null : again.error).toBe("duplicate");
    expect(again.message).toBe(MESSAGES.duplicate);
    expect(h.store.tables.checks).toHaveLength(1);
    expect(h.store.tables.users.map((u) => u.telegram_id)).toEqual([42]);
  });

  it("rejects a receipt dated yesterday", async () => {
    const h = harness();
    const res = await h.submit(h.receipt("F-1", { datetime: "2026-10-18 23:59:59" }));
    expect(res.success ? null : res.error).toBe("stale");
    expect(res.message).toBe("Чек должен быть сегодняшним. Дата чека: 2026-10-18.");
  });

  it("enforces the daily limit from settings", async () => {
    const h = harness();
    h.store.settings.set("daily_check_limit", "2");
    expectSuccess(await h.submit(h.receipt("Q-1")));
    expectSuccess(await h.submit(h.receipt("Q-2")));

    const third = await h.submit(h.receipt("Q-3"));
    expect(third.success ? null : third.error).toBe("quota_exceeded");
    expect(third.message).toBe("Достигнут лимит чеков на сегодня (2). Попробуйте завтра.");
    // another account is unaffected
    expectSuccess(await h.submit(h.receipt("Q-4"), 43));
  });

  it("lets the configured override win over settings", async () => {
    const h = harness({ dailyLimitOverride: 1 });
    h.store.settings.set("daily_check_limit", "5");
    expectSuccess(await h.submit(h.receipt("Q-1")));
    const second = await h.submit(h.receipt("Q-2"));
    expect(second.message).toBe(MESSAGES.quotaExceeded(1));
  });

  it("leaves no partial state when the visit insert fails", async () => {
    const h = harness();
    h.store.addRule({ rule_type: "fixed", cash_amount: "50" });
    h.store.faults.failVisitInsert = true;

    const res = await h.submit(h.receipt("F-1"));
    expect(res).toMatchObject({ success: false, error: "persistence_conflict", message: MESSAGES.storageError });
    expect(h.store.tables.checks).toEqual([]);
    expect(h.store.tables.visits).toEqual([]);
    expect(h.store.tables.users[0]?.total_cashback).toBe("0.00");

    h.store.faults.failVisitInsert = false;
    const retry = expectSuccess(await h.submit(h.receipt("F-1")));
    expect(retry.user.total_cashback).toBe("50.00");
  });

  it("accepts exactly one of two concurrent first submissions when the limit is 1", async () => {
    const h = harness({ dailyLimitOverride: 1 });
    const results = await Promise.all([h.submit(h.receipt("C-1")), h.submit(h.receipt("C-2"))]);

    const accepted = results.filter((r) => r.success);
    const rejected = results.flatMap((r) => (r.success ? [] : [r.error]));
    expect(accepted).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(["quota_exceeded", "persistence_conflict"]).toContain(rejected[0]);
    expect(h.store.tables.checks).toHaveLength(1);
    expect(h.store.tables.users).toHaveLength(1);
  });

  it("serializes concurrent commits of an existing account on the quota", async () => {
    const h = harness({ dailyLimitOverride: 1 });
    await h.store.getOrCreateUser(42);
    const results = await Promise.all([h.submit(h.receipt("C-1")), h.submit(h.receipt("C-2"))]);
    expect(results.filter((r) => r.success)).toHaveLength(1);
    expect(results.flatMap((r) => (r.success ? [] : [r.error]))).toEqual(["quota_exceeded"]);
  });

  it("re-checks the quota after creating the account", async () => {
    // Another submission from the same person commits while the account is being created.
    class RacingStore extends MemoryCheckStore {
      override async getOrCreateUser(telegramId: number) {
        const res = await super.getOrCreateUser(telegramId);
        if (res.created) this.addCheck({ userId: res.user.id, fiscalId: "R-0" });
        return res;
      }
    }
    const store = new RacingStore({ now: () => NOW });
    const h = harness({ store, dailyLimitOverride: 1 });

    const res = await h.submit(h.receipt("R-1"));
    expect(res).toEqual({
      success: false,
      message: MESSAGES.quotaExceeded(1),
      check: null,
      cashback: null,
      error: "quota_exceeded",
      stage: "validated"
    });
    expect(store.tables.checks.map((c) => c.fiskal_id)).toEqual(["R-0"]);
  });

  it("turns a commit-time duplicate from a concurrent user into a rejection", async () => {
    const h = harness();
    const image = h.receipt("F-1");
    const results = await Promise.all([h.submit(image, 42), h.submit(image, 43)]);

    const rejected = results.filter((r) => !r.success);
    expect(results.filter((r) => r.success)).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]?.message).toBe(MESSAGES.duplicate);
    expect(h.store.tables.checks).toHaveLength(1);
  });

  it("reports storage faults as a rejection with the stage reached", async () => {
    const h = harness();
    h.store.faults.failReads = true;
    const res = await h.submit(h.receipt("F-1"));
    expect(res).toEqual({
      success: false,
      message: MESSAGES.storageError,
      check: null,
      cashback: null,
      error: "persistence_conflict",
      stage: "fetched"
    });
    expect(h.lines.some((l) => l.level === "error" && l.msg === "check ingestion failed")).toBe(true);
  });

  it("skips invalid rules and logs them", async () => {
    const h = harness();
    h.store.addRule({ id: "broken", rule_type: "percentage", percentage: "150", priority: 99 });
    h.store.addRule({ rule_type: "fixed", cash_amount: "20", priority: 1 });

    const res = expectSuccess(await h.submit(h.receipt("F-1")));
    expect(res.cashback.toFixed(2)).toBe("20.00");
    expect(h.lines).toContainEqual({
      level: "warn",
      obj: { rule_id: "broken", rule_type: "percentage" },
      msg: "skipping invalid cashback rule"
    });
  });
});

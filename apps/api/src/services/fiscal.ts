import { Decimal } from "decimal.js";
import { DateTime } from "luxon";
import { luxonZone } from "../utils/time.js";
import { getJson, type JsonResponse } from "./http.js";

// Providers disagree on field names; candidates are tried in order.
export const FISCAL_FIELDS = {
  fiscalId: ["RRN", "FISKAL_NO", "fiskal_id", "id"],
  amount: ["amount", "total", "sum"],
  datetime: ["datetime", "date", "created_at"]
} as const;

export const DATETIME_FORMATS: ReadonlyArray<{ format: string; utc: boolean }> = [
  { format: "yyyy-MM-dd HH:mm:ss", utc: false },
  { format: "yyyy-MM-dd'T'HH:mm:ss", utc: false },
  { format: "yyyy-MM-dd'T'HH:mm:ss'Z'", utc: true },
  { format: "dd.MM.yyyy HH:mm:ss", utc: false }
];

export type Extracted<T> =
  | { kind: "parsed"; field: string; value: T }
  | { kind: "unparseable"; field: string; raw: unknown }
  | { kind: "absent" };

export type FiscalCheckData = {
  fiscalId: string;
  amount: Decimal;
  datetime: Date;
  sourceUrl: string;
  rawData: Record<string, unknown>;
};

export type FetchFailureReason =
  | "invalid_url"
  | "timeout"
  | "network_error"
  | "http_error"
  | "invalid_json"
  | "missing_fiscal_id"
  | "invalid_fiscal_id"
  | "missing_amount"
  | "invalid_amount"
  | "invalid_datetime";

export type FiscalFetchResult =
  | { ok: true; data: FiscalCheckData }
  | { ok: false; reason: FetchFailureReason; detail?: string };

export type FetchFiscalOptions = {
  timeZone: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  now?: () => Date;
};

type FieldCandidates = ReadonlyArray<string>;

const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

export function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function pickField(payload: Record<string, unknown>, candidates: FieldCandidates): { field: string; raw: unknown } | null {
  for (const field of candidates) {
    const raw = payload[field];
    if (raw === undefined || raw === null || raw === "") continue;
    return { field, raw };
  }
  return null;
}

export function extractFiscalId(payload: Record<string, unknown>): Extracted<string> {
  const hit = pickField(payload, FISCAL_FIELDS.fiscalId);
  if (!hit) return { kind: "absent" };
  if (typeof hit.raw === "string" && hit.raw.trim()) return { kind: "parsed", field: hit.field, value: hit.raw.trim() };
  if (typeof hit.raw === "number" && Number.isSafeInteger(hit.raw)) {
    return { kind: "parsed", field: hit.field, value: String(hit.raw) };
  }
  return { kind: "unparseable", field: hit.field, raw: hit.raw };
}

export function parseAmount(raw: unknown): Decimal | null {
  let s: string;
  if (typeof raw === "number") {
    if (!Number.isFinite(raw)) return null;
    s = String(raw);
  } else if (typeof raw === "string") {
    s = raw.trim();
  } else {
    return null;
  }
  if (typeof raw === "string" && !DECIMAL_RE.test(s)) return null;
  try {
    const d = new Decimal(s);
    return d.isFinite() ? d : null;
  } catch {
    return null;
  }
}

export function extractAmount(payload: Record<string, unknown>): Extracted<Decimal> {
  const hit = pickField(payload, FISCAL_FIELDS.amount);
  if (!hit) return { kind: "absent" };
  const value = parseAmount(hit.raw);
  if (!value) return { kind: "unparseable", field: hit.field, raw: hit.raw };
  return { kind: "parsed", field: hit.field, value };
}

/** Tries the known receipt formats in order; naive timestamps are read in `timeZone`. */
export function parseFiscalDatetime(raw: string, timeZone: string): Date | null {
  const s = raw.trim();
  for (const { format, utc } of DATETIME_FORMATS) {
    const dt = DateTime.fromFormat(s, format, { zone: utc ? "utc" : luxonZone(timeZone) });
    if (dt.isValid) return dt.toJSDate();
  }
  return null;
}

export function extractDatetime(payload: Record<string, unknown>, timeZone: string): Extracted<Date> {
  const hit = pickField(payload, FISCAL_FIELDS.datetime);
  if (!hit) return { kind: "absent" };
  if (typeof hit.raw !== "string") return { kind: "unparseable", field: hit.field, raw: hit.raw };
  const value = parseFiscalDatetime(hit.raw, timeZone);
  if (!value) return { kind: "unparseable", field: hit.field, raw: hit.raw };
  return { kind: "parsed", field: hit.field, value };
}

function isHttpUrl(input: string): boolean {
  try {
    const u = new URL(input);
    return u.protocol === "http:" || u.protocol === "https:";
  } catch {
    return false;
  }
}

function errorName(e: unknown): string {
  return e instanceof Error ? e.name : "";
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export async function fetchFiscalCheck(url: string, opts: FetchFiscalOptions): Promise<FiscalFetchResult> {
  const sourceUrl = url.trim();
  if (!isHttpUrl(sourceUrl)) return { ok: false, reason: "invalid_url", detail: sourceUrl.slice(0, 200) };

  let res: JsonResponse;
  try {
    res = await getJson(sourceUrl, { timeoutMs: opts.timeoutMs ?? 10000, fetchImpl: opts.fetchImpl });
  } catch (e) {
    const reason = errorName(e) === "AbortError" ? "timeout" : "network_error";
    return { ok: false, reason, detail: errorMessage(e) };
  }
  if (!res.ok) return { ok: false, reason: "http_error", detail: `HTTP ${res.status}` };
  if (!isRecord(res.json)) return { ok: false, reason: "invalid_json", detail: res.text.slice(0, 200) };
  const payload = res.json;

  const fiscalId = extractFiscalId(payload);
  if (fiscalId.kind === "absent") return { ok: false, reason: "missing_fiscal_id" };
  if (fiscalId.kind === "unparseable") return { ok: false, reason: "invalid_fiscal_id", detail: fiscalId.field };

  const amount = extractAmount(payload);
  if (amount.kind === "absent") return { ok: false, reason: "missing_amount" };
  if (amount.kind === "unparseable") return { ok: false, reason: "invalid_amount", detail: String(amount.raw) };

  const dt = extractDatetime(payload, opts.timeZone);
  if (dt.kind === "unparseable") return { ok: false, reason: "invalid_datetime", detail: String(dt.raw) };
  // Field absent: the receipt is taken as issued now.
  const datetime = dt.kind === "parsed" ? dt.value : (opts.now ?? (() => new Date()))();

  return {
    ok: true,
    data: { fiscalId: fiscalId.value, amount: amount.value, datetime, sourceUrl, rawData: payload }
  };
}

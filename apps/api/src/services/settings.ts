import type { CheckStore } from "../store/types.js";

export const DAILY_CHECK_LIMIT_KEY = "daily_check_limit";
export const DEFAULT_DAILY_CHECK_LIMIT = 10;

export function parseDailyLimit(raw: string | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  const s = raw.trim();
  if (!/^\d+$/.test(s)) return null;
  const n = Number(s);
  return Number.isSafeInteger(n) ? n : null;
}

/**
 * Daily quota for one submission: explicit override (env) first, then the
 * `daily_check_limit` settings row, then the coded default.
 */
export async function resolveDailyCheckLimit(params: {
  override?: number | undefined;
  store: Pick<CheckStore, "getSetting">;
}): Promise<number> {
  if (params.override !== undefined) return params.override;
  const stored = parseDailyLimit(await params.store.getSetting(DAILY_CHECK_LIMIT_KEY));
  return stored ?? DEFAULT_DAILY_CHECK_LIMIT;
}

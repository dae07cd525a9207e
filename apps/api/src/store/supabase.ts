import type { PostgrestError, SupabaseClient } from "@supabase/supabase-js";
import type { DashboardStats, DbCashbackRule, DbUser, RecentCheckRow } from "@qrcashback/shared";
import {
  commitResultSchema,
  dashboardStatsSchema,
  recentCheckRowSchema,
  ruleRowSchema,
  userRowSchema
} from "./rows.js";
import type { CheckStore, CommitCheckInput, CommitCheckResult } from "./types.js";

const UNIQUE_VIOLATION = "23505";

export class StorageError extends Error {
  readonly code: string | null;

  constructor(op: string, err: PostgrestError) {
    super(`${op} failed: ${err.message}`);
    this.name = "StorageError";
    this.code = err.code || null;
  }
}

export class SupabaseCheckStore implements CheckStore {
  constructor(private readonly db: SupabaseClient) {}

  async fiscalIdExists(fiscalId: string): Promise<boolean> {
    const res = await this.db.from("checks").select("id").eq("fiskal_id", fiscalId).limit(1);
    if (res.error) throw new StorageError("fiscalIdExists", res.error);
    return (res.data ?? []).length > 0;
  }

  async findUserByTelegramId(telegramId: number): Promise<DbUser | null> {
    const res = await this.db.from("users").select("*").eq("telegram_id", telegramId).maybeSingle();
    if (res.error) throw new StorageError("findUserByTelegramId", res.error);
    return res.data ? userRowSchema.parse(res.data) : null;
  }

  async getOrCreateUser(telegramId: number): Promise<{ user: DbUser; created: boolean }> {
    const existing = await this.findUserByTelegramId(telegramId);
    if (existing) return { user: existing, created: false };

    const inserted = await this.db
      .from("users")
      .insert([{ telegram_id: telegramId, registration_date: new Date().toISOString() }])
      .select("*")
      .single();
    if (inserted.error) {
      // Lost the race against a concurrent first submission: the row exists now.
      if (inserted.error.code === UNIQUE_VIOLATION) {
        const winner = await this.findUserByTelegramId(telegramId);
        if (winner) return { user: winner, created: false };
      }
      throw new StorageError("getOrCreateUser", inserted.error);
    }
    return { user: userRowSchema.parse(inserted.data), created: true };
  }

  async countChecksSince(userId: string, sinceIso: string): Promise<number> {
    const res = await this.db
      .from("checks")
      .select("id", { count: "exact", head: true })
      .eq("user_id", userId)
      .gte("created_at", sinceIso);
    if (res.error) throw new StorageError("countChecksSince", res.error);
    return res.count ?? 0;
  }

  async listActiveRules(): Promise<DbCashbackRule[]> {
    const res = await this.db
      .from("cashback_rules")
      .select("id, name, rule_type, threshold, cash_amount, percentage, is_active, priority")
      .eq("is_active", true)
      .order("priority", { ascending: false })
      .order("threshold", { ascending: false });
    if (res.error) throw new StorageError("listActiveRules", res.error);
    return (res.data ?? []).map((row) => ruleRowSchema.parse(row));
  }

  async getSetting(key: string): Promise<string | null> {
    const res = await this.db.from("settings").select("value").eq("key", key).maybeSingle();
    if (res.error) throw new StorageError("getSetting", res.error);
    const value: unknown = res.data?.value;
    return typeof value === "string" ? value : null;
  }

  async commitCheck(input: CommitCheckInput): Promise<CommitCheckResult> {
    const res = await this.db.rpc("ingest_check", {
      p_user_id: input.userId,
      p_fiskal_id: input.fiscalId,
      p_amount: input.amount,
      p_check_datetime: input.checkDatetime,
      p_source_url: input.sourceUrl,
      p_cashback_amount: input.cashbackAmount,
      p_raw_data: input.rawData,
      p_daily_limit: input.dailyLimit,
      p_day_start: input.dayStartIso
    });
    if (res.error) {
      if (res.error.code === UNIQUE_VIOLATION) return { ok: false, reason: "duplicate", detail: res.error.message };
      return { ok: false, reason: "storage_error", detail: `${res.error.code}: ${res.error.message}` };
    }
    const parsed = commitResultSchema.safeParse(res.data);
    if (!parsed.success) return { ok: false, reason: "storage_error", detail: parsed.error.message };
    if (parsed.data.status === "quota_exceeded") {
      return { ok: false, reason: "quota_exceeded", detail: `count=${parsed.data.count}` };
    }
    return { ok: true, check: parsed.data.check, user: parsed.data.user };
  }

  async getDashboardStats(sinceIso: string): Promise<DashboardStats> {
    const res = await this.db.rpc("dashboard_stats", { p_since: sinceIso });
    if (res.error) throw new StorageError("getDashboardStats", res.error);
    return dashboardStatsSchema.parse(res.data);
  }

  async listRecentChecks(limit: number): Promise<RecentCheckRow[]> {
    const res = await this.db
      .from("checks")
      .select("fiskal_id, amount, cashback_amount, created_at, users(telegram_id)")
      .order("created_at", { ascending: false })
      .limit(limit);
    if (res.error) throw new StorageError("listRecentChecks", res.error);
    return (res.data ?? []).map((row) => recentCheckRowSchema.parse(row));
  }
}

import type { DashboardStats, DbCashbackRule, DbCheck, DbUser, RecentCheckRow } from "@qrcashback/shared";

export type CommitCheckInput = {
  userId: string;
  fiscalId: string;
  amount: string;
  checkDatetime: string;
  sourceUrl: string;
  cashbackAmount: string;
  rawData: Record<string, unknown>;
  // Quota re-checked under the user row lock.
  dailyLimit: number;
  dayStartIso: string;
};

export type CommitFailureReason = "duplicate" | "quota_exceeded" | "storage_error";

export type CommitCheckResult =
  | { ok: true; check: DbCheck; user: DbUser }
  | { ok: false; reason: CommitFailureReason; detail?: string };

/**
 * Persistence seam of the ingestion pipeline.
 *
 * Reads may throw on storage errors. `commitCheck` never throws: the Check row,
 * its Visit and the balance increment land together or not at all.
 */
export interface CheckStore {
  fiscalIdExists(fiscalId: string): Promise<boolean>;
  findUserByTelegramId(telegramId: number): Promise<DbUser | null>;
  getOrCreateUser(telegramId: number): Promise<{ user: DbUser; created: boolean }>;
  countChecksSince(userId: string, sinceIso: string): Promise<number>;
  listActiveRules(): Promise<DbCashbackRule[]>;
  getSetting(key: string): Promise<string | null>;
  commitCheck(input: CommitCheckInput): Promise<CommitCheckResult>;
  getDashboardStats(sinceIso: string): Promise<DashboardStats>;
  listRecentChecks(limit: number): Promise<RecentCheckRow[]>;
}

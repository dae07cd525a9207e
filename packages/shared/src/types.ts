// Shared domain types. Monetary values travel as decimal strings ("150.00"), never as floats.

export type CashbackRuleType = "fixed" | "percentage" | "tiered";

export type RejectionKind =
  | "decode_failed"
  | "fetch_failed"
  | "duplicate"
  | "stale"
  | "quota_exceeded"
  | "persistence_conflict";

export interface DbUser {
  id: string;
  telegram_id: number;
  phone: string | null;
  car_name: string | null;
  car_number: string | null;
  registration_date: string;
  is_active: boolean;
  total_cashback: string;
  created_at: string;
  updated_at: string;
}

export interface DbCheck {
  id: string;
  user_id: string;
  fiskal_id: string;
  amount: string;
  check_datetime: string;
  source_url: string;
  cashback_amount: string;
  raw_data: Record<string, unknown> | null;
  created_at: string;
  updated_at: string;
}

export interface DbVisit {
  id: string;
  user_id: string;
  check_id: string;
  created_at: string;
}

export interface DbCashbackRule {
  id: string;
  name: string;
  rule_type: string;
  threshold: string;
  cash_amount: string;
  percentage: string;
  is_active: boolean;
  priority: number;
}

// POST /bot/checks response body
export interface CheckSubmissionResponse {
  ok: boolean;
  message: string;
  error: RejectionKind | null;
  check: DbCheck | null;
  cashback: string | null;
}

// GET /bot/balance/:telegramUserId response body
export interface BalanceResponse {
  user: { telegram_id: number; total_cashback: string; registration_date: string } | null;
}

export interface RecentCheckRow {
  fiskal_id: string;
  amount: string;
  cashback_amount: string;
  created_at: string;
  telegram_id: number | null;
}

export interface DashboardStats {
  today_checks_count: number;
  today_visits_count: number;
  today_revenue: string;
  today_cashback: string;
  total_users: number;
  total_checks: number;
  total_revenue: string;
  total_cashback: string;
}

export interface DashboardData extends DashboardStats {
  local_date: string;
  recent_checks: RecentCheckRow[];
  active_rules: DbCashbackRule[];
}

import { z } from "zod";
import type { DashboardStats, DbCashbackRule, DbCheck, DbUser, RecentCheckRow } from "@qrcashback/shared";

// PostgREST returns numeric columns as JSON numbers; keep them as decimal strings.
const numeric = z.union([z.number(), z.string()]).transform((v) => String(v));
const count = z.union([z.number(), z.string()]).transform((v) => Number(v));

export const userRowSchema = z.object({
  id: z.string(),
  telegram_id: z.union([z.number(), z.string()]).transform((v) => Number(v)),
  phone: z.string().nullable(),
  car_name: z.string().nullable(),
  car_number: z.string().nullable(),
  registration_date: z.string(),
  is_active: z.boolean(),
  total_cashback: numeric,
  created_at: z.string(),
  updated_at: z.string()
}) satisfies z.ZodType<DbUser, z.ZodTypeDef, unknown>;

export const checkRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  fiskal_id: z.string(),
  amount: numeric,
  check_datetime: z.string(),
  source_url: z.string(),
  cashback_amount: numeric,
  raw_data: z.record(z.unknown()).nullable(),
  created_at: z.string(),
  updated_at: z.string()
}) satisfies z.ZodType<DbCheck, z.ZodTypeDef, unknown>;

export const ruleRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  rule_type: z.string(),
  threshold: numeric,
  cash_amount: numeric,
  percentage: numeric,
  is_active: z.boolean(),
  priority: z.number().int()
}) satisfies z.ZodType<DbCashbackRule, z.ZodTypeDef, unknown>;

export const dashboardStatsSchema = z.object({
  today_checks_count: count,
  today_visits_count: count,
  today_revenue: numeric,
  today_cashback: numeric,
  total_users: count,
  total_checks: count,
  total_revenue: numeric,
  total_cashback: numeric
}) satisfies z.ZodType<DashboardStats, z.ZodTypeDef, unknown>;

const ownerSchema = z.object({ telegram_id: z.union([z.number(), z.string()]).transform((v) => Number(v)) });

export const recentCheckRowSchema = z
  .object({
    fiskal_id: z.string(),
    amount: numeric,
    cashback_amount: numeric,
    created_at: z.string(),
    users: z.union([ownerSchema, z.array(ownerSchema), z.null()])
  })
  .transform((r): RecentCheckRow => {
    const owner = Array.isArray(r.users) ? (r.users[0] ?? null) : r.users;
    return {
      fiskal_id: r.fiskal_id,
      amount: r.amount,
      cashback_amount: r.cashback_amount,
      created_at: r.created_at,
      telegram_id: owner ? owner.telegram_id : null
    };
  });

export const commitResultSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("ok"), check: checkRowSchema, user: userRowSchema }),
  z.object({ status: z.literal("quota_exceeded"), count: count })
]);

import { Decimal } from "decimal.js";
import type { FastifyInstance } from "fastify";
import type { DashboardData, DbCashbackRule } from "@qrcashback/shared";
import type { ServerDeps } from "../server.js";
import { utcRangeForLocalDay } from "../utils/time.js";
import { requireDashboardToken } from "./guards.js";
import { dashboardQuerySchema } from "./schemas.js";

const RECENT_CHECKS_LIMIT = 10;

function byPriority(a: DbCashbackRule, b: DbCashbackRule): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  return new Decimal(b.threshold).comparedTo(a.threshold);
}

export function registerAdminRoutes(app: FastifyInstance, deps: ServerDeps) {
  // Read-only operator view: today's totals (local day in APP_TIMEZONE), all-time totals, recent checks.
  app.get("/admin/dashboard/data", async (req): Promise<DashboardData> => {
    const query = dashboardQuerySchema.parse(req.query);
    requireDashboardToken(req, deps.adminToken, query.token);

    const now = (deps.ingest?.now ?? (() => new Date()))();
    const day = utcRangeForLocalDay({ now, timeZone: deps.timeZone });
    const [stats, recent, rules] = await Promise.all([
      deps.store.getDashboardStats(day.startUtcIso),
      deps.store.listRecentChecks(RECENT_CHECKS_LIMIT),
      deps.store.listActiveRules()
    ]);

    return {
      ...stats,
      local_date: day.localDate,
      recent_checks: recent,
      active_rules: [...rules].sort(byPriority)
    };
  });
}

import { env, supabaseAdmin } from "./config.js";
import { buildServer } from "./server.js";
import { SupabaseCheckStore } from "./store/supabase.js";

const app = buildServer({
  store: new SupabaseCheckStore(supabaseAdmin),
  timeZone: env.APP_TIMEZONE,
  dailyLimitOverride: env.DAILY_CHECK_LIMIT,
  fetchTimeoutMs: env.FISCAL_FETCH_TIMEOUT_MS,
  adminToken: env.ADMIN_DASHBOARD_TOKEN,
  botApiToken: env.BOT_API_TOKEN,
  logLevel: env.LOG_LEVEL
});

await app.listen({ port: env.PORT, host: "0.0.0.0" });

export type ApiResponse = { status: number; ok: boolean; json: unknown; text: string };

export type ApiClient = (path: string, init?: RequestInit) => Promise<ApiResponse>;

export function createApiClient(
  baseUrl: string,
  opts: { botApiToken?: string | undefined; fetchImpl?: typeof fetch } = {}
): ApiClient {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const auth: Record<string, string> = opts.botApiToken ? { "x-bot-token": opts.botApiToken } : {};
  return async function api(path: string, init?: RequestInit): Promise<ApiResponse> {
    const res = await fetchImpl(`${baseUrl}${path}`, {
      ...init,
      headers: { "Content-Type": "application/json", ...auth, ...(init?.headers || {}) }
    });
    const text = await res.text();
    let json: unknown = null;
    try {
      json = text ? JSON.parse(text) : null;
    } catch {
      json = null; // non-JSON body (proxy error page); callers fall back on status
    }
    return { status: res.status, ok: res.ok, json, text };
  };
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

// Message to show for a POST /bot/checks response, accepted or rejected.
export function readSubmissionMessage(json: unknown): string | null {
  if (!isRecord(json)) return null;
  return typeof json.message === "string" && json.message ? json.message : null;
}

// total_cashback from GET /bot/balance; null when the user is unknown or the body is malformed.
export function readBalance(json: unknown): string | null {
  if (!isRecord(json) || !isRecord(json.user)) return null;
  const total = json.user.total_cashback;
  if (typeof total === "string") return total;
  if (typeof total === "number" && Number.isFinite(total)) return String(total);
  return null;
}

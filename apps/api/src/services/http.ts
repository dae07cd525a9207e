export type JsonResponse = { ok: boolean; status: number; json: unknown; text: string };

export async function getJson(
  url: string,
  opts: { timeoutMs?: number; fetchImpl?: typeof fetch } = {}
): Promise<JsonResponse> {
  const timeoutMs = opts.timeoutMs ?? 10000;
  const fetchImpl = opts.fetchImpl ?? fetch;
  const ctrl = new AbortController();
  const t = setTimeout(() => ctrl.abort(), timeoutMs);
  try {
    const res = await fetchImpl(url, {
      method: "GET",
      headers: { Accept: "application/json" },
      signal: ctrl.signal
    });
    const text = await res.text();
    let json: unknown = null;
    try {
      json = text ? JSON.parse(text) : null;
    } catch {
      json = null;
    }
    return { ok: res.ok, status: res.status, json, text };
  } finally {
    clearTimeout(t);
  }
}

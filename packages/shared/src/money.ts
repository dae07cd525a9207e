// Formatting helpers for decimal strings shown to users ("150" -> "150.00").

export function formatRub(value: string): string {
  const s = value.trim();
  const m = s.match(/^(-?)(\d+)(?:\.(\d+))?$/);
  if (!m) return s;
  const sign = m[1] ?? "";
  const int = m[2] ?? "0";
  const frac = (m[3] ?? "").padEnd(2, "0");
  return `${sign}${int}.${frac}`;
}

// Timezone guards for APP_TIMEZONE. Not perfect, but enough to fail fast on typos.

export function isLikelyIanaTimezone(tz: string): boolean {
  if (!tz || typeof tz !== "string") return false;
  // Basic shape: Area/City or Area/Region/City, allow underscores and dashes.
  return /^[A-Za-z]+(?:[_-][A-Za-z]+)*(?:\/[A-Za-z]+(?:[_-][A-Za-z]+)*)+$/.test(tz);
}

export function isGmtOffsetTimezone(tz: string): boolean {
  const m = tz.trim().match(/^(?:GMT|UTC)[+-](\d{1,2})(?::?(\d{2}))?$/i);
  if (!m) return false;
  return Number(m[1]) <= 14 && Number(m[2] ?? "0") <= 59;
}

export function isSupportedTimezone(tz: string): boolean {
  if (tz === "UTC" || isGmtOffsetTimezone(tz)) return true;
  if (!isLikelyIanaTimezone(tz)) return false;
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

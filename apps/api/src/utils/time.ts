import { DateTime, FixedOffsetZone, type Zone } from "luxon";

export function parseGmtOffsetToMinutes(input: string): number | null {
  // Accept: "GMT+3", "GMT+03:00", "UTC-7", "GMT-03:30"
  const s = input.trim();
  const m = s.match(/^(?:GMT|UTC)\s*([+-])\s*(\d{1,2})(?::?(\d{2}))?$/i);
  if (!m) return null;
  const sign = m[1] === "-" ? -1 : 1;
  const hh = Number(m[2]);
  const mm = m[3] ? Number(m[3]) : 0;
  if (!Number.isFinite(hh) || !Number.isFinite(mm)) return null;
  if (hh < 0 || hh > 14) return null;
  if (mm < 0 || mm > 59) return null;
  return sign * (hh * 60 + mm);
}

export type LocalParts = { year: number; month: number; day: number; hour: number; minute: number };

export function getLocalParts(date: Date, timeZone: string): LocalParts {
  const off = parseGmtOffsetToMinutes(timeZone);
  if (off !== null) {
    const d = new Date(date.getTime() + off * 60000);
    return {
      year: d.getUTCFullYear(),
      month: d.getUTCMonth() + 1,
      day: d.getUTCDate(),
      hour: d.getUTCHours(),
      minute: d.getUTCMinutes()
    };
  }
  const fmt = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23"
  });
  const parts = fmt.formatToParts(date);
  const get = (type: string) => Number(parts.find((p) => p.type === type)?.value ?? "0");
  return {
    year: get("year"),
    month: get("month"),
    day: get("day"),
    hour: get("hour"),
    minute: get("minute")
  };
}

/** Calendar date (YYYY-MM-DD) of the instant as seen in `timeZone`. */
export function localDateKey(date: Date, timeZone: string): string {
  const p = getLocalParts(date, timeZone);
  return `${String(p.year).padStart(4, "0")}-${String(p.month).padStart(2, "0")}-${String(p.day).padStart(2, "0")}`;
}

export function luxonZone(timeZone: string): Zone | string {
  const off = parseGmtOffsetToMinutes(timeZone);
  return off !== null ? FixedOffsetZone.instance(off) : timeZone;
}

export function utcRangeForLocalDay(params: {
  now: Date;
  timeZone: string;
}): { startUtcIso: string; endUtcIso: string; localDate: string } {
  const { now, timeZone } = params;
  // The offset at local midnight can differ from the one at `now` on DST-change days.
  const local = DateTime.fromJSDate(now, { zone: luxonZone(timeZone) });
  return {
    startUtcIso: local.startOf("day").toJSDate().toISOString(),
    endUtcIso: local.endOf("day").toJSDate().toISOString(),
    localDate: localDateKey(now, timeZone)
  };
}

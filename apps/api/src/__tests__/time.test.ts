import { describe, expect, it } from "vitest";
import { localDateKey, parseGmtOffsetToMinutes, utcRangeForLocalDay } from "../utils/time.js";

describe("parseGmtOffsetToMinutes", () => {
  it("parses GMT and UTC offsets", () => {
    expect(parseGmtOffsetToMinutes("GMT+3")).toBe(180);
    expect(parseGmtOffsetToMinutes("UTC-03:30")).toBe(-210);
    expect(parseGmtOffsetToMinutes("Europe/Moscow")).toBeNull();
    expect(parseGmtOffsetToMinutes("GMT+15")).toBeNull();
  });
});

describe("localDateKey", () => {
  it("uses the calendar of the given zone", () => {
    const instant = new Date("2026-10-18T21:30:00Z");
    expect(localDateKey(instant, "UTC")).toBe("2026-10-18");
    expect(localDateKey(instant, "Europe/Moscow")).toBe("2026-10-19");
    expect(localDateKey(instant, "GMT-5")).toBe("2026-10-18");
  });
});

describe("utcRangeForLocalDay", () => {
  it("returns local midnight as a UTC instant", () => {
    const range = utcRangeForLocalDay({ now: new Date("2026-10-19T09:00:00Z"), timeZone: "Europe/Moscow" });
    expect(range).toEqual({
      startUtcIso: "2026-10-18T21:00:00.000Z",
      endUtcIso: "2026-10-19T20:59:59.999Z",
      localDate: "2026-10-19"
    });
  });

  it("handles fixed offsets", () => {
    const range = utcRangeForLocalDay({ now: new Date("2026-10-19T02:00:00Z"), timeZone: "GMT-5" });
    expect(range.localDate).toBe("2026-10-18");
    expect(range.startUtcIso).toBe("2026-10-18T05:00:00.000Z");
  });

  it("takes the offset in force at midnight when clocks go forward", () => {
    const range = utcRangeForLocalDay({ now: new Date("2026-03-29T10:00:00Z"), timeZone: "Europe/Berlin" });
    expect(range).toEqual({
      startUtcIso: "2026-03-28T23:00:00.000Z",
      endUtcIso: "2026-03-29T21:59:59.999Z",
      localDate: "2026-03-29"
    });
  });

  it("takes the offset in force at midnight when clocks go back", () => {
    const range = utcRangeForLocalDay({ now: new Date("2026-10-25T10:00:00Z"), timeZone: "Europe/Berlin" });
    expect(range).toEqual({
      startUtcIso: "2026-10-24T22:00:00.000Z",
      endUtcIso: "2026-10-25T22:59:59.999Z",
      localDate: "2026-10-25"
    });
  });
});

import { describe, expect, it } from "vitest";

import DateUtil from "@/lib/date-util";
import { currentWeekWeekdays, getWeekdayLabel, resolvePeriodStatus, timetableEntryKey } from "@/lib/school-calendar";

const kst = (time: string) => `2026-10-19T${time}+09:00`;

describe("currentWeekWeekdays", () => {
  it("returns Monday to Friday of the current week", () => {
    const days = currentWeekWeekdays("2026-10-21T01:00:00Z").map((date) => DateUtil.formatISODate(date));

    expect(days).toEqual(["2026-10-19", "2026-10-20", "2026-10-21", "2026-10-22", "2026-10-23"]);
  });

  it("treats a late Sunday in Seoul as the end of the week", () => {
    const days = currentWeekWeekdays("2026-10-25T14:59:00Z").map((date) => DateUtil.formatISODate(date));

    expect(days[0]).toBe("2026-10-19");
    expect(days[4]).toBe("2026-10-23");
  });

  it("follows Seoul time when UTC is still on Sunday", () => {
    const days = currentWeekWeekdays("2026-10-18T16:00:00Z").map((date) => DateUtil.formatISODate(date));

    expect(days[0]).toBe("2026-10-19");
  });

  it("always yields five consecutive days starting on a Monday", () => {
    const start = Date.parse("2026-10-12T03:00:00Z");

    for (let offset = 0; offset < 14; offset += 1) {
      const days = currentWeekWeekdays(new Date(start + offset * 86_400_000));

      expect(days).toHaveLength(5);
      expect(days[0]?.getUTCDay()).toBe(1);
      days.slice(1).forEach((day, index) => {
        expect(day.getTime() - (days[index]?.getTime() ?? 0)).toBe(86_400_000);
      });
    }
  });
});

describe("getWeekdayLabel", () => {
  it("labels weekdays in Korean starting from Monday", () => {
    expect(getWeekdayLabel(new Date(Date.UTC(2026, 9, 19)))).toBe("월");
    expect(getWeekdayLabel(new Date(Date.UTC(2026, 9, 23)))).toBe("금");
    expect(getWeekdayLabel(new Date(Date.UTC(2026, 9, 25)))).toBe("일");
  });
});

describe("resolvePeriodStatus", () => {
  it("reports the running period and the one after it", () => {
    expect(resolvePeriodStatus(kst("08:45:00"))).toEqual({ current: 1, next: 2 });
  });

  it("reports only the next period during a break", () => {
    expect(resolvePeriodStatus(kst("09:35:00"))).toEqual({ current: null, next: 2 });
  });

  it("reports the first period before school starts", () => {
    expect(resolvePeriodStatus(kst("08:00:00"))).toEqual({ current: null, next: 1 });
  });

  it("reports nothing after the last period", () => {
    expect(resolvePeriodStatus(kst("17:00:00"))).toEqual({ current: null, next: null });
  });

  it("includes both ends of a period window", () => {
    expect(resolvePeriodStatus(kst("08:40:00"))).toEqual({ current: 1, next: 2 });
    expect(resolvePeriodStatus(kst("09:30:00.000"))).toEqual({ current: 1, next: 2 });
    expect(resolvePeriodStatus(kst("09:30:00.001"))).toEqual({ current: null, next: 2 });
  });

  it("has no next period during the last one", () => {
    expect(resolvePeriodStatus(kst("16:20:00"))).toEqual({ current: 7, next: null });
  });

  it("accepts a custom schedule", () => {
    const schedule = [{ period: 1, start: "09:00", end: "09:45" }];

    expect(resolvePeriodStatus(kst("09:10:00"), schedule)).toEqual({ current: 1, next: null });
  });
});

describe("timetableEntryKey", () => {
  it("keeps repeated period and subject rows distinct", () => {
    const rows = [
      { period: 3, subject: "체육" },
      { period: 3, subject: "체육" },
    ];

    const keys = rows.map((row, index) => timetableEntryKey(row, index));

    expect(keys).toEqual(["0-3-체육", "1-3-체육"]);
    expect(new Set(keys).size).toBe(2);
  });
});

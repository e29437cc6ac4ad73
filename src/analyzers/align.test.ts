import { describe, it, expect } from "vitest";
import { alignSeries, intersectDates, minRequiredDays, projectSeries } from "./align";
import { InsufficientHistoryError } from "../utils/errors";
import { addDays } from "../utils/config";
import type { PriceSeries } from "./types";

function series(name: string, startOffset: number, days: number, close = 100): PriceSeries {
  return {
    name,
    bars: Array.from({ length: days }, (_, i) => ({
      date: addDays("2024-01-01", startOffset + i),
      close: close + i,
    })),
  };
}

describe("alignment", () => {
  it("requires maLong + 10 days", () => {
    expect(minRequiredDays(7)).toBe(17);
  });

  it("intersects dates across every series", () => {
    expect(intersectDates([series("A", 0, 5), series("B", 2, 5)])).toEqual([
      "2024-01-03",
      "2024-01-04",
      "2024-01-05",
    ]);
    expect(intersectDates([])).toEqual([]);
  });

  it("drops short assets before intersecting", () => {
    const input = new Map([
      ["BTC", series("BTC", 0, 20)],
      ["ETH", series("ETH", 0, 20)],
      ["NEW", series("NEW", 15, 5)],
    ]);
    const result = alignSeries(input, "BTC", 7);

    expect(result.calendar).toHaveLength(20);
    expect(result.calendar[0]).toBe("2024-01-01");
    expect(result.included.map((s) => s.name)).toEqual(["ETH"]);
    expect(result.excluded).toEqual([{ name: "NEW", rows: 5, required: 17 }]);
  });

  it("keeps the calendar inside every included series", () => {
    const input = new Map([
      ["BTC", series("BTC", 0, 25)],
      ["SOL", series("SOL", 3, 22)],
    ]);
    const { calendar } = alignSeries(input, "BTC", 7);
    expect(calendar[0]).toBe("2024-01-04");
    expect(calendar).toHaveLength(22);
  });

  it("throws when the overlap is too short", () => {
    const input = new Map([
      ["BTC", series("BTC", 0, 20)],
      ["ETH", series("ETH", 9, 20)],
    ]);
    try {
      alignSeries(input, "BTC", 7);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InsufficientHistoryError);
      if (err instanceof InsufficientHistoryError) {
        expect(err.required).toBe(17);
        expect(err.actual).toBe(11);
        expect(err.firstDate).toBe("2024-01-10");
        expect(err.lastDate).toBe("2024-01-20");
        expect(err.series).toEqual(["BTC", "ETH"]);
      }
    }
  });

  it("treats a missing baseline as no history", () => {
    try {
      alignSeries(new Map([["ETH", series("ETH", 0, 30)]]), "BTC", 7);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InsufficientHistoryError);
      if (err instanceof InsufficientHistoryError) expect(err.actual).toBe(0);
    }
  });

  it("projects a series onto the calendar", () => {
    const s: PriceSeries = {
      name: "X",
      bars: [
        { date: "2024-01-01", close: 1, high: 2, low: 0.5 },
        { date: "2024-01-02", close: 3 },
        { date: "2024-01-03", close: 4 },
      ],
    };
    expect(projectSeries(s, ["2024-01-01", "2024-01-03"])).toEqual({
      name: "X",
      close: [1, 4],
      high: [2, null],
      low: [0.5, null],
    });
    expect(() => projectSeries(s, ["2024-01-05"])).toThrow("X has no bar on calendar date 2024-01-05");
  });
});

import type { PriceBar, IndicatorField } from "@shared/schema";
import { PriceSeries } from "./market";

const INDICATOR_COLUMNS: Record<string, IndicatorField> = {
  rsi: "rsi",
  macd: "macd",
  signal: "macdSignal",
  macd_signal: "macdSignal",
  macd_hist: "macdHist",
  short_ma: "shortMa",
  long_ma: "longMa",
};

/**
 * Reads the date and wall-clock time of a timestamp and drops any UTC offset,
 * so "2024-03-01 09:30:00-05:00" and "2024-03-01T09:30:00" give the same bar.
 */
export function parseNaiveTimestamp(raw: string): Date | null {
  const match = raw.trim().match(/^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?))?/);
  if (!match) return null;

  const [, date, time] = match;
  const parsed = new Date(`${date}T${time ?? "00:00:00"}Z`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function toNaiveIsoString(date: Date): string {
  return date.toISOString().slice(0, 19);
}

export class CSVDataLoader {
  static parseCSV(csvContent: string): PriceBar[] {
    const lines = csvContent.trim().split(/\r?\n/);
    if (lines.length < 2) return [];

    const headers = lines[0].split(",").map(h => h.trim().toLowerCase());
    const bars: PriceBar[] = [];

    for (let i = 1; i < lines.length; i++) {
      const values = lines[i].split(",").map(v => v.trim());
      if (values.length < headers.length) continue;

      const row: Record<string, string> = {};
      headers.forEach((header, idx) => {
        row[header] = values[idx];
      });

      const timestamp = parseNaiveTimestamp(row.timestamp ?? row.date ?? row.datetime ?? "");
      if (!timestamp) continue;

      const bar: PriceBar = {
        timestamp,
        open: parseFloat(row.open ?? ""),
        high: parseFloat(row.high ?? ""),
        low: parseFloat(row.low ?? ""),
        close: parseFloat(row.close ?? ""),
        volume: parseFloat(row.volume ?? ""),
      };

      for (const [column, field] of Object.entries(INDICATOR_COLUMNS)) {
        if (row[column] !== undefined) {
          bar[field] = parseFloat(row[column]);
        }
      }

      bars.push(bar);
    }

    return bars;
  }

  static loadSeries(csvContent: string): PriceSeries {
    return new PriceSeries(CSVDataLoader.parseCSV(csvContent));
  }
}

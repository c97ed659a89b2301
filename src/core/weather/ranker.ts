/**
 * Ranker - top-N projections of weather records along one metric
 */

import {
  RankedEntry,
  ResultSet,
  WeatherRankings,
  WeatherRecord,
} from "../models/weather";

export const DEFAULT_RANK_LIMIT = 3;

export interface RankingMetric {
  id: "temperature" | "wind";
  /** Column header for the metric value */
  header: string;
  /** Fixed destination key for this ranking */
  outputKey: string;
  select(record: WeatherRecord): number;
}

export const TEMPERATURE_METRIC: RankingMetric = {
  id: "temperature",
  header: "Temperature",
  outputKey: "highest_temperatures.csv",
  select: (record) => record.temperature.current,
};

export const WIND_METRIC: RankingMetric = {
  id: "wind",
  header: "Wind Speed",
  outputKey: "highest_wind.csv",
  select: (record) => record.wind.speed,
};

/**
 * Highest values first; equal values keep their input order.
 * Returns min(limit, entries.length) entries.
 */
export function topEntries(
  entries: readonly RankedEntry[],
  limit: number = DEFAULT_RANK_LIMIT
): ResultSet {
  // Array.prototype.sort is stable
  return [...entries].sort((a, b) => b.value - a.value).slice(0, Math.max(0, limit));
}

export function rankByMetric(
  records: readonly WeatherRecord[],
  metric: RankingMetric,
  limit: number = DEFAULT_RANK_LIMIT
): ResultSet {
  return topEntries(
    records.map((record) => ({ city: record.name, value: metric.select(record) })),
    limit
  );
}

export function rankWeather(records: readonly WeatherRecord[]): WeatherRankings {
  return {
    temperature: rankByMetric(records, TEMPERATURE_METRIC),
    wind: rankByMetric(records, WIND_METRIC),
  };
}

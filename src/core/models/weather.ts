/**
 * Weather models
 *
 * Snapshots fetched per city and the ranked projections built from them.
 */

/** A city token from the uploaded list, with every whitespace character removed. */
export type CityName = string;

export interface TemperatureReading {
  readonly current: number;
  readonly feelsLike: number;
  readonly min: number;
  readonly max: number;
}

export interface WindReading {
  readonly speed: number;
  /** Meteorological degrees */
  readonly direction: number;
}

/**
 * One city's current weather. Built once per city and never mutated.
 */
export interface WeatherRecord {
  readonly id: number;
  /** Display name as reported by the weather API */
  readonly name: string;
  readonly temperature: TemperatureReading;
  readonly pressure: number;
  readonly humidity: number;
  readonly wind: WindReading;
}

export interface RankedEntry {
  readonly city: string;
  readonly value: number;
}

/** At most three entries, highest value first. */
export type ResultSet = readonly RankedEntry[];

export interface WeatherRankings {
  temperature: ResultSet;
  wind: ResultSet;
}

export function createWeatherRecord(params: {
  id: number;
  name: string;
  temperature: TemperatureReading;
  pressure: number;
  humidity: number;
  wind: WindReading;
}): WeatherRecord {
  return Object.freeze({
    id: params.id,
    name: params.name,
    temperature: Object.freeze({ ...params.temperature }),
    pressure: params.pressure,
    humidity: params.humidity,
    wind: Object.freeze({ ...params.wind }),
  });
}

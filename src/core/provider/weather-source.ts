/**
 * WeatherSource - where per-city weather snapshots come from
 */

import { CityName, WeatherRecord } from "../models/weather";
import { PipelineError, WeatherFetchError } from "../errors/pipeline-errors";

export interface WeatherSource {
  fetchCurrent(city: CityName): Promise<WeatherRecord>;
}

/**
 * Fetch weather for every city, one request at a time, in input order.
 *
 * Stops at the first failing city; nothing fetched so far is returned.
 */
export async function fetchWeatherForCities(
  source: WeatherSource,
  cities: readonly CityName[]
): Promise<WeatherRecord[]> {
  const records: WeatherRecord[] = [];
  for (const city of cities) {
    try {
      records.push(await source.fetchCurrent(city));
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      throw new WeatherFetchError(city, error);
    }
  }
  return records;
}

/**
 * OpenWeatherClient - WeatherSource over the OpenWeatherMap current weather API
 */

import { z } from "zod";
import { CityName, WeatherRecord, createWeatherRecord } from "../models/weather";
import { WeatherFetchError, WeatherParseError } from "../errors/pipeline-errors";
import { HttpClient, withoutQuery } from "./http-client";
import { WeatherSource } from "./weather-source";

export const OPENWEATHER_ENDPOINT = "https://api.openweathermap.org/data/2.5/weather";
export const DEFAULT_UNITS = "metric";
export const DEFAULT_TIMEOUT_MS = 2000;

const currentWeatherSchema = z.object({
  id: z.number(),
  name: z.string(),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    temp_min: z.number(),
    temp_max: z.number(),
    pressure: z.number(),
    humidity: z.number(),
  }),
  wind: z.object({
    speed: z.number(),
    // omitted by the API in calm conditions
    deg: z.number().default(0),
  }),
});

export type CurrentWeatherResponse = z.infer<typeof currentWeatherSchema>;

export interface OpenWeatherClientOptions {
  http: HttpClient;
  apiKey: string;
  endpoint?: string;
  units?: string;
  timeoutMs?: number;
}

export class OpenWeatherClient implements WeatherSource {
  private http: HttpClient;
  private apiKey: string;
  private endpoint: string;
  private units: string;
  private timeoutMs: number;

  constructor(options: OpenWeatherClientOptions) {
    if (!options.apiKey) {
      throw new Error("OpenWeatherClient requires an API key");
    }
    this.http = options.http;
    this.apiKey = options.apiKey;
    this.endpoint = options.endpoint ?? OPENWEATHER_ENDPOINT;
    this.units = options.units ?? DEFAULT_UNITS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetchCurrent(city: CityName): Promise<WeatherRecord> {
    const url = this.buildUrl(city);

    let body: string;
    try {
      const response = await this.http.get(url, { timeoutMs: this.timeoutMs });
      if (!response.ok) {
        throw new Error(`${withoutQuery(url)} responded with HTTP ${response.status}`);
      }
      body = response.body;
    } catch (error) {
      throw new WeatherFetchError(city, error);
    }

    return parseCurrentWeather(city, body);
  }

  buildUrl(city: CityName): string {
    const params = new URLSearchParams({
      q: city,
      units: this.units,
      appid: this.apiKey,
    });
    return `${this.endpoint}?${params.toString()}`;
  }
}

/**
 * Parse a current weather response body into a WeatherRecord.
 */
export function parseCurrentWeather(city: CityName, body: string): WeatherRecord {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new WeatherParseError(city, error);
  }

  const parsed = currentWeatherSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new WeatherParseError(city, new Error(detail));
  }

  const { id, name, main, wind } = parsed.data;
  return createWeatherRecord({
    id,
    name,
    temperature: {
      current: main.temp,
      feelsLike: main.feels_like,
      min: main.temp_min,
      max: main.temp_max,
    },
    pressure: main.pressure,
    humidity: main.humidity,
    wind: { speed: wind.speed, direction: wind.deg },
  });
}

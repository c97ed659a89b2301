/**
 * Shared fakes for pipeline tests
 */

import type { S3Event, S3EventRecord } from "aws-lambda";
import { CityName, WeatherRecord, createWeatherRecord } from "../models/weather";
import { WeatherSource } from "../provider/weather-source";
import { HttpClient, HttpRequestOptions, HttpResponse } from "../provider/http-client";
import { InMemoryObjectStore, ObjectBody } from "../store/object-store";

export const INPUT = "city-uploads";
export const OUTPUT = "city-rankings";

export function weatherRecord(
  name: string,
  temperature: number,
  windSpeed: number,
  id: number = 1
): WeatherRecord {
  return createWeatherRecord({
    id,
    name,
    temperature: {
      current: temperature,
      feelsLike: temperature - 1,
      min: temperature - 2,
      max: temperature + 2,
    },
    pressure: 1012,
    humidity: 60,
    wind: { speed: windSpeed, direction: 180 },
  });
}

/**
 * Body shaped like the OpenWeatherMap current weather response.
 */
export function apiBody(name: string, temperature: number, windSpeed: number, id: number = 1): string {
  return JSON.stringify({
    coord: { lon: 0, lat: 0 },
    id,
    name,
    main: {
      temp: temperature,
      feels_like: temperature - 1,
      temp_min: temperature - 2,
      temp_max: temperature + 2,
      pressure: 1012,
      humidity: 60,
    },
    wind: { speed: windSpeed, deg: 180 },
    cod: 200,
  });
}

// ── Mock WeatherSource ───────────────────────────────────────────

export class StubWeatherSource implements WeatherSource {
  calls: CityName[] = [];

  constructor(private responses: Map<CityName, WeatherRecord | Error>) {}

  async fetchCurrent(city: CityName): Promise<WeatherRecord> {
    this.calls.push(city);
    const response = this.responses.get(city);
    if (response === undefined) {
      throw new Error(`no stubbed weather for ${city}`);
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  }
}

export function defaultWeather(): Map<CityName, WeatherRecord | Error> {
  return new Map<CityName, WeatherRecord | Error>([
    ["London", weatherRecord("London", 12.5, 4.1, 2643743)],
    ["Paris", weatherRecord("Paris", 15, 6.2, 2988507)],
    ["Tokyo", weatherRecord("Tokyo", 22.3, 3.4, 1850147)],
  ]);
}

// ── Mock HttpClient ──────────────────────────────────────────────

export type Responder = (
  url: string,
  options: HttpRequestOptions
) => HttpResponse | Promise<HttpResponse>;

export class StubHttpClient implements HttpClient {
  requests: Array<{ url: string; options: HttpRequestOptions }> = [];

  constructor(private respond: Responder) {}

  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    this.requests.push({ url, options });
    return this.respond(url, options);
  }

  /** Values of the `q` parameter, in request order */
  get cities(): string[] {
    return this.requests.map((r) => new URL(r.url).searchParams.get("q") ?? "");
  }
}

export function ok(body: string): HttpResponse {
  return { status: 200, ok: true, body };
}

// ── Object stores ────────────────────────────────────────────────

/**
 * InMemoryObjectStore whose writes or deletes fail for chosen keys.
 */
export class FlakyObjectStore extends InMemoryObjectStore {
  failPutKeys = new Set<string>();
  failDeleteKeys = new Set<string>();

  async putObject(
    location: string,
    key: string,
    body: ObjectBody,
    contentType?: string
  ): Promise<void> {
    if (this.failPutKeys.has(key)) {
      throw new Error("AccessDenied");
    }
    await super.putObject(location, key, body, contentType);
  }

  async deleteObject(location: string, key: string): Promise<void> {
    if (this.failDeleteKeys.has(key)) {
      throw new Error("AccessDenied");
    }
    await super.deleteObject(location, key);
  }
}

// ── S3 notifications ─────────────────────────────────────────────

export function s3Record(key: string, bucket: string = INPUT): S3EventRecord {
  return {
    eventVersion: "2.1",
    eventSource: "aws:s3",
    awsRegion: "eu-west-1",
    eventTime: "2024-05-01T12:00:00.000Z",
    eventName: "ObjectCreated:Put",
    userIdentity: { principalId: "test-principal" },
    requestParameters: { sourceIPAddress: "127.0.0.1" },
    responseElements: {
      "x-amz-request-id": "test-request",
      "x-amz-id-2": "test-id",
    },
    s3: {
      s3SchemaVersion: "1.0",
      configurationId: "city-upload",
      bucket: {
        name: bucket,
        ownerIdentity: { principalId: "test-principal" },
        arn: `arn:aws:s3:::${bucket}`,
      },
      object: {
        key,
        size: 32,
        eTag: "test-etag",
        sequencer: "0001",
      },
    },
  };
}

export function s3Event(...keys: string[]): S3Event {
  return { Records: keys.map((key) => s3Record(key)) };
}

/**
 * Pipeline error taxonomy
 *
 * Every failure a stage can report is a PipelineError tagged with the
 * stage that raised it.
 */

export type StageName =
  | "ingest"
  | "fetch-weather"
  | "rank"
  | "write-results"
  | "cleanup";

export class PipelineError extends Error {
  readonly stage: StageName;

  constructor(stage: StageName, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "PipelineError";
    this.stage = stage;
  }
}

export class SourceReadError extends PipelineError {
  readonly key: string;

  constructor(key: string, cause?: unknown) {
    super("ingest", `failed to read source object "${key}": ${describeCause(cause)}`, cause);
    this.name = "SourceReadError";
    this.key = key;
  }
}

export class WeatherFetchError extends PipelineError {
  readonly city: string;

  constructor(city: string, cause?: unknown) {
    super("fetch-weather", `weather request for "${city}" failed: ${describeCause(cause)}`, cause);
    this.name = "WeatherFetchError";
    this.city = city;
  }
}

export class WeatherParseError extends PipelineError {
  readonly city: string;

  constructor(city: string, cause?: unknown) {
    super("fetch-weather", `weather response for "${city}" is invalid: ${describeCause(cause)}`, cause);
    this.name = "WeatherParseError";
    this.city = city;
  }
}

export class SerializationError extends PipelineError {
  constructor(message: string) {
    super("write-results", message);
    this.name = "SerializationError";
  }
}

export class SinkWriteError extends PipelineError {
  readonly key: string;

  constructor(key: string, cause?: unknown) {
    super("write-results", `failed to write "${key}": ${describeCause(cause)}`, cause);
    this.name = "SinkWriteError";
    this.key = key;
  }
}

export class SinkDeleteError extends PipelineError {
  readonly key: string;

  constructor(key: string, cause?: unknown) {
    super("cleanup", `failed to delete "${key}": ${describeCause(cause)}`, cause);
    this.name = "SinkDeleteError";
    this.key = key;
  }
}

/** Aborted HTTP request. `target` must not carry query credentials. */
export class HttpTimeoutError extends Error {
  constructor(target: string, timeoutMs: number) {
    super(`request to ${target} timed out after ${timeoutMs}ms`);
    this.name = "HttpTimeoutError";
  }
}

export function describeCause(cause: unknown): string {
  if (cause === undefined) return "unknown error";
  return cause instanceof Error ? cause.message : String(cause);
}

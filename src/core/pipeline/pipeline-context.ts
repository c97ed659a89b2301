/**
 * PipelineContext
 *
 * Request-scoped context flowing through all pipeline stages. A new one is
 * created per source object; nothing in it outlives the run.
 */

import { v4 as uuidv4 } from "uuid";
import { CityName, WeatherRankings, WeatherRecord } from "../models/weather";
import { ObjectStore } from "../store/object-store";
import { WeatherSource } from "../provider/weather-source";

/**
 * Pipeline phase types
 */
export type PipelinePhase =
  | { type: "initializing" }
  | { type: "ingested"; count: number }
  | { type: "weather_fetched"; count: number }
  | { type: "ranked" }
  | { type: "result_written"; key: string; rows: number }
  | { type: "source_deleted"; key: string }
  | { type: "completed" };

export type PhaseListener = (
  phase: PipelinePhase,
  context: PipelineContext
) => void | Promise<void>;

/**
 * Shared context for pipeline execution.
 *
 * This is the communication channel between stages.
 */
export interface PipelineContext {
  /** Correlates log lines of one run */
  runId: string;

  /** Key of the uploaded city list */
  sourceKey: string;

  /** Bucket holding the uploaded city list */
  inputLocation: string;

  /** Bucket receiving the ranked CSV files */
  outputLocation: string;

  objectStore: ObjectStore;

  weatherSource: WeatherSource;

  /** Callback for phase changes */
  onPhaseChange?: PhaseListener;

  // ── Mutable state (written by stages) ──

  /** Cities parsed from the source object, in file order */
  cities: CityName[];

  /** One record per city, same order as `cities` */
  weather: WeatherRecord[];

  rankings?: WeatherRankings;

  /** Destination keys written so far */
  writtenKeys: string[];
}

/**
 * Create a new pipeline context.
 */
export function createPipelineContext(params: {
  sourceKey: string;
  inputLocation: string;
  outputLocation: string;
  objectStore: ObjectStore;
  weatherSource: WeatherSource;
  runId?: string;
  onPhaseChange?: PhaseListener;
}): PipelineContext {
  return {
    runId: params.runId ?? uuidv4(),
    sourceKey: params.sourceKey,
    inputLocation: params.inputLocation,
    outputLocation: params.outputLocation,
    objectStore: params.objectStore,
    weatherSource: params.weatherSource,
    onPhaseChange: params.onPhaseChange,
    cities: [],
    weather: [],
    rankings: undefined,
    writtenKeys: [],
  };
}

/**
 * Helper to emit phase changes
 */
export async function emitPhase(
  context: PipelineContext,
  phase: PipelinePhase
): Promise<void> {
  if (context.onPhaseChange) {
    await context.onPhaseChange(phase, context);
  }
}

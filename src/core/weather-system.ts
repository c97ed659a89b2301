/**
 * WeatherSystem
 *
 * Central object that wires the object store, weather source and
 * orchestrator from configuration. Any collaborator can be overridden.
 */

import { S3Client } from "@aws-sdk/client-s3";
import { PipelineConfig } from "./config/pipeline-config";
import { ObjectStore, S3ObjectStore } from "./store";
import { FetchHttpClient, HttpClient, OpenWeatherClient, WeatherSource } from "./provider";
import { PhaseListener } from "./pipeline";
import { WeatherRankingOrchestrator } from "./orchestrator/weather-orchestrator";
import { WeatherPipeline } from "./orchestrator/weather-pipeline";

export interface WeatherSystem {
  config: PipelineConfig;
  objectStore: ObjectStore;
  weatherSource: WeatherSource;
  orchestrator: WeatherRankingOrchestrator;
}

export interface WeatherSystemOverrides {
  objectStore?: ObjectStore;
  httpClient?: HttpClient;
  weatherSource?: WeatherSource;
  pipeline?: WeatherPipeline;
  onPhaseChange?: PhaseListener;
}

export function createWeatherSystem(
  config: PipelineConfig,
  overrides: WeatherSystemOverrides = {}
): WeatherSystem {
  const objectStore = overrides.objectStore ?? new S3ObjectStore(new S3Client({}));
  const weatherSource =
    overrides.weatherSource ??
    new OpenWeatherClient({
      http: overrides.httpClient ?? new FetchHttpClient(),
      apiKey: config.weatherApiKey,
    });

  const orchestrator = new WeatherRankingOrchestrator({
    objectStore,
    weatherSource,
    inputLocation: config.inputLocation,
    outputLocation: config.outputLocation,
    pipeline: overrides.pipeline,
    onPhaseChange: overrides.onPhaseChange ?? logPhase,
  });

  return { config, objectStore, weatherSource, orchestrator };
}

const logPhase: PhaseListener = (phase, context) => {
  const { type, ...detail } = phase;
  const suffix = Object.keys(detail).length > 0 ? ` ${JSON.stringify(detail)}` : "";
  console.log(`[WeatherSystem] ${context.runId} phase=${type}${suffix}`);
};

/**
 * WeatherRankingOrchestrator
 *
 * Entry point that runs the pipeline once per uploaded city list.
 */

import { ObjectStore } from "../store/object-store";
import { WeatherSource } from "../provider/weather-source";
import { PhaseListener, createPipelineContext } from "../pipeline/pipeline-context";
import { PipelineResult } from "../pipeline/stage-result";
import { WeatherPipeline } from "./weather-pipeline";

/**
 * Configuration for the orchestrator.
 */
export interface OrchestratorConfig {
  objectStore: ObjectStore;

  weatherSource: WeatherSource;

  /** Bucket holding uploaded city lists */
  inputLocation: string;

  /** Bucket receiving the ranked CSV files */
  outputLocation: string;

  /** Callback for pipeline phase changes */
  onPhaseChange?: PhaseListener;

  /** Custom pipeline (if omitted, uses the default five stages) */
  pipeline?: WeatherPipeline;
}

/**
 * Delegates to a WeatherPipeline:
 *
 * ```
 * Uploaded object
 *   → [IngestStage] city names
 *     → [FetchWeatherStage] one WeatherRecord per city
 *       → [RankStage] top 3 by temperature and by wind speed
 *         → [WriteResultsStage] highest_temperatures.csv, highest_wind.csv
 *           → [CleanupStage] delete the uploaded object
 * ```
 */
export class WeatherRankingOrchestrator {
  private config: OrchestratorConfig;
  private pipeline: WeatherPipeline;

  constructor(config: OrchestratorConfig) {
    this.config = config;
    this.pipeline = config.pipeline ?? WeatherPipeline.default();
  }

  get inputLocation(): string {
    return this.config.inputLocation;
  }

  /**
   * Process one uploaded object with a fresh context.
   *
   * @param sourceKey Key of the object in the input location
   */
  async execute(sourceKey: string, runId?: string): Promise<PipelineResult> {
    const context = createPipelineContext({
      sourceKey,
      runId,
      inputLocation: this.config.inputLocation,
      outputLocation: this.config.outputLocation,
      objectStore: this.config.objectStore,
      weatherSource: this.config.weatherSource,
      onPhaseChange: this.config.onPhaseChange,
    });

    return this.pipeline.execute(context);
  }
}

/**
 * WeatherPipeline
 *
 * Executes PipelineStages in sequence, stopping at the first failure.
 */

import { PipelineError } from "../errors/pipeline-errors";
import { PipelineStage } from "../pipeline/pipeline-stage";
import { PipelineContext, emitPhase } from "../pipeline/pipeline-context";
import { PipelineResult, StageResult } from "../pipeline/stage-result";
import {
  IngestStage,
  FetchWeatherStage,
  RankStage,
  WriteResultsStage,
  CleanupStage,
} from "../pipeline/stages";

/**
 * A composable, strictly forward pipeline.
 *
 * There is no retry: a failed stage ends the run and whatever earlier
 * stages wrote stays written.
 */
export class WeatherPipeline {
  private stages: PipelineStage[];

  constructor(stages: PipelineStage[]) {
    this.stages = stages;
  }

  get stageNames(): string[] {
    return this.stages.map((s) => s.name);
  }

  /**
   * Execute the pipeline with the given context.
   *
   * @returns Success, or the error together with the stage that raised it
   */
  async execute(context: PipelineContext): Promise<PipelineResult> {
    const tag = `[WeatherPipeline] ${context.runId}`;
    console.log(`${tag} Starting "${context.sourceKey}" with ${this.stages.length} stages`);
    const startTime = Date.now();

    await emitPhase(context, { type: "initializing" });

    for (const stage of this.stages) {
      console.log(`${tag} Executing stage: ${stage.name}`);
      const result = await this.executeStage(context, stage);

      if (result.type === "failed") {
        console.error(`${tag} Stage ${stage.name} failed:`, result.error);
        return {
          type: "error",
          runId: context.runId,
          sourceKey: context.sourceKey,
          stage: result.error.stage,
          error: result.error,
        };
      }
    }

    await emitPhase(context, { type: "completed" });
    console.log(`${tag} Execution complete in ${Date.now() - startTime}ms`);

    return {
      type: "success",
      runId: context.runId,
      sourceKey: context.sourceKey,
      cityCount: context.cities.length,
      writtenKeys: [...context.writtenKeys],
    };
  }

  /**
   * Execute a single stage, turning anything it throws into a failed result.
   */
  private async executeStage(
    context: PipelineContext,
    stage: PipelineStage
  ): Promise<StageResult> {
    try {
      return await stage.execute(context);
    } catch (error) {
      if (error instanceof PipelineError) {
        return StageResult.Failed(error);
      }
      const message = error instanceof Error ? error.message : String(error);
      return StageResult.Failed(new PipelineError(stage.name, message, error));
    }
  }

  /**
   * Create the default ingest → fetch → rank → write → cleanup pipeline.
   */
  static default(): WeatherPipeline {
    return new WeatherPipeline([
      new IngestStage(),
      new FetchWeatherStage(),
      new RankStage(),
      new WriteResultsStage(),
      new CleanupStage(),
    ]);
  }
}

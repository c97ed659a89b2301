/**
 * WriteResultsStage
 *
 * Stage 4: Serializes each ranking to CSV and stores it under its fixed key.
 *
 * Temperature is written before wind. If the wind write fails the
 * temperature file stays where it is.
 */

import {
  PipelineError,
  SerializationError,
  SinkWriteError,
  StageName,
} from "../../errors/pipeline-errors";
import { serializeResultSet } from "../../weather/csv-serializer";
import { RankingMetric, TEMPERATURE_METRIC, WIND_METRIC } from "../../weather/ranker";
import { PipelineStage } from "../pipeline-stage";
import { PipelineContext, emitPhase } from "../pipeline-context";
import { StageResult } from "../stage-result";

export const CSV_CONTENT_TYPE = "text/csv";

export class WriteResultsStage implements PipelineStage {
  name: StageName = "write-results";
  description = "Writes the ranked CSV files to the destination location";

  constructor(
    private metrics: RankingMetric[] = [TEMPERATURE_METRIC, WIND_METRIC]
  ) {}

  async execute(context: PipelineContext): Promise<StageResult> {
    const rankings = context.rankings;
    if (!rankings) {
      return StageResult.Failed(
        new SerializationError("No rankings available; rank stage may not have run")
      );
    }

    for (const metric of this.metrics) {
      const entries = rankings[metric.id];

      let body: string;
      try {
        body = serializeResultSet(entries, metric.header);
      } catch (error) {
        if (error instanceof PipelineError) return StageResult.Failed(error);
        return StageResult.Failed(
          new SerializationError(`failed to encode ${metric.outputKey}: ${String(error)}`)
        );
      }

      console.log(
        `[WriteResultsStage] ${context.runId} ${metric.outputKey}:\n${body}`
      );

      try {
        await context.objectStore.putObject(
          context.outputLocation,
          metric.outputKey,
          body,
          CSV_CONTENT_TYPE
        );
      } catch (error) {
        return StageResult.Failed(new SinkWriteError(metric.outputKey, error));
      }

      context.writtenKeys.push(metric.outputKey);
      await emitPhase(context, {
        type: "result_written",
        key: metric.outputKey,
        rows: entries.length,
      });
    }

    return StageResult.Continue();
  }
}

/**
 * IngestStage
 *
 * Stage 1: Reads the uploaded object and parses it into city names.
 */

import { StageName, SourceReadError } from "../../errors/pipeline-errors";
import { readCityList } from "../../weather/city-list-reader";
import { PipelineStage } from "../pipeline-stage";
import { PipelineContext, emitPhase } from "../pipeline-context";
import { StageResult } from "../stage-result";

export class IngestStage implements PipelineStage {
  name: StageName = "ingest";
  description = "Reads the source object and splits it into city names";

  async execute(context: PipelineContext): Promise<StageResult> {
    try {
      const chunks = await context.objectStore.openObject(
        context.inputLocation,
        context.sourceKey
      );
      context.cities = await readCityList(chunks);
    } catch (error) {
      return StageResult.Failed(new SourceReadError(context.sourceKey, error));
    }

    await emitPhase(context, { type: "ingested", count: context.cities.length });
    return StageResult.Continue();
  }
}

/**
 * CleanupStage
 *
 * Stage 5: Removes the processed source object. Outputs already written
 * are left in place when this fails.
 */

import { SinkDeleteError, StageName } from "../../errors/pipeline-errors";
import { PipelineStage } from "../pipeline-stage";
import { PipelineContext, emitPhase } from "../pipeline-context";
import { StageResult } from "../stage-result";

export class CleanupStage implements PipelineStage {
  name: StageName = "cleanup";
  description = "Deletes the source object once both results are stored";

  async execute(context: PipelineContext): Promise<StageResult> {
    try {
      await context.objectStore.deleteObject(context.inputLocation, context.sourceKey);
    } catch (error) {
      return StageResult.Failed(new SinkDeleteError(context.sourceKey, error));
    }

    await emitPhase(context, { type: "source_deleted", key: context.sourceKey });
    return StageResult.Continue();
  }
}

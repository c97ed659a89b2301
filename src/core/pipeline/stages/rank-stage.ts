/**
 * RankStage
 *
 * Stage 3: Builds the temperature and wind rankings.
 */

import { StageName } from "../../errors/pipeline-errors";
import { rankWeather } from "../../weather/ranker";
import { PipelineStage } from "../pipeline-stage";
import { PipelineContext, emitPhase } from "../pipeline-context";
import { StageResult } from "../stage-result";

export class RankStage implements PipelineStage {
  name: StageName = "rank";
  description = "Selects the three hottest and three windiest cities";

  async execute(context: PipelineContext): Promise<StageResult> {
    context.rankings = rankWeather(context.weather);
    await emitPhase(context, { type: "ranked" });
    return StageResult.Continue();
  }
}

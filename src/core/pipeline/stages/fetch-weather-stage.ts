/**
 * FetchWeatherStage
 *
 * Stage 2: Fetches current weather for every city, in order.
 */

import { PipelineError, StageName } from "../../errors/pipeline-errors";
import { fetchWeatherForCities } from "../../provider/weather-source";
import { PipelineStage } from "../pipeline-stage";
import { PipelineContext, emitPhase } from "../pipeline-context";
import { StageResult } from "../stage-result";

export class FetchWeatherStage implements PipelineStage {
  name: StageName = "fetch-weather";
  description = "Fetches current weather for each city, failing on the first error";

  async execute(context: PipelineContext): Promise<StageResult> {
    try {
      context.weather = await fetchWeatherForCities(
        context.weatherSource,
        context.cities
      );
    } catch (error) {
      if (error instanceof PipelineError) {
        return StageResult.Failed(error);
      }
      throw error;
    }

    await emitPhase(context, { type: "weather_fetched", count: context.weather.length });
    return StageResult.Continue();
  }
}

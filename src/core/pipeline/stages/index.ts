export { IngestStage } from "./ingest-stage";
export { FetchWeatherStage } from "./fetch-weather-stage";
export { RankStage } from "./rank-stage";
export { WriteResultsStage, CSV_CONTENT_TYPE } from "./write-results-stage";
export { CleanupStage } from "./cleanup-stage";

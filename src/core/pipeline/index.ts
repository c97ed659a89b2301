/**
 * Pipeline module - weather ranking pipeline and stages
 */

export * from "./pipeline-stage";
export * from "./stage-result";
export * from "./pipeline-context";
export * from "./stages";

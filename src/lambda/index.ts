/**
 * Lambda entry point for the weather ranking pipeline.
 *
 * Configuration and collaborators are created once per process; each
 * invocation gets its own pipeline context.
 */

import { loadConfig } from "../core/config/pipeline-config";
import { createWeatherSystem } from "../core/weather-system";
import { createLambdaHandler, createS3EventHandler } from "./s3-event-handler";

const system = createWeatherSystem(loadConfig(process.env));

/**
 * Throws on failure so the trigger can redeliver the notification.
 */
export const handler = createLambdaHandler(
  createS3EventHandler({ orchestrator: system.orchestrator })
);

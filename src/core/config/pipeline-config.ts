/**
 * PipelineConfig - environment-driven configuration
 *
 * Read once at process start. Nothing here changes afterwards.
 */

import { z } from "zod";

const envSchema = z.object({
  INPUT_LOCATION: z.string().trim().min(1, "source bucket name is required"),
  OUTPUT_LOCATION: z.string().trim().min(1, "destination bucket name is required"),
  WEATHER_API_KEY: z.string().trim().min(1, "weather API credential is required"),
});

export interface PipelineConfig {
  /** Bucket the city lists are uploaded to */
  readonly inputLocation: string;
  /** Bucket the ranked CSV files are written to */
  readonly outputLocation: string;
  readonly weatherApiKey: string;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): PipelineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return Object.freeze({
    inputLocation: parsed.data.INPUT_LOCATION,
    outputLocation: parsed.data.OUTPUT_LOCATION,
    weatherApiKey: parsed.data.WEATHER_API_KEY,
  });
}

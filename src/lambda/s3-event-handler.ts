/**
 * S3 "object created" notification handler.
 *
 * Each record names one uploaded city list; records are processed in
 * order and processing stops at the first failure.
 */

import type { S3Event, S3EventRecord } from "aws-lambda";
import { WeatherRankingOrchestrator } from "../core/orchestrator/weather-orchestrator";
import { PipelineResult } from "../core/pipeline/stage-result";

export interface PipelineResponse {
  statusCode: number;
  statusMessage: string;
}

export interface S3EventHandlerDeps {
  orchestrator: WeatherRankingOrchestrator;
}

export type S3EventHandler = (event: S3Event) => Promise<PipelineResponse>;

export class PipelineInvocationError extends Error {
  readonly response: PipelineResponse;

  constructor(response: PipelineResponse) {
    super(`${response.statusCode} ${response.statusMessage}`);
    this.name = "PipelineInvocationError";
    this.response = response;
  }
}

export function createS3EventHandler(deps: S3EventHandlerDeps): S3EventHandler {
  const { orchestrator } = deps;

  return async (event) => {
    const records = event.Records ?? [];
    if (records.length === 0) {
      console.warn("[S3EventHandler] Event contains no records");
      return { statusCode: 400, statusMessage: "event contains no records" };
    }

    console.log(
      `[S3EventHandler] Received ${records.length} record(s) for ${orchestrator.inputLocation}`
    );

    for (const record of records) {
      const sourceKey = objectKeyOf(record);
      const result = await orchestrator.execute(sourceKey);
      if (result.type === "error") {
        return failureResponse(result);
      }
      console.log(
        `[S3EventHandler] ${result.runId} processed "${sourceKey}" (${result.cityCount} cities)`
      );
    }

    return { statusCode: 200, statusMessage: "Success" };
  };
}

/**
 * Wraps an event handler for deployment: any non-200 response is thrown
 * so the trigger sees the invocation as failed.
 */
export function createLambdaHandler(processEvent: S3EventHandler): S3EventHandler {
  return async (event) => {
    const response = await processEvent(event);
    if (response.statusCode !== 200) {
      throw new PipelineInvocationError(response);
    }
    return response;
  };
}

/**
 * Notification keys arrive URL-encoded with spaces as "+". A key that
 * does not decode is used as delivered.
 */
export function objectKeyOf(record: S3EventRecord): string {
  const raw = record.s3.object.key;
  try {
    return decodeURIComponent(raw.replace(/\+/g, " "));
  } catch (error) {
    if (!(error instanceof URIError)) throw error;
    console.warn(`[S3EventHandler] Key "${raw}" is not URL-encoded; using it as is`);
    return raw;
  }
}

function failureResponse(result: Extract<PipelineResult, { type: "error" }>): PipelineResponse {
  const { error, stage } = result;
  console.error(
    `[S3EventHandler] ${result.runId} failed processing "${result.sourceKey}" at ${stage}:`,
    error
  );
  return {
    statusCode: 500,
    statusMessage: `${stage}: ${error.name}: ${error.message}`,
  };
}

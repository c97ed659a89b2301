/**
 * StageResult
 *
 * The outcome of a PipelineStage execution, controlling pipeline flow.
 */

import { PipelineError, StageName } from "../errors/pipeline-errors";

/**
 * Final outcome of one pipeline run
 */
export type PipelineResult =
  | {
      type: "success";
      runId: string;
      sourceKey: string;
      cityCount: number;
      writtenKeys: string[];
    }
  | {
      type: "error";
      runId: string;
      sourceKey: string;
      stage: StageName;
      error: PipelineError;
    };

/**
 * The outcome of a stage execution.
 */
export type StageResult =
  | { type: "continue" }
  | { type: "failed"; error: PipelineError };

/**
 * Helper functions to create stage results
 */
export const StageResult = {
  Continue: (): StageResult => ({ type: "continue" }),

  Failed: (error: PipelineError): StageResult => ({
    type: "failed",
    error,
  }),
};

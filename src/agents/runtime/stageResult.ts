import { AgentRunResult, AgentRunTrace } from "./agentRuntime.js";

export interface StageRawResponse {
  stage: string;
  agentName: string;
  text: string;
}

export interface AgentStageResult<T> {
  artifact: T;
  traces: AgentRunTrace[];
  rawResponses: StageRawResponse[];
}

/**
 * Collects traces and raw model replies for a stage that issues several agent calls.
 */
export class StageRecorder {
  readonly traces: AgentRunTrace[] = [];
  readonly rawResponses: StageRawResponse[] = [];

  record<T>(run: AgentRunResult<T>): T {
    this.traces.push(run.trace);
    if (run.rawText) {
      this.rawResponses.push({
        stage: run.trace.stage,
        agentName: run.trace.agentName,
        text: run.rawText
      });
    }
    return run.data;
  }

  absorb<T>(result: AgentStageResult<T>): T {
    this.traces.push(...result.traces);
    this.rawResponses.push(...result.rawResponses);
    return result.artifact;
  }

  finish<T>(artifact: T): AgentStageResult<T> {
    return {
      artifact,
      traces: [...this.traces],
      rawResponses: [...this.rawResponses]
    };
  }
}

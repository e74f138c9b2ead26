import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { AgentRunTrace } from "../../agents/runtime/agentRuntime.js";
import { StageRawResponse } from "../../agents/runtime/stageResult.js";
import { QuizOutput } from "../../domain/models.js";

export const QUIZ_OUTPUT_FILE = "quiz-output.json";

/**
 * Writes one run's JSON artifacts under `<output>/runs/<runId>/` and the final quiz to
 * `<output>/quiz-output.json`.
 */
export class PipelineArtifactStore {
  private readonly runDirectory: string;

  constructor(
    private readonly outputDirectory: string,
    readonly runId: string
  ) {
    this.runDirectory = path.join(outputDirectory, "runs", runId);
  }

  get directoryPath(): string {
    return this.runDirectory;
  }

  async persistStageArtifact(stage: string, artifact: unknown): Promise<string> {
    return this.writeJson(this.runDirectory, `${stage}.artifact.json`, artifact);
  }

  async persistRawResponses(stage: string, rawResponses: StageRawResponse[]): Promise<string | null> {
    if (rawResponses.length === 0) {
      return null;
    }
    return this.writeJson(this.runDirectory, `${stage}.raw-responses.json`, rawResponses);
  }

  async persistTraces(traces: AgentRunTrace[]): Promise<string> {
    return this.writeJson(this.runDirectory, "agent-traces.json", traces);
  }

  async persistRunSummary(summary: unknown): Promise<string> {
    return this.writeJson(this.runDirectory, "run-summary.json", summary);
  }

  async persistQuizOutput(output: QuizOutput): Promise<string> {
    return this.writeJson(this.outputDirectory, QUIZ_OUTPUT_FILE, output);
  }

  private async writeJson(directory: string, fileName: string, value: unknown): Promise<string> {
    await mkdir(directory, { recursive: true });
    const filePath = path.join(directory, fileName);
    await writeFile(filePath, JSON.stringify(value, null, 2), "utf8");
    return filePath;
  }
}

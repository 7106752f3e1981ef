import type { QueueItemEntity } from "../../core/entities/reviewQueue";
import type { RuleDraft } from "../../core/entities/rule";
import type {
  PromoteStepResult,
  SimilarityStepResult,
  SuppressedDraft,
} from "../../core/entities/workflow";
import type {
  ClockPort,
  ReviewQueueRepositoryPort,
} from "../../core/ports/outboundPorts";

/**
 * Stable per draft so a retried promotion writes the same ids.
 */
export const queueItemIdFor = (executionId: string, draftIndex: number): string =>
  `${executionId}-q${draftIndex}`;

/**
 * Queues novel drafts for human review; duplicates and variants are only recorded.
 */
export class QueuePromotionService {
  constructor(
    private readonly queueRepo: ReviewQueueRepositoryPort,
    private readonly clock: ClockPort,
  ) {}

  async promote(
    execution: { id: string; documentId: string },
    drafts: readonly RuleDraft[],
    similarity: SimilarityStepResult,
  ): Promise<PromoteStepResult> {
    const now = this.clock.now();
    const items: QueueItemEntity[] = [];
    const suppressed: SuppressedDraft[] = [];

    for (const match of similarity.matches) {
      const draft = drafts.find(
        (candidate) => candidate.id === match.draftId && candidate.validation.valid,
      );
      if (!draft) {
        continue;
      }

      if (match.classification !== "novel") {
        suppressed.push({
          draftId: draft.id,
          bestRuleId: match.bestRuleId,
          aggregate: match.aggregate,
          classification: match.classification,
        });
        continue;
      }

      items.push({
        id: queueItemIdFor(execution.id, draft.index),
        executionId: execution.id,
        documentId: execution.documentId,
        draft,
        similarity: match,
        status: "pending",
        createdAt: now,
        updatedAt: now,
      });
    }

    await this.queueRepo.insertMany(items);

    return {
      queuedItemIds: items.map((item) => item.id),
      suppressed,
    };
  }
}

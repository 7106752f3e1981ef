import type { RuleDraft } from "./rule";
import type { SimilarityMatch } from "./similarity";

export type ReviewStatus = "pending" | "approved" | "rejected" | "edited";

export type QueueItemEntity = {
  id: string;
  executionId: string;
  documentId: string;
  draft: RuleDraft;
  similarity: SimilarityMatch;
  status: ReviewStatus;
  reviewNote?: string;
  editedRaw?: string;
  createdAt: Date;
  updatedAt: Date;
};

/**
 * Approved and rejected items are final; edits can be revised until a decision is made.
 */
export const reviewTransitions: Record<ReviewStatus, ReviewStatus[]> = {
  pending: ["approved", "rejected", "edited"],
  edited: ["approved", "rejected", "edited"],
  approved: [],
  rejected: [],
};

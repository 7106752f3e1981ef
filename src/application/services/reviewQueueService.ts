import { err, ok, type Result } from "neverthrow";
import { stringify } from "yaml";
import type { AppBoundaryError } from "../../core/entities/appError";
import {
  reviewTransitions,
  type QueueItemEntity,
  type ReviewStatus,
} from "../../core/entities/reviewQueue";
import type {
  ClockPort,
  EmbeddingPort,
  ReviewQueueRepositoryPort,
  VectorIndexPort,
} from "../../core/ports/outboundPorts";
import { describeParseError } from "../parsing/tolerantParse";
import { parseRules } from "./ruleGenerationService";
import { validateRule } from "./ruleValidator";
import { embedSections, sectionTextsOf } from "./similarityMatchingService";

const workflowError = (
  code: AppBoundaryError["code"],
  message: string,
): AppBoundaryError => ({
  source: "workflow",
  code,
  provider: "review-queue",
  message,
  retryable: false,
});

/**
 * Human review of queued drafts. Approval adds the rule to the similarity corpus.
 */
export class ReviewQueueService {
  constructor(
    private readonly queueRepo: ReviewQueueRepositoryPort,
    private readonly embedding: EmbeddingPort,
    private readonly index: VectorIndexPort,
    private readonly clock: ClockPort,
  ) {}

  list(filter: { status?: ReviewStatus; limit: number }) {
    return this.queueRepo.list(filter);
  }

  async get(itemId: string): Promise<Result<QueueItemEntity, AppBoundaryError>> {
    const item = await this.queueRepo.findById(itemId);
    return item
      ? ok(item)
      : err(workflowError("not_found", `Queue item ${itemId} not found.`));
  }

  async approve(
    itemId: string,
    note?: string,
  ): Promise<Result<QueueItemEntity, AppBoundaryError>> {
    const item = await this.load(itemId, "approved");
    if (item.isErr()) {
      return err(item.error);
    }

    const fields = item.value.draft.fields;
    if (!item.value.draft.validation.valid || !fields) {
      return err(
        workflowError("validation_error", `Queue item ${itemId} holds an invalid rule.`),
      );
    }

    const embedded = await embedSections(this.embedding, sectionTextsOf(fields));
    if (embedded.isErr()) {
      return err({
        source: "embedding",
        code: "provider_error",
        provider: "review-queue",
        message: embedded.error.message,
        retryable: embedded.error.retryable,
      });
    }

    const now = this.clock.now();
    const indexed = await this.index.upsert({
      ruleId: item.value.id,
      title: fields.title,
      updatedAt: now,
      embeddings: embedded.value,
    });
    if (indexed.isErr()) {
      return err(indexed.error);
    }

    return this.save(item.value, "approved", now, note);
  }

  async reject(
    itemId: string,
    note?: string,
  ): Promise<Result<QueueItemEntity, AppBoundaryError>> {
    const item = await this.load(itemId, "rejected");
    if (item.isErr()) {
      return err(item.error);
    }
    return this.save(item.value, "rejected", this.clock.now(), note);
  }

  /**
   * Replaces the draft with a reviewer's edit: one YAML (or JSON) rule that must validate.
   */
  async edit(
    itemId: string,
    rawRule: string,
    note?: string,
  ): Promise<Result<QueueItemEntity, AppBoundaryError>> {
    const item = await this.load(itemId, "edited");
    if (item.isErr()) {
      return err(item.error);
    }

    const parsed = parseRules(rawRule);
    if (parsed.isErr()) {
      return err(workflowError("invalid_yaml", describeParseError(parsed.error)));
    }
    const [rule, ...extra] = parsed.value;
    if (extra.length > 0) {
      return err(
        workflowError(
          "validation_error",
          `An edit replaces one rule; got ${parsed.value.length}.`,
        ),
      );
    }

    const { validation, fields } = validateRule(rule);
    if (!validation.valid || !fields) {
      return err(
        workflowError(
          "validation_error",
          `Edited rule is invalid: ${validation.errors.join(" ")}`,
        ),
      );
    }

    const edited: QueueItemEntity = {
      ...item.value,
      draft: {
        ...item.value.draft,
        fields,
        validation,
        raw: stringify(rule),
      },
      editedRaw: rawRule,
    };
    return this.save(edited, "edited", this.clock.now(), note);
  }

  private async load(
    itemId: string,
    target: ReviewStatus,
  ): Promise<Result<QueueItemEntity, AppBoundaryError>> {
    const item = await this.queueRepo.findById(itemId);
    if (!item) {
      return err(workflowError("not_found", `Queue item ${itemId} not found.`));
    }
    if (!reviewTransitions[item.status].includes(target)) {
      return err(
        workflowError(
          "conflict",
          `Queue item ${itemId} is ${item.status} and cannot become ${target}.`,
        ),
      );
    }
    return ok(item);
  }

  private async save(
    item: QueueItemEntity,
    status: ReviewStatus,
    now: Date,
    note?: string,
  ): Promise<Result<QueueItemEntity, AppBoundaryError>> {
    const next: QueueItemEntity = {
      ...item,
      status,
      updatedAt: now,
      ...(note !== undefined ? { reviewNote: note } : {}),
    };
    await this.queueRepo.update(next);
    return ok(next);
  }
}

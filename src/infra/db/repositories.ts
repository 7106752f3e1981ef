import { and, desc, eq, isNull, lt, type SQL } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import { err, ok, ResultAsync, type Result } from "neverthrow";
import postgres from "postgres";
import type {
  AppBoundaryError,
  AppBoundarySource,
} from "../../core/entities/appError";
import type { DocumentEntity } from "../../core/entities/document";
import type { QueueItemEntity, ReviewStatus } from "../../core/entities/reviewQueue";
import type {
  IndexedRuleMatch,
  SectionEmbeddings,
} from "../../core/entities/similarity";
import type { WorkflowExecutionEntity } from "../../core/entities/workflow";
import type { DocumentStorePort } from "../../core/ports/inboundPorts";
import type {
  ExecutionListFilter,
  ExecutionRepositoryPort,
  ExecutionWriteGuard,
  IndexedRuleEntry,
  ReviewQueueRepositoryPort,
  VectorIndexPort,
} from "../../core/ports/outboundPorts";
import {
  documentsTable,
  ruleQueueTable,
  workflowExecutionsTable,
} from "./schema";

type Db = PostgresJsDatabase<Record<string, never>>;

const UNIQUE_VIOLATION = "23505";

const storageError =
  (source: AppBoundarySource, provider: string) =>
  (error: unknown): AppBoundaryError => {
    if (error instanceof postgres.PostgresError && error.code === UNIQUE_VIOLATION) {
      return {
        source,
        code: "conflict",
        provider,
        message: error.detail ?? error.message,
        retryable: false,
        cause: error,
      };
    }
    return {
      source,
      code: "unavailable",
      provider,
      message: error instanceof Error ? error.message : String(error),
      retryable: true,
      cause: error,
    };
  };

/**
 * Read-only access to ingested documents.
 */
export class PostgresDocumentStore implements DocumentStorePort {
  constructor(private readonly db: Db) {}

  async fetchById(
    documentId: string,
  ): Promise<Result<DocumentEntity | null, AppBoundaryError>> {
    return await ResultAsync.fromPromise(
      this.db
        .select()
        .from(documentsTable)
        .where(eq(documentsTable.id, documentId))
        .limit(1),
      storageError("documents", "postgres"),
    ).map(([row]) =>
      row
        ? {
            id: row.id,
            title: row.title,
            content: row.content,
            platformHints: row.platformHints,
            ...(row.url ? { url: row.url } : {}),
            ...(row.source ? { source: row.source } : {}),
            ...(row.publishedAt ? { publishedAt: row.publishedAt } : {}),
          }
        : null,
    );
  }
}

type ExecutionRow = typeof workflowExecutionsTable.$inferSelect;

const executionFromRow = (row: ExecutionRow): WorkflowExecutionEntity => ({
  id: row.id,
  documentId: row.documentId,
  configVersion: row.configVersion,
  config: row.config,
  status: row.status,
  currentStep: row.currentStep,
  stepResults: row.stepResults,
  terminationReason: row.terminationReason,
  error: row.error,
  flags: row.flags,
  cancelRequested: row.cancelRequested,
  retryCount: row.retryCount,
  revision: row.revision,
  audit: row.audit,
  createdAt: row.createdAt,
  startedAt: row.startedAt,
  updatedAt: row.updatedAt,
  completedAt: row.completedAt,
});

/**
 * Execution records with optimistic concurrency: every update is conditional on revision and step.
 */
export class PostgresExecutionRepository implements ExecutionRepositoryPort {
  constructor(private readonly db: Db) {}

  /**
   * The partial unique index on active (document, config version) pairs turns a second trigger into `conflict`.
   */
  async create(
    execution: WorkflowExecutionEntity,
  ): Promise<Result<WorkflowExecutionEntity, AppBoundaryError>> {
    return await ResultAsync.fromPromise(
      this.db.insert(workflowExecutionsTable).values(execution).returning(),
      storageError("storage", "postgres"),
    ).andThen(([row]) =>
      row
        ? ok(executionFromRow(row))
        : err(storageError("storage", "postgres")(new Error("Insert returned no row."))),
    );
  }

  async findById(executionId: string): Promise<WorkflowExecutionEntity | null> {
    const [row] = await this.db
      .select()
      .from(workflowExecutionsTable)
      .where(eq(workflowExecutionsTable.id, executionId))
      .limit(1);
    return row ? executionFromRow(row) : null;
  }

  async compareAndSet(
    next: WorkflowExecutionEntity,
    guard: ExecutionWriteGuard,
  ): Promise<Result<WorkflowExecutionEntity, AppBoundaryError>> {
    const conditions: SQL[] = [
      eq(workflowExecutionsTable.id, next.id),
      eq(workflowExecutionsTable.revision, guard.expectedRevision),
    ];
    if (guard.expectedStep === null) {
      conditions.push(isNull(workflowExecutionsTable.currentStep));
    } else if (guard.expectedStep !== undefined) {
      conditions.push(eq(workflowExecutionsTable.currentStep, guard.expectedStep));
    }

    const { id: _id, createdAt: _createdAt, ...changes } = next;
    const updated = await ResultAsync.fromPromise(
      this.db
        .update(workflowExecutionsTable)
        .set(changes)
        .where(and(...conditions))
        .returning(),
      storageError("storage", "postgres"),
    );
    if (updated.isErr()) {
      return err(updated.error);
    }

    const [row] = updated.value;
    if (!row) {
      return err({
        source: "storage",
        code: "conflict",
        provider: "postgres",
        message: `Execution ${next.id} changed since revision ${guard.expectedRevision}.`,
        retryable: false,
      });
    }
    return ok(executionFromRow(row));
  }

  async list(filter: ExecutionListFilter): Promise<WorkflowExecutionEntity[]> {
    const conditions: SQL[] = [];
    if (filter.status) {
      conditions.push(eq(workflowExecutionsTable.status, filter.status));
    }
    if (filter.documentId) {
      conditions.push(eq(workflowExecutionsTable.documentId, filter.documentId));
    }

    const rows = await this.db
      .select()
      .from(workflowExecutionsTable)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(workflowExecutionsTable.updatedAt))
      .limit(filter.limit);
    return rows.map(executionFromRow);
  }

  async listRunningUpdatedBefore(cutoff: Date): Promise<WorkflowExecutionEntity[]> {
    const rows = await this.db
      .select()
      .from(workflowExecutionsTable)
      .where(
        and(
          eq(workflowExecutionsTable.status, "running"),
          lt(workflowExecutionsTable.updatedAt, cutoff),
        ),
      );
    return rows.map(executionFromRow);
  }
}

type QueueRow = typeof ruleQueueTable.$inferSelect;

const queueItemFromRow = (row: QueueRow): QueueItemEntity => ({
  id: row.id,
  executionId: row.executionId,
  documentId: row.documentId,
  draft: row.draft,
  similarity: row.similarity,
  status: row.status,
  ...(row.reviewNote !== null ? { reviewNote: row.reviewNote } : {}),
  ...(row.editedRaw !== null ? { editedRaw: row.editedRaw } : {}),
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
});

/**
 * Review queue storage; inserts are idempotent on the derived item id.
 */
export class PostgresReviewQueueRepository implements ReviewQueueRepositoryPort {
  constructor(private readonly db: Db) {}

  async insertMany(items: QueueItemEntity[]): Promise<void> {
    if (items.length === 0) return;
    await this.db
      .insert(ruleQueueTable)
      .values(
        items.map((item) => ({
          ...item,
          reviewNote: item.reviewNote ?? null,
          editedRaw: item.editedRaw ?? null,
        })),
      )
      .onConflictDoNothing({ target: ruleQueueTable.id });
  }

  async findById(itemId: string): Promise<QueueItemEntity | null> {
    const [row] = await this.db
      .select()
      .from(ruleQueueTable)
      .where(eq(ruleQueueTable.id, itemId))
      .limit(1);
    return row ? queueItemFromRow(row) : null;
  }

  async list(filter: {
    status?: ReviewStatus;
    limit: number;
  }): Promise<QueueItemEntity[]> {
    const rows = await this.db
      .select()
      .from(ruleQueueTable)
      .where(filter.status ? eq(ruleQueueTable.status, filter.status) : undefined)
      .orderBy(desc(ruleQueueTable.createdAt))
      .limit(filter.limit);
    return rows.map(queueItemFromRow);
  }

  async update(item: QueueItemEntity): Promise<void> {
    await this.db
      .update(ruleQueueTable)
      .set({
        draft: item.draft,
        status: item.status,
        reviewNote: item.reviewNote ?? null,
        editedRaw: item.editedRaw ?? null,
        updatedAt: item.updatedAt,
      })
      .where(eq(ruleQueueTable.id, item.id));
  }
}

type RuleMatchRow = {
  rule_id: string;
  title: string;
  updated_at: Date;
  title_score: number;
  description_score: number;
  tags_score: number;
  signature_score: number;
};

const toVectorLiteral = (values: number[]): string => `[${values.join(",")}]`;

/**
 * Per-section rule embeddings in pgvector; candidates are fetched by signature distance, the dominant section.
 */
export class PgVectorRuleIndex implements VectorIndexPort {
  constructor(private readonly sqlClient: postgres.Sql) {}

  async upsert(entry: IndexedRuleEntry): Promise<Result<void, AppBoundaryError>> {
    const { embeddings } = entry;
    return await ResultAsync.fromPromise(
      this.sqlClient`
        INSERT INTO rule_embeddings (
          rule_id, title, title_embedding, description_embedding,
          tags_embedding, signature_embedding, updated_at
        )
        VALUES (
          ${entry.ruleId}, ${entry.title},
          ${toVectorLiteral(embeddings.title)}::vector,
          ${toVectorLiteral(embeddings.description)}::vector,
          ${toVectorLiteral(embeddings.tags)}::vector,
          ${toVectorLiteral(embeddings.signature)}::vector,
          ${entry.updatedAt}
        )
        ON CONFLICT (rule_id)
        DO UPDATE SET
          title = EXCLUDED.title,
          title_embedding = EXCLUDED.title_embedding,
          description_embedding = EXCLUDED.description_embedding,
          tags_embedding = EXCLUDED.tags_embedding,
          signature_embedding = EXCLUDED.signature_embedding,
          updated_at = EXCLUDED.updated_at;
      `,
      storageError("vector_index", "pgvector"),
    ).map(() => undefined);
  }

  async query(
    embeddings: SectionEmbeddings,
    topK: number,
  ): Promise<Result<IndexedRuleMatch[], AppBoundaryError>> {
    return await ResultAsync.fromPromise(
      this.sqlClient<RuleMatchRow[]>`
        SELECT
          rule_id,
          title,
          updated_at,
          1 - (title_embedding <=> ${toVectorLiteral(embeddings.title)}::vector) AS title_score,
          1 - (description_embedding <=> ${toVectorLiteral(embeddings.description)}::vector) AS description_score,
          1 - (tags_embedding <=> ${toVectorLiteral(embeddings.tags)}::vector) AS tags_score,
          1 - (signature_embedding <=> ${toVectorLiteral(embeddings.signature)}::vector) AS signature_score
        FROM rule_embeddings
        ORDER BY signature_embedding <=> ${toVectorLiteral(embeddings.signature)}::vector
        LIMIT ${topK};
      `,
      storageError("vector_index", "pgvector"),
    ).map((rows) =>
      rows.map((row) => ({
        ruleId: row.rule_id,
        title: row.title,
        updatedAt: row.updated_at,
        sectionScores: {
          title: Number(row.title_score),
          description: Number(row.description_score),
          tags: Number(row.tags_score),
          signature: Number(row.signature_score),
        },
      })),
    );
  }
}

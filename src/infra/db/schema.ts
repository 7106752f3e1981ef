import { sql } from "drizzle-orm";
import {
  boolean,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  vector,
} from "drizzle-orm/pg-core";
import type { ReviewStatus } from "../../core/entities/reviewQueue";
import type { RuleDraft } from "../../core/entities/rule";
import type { SimilarityMatch } from "../../core/entities/similarity";
import type {
  AuditEntry,
  ExecutionError,
  ExecutionFlag,
  ExecutionStatus,
  StepResults,
  TerminationReason,
  WorkflowStep,
} from "../../core/entities/workflow";
import type { WorkflowConfig } from "../../core/entities/workflowConfig";

export const EMBEDDING_DIMENSIONS = 768;

export const documentsTable = pgTable("documents", {
  id: text("id").primaryKey(),
  title: text("title").notNull(),
  content: text("content").notNull(),
  platformHints: jsonb("platform_hints").$type<string[]>().notNull(),
  url: text("url"),
  source: text("source"),
  publishedAt: timestamp("published_at", { withTimezone: true }),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

export const workflowExecutionsTable = pgTable(
  "workflow_executions",
  {
    id: text("id").primaryKey(),
    documentId: text("document_id").notNull(),
    configVersion: text("config_version").notNull(),
    config: jsonb("config").$type<WorkflowConfig>().notNull(),
    status: text("status").$type<ExecutionStatus>().notNull(),
    currentStep: text("current_step").$type<WorkflowStep>(),
    stepResults: jsonb("step_results").$type<Partial<StepResults>>().notNull(),
    terminationReason: text("termination_reason").$type<TerminationReason>(),
    error: jsonb("error").$type<ExecutionError>(),
    flags: jsonb("flags").$type<ExecutionFlag[]>().notNull(),
    cancelRequested: boolean("cancel_requested").notNull().default(false),
    retryCount: integer("retry_count").notNull().default(0),
    revision: integer("revision").notNull(),
    audit: jsonb("audit").$type<AuditEntry[]>().notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    startedAt: timestamp("started_at", { withTimezone: true }),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
    completedAt: timestamp("completed_at", { withTimezone: true }),
  },
  (table) => ({
    activeRunUidx: uniqueIndex("workflow_executions_active_uidx")
      .on(table.documentId, table.configVersion)
      .where(sql`${table.status} in ('pending', 'running')`),
    statusUpdatedIdx: index("workflow_executions_status_updated_idx").on(
      table.status,
      table.updatedAt,
    ),
  }),
);

export const ruleQueueTable = pgTable(
  "rule_queue",
  {
    id: text("id").primaryKey(),
    executionId: text("execution_id")
      .notNull()
      .references(() => workflowExecutionsTable.id, { onDelete: "cascade" }),
    documentId: text("document_id").notNull(),
    draft: jsonb("draft").$type<RuleDraft>().notNull(),
    similarity: jsonb("similarity").$type<SimilarityMatch>().notNull(),
    status: text("status").$type<ReviewStatus>().notNull(),
    reviewNote: text("review_note"),
    editedRaw: text("edited_raw"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    statusIdx: index("rule_queue_status_idx").on(table.status),
  }),
);

export const ruleEmbeddingsTable = pgTable("rule_embeddings", {
  ruleId: text("rule_id").primaryKey(),
  title: text("title").notNull(),
  titleEmbedding: vector("title_embedding", {
    dimensions: EMBEDDING_DIMENSIONS,
  }).notNull(),
  descriptionEmbedding: vector("description_embedding", {
    dimensions: EMBEDDING_DIMENSIONS,
  }).notNull(),
  tagsEmbedding: vector("tags_embedding", {
    dimensions: EMBEDDING_DIMENSIONS,
  }).notNull(),
  signatureEmbedding: vector("signature_embedding", {
    dimensions: EMBEDDING_DIMENSIONS,
  }).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
});

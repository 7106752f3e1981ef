import { readFile } from "node:fs/promises";
import { Result } from "neverthrow";
import { FatalConfigurationError } from "../../core/entities/appError";
import {
  parseWorkflowConfig,
  type WorkflowConfig,
} from "../../core/entities/workflowConfig";
import { env } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import { JsonClassifierArtifact } from "../../infra/classifier/jsonClassifierArtifact";
import { createDatabase } from "../../infra/db/client";
import {
  PgVectorRuleIndex,
  PostgresDocumentStore,
  PostgresExecutionRepository,
  PostgresReviewQueueRepository,
} from "../../infra/db/repositories";
import { EMBEDDING_DIMENSIONS } from "../../infra/db/schema";
import { HttpJsonClient } from "../../infra/http/httpJsonClient";
import { OllamaEmbedding } from "../../infra/llm/ollamaEmbedding";
import { OllamaModelGateway } from "../../infra/llm/ollamaModelGateway";
import {
  BullMqWorkflowQueue,
  redisConfigFromUrl,
} from "../../infra/queue/bullMqQueue";
import { SystemClock, UuidIdGenerator } from "../../infra/system/systemPorts";
import { ContentFilterService } from "../services/contentFilterService";
import { ExtractionSupervisorService } from "../services/extractionSupervisorService";
import { PlatformDetectionService } from "../services/platformDetectionService";
import { QaReviewService } from "../services/qaReviewService";
import { QueuePromotionService } from "../services/queuePromotionService";
import { RankingService } from "../services/rankingService";
import { ReviewQueueService } from "../services/reviewQueueService";
import { RuleGenerationService } from "../services/ruleGenerationService";
import { SimilarityMatchingService } from "../services/similarityMatchingService";
import { WorkflowDriverService } from "../services/workflowDriverService";

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (error) => (error instanceof Error ? error.message : String(error)),
);

/**
 * Reads the workflow config file, or falls back to built-in defaults when no path is configured.
 */
export const loadWorkflowConfig = async (
  path: string,
): Promise<WorkflowConfig> => {
  if (path.trim().length === 0) {
    return parseWorkflowConfig({});
  }

  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new FatalConfigurationError(`Cannot read workflow config ${path}.`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = parseJson(text);
  if (parsed.isErr()) {
    throw new FatalConfigurationError(
      `Workflow config ${path} is not valid JSON.`,
      [parsed.error],
    );
  }
  return parseWorkflowConfig(parsed.value);
};

/**
 * Composition root shared by the CLI and the worker.
 */
export const createRuntime = async () => {
  const config = await loadWorkflowConfig(env.WORKFLOW_CONFIG_PATH);
  const database = createDatabase(env.POSTGRES_URL, {
    maxConnections: env.QUEUE_CONCURRENCY_WORKFLOW * 2 + 2,
  });
  const { db, sql } = database;

  const clock = new SystemClock();
  const ids = new UuidIdGenerator();
  const queue = new BullMqWorkflowQueue(redisConfigFromUrl(env.REDIS_URL));

  const documents = new PostgresDocumentStore(db);
  const executions = new PostgresExecutionRepository(db);
  const reviewQueue = new PostgresReviewQueueRepository(db);
  const ruleIndex = new PgVectorRuleIndex(sql);

  const httpClient = new HttpJsonClient({ log: logger.child({ component: "http" }) });
  const gateway = new OllamaModelGateway(
    env.OLLAMA_BASE_URL,
    env.OLLAMA_CHAT_MODEL,
    httpClient,
  );
  const embedder = new OllamaEmbedding(
    {
      baseUrl: env.OLLAMA_BASE_URL,
      model: env.OLLAMA_EMBED_MODEL,
      dimensions: env.OLLAMA_EMBED_DIMENSIONS ?? EMBEDDING_DIMENSIONS,
      timeoutMs: env.OLLAMA_EMBED_TIMEOUT_MS,
      retries: config.transport.retries,
      retryDelayMs: config.transport.baseDelayMs,
    },
    httpClient,
  );

  const qa = new QaReviewService(gateway);
  const driver = new WorkflowDriverService(
    executions,
    documents,
    {
      contentFilter: new ContentFilterService(
        new JsonClassifierArtifact(env.CLASSIFIER_ARTIFACT_PATH),
      ),
      ranking: new RankingService(gateway),
      platform: new PlatformDetectionService(gateway),
      extraction: new ExtractionSupervisorService(gateway, qa, logger),
      generation: new RuleGenerationService(gateway),
      similarity: new SimilarityMatchingService(embedder, ruleIndex),
      promotion: new QueuePromotionService(reviewQueue, clock),
    },
    config,
    clock,
    ids,
    logger,
  );
  const review = new ReviewQueueService(reviewQueue, embedder, ruleIndex, clock);

  const close = async (): Promise<void> => {
    await queue.close();
    await database.close();
  };

  return { config, clock, queue, driver, review, close };
};

export type Runtime = Awaited<ReturnType<typeof createRuntime>>;

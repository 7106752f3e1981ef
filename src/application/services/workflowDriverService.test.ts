import { err, ok, type Result } from "neverthrow";
import { describe, expect, it } from "vitest";
import type {
  ClassifierLoadError,
  ClassifierModel,
} from "../../core/entities/contentFilter";
import type { DocumentEntity } from "../../core/entities/document";
import {
  parseWorkflowConfig,
  type WorkflowConfig,
} from "../../core/entities/workflowConfig";
import type { VectorIndexPort } from "../../core/ports/outboundPorts";
import {
  FixedClock,
  gatewayError,
  HashingEmbedder,
  InMemoryDocumentStore,
  InMemoryExecutionRepository,
  InMemoryReviewQueueRepository,
  InMemoryVectorIndex,
  ScriptedModelGateway,
  SequentialIds,
  StaticClassifierArtifact,
} from "../../__tests__/support/inMemoryAdapters";
import {
  encodedPowershellRule,
  testConfig,
  threatReport,
} from "../../__tests__/support/fixtures";
import { ContentFilterService } from "./contentFilterService";
import { ExtractionSupervisorService } from "./extractionSupervisorService";
import { PlatformDetectionService } from "./platformDetectionService";
import { QaReviewService } from "./qaReviewService";
import { QueuePromotionService } from "./queuePromotionService";
import { RankingService } from "./rankingService";
import { RuleGenerationService } from "./ruleGenerationService";
import {
  embedSections,
  sectionTextsOf,
  SimilarityMatchingService,
} from "./similarityMatchingService";
import { validateRule } from "./ruleValidator";
import { WorkflowDriverService } from "./workflowDriverService";

const keepEverything: ClassifierModel = { version: "keep-v1", bias: 10, weights: {} };

const linuxReport: DocumentEntity = {
  id: "doc-2",
  title: "Cron persistence",
  content: "A bash script dropped in /tmp/ was made runnable with chmod +x.",
  platformHints: [],
};

const observablesReply = JSON.stringify({
  observables: [{ value: "powershell.exe -enc SQBFAFgA", source_ref: "sentence 1" }],
});

const harness = (
  options: {
    config?: WorkflowConfig;
    classifier?: Result<ClassifierModel, ClassifierLoadError>;
    vectorIndex?: VectorIndexPort;
  } = {},
) => {
  const gateway = new ScriptedModelGateway();
  const clock = new FixedClock();
  const executions = new InMemoryExecutionRepository();
  const documents = new InMemoryDocumentStore([threatReport, linuxReport]);
  const embedder = new HashingEmbedder();
  const index = new InMemoryVectorIndex();
  const reviewQueue = new InMemoryReviewQueueRepository();

  const driver = new WorkflowDriverService(
    executions,
    documents,
    {
      contentFilter: new ContentFilterService(
        new StaticClassifierArtifact(options.classifier ?? ok(keepEverything)),
      ),
      ranking: new RankingService(gateway),
      platform: new PlatformDetectionService(gateway),
      extraction: new ExtractionSupervisorService(gateway, new QaReviewService(gateway)),
      generation: new RuleGenerationService(gateway),
      similarity: new SimilarityMatchingService(embedder, options.vectorIndex ?? index),
      promotion: new QueuePromotionService(reviewQueue, clock),
    },
    options.config ?? testConfig(),
    clock,
    new SequentialIds(),
  );

  return { driver, gateway, clock, executions, documents, index, reviewQueue, embedder };
};

type Harness = ReturnType<typeof harness>;

const scriptHappyPath = (gateway: ScriptedModelGateway) =>
  gateway
    .script("ranker", '{"score": 82, "reasoning": "Concrete commands."}')
    .script("cmdline", observablesReply)
    .script("rule_generator", JSON.stringify({ rules: [encodedPowershellRule] }));

const triggerAndStart = async (h: Harness, documentId = "doc-1") => {
  const created = (await h.driver.trigger(documentId))._unsafeUnwrap();
  return (await h.driver.start(created.id))._unsafeUnwrap();
};

const auditKinds = (h: Harness, executionId: string) =>
  (h.executions.rows.get(executionId)?.audit ?? []).map((entry) =>
    entry.step ? `${entry.kind}:${entry.step}` : entry.kind,
  );

describe("WorkflowDriverService", () => {
  describe("trigger", () => {
    it("creates a pending execution pinned to the config snapshot", async () => {
      const h = harness();

      const created = (await h.driver.trigger("doc-1"))._unsafeUnwrap();

      expect(created.id).toBe("exec-1");
      expect(created.status).toBe("pending");
      expect(created.currentStep).toBeNull();
      expect(created.revision).toBe(0);
      expect(created.configVersion).toMatch(/^1-[0-9a-f]{12}$/);
      expect(created.audit.map((entry) => entry.kind)).toEqual(["created"]);
    });

    it("rejects a second active run for the same document", async () => {
      const h = harness();
      await h.driver.trigger("doc-1");

      const second = (await h.driver.trigger("doc-1"))._unsafeUnwrapErr();

      expect(second.code).toBe("conflict");
    });

    it("reports an unknown document", async () => {
      const h = harness();

      const missing = (await h.driver.trigger("doc-missing"))._unsafeUnwrapErr();

      expect(missing.code).toBe("not_found");
      expect(missing.message).toBe("Document doc-missing not found.");
    });
  });

  describe("step loop", () => {
    it("queues a novel rule for review", async () => {
      const h = harness();
      scriptHappyPath(h.gateway);

      const finished = await triggerAndStart(h);

      expect(finished.status).toBe("completed");
      expect(finished.terminationReason).toBe("queued");
      expect(finished.currentStep).toBe("promote");
      expect(finished.completedAt?.toISOString()).toBe("2026-03-01T09:00:00.000Z");
      expect(finished.stepResults.promote?.queuedItemIds).toEqual(["exec-1-q0"]);
      expect(finished.stepResults.platform_detect?.platform).toBe("windows");
      expect(finished.stepResults.generate?.drafts[0]?.id).toBe("exec-1-rule-0");
      expect(finished.flags).toEqual([]);
      expect(h.reviewQueue.items.get("exec-1-q0")?.status).toBe("pending");
      expect(auditKinds(h, "exec-1")).toEqual([
        "created",
        "started:filter",
        "step_completed:filter",
        "step_completed:rank",
        "step_completed:platform_detect",
        "step_completed:extract",
        "step_completed:generate",
        "step_completed:similarity",
        "terminated:promote",
      ]);
    });

    it("suppresses a rule the corpus already holds", async () => {
      const h = harness();
      scriptHappyPath(h.gateway);
      const fields = validateRule(encodedPowershellRule).fields;
      if (!fields) {
        throw new Error("fixture rule does not validate");
      }
      await h.index.upsert({
        ruleId: "corpus-1",
        title: fields.title,
        updatedAt: new Date("2026-01-15T00:00:00.000Z"),
        embeddings: (await embedSections(h.embedder, sectionTextsOf(fields)))._unsafeUnwrap(),
      });

      const finished = await triggerAndStart(h);

      expect(finished.terminationReason).toBe("duplicate_suppressed");
      expect(finished.stepResults.promote?.queuedItemIds).toEqual([]);
      expect(finished.stepResults.promote?.suppressed[0]?.bestRuleId).toBe("corpus-1");
      expect(h.reviewQueue.items.size).toBe(0);
    });

    it("retries rule generation with validator feedback inside the step", async () => {
      const h = harness();
      const { logsource: _removed, ...withoutLogsource } = encodedPowershellRule;
      h.gateway
        .script("ranker", '{"score": 70}')
        .script("cmdline", observablesReply)
        .script(
          "rule_generator",
          JSON.stringify({ rules: [withoutLogsource] }),
          JSON.stringify({ rules: [encodedPowershellRule] }),
        );

      const finished = await triggerAndStart(h);

      expect(finished.terminationReason).toBe("queued");
      expect(finished.stepResults.generate?.attempts).toHaveLength(2);
      expect(finished.stepResults.generate?.drafts[0]?.attempts).toBe(2);
    });

    it("stops on low relevance", async () => {
      const h = harness();
      h.gateway.script("ranker", '{"score": 20, "reasoning": "Vendor marketing."}');

      const finished = await triggerAndStart(h);

      expect(finished.status).toBe("completed");
      expect(finished.terminationReason).toBe("low_relevance");
      expect(finished.currentStep).toBe("rank");
      expect(h.gateway.callsFor("cmdline")).toHaveLength(0);
    });

    it("stops on a platform outside the targets", async () => {
      const h = harness();
      h.gateway.script("ranker", '{"score": 90}');

      const finished = await triggerAndStart(h, "doc-2");

      expect(finished.terminationReason).toBe("platform_excluded");
      expect(finished.stepResults.platform_detect?.platform).toBe("linux");
    });

    it("fails the run when every sub-agent fails", async () => {
      const h = harness();
      h.gateway.script("ranker", '{"score": 90}');

      const finished = await triggerAndStart(h);

      expect(finished.status).toBe("failed");
      expect(finished.terminationReason).toBe("extraction_failed");
      expect(finished.error?.code).toBe("extraction_failed");
      expect(finished.error?.step).toBe("extract");
    });

    it("keeps every sub-agent conversation when extraction fails", async () => {
      const h = harness();
      h.gateway
        .script("ranker", '{"score": 90}')
        .always("cmdline", "MODEL-SAID-GARBAGE-XYZ");

      const finished = await triggerAndStart(h);

      expect(finished.status).toBe("failed");
      const transcript = finished.error?.transcript;
      const agents = transcript?.kind === "extraction" ? transcript.agents : [];
      expect(agents.map((agent) => agent.name)).toEqual(["cmdline"]);
      expect(agents[0]?.attempts.map((attempt) => attempt.response)).toEqual([
        "MODEL-SAID-GARBAGE-XYZ",
        "MODEL-SAID-GARBAGE-XYZ",
        "MODEL-SAID-GARBAGE-XYZ",
      ]);
      const failedEntry = finished.audit.find((entry) => entry.kind === "failed");
      expect(failedEntry?.data?.transcript).toEqual(transcript);
    });

    it("keeps an unparseable ranking reply on the failed record", async () => {
      const h = harness();
      h.gateway.script("ranker", "I'd rate this highly, lots to hunt on.");

      const finished = await triggerAndStart(h);

      expect(finished.error?.code).toBe("invalid_response");
      expect(finished.error?.transcript).toMatchObject({
        kind: "model_call",
        response: "I'd rate this highly, lots to hunt on.",
      });
    });

    it("keeps earlier generation attempts when a later call times out", async () => {
      const h = harness();
      h.gateway
        .script("ranker", '{"score": 82}')
        .script("cmdline", observablesReply)
        .script(
          "rule_generator",
          JSON.stringify({ rules: [{ title: "First attempt rule" }] }),
          err(gatewayError("timeout", "took too long")),
        );

      const finished = await triggerAndStart(h);

      expect(finished.status).toBe("failed");
      expect(finished.error?.step).toBe("generate");
      const transcript = finished.error?.transcript;
      const attempts = transcript?.kind === "generation" ? transcript.attempts : [];
      expect(attempts.map((attempt) => attempt.response)).toEqual([
        JSON.stringify({ rules: [{ title: "First attempt rule" }] }),
        undefined,
      ]);
      expect(attempts[1]?.error).toBe("took too long");
    });

    it("generates from the only sub-agent that delivered", async () => {
      const h = harness({
        config: testConfig({
          extraction: {
            roster: [
              {
                name: "cmdline",
                observableType: "command_line",
                promptTemplateId: "extract.command_line",
                qaEnabled: false,
              },
              {
                name: "event_ids",
                observableType: "event_id",
                promptTemplateId: "extract.event_id",
                qaEnabled: false,
              },
            ],
          },
        }),
      });
      h.gateway
        .script("ranker", '{"score": 82}')
        .script(
          "event_ids",
          JSON.stringify({ observables: [{ value: "4688", source_ref: "sentence 2" }] }),
        )
        .script("rule_generator", JSON.stringify({ rules: [encodedPowershellRule] }));

      const finished = await triggerAndStart(h);

      expect(finished.stepResults.extract?.agents.map((agent) => agent.status)).toEqual([
        "failed",
        "done",
      ]);
      const prompt = h.gateway.callsFor("rule_generator")[0]?.prompt.user ?? "";
      expect(prompt).toContain("event_id:\n- 4688");
      expect(prompt).not.toContain("command_line:");
    });

    it("flags a degraded filter and keeps going", async () => {
      const h = harness({ classifier: err({ kind: "unavailable", message: "missing" }) });
      scriptHappyPath(h.gateway);

      const finished = await triggerAndStart(h);

      expect(finished.flags).toEqual(["filter_degraded"]);
      expect(finished.terminationReason).toBe("queued");
    });
  });

  describe("scenarios on the default roster", () => {
    const rosterConfig = () =>
      parseWorkflowConfig({ transport: { timeoutMs: 1_000, retries: 0, baseDelayMs: 0 } });

    const reply = (...values: string[]) =>
      JSON.stringify({
        observables: values.map((value) => ({ value, source_ref: "report" })),
      });

    it("A: three of five sub-agents deliver and a 0.3 match is queued", async () => {
      const olderRule: VectorIndexPort = {
        upsert: async () => ok(undefined),
        query: async () =>
          ok([
            {
              ruleId: "corpus-9",
              title: "Generic PowerShell",
              updatedAt: new Date("2026-01-01T00:00:00.000Z"),
              sectionScores: { title: 0.3, description: 0.3, tags: 0.3, signature: 0.3 },
            },
          ]),
      };
      const h = harness({ config: rosterConfig(), vectorIndex: olderRule });
      h.gateway
        .script("ranker", '{"score": 85, "reasoning": "Commands and registry paths."}')
        .script("cmdline", reply("powershell.exe -enc SQBFAFgA"))
        .script(
          "cmdline.qa",
          JSON.stringify({ verdict: "pass", summary: "Matches the article.", issues: [] }),
        )
        .script("event_ids", reply("4688"))
        .script("registry", reply("HKLM\\Software\\Run"))
        .script("rule_generator", JSON.stringify({ rules: [encodedPowershellRule] }));

      const finished = await triggerAndStart(h);

      expect(finished.terminationReason).toBe("queued");
      const extract = finished.stepResults.extract;
      expect(extract?.agents.map((agent) => `${agent.name}:${agent.status}`)).toEqual([
        "cmdline:done",
        "hunt_queries:failed",
        "event_ids:done",
        "process_lineage:failed",
        "registry:done",
      ]);
      expect(extract?.totalObservables).toBe(3);
      expect(finished.stepResults.generate?.attempts).toHaveLength(1);
      const [match] = finished.stepResults.similarity?.matches ?? [];
      expect(match?.aggregate).toBeCloseTo(0.3, 9);
      expect(match?.classification).toBe("novel");
      expect([...h.reviewQueue.items.values()].map((item) => item.status)).toEqual(["pending"]);
    });

    it("B: a 40 relevance score stops before extraction", async () => {
      const h = harness({ config: rosterConfig() });
      h.gateway.script("ranker", '{"score": 40, "reasoning": "Mostly a product announcement."}');

      const finished = await triggerAndStart(h);

      expect(finished.status).toBe("completed");
      expect(finished.terminationReason).toBe("low_relevance");
      expect(finished.stepResults.extract).toBeUndefined();
      expect(h.reviewQueue.items.size).toBe(0);
    });

    it("C: three invalid generations leave one invalid draft and nothing queued", async () => {
      const h = harness({ config: rosterConfig() });
      h.gateway
        .script("ranker", '{"score": 85}')
        .script("event_ids", reply("4688"))
        .always("rule_generator", JSON.stringify({ rules: [{ title: "half a rule" }] }));

      const finished = await triggerAndStart(h);

      expect(finished.status).toBe("completed");
      expect(finished.terminationReason).toBe("no_valid_rules");
      expect(finished.stepResults.generate?.attempts).toHaveLength(3);
      expect(finished.stepResults.generate?.drafts).toHaveLength(1);
      expect(finished.stepResults.generate?.drafts[0]?.validation.valid).toBe(false);
      expect(finished.stepResults.generate?.drafts[0]?.attempts).toBe(3);
      expect(finished.stepResults.similarity).toBeUndefined();
      expect(h.reviewQueue.items.size).toBe(0);
    });
  });

  describe("retry", () => {
    it("re-enters the failed step and reuses earlier results", async () => {
      const h = harness();
      h.gateway.script("ranker", err(gatewayError("timeout", "took too long")));
      scriptHappyPath(h.gateway);

      const failed = await triggerAndStart(h);
      expect(failed.status).toBe("failed");
      expect(failed.currentStep).toBe("rank");
      expect(failed.error).toMatchObject({
        step: "rank",
        code: "timeout",
        message: "model/scripted: timeout: took too long",
        retryable: true,
        fatal: false,
      });

      const finished = (await h.driver.retry("exec-1"))._unsafeUnwrap();

      expect(finished.terminationReason).toBe("queued");
      expect(finished.retryCount).toBe(1);
      expect(finished.error).toBeNull();
      expect(h.gateway.callsFor("ranker")).toHaveLength(2);
      expect(auditKinds(h, "exec-1").filter((kind) => kind === "step_completed:filter")).toHaveLength(1);
      expect(auditKinds(h, "exec-1")).toContain("retry:rank");
    });

    it("refuses to retry a failure a retry cannot fix", async () => {
      const h = harness();
      const created = (await h.driver.trigger("doc-1"))._unsafeUnwrap();
      h.documents.remove("doc-1");

      const failed = (await h.driver.start(created.id))._unsafeUnwrap();
      expect(failed.error?.code).toBe("not_found");
      expect(failed.error?.retryable).toBe(false);

      const refused = (await h.driver.retry("exec-1"))._unsafeUnwrapErr();

      expect(refused.code).toBe("conflict");
      expect(refused.message).toBe(
        "Execution exec-1 failed with not_found, which a retry cannot fix.",
      );
      expect(h.executions.rows.get("exec-1")?.retryCount).toBe(0);
    });

    it("refuses to retry a fatal configuration failure", async () => {
      const h = harness({
        classifier: err({ kind: "corrupt", message: "bad weights", details: ["bias: Required"] }),
      });

      const failed = await triggerAndStart(h);
      expect(failed.error?.code).toBe("fatal_configuration");
      expect(failed.error?.fatal).toBe(true);
      expect(failed.error?.retryable).toBe(false);
      expect(failed.error?.details).toEqual(["bias: Required"]);

      const refused = (await h.driver.retry("exec-1"))._unsafeUnwrapErr();

      expect(refused.code).toBe("conflict");
      expect(refused.message).toBe(
        "Execution exec-1 failed on a fatal configuration error and cannot be retried.",
      );
    });

    it("refuses to retry a completed run", async () => {
      const h = harness();
      h.gateway.script("ranker", '{"score": 5}');
      await triggerAndStart(h);

      const refused = (await h.driver.retry("exec-1"))._unsafeUnwrapErr();

      expect(refused.message).toBe("Only failed executions can be retried.");
    });
  });

  describe("cancel", () => {
    it("cancels a pending execution at once", async () => {
      const h = harness();
      await h.driver.trigger("doc-1");

      const cancelled = (await h.driver.cancel("exec-1"))._unsafeUnwrap();

      expect(cancelled.status).toBe("cancelled");
      expect(cancelled.terminationReason).toBe("cancelled");
      expect((await h.driver.start("exec-1"))._unsafeUnwrapErr().message).toBe(
        "Cannot start a cancelled execution.",
      );
    });

    it("honours a cancel marker between steps", async () => {
      const h = harness();
      scriptHappyPath(h.gateway);
      let marked = false;
      h.executions.beforeWrite = (next) => {
        if (!marked && next.stepResults.filter) {
          marked = true;
          h.executions.overwrite(next.id, (row) => ({
            ...row,
            cancelRequested: true,
            revision: row.revision + 1,
          }));
        }
      };

      const finished = await triggerAndStart(h);

      expect(finished.status).toBe("cancelled");
      expect(finished.currentStep).toBe("rank");
      expect(finished.stepResults.filter).toBeDefined();
      expect(h.gateway.callsFor("ranker")).toHaveLength(0);
    });

    it("marks a running execution instead of stopping it", async () => {
      const h = harness();
      await h.driver.trigger("doc-1");
      h.executions.overwrite("exec-1", (row) => ({
        ...row,
        status: "running",
        currentStep: "extract",
        revision: 4,
      }));

      const marked = (await h.driver.cancel("exec-1"))._unsafeUnwrap();

      expect(marked.status).toBe("running");
      expect(marked.cancelRequested).toBe(true);
      expect(marked.revision).toBe(5);
    });

    it("refuses to cancel a finished run", async () => {
      const h = harness();
      h.gateway.script("ranker", '{"score": 5}');
      await triggerAndStart(h);

      const refused = (await h.driver.cancel("exec-1"))._unsafeUnwrapErr();

      expect(refused.message).toBe("Cannot cancel a completed execution.");
    });
  });

  describe("ownership", () => {
    it("stops when another writer takes the record", async () => {
      const h = harness();
      scriptHappyPath(h.gateway);
      let taken = false;
      h.executions.beforeWrite = (next) => {
        if (!taken && next.stepResults.filter) {
          taken = true;
          h.executions.overwrite(next.id, (row) => ({
            ...row,
            status: "failed",
            terminationReason: "stale_timeout",
            revision: row.revision + 1,
          }));
        }
      };

      const finished = await triggerAndStart(h);

      expect(finished.status).toBe("failed");
      expect(finished.terminationReason).toBe("stale_timeout");
      expect(h.gateway.callsFor("ranker")).toHaveLength(0);
    });
  });

  describe("sweepStale", () => {
    const runningSince = async (h: Harness) => {
      await h.driver.trigger("doc-1");
      h.executions.overwrite("exec-1", (row) => ({
        ...row,
        status: "running",
        currentStep: "extract",
        revision: 3,
      }));
    };

    it("fails runs without progress past the timeout", async () => {
      const h = harness();
      await runningSince(h);
      h.clock.advance(31 * 60_000);

      const report = await h.driver.sweepStale();

      expect(report).toEqual({ swept: ["exec-1"], conflicts: [] });
      const row = h.executions.rows.get("exec-1");
      expect(row?.status).toBe("failed");
      expect(row?.terminationReason).toBe("stale_timeout");
      expect(row?.error).toEqual({
        step: "extract",
        code: "stale_timeout",
        message: "No progress since 2026-03-01T09:00:00.000Z.",
        retryable: true,
        fatal: false,
      });
    });

    it("leaves recent runs alone", async () => {
      const h = harness();
      await runningSince(h);
      h.clock.advance(10 * 60_000);

      expect(await h.driver.sweepStale()).toEqual({ swept: [], conflicts: [] });
    });

    it("yields to a step owner that wrote first", async () => {
      const h = harness();
      await runningSince(h);
      h.clock.advance(31 * 60_000);
      h.executions.beforeWrite = (next) => {
        h.executions.beforeWrite = null;
        h.executions.overwrite(next.id, (row) => ({
          ...row,
          currentStep: "generate",
          revision: row.revision + 1,
        }));
      };

      const report = await h.driver.sweepStale();

      expect(report).toEqual({ swept: [], conflicts: ["exec-1"] });
      expect(h.executions.rows.get("exec-1")?.status).toBe("running");
    });
  });
});

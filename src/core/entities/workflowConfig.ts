import { createHash } from "node:crypto";
import { z } from "zod";
import { deepFreeze, stableStringify } from "../../shared/utils/stableJson";
import { FatalConfigurationError } from "./appError";

export const observableTypes = [
  "command_line",
  "query_fragment",
  "event_id",
  "process_lineage",
  "registry_operation",
] as const;

export type ObservableType = (typeof observableTypes)[number];

export const platforms = [
  "windows",
  "linux",
  "macos",
  "multiple",
  "unknown",
] as const;

const subAgentSchema = z.object({
  name: z.string().min(1),
  observableType: z.enum(observableTypes),
  promptTemplateId: z.string().min(1),
  qaEnabled: z.boolean(),
  enabled: z.boolean().default(true),
});

export type SubAgentSpec = z.infer<typeof subAgentSchema>;

const defaultRoster = (): SubAgentSpec[] => [
  {
    name: "cmdline",
    observableType: "command_line",
    promptTemplateId: "extract.command_line",
    qaEnabled: true,
    enabled: true,
  },
  {
    name: "hunt_queries",
    observableType: "query_fragment",
    promptTemplateId: "extract.query_fragment",
    qaEnabled: true,
    enabled: true,
  },
  {
    name: "event_ids",
    observableType: "event_id",
    promptTemplateId: "extract.event_id",
    qaEnabled: false,
    enabled: true,
  },
  {
    name: "process_lineage",
    observableType: "process_lineage",
    promptTemplateId: "extract.process_lineage",
    qaEnabled: true,
    enabled: true,
  },
  {
    name: "registry",
    observableType: "registry_operation",
    promptTemplateId: "extract.registry_operation",
    qaEnabled: false,
    enabled: true,
  },
];

// Chunks hitting any of these are kept no matter what the classifier says.
const defaultProtectedPatterns = (): string[] => [
  "\\bpowershell(\\.exe)?\\s+(-\\w+\\s+)*-(e|enc|encodedcommand)\\b",
  "\\b(rundll32|regsvr32|mshta|certutil|bitsadmin)(\\.exe)?\\s",
  "\\bschtasks(\\.exe)?\\s+/create\\b",
  "\\bHK(LM|CU|EY_LOCAL_MACHINE|EY_CURRENT_USER)\\\\",
  "\\bevent\\s?id\\s?\\d{3,5}\\b",
  "\\beventcode\\s*=\\s*\\d+",
  "\\bvssadmin(\\.exe)?\\s+delete\\s+shadows\\b",
  "\\bwmic(\\.exe)?\\s.*process\\s+call\\s+create\\b",
  "%[a-z0-9_]+:~[0-9]+(,[0-9]+)?%",
  "\\bcmd(\\.exe)?\\s*/v(:on)?\\b",
];

const agentOptionsSchema = z.object({
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).default(0),
});

export type AgentOptions = z.infer<typeof agentOptionsSchema>;

const sectionWeightsSchema = z.object({
  title: z.number().min(0).max(1),
  description: z.number().min(0).max(1),
  tags: z.number().min(0).max(1),
  signature: z.number().min(0).max(1),
});

export type SectionWeights = z.infer<typeof sectionWeightsSchema>;

export const WEIGHT_SUM_TOLERANCE = 1e-6;

export const workflowConfigSchema = z
  .object({
    version: z.string().min(1).default("1"),
    contentFilter: z
      .object({
        chunkSize: z.number().int().positive().default(1_000),
        overlap: z.number().int().nonnegative().default(200),
        minConfidence: z.number().min(0).max(1).default(0.7),
        protectedPatterns: z
          .array(z.string().min(1))
          .default(defaultProtectedPatterns),
        keywordWeight: z.number().min(0).default(0),
        classifierWeight: z.number().min(0).default(1),
      })
      .default({}),
    ranking: z
      .object({
        threshold: z.number().min(0).max(100).default(60),
      })
      .default({}),
    platform: z
      .object({
        targets: z
          .array(z.enum(platforms))
          .min(1)
          .default((): (typeof platforms)[number][] => ["windows"]),
        fallbackEnabled: z.boolean().default(false),
      })
      .default({}),
    extraction: z
      .object({
        roster: z.array(subAgentSchema).min(1).default(defaultRoster),
        qaMaxAttempts: z.number().int().min(1).max(10).default(3),
      })
      .default({}),
    generation: z
      .object({
        maxAttempts: z.number().int().min(1).max(10).default(3),
      })
      .default({}),
    similarity: z
      .object({
        threshold: z.number().min(0).max(1).default(0.5),
        duplicateThreshold: z.number().min(0).max(1).default(0.9),
        topK: z.number().int().positive().default(10),
        weights: sectionWeightsSchema.default({
          title: 0.042,
          description: 0.042,
          tags: 0.042,
          signature: 0.874,
        }),
      })
      .default({}),
    transport: z
      .object({
        timeoutMs: z.number().int().positive().default(120_000),
        retries: z.number().int().min(0).max(5).default(2),
        baseDelayMs: z.number().int().nonnegative().default(500),
      })
      .default({}),
    agents: z.record(z.string(), agentOptionsSchema).default({}),
    staleAfterMs: z
      .number()
      .int()
      .positive()
      .default(30 * 60_000),
  })
  .superRefine((config, ctx) => {
    const weights = config.similarity.weights;
    const weightSum =
      weights.title + weights.description + weights.tags + weights.signature;
    if (Math.abs(weightSum - 1) > WEIGHT_SUM_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["similarity", "weights"],
        message: `Section weights must sum to 1.0, got ${weightSum}.`,
      });
    }

    if (config.similarity.duplicateThreshold < config.similarity.threshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["similarity", "duplicateThreshold"],
        message: "duplicateThreshold must not be below threshold.",
      });
    }

    if (config.contentFilter.overlap >= config.contentFilter.chunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["contentFilter", "overlap"],
        message: "overlap must be smaller than chunkSize.",
      });
    }

    if (
      config.contentFilter.keywordWeight +
        config.contentFilter.classifierWeight <=
      0
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["contentFilter"],
        message: "keywordWeight and classifierWeight cannot both be zero.",
      });
    }

    config.contentFilter.protectedPatterns.forEach((pattern, index) => {
      try {
        new RegExp(pattern, "i");
      } catch {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["contentFilter", "protectedPatterns", index],
          message: `Invalid regular expression: ${pattern}`,
        });
      }
    });

    const names = config.extraction.roster.map((agent) => agent.name);
    if (new Set(names).size !== names.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["extraction", "roster"],
        message: "Sub-agent names must be unique.",
      });
    }

    if (!config.extraction.roster.some((agent) => agent.enabled)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["extraction", "roster"],
        message: "At least one sub-agent must be enabled.",
      });
    }
  });

export type WorkflowConfig = z.infer<typeof workflowConfigSchema>;
export type ContentFilterConfig = WorkflowConfig["contentFilter"];
export type TransportPolicy = WorkflowConfig["transport"];

/**
 * Validates raw workflow settings into an immutable snapshot; invalid settings abort before any run starts.
 */
export const parseWorkflowConfig = (raw: unknown): WorkflowConfig => {
  const parsed = workflowConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new FatalConfigurationError(
      "Workflow configuration is invalid.",
      details,
    );
  }

  return deepFreeze(parsed.data);
};

/**
 * Stamps a config with its declared version plus a content hash so audits can tell edited configs apart.
 */
export const configVersionOf = (config: WorkflowConfig): string => {
  const digest = createHash("sha256")
    .update(stableStringify(config))
    .digest("hex")
    .slice(0, 12);
  return `${config.version}-${digest}`;
};

import { err, ok, type Result } from "neverthrow";
import { stringify } from "yaml";
import { stageFailureFrom } from "../../core/entities/appError";
import type { ExtractionResult } from "../../core/entities/extraction";
import type {
  GenerationAttempt,
  GenerationResult,
  RuleDraft,
  RuleFields,
  RuleValidation,
} from "../../core/entities/rule";
import type { StageFailure } from "../../core/entities/workflow";
import type { WorkflowConfig } from "../../core/entities/workflowConfig";
import type { ModelGatewayPort } from "../../core/ports/outboundPorts";
import { callOptionsFor } from "../prompts/callOptions";
import { generationPrompt, renderPrompt } from "../prompts/promptTemplates";
import {
  describeParseError,
  excerptOf,
  type ParseError,
} from "../parsing/tolerantParse";
import { extractYamlDocuments } from "../parsing/yamlDocuments";
import { validateRule } from "./ruleValidator";

export const GENERATION_AGENT = "rule_generator";

type ValidatedRule = {
  rule: unknown;
  validation: RuleValidation;
  fields: RuleFields | null;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const rulesOf = (document: unknown): unknown[] => {
  if (Array.isArray(document)) {
    return document;
  }
  if (isRecord(document) && Array.isArray(document.rules)) {
    return document.rules;
  }
  return [document];
};

/**
 * Accepts YAML documents separated by `---`, a list of rules, `rules: [...]` or a single rule; JSON is read too.
 */
export const parseRules = (response: string): Result<unknown[], ParseError> =>
  extractYamlDocuments(response).andThen((documents): Result<unknown[], ParseError> => {
    const rules = documents.flatMap(rulesOf);
    if (rules.length === 0) {
      return err({
        stage: "schema",
        message: "Expected at least one rule: a YAML rule document, a list of rules or rules: [...].",
        excerpt: excerptOf(response.trim()),
      });
    }
    return ok(rules);
  });

export const formatValidationFeedback = (rules: readonly ValidatedRule[]): string =>
  rules
    .map((entry, index) => ({ entry, index }))
    .filter(({ entry }) => !entry.validation.valid)
    .map(({ entry, index }) => {
      const title =
        isRecord(entry.rule) && typeof entry.rule.title === "string"
          ? ` (${entry.rule.title})`
          : "";
      return [
        `Rule ${index + 1}${title}:`,
        ...entry.validation.errors.map((error) => `- ${error}`),
      ].join("\n");
    })
    .join("\n");

/**
 * Drafts detection rules from the extracted observables, feeding validator errors back until every rule validates.
 */
export class RuleGenerationService {
  constructor(private readonly gateway: ModelGatewayPort) {}

  async generate(
    extraction: ExtractionResult,
    config: WorkflowConfig,
    draftIdPrefix: string,
  ): Promise<Result<GenerationResult, StageFailure>> {
    const attempts: GenerationAttempt[] = [];
    let latestParsed: ValidatedRule[] | null = null;
    let latestResponse = "";
    let feedback: string | null = null;

    for (
      let attempt = 1;
      attempt <= config.generation.maxAttempts;
      attempt += 1
    ) {
      const prompt = generationPrompt(
        extraction.platform,
        extraction.observables,
        feedback,
      );
      const record: GenerationAttempt = {
        attempt,
        prompt: renderPrompt(prompt),
        validations: [],
      };
      attempts.push(record);

      const response = await this.gateway.complete(
        prompt,
        callOptionsFor(config, GENERATION_AGENT),
      );
      if (response.isErr()) {
        record.error = response.error.message;
        const failure: StageFailure = {
          ...stageFailureFrom(response.error),
          transcript: { kind: "generation", attempts },
        };
        return err(failure);
      }
      record.response = response.value;
      latestResponse = response.value;

      const parsed = parseRules(response.value);
      if (parsed.isErr()) {
        record.parseError = describeParseError(parsed.error);
        feedback = `Your output could not be parsed (${record.parseError}). Reply with YAML rule documents only.`;
        continue;
      }

      const validated = parsed.value.map((rule) => ({
        rule,
        ...validateRule(rule),
      }));
      record.validations = validated.map((entry) => entry.validation);
      latestParsed = validated;

      if (validated.every((entry) => entry.validation.valid)) {
        break;
      }
      feedback = formatValidationFeedback(validated);
    }

    const drafts: RuleDraft[] = latestParsed
      ? latestParsed.map((entry, index) => ({
          id: `${draftIdPrefix}-rule-${index}`,
          index,
          fields: entry.fields,
          raw: stringify(entry.rule),
          validation: entry.validation,
          attempts: attempts.length,
        }))
      : [
          {
            id: `${draftIdPrefix}-rule-0`,
            index: 0,
            fields: null,
            raw: latestResponse,
            validation: {
              valid: false,
              errors: ["No attempt produced parseable rules."],
              warnings: [],
            },
            attempts: attempts.length,
          },
        ];

    return ok({ drafts, attempts });
  }
}

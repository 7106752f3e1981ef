import { FatalConfigurationError } from "../../core/entities/appError";
import type { Platform } from "../../core/entities/document";
import type { Observable } from "../../core/entities/extraction";
import type { ObservableType } from "../../core/entities/workflowConfig";
import type { ModelPrompt } from "../../core/ports/outboundPorts";

const HUNTER_PERSONA =
  "You are a detection engineer who turns threat intelligence into threat-hunting content. Answer with JSON only.";

export const rankingPrompt = (text: string): ModelPrompt => ({
  system: HUNTER_PERSONA,
  user: [
    "Score how useful the article below is for writing behavioural detections, from 0 to 100.",
    "High scores need concrete command lines, process trees, registry paths, event IDs or queries.",
    "Vendor marketing, news summaries and strategic analysis score low.",
    'Reply as {"score": <0-100>, "reasoning": "<one paragraph>"}.',
    "",
    "ARTICLE:",
    text,
  ].join("\n"),
});

export const platformPrompt = (text: string): ModelPrompt => ({
  system: HUNTER_PERSONA,
  user: [
    "Which operating system do the attacker techniques in this article target?",
    'Reply as {"platform": "windows" | "linux" | "macos" | "multiple" | "unknown"}.',
    "",
    "ARTICLE:",
    text,
  ].join("\n"),
});

type ExtractionTemplate = {
  label: string;
  guidance: string;
};

const extractionTemplates: Record<string, ExtractionTemplate> = {
  "extract.command_line": {
    label: "command lines",
    guidance:
      "Copy complete command lines exactly as written, including arguments. Skip prose descriptions of commands.",
  },
  "extract.query_fragment": {
    label: "hunt query fragments",
    guidance:
      "Copy query snippets (KQL, SPL, EQL, SQL, Sigma selections) that appear verbatim in the article.",
  },
  "extract.event_id": {
    label: "event identifiers",
    guidance:
      "List Windows event IDs, Sysmon event IDs or audit record types named in the article, one per entry.",
  },
  "extract.process_lineage": {
    label: "process lineage",
    guidance:
      "Describe each parent to child process chain as 'parent.exe -> child.exe', only when the article states it.",
  },
  "extract.registry_operation": {
    label: "registry operations",
    guidance:
      "List registry keys or values that are created, modified or deleted, with the full hive path.",
  },
};

export const hasExtractionTemplate = (templateId: string): boolean =>
  templateId in extractionTemplates;

const resolveExtractionTemplate = (templateId: string): ExtractionTemplate => {
  const template = extractionTemplates[templateId];
  if (!template) {
    throw new FatalConfigurationError(
      `Unknown prompt template '${templateId}'.`,
      [`Known templates: ${Object.keys(extractionTemplates).join(", ")}`],
    );
  }
  return template;
};

export const extractionPrompt = (
  templateId: string,
  text: string,
  platform: Platform,
  feedback: string | null,
): ModelPrompt => {
  const template = resolveExtractionTemplate(templateId);
  const lines = [
    `Extract ${template.label} from the article below. Target platform: ${platform}.`,
    template.guidance,
    "Never invent values; every value must appear in the article.",
    'Reply as {"observables": [{"value": "...", "source_ref": "<quoted sentence>", "context": "<optional>"}]}.',
    'Reply {"observables": []} when there are none.',
  ];

  if (feedback) {
    lines.push("", "A reviewer rejected your previous answer:", feedback);
  }

  lines.push("", "ARTICLE:", text);
  return { system: HUNTER_PERSONA, user: lines.join("\n") };
};

export const qaReviewPrompt = (
  observableType: ObservableType,
  text: string,
  observables: Observable[],
): ModelPrompt => ({
  system:
    "You review extraction output for a detection engineering team. Answer with JSON only.",
  user: [
    `Check these ${observableType} observables against the source article.`,
    "compliance: is each value of the requested kind? factuality: does it appear in the article? formatting: is it copied exactly?",
    'Reply as {"verdict": "pass" | "needs_revision" | "critical_failure", "summary": "...", "issues": [{"type": "compliance" | "factuality" | "formatting", "description": "...", "location": "<optional>", "severity": "low" | "medium" | "high"}]}.',
    "",
    "OBSERVABLES:",
    JSON.stringify(
      observables.map((item) => ({ value: item.value, source_ref: item.sourceRef })),
      null,
      2,
    ),
    "",
    "ARTICLE:",
    text,
  ].join("\n"),
});

export const generationPrompt = (
  platform: string,
  observables: Partial<Record<ObservableType, Observable[]>>,
  feedback: string | null,
): ModelPrompt => {
  const sections = Object.entries(observables)
    .filter(([, items]) => items !== undefined && items.length > 0)
    .map(
      ([type, items]) =>
        `${type}:\n${(items ?? []).map((item) => `- ${item.value}`).join("\n")}`,
    );

  const lines = [
    `Write Sigma detection rules for ${platform} from the observables below.`,
    "Each rule needs title, description, logsource (category/product/service), detection with named selections and a condition, tags and level.",
    "Do not use aggregation pipes or 'near' in conditions.",
    "Reply with one YAML document per rule, separated by lines containing only ---, and no other text.",
    "",
    "OBSERVABLES:",
    sections.join("\n\n"),
  ];

  if (feedback) {
    lines.push("", "Your previous rules failed validation:", feedback);
  }

  return { system: HUNTER_PERSONA, user: lines.join("\n") };
};

export const renderPrompt = (prompt: ModelPrompt): string =>
  prompt.system ? `[system]\n${prompt.system}\n\n[user]\n${prompt.user}` : prompt.user;

import { z } from "zod";
import type { Platform } from "../../core/entities/document";
import type {
  PlatformEvidence,
  PlatformStepResult,
} from "../../core/entities/workflow";
import type { WorkflowConfig } from "../../core/entities/workflowConfig";
import type { ModelGatewayPort } from "../../core/ports/outboundPorts";
import { describeBoundaryError } from "../../core/entities/appError";
import indicatorSources from "../data/platformIndicators.json";
import { callOptionsFor } from "../prompts/callOptions";
import { platformPrompt, renderPrompt } from "../prompts/promptTemplates";
import { describeParseError, tolerantParse } from "../parsing/tolerantParse";

export const PLATFORM_AGENT = "platform_detector";

type ConcretePlatform = keyof PlatformEvidence;

const concretePlatforms: readonly ConcretePlatform[] = [
  "windows",
  "linux",
  "macos",
];

const indicators: Record<ConcretePlatform, RegExp[]> = {
  windows: indicatorSources.windows.map((source) => new RegExp(source, "i")),
  linux: indicatorSources.linux.map((source) => new RegExp(source, "i")),
  macos: indicatorSources.macos.map((source) => new RegExp(source, "i")),
};

const hintAliases: Record<string, ConcretePlatform> = {
  windows: "windows",
  win: "windows",
  linux: "linux",
  macos: "macos",
  mac: "macos",
  osx: "macos",
  "os x": "macos",
};

const fallbackSchema = z.object({ platform: z.string() });

const normalizePlatform = (label: string): Platform | null => {
  const lower = label.trim().toLowerCase();
  if (lower === "multiple" || lower === "unknown") {
    return lower;
  }
  return hintAliases[lower] ?? null;
};

export const collectEvidence = (
  text: string,
  platformHints: readonly string[],
): PlatformEvidence => {
  const evidence: PlatformEvidence = { windows: 0, linux: 0, macos: 0 };

  for (const platform of concretePlatforms) {
    evidence[platform] = indicators[platform].filter((pattern) =>
      pattern.test(text),
    ).length;
  }

  for (const hint of platformHints) {
    const platform = hintAliases[hint.trim().toLowerCase()];
    if (platform) {
      evidence[platform] += 1;
    }
  }

  return evidence;
};

/**
 * Maps evidence to a label: a close runner-up (at least half the leader and at least 2) or a tied lead means `multiple`.
 * Returns null when there is no evidence at all.
 */
export const decidePlatform = (evidence: PlatformEvidence): Platform | null => {
  const ranked = concretePlatforms
    .map((platform) => ({ platform, points: evidence[platform] }))
    .sort((a, b) => b.points - a.points);

  const leader = ranked[0];
  const runnerUp = ranked[1];
  if (!leader || leader.points === 0) {
    return null;
  }

  if (runnerUp && runnerUp.points > 0) {
    if (runnerUp.points === leader.points) {
      return "multiple";
    }
    if (runnerUp.points >= 2 && runnerUp.points * 2 >= leader.points) {
      return "multiple";
    }
  }

  return leader.platform;
};

/**
 * Keyword-first platform detection with an optional model fallback for texts carrying no indicators.
 */
export class PlatformDetectionService {
  constructor(private readonly gateway: ModelGatewayPort) {}

  async detect(
    text: string,
    platformHints: readonly string[],
    config: WorkflowConfig,
  ): Promise<PlatformStepResult> {
    const evidence = collectEvidence(text, platformHints);
    const targets = [...config.platform.targets];
    const decided = decidePlatform(evidence);

    if (decided) {
      return this.result(decided, "keywords", evidence, targets, []);
    }

    if (!config.platform.fallbackEnabled) {
      return this.result("unknown", "none", evidence, targets, []);
    }

    const prompt = platformPrompt(text);
    const rendered = renderPrompt(prompt);
    const response = await this.gateway.complete(
      prompt,
      callOptionsFor(config, PLATFORM_AGENT),
    );

    if (response.isErr()) {
      const message = describeBoundaryError(response.error);
      return this.result("unknown", "none", evidence, targets, [
        `Platform fallback failed: ${message}`,
      ], { prompt: rendered, error: message });
    }

    const parsed = tolerantParse(response.value, fallbackSchema);
    if (parsed.isErr()) {
      const message = describeParseError(parsed.error);
      return this.result("unknown", "none", evidence, targets, [
        `Platform fallback answer unusable: ${message}`,
      ], { prompt: rendered, response: response.value, error: message });
    }

    const platform = normalizePlatform(parsed.value.platform);
    if (!platform) {
      return this.result("unknown", "none", evidence, targets, [
        `Platform fallback returned unsupported label '${parsed.value.platform}'.`,
      ], { prompt: rendered, response: response.value });
    }

    return this.result(platform, "model", evidence, targets, [], {
      prompt: rendered,
      response: response.value,
    });
  }

  private result(
    platform: Platform,
    source: PlatformStepResult["source"],
    evidence: PlatformEvidence,
    targets: Platform[],
    warnings: string[],
    fallback?: PlatformStepResult["fallback"],
  ): PlatformStepResult {
    return {
      platform,
      source,
      evidence,
      targets,
      excluded: platform !== "multiple" && !targets.includes(platform),
      ...(fallback ? { fallback } : {}),
      warnings,
    };
  }
}

import { stringify } from "yaml";
import { validateRule } from "../../application/services/ruleValidator";
import type { DocumentEntity } from "../../core/entities/document";
import type { RuleDraft } from "../../core/entities/rule";
import {
  parseWorkflowConfig,
  type WorkflowConfig,
} from "../../core/entities/workflowConfig";

export const threatReport: DocumentEntity = {
  id: "doc-1",
  title: "Loader abuses encoded PowerShell",
  content:
    "Attackers ran powershell.exe -enc SQBFAFgA from cmd.exe and created HKLM\\Software\\Run keys. Event ID 4688 recorded the launch.",
  platformHints: [],
};

export const encodedPowershellRule = {
  title: "Encoded PowerShell launched from cmd",
  description: "Detects cmd.exe spawning powershell.exe with an encoded command.",
  status: "experimental",
  logsource: { category: "process_creation", product: "windows" },
  detection: {
    selection: {
      "ParentImage|endswith": "\\cmd.exe",
      "CommandLine|contains": "-enc",
    },
    condition: "selection",
  },
  tags: ["attack.execution", "attack.t1059.001"],
  level: "high",
};

export const runKeyRule = {
  title: "Run key persistence via reg.exe",
  description: "Detects reg.exe writing to the Run key.",
  logsource: { category: "registry_set", product: "windows" },
  detection: {
    selection: { "TargetObject|contains": "\\Software\\Run" },
    condition: "selection",
  },
  tags: ["attack.persistence"],
  level: "medium",
};

/**
 * One extraction agent without QA keeps model scripts short; tests that need the full roster pass their own.
 */
export const testConfig = (overrides: Record<string, unknown> = {}): WorkflowConfig =>
  parseWorkflowConfig({
    extraction: {
      roster: [
        {
          name: "cmdline",
          observableType: "command_line",
          promptTemplateId: "extract.command_line",
          qaEnabled: false,
        },
      ],
    },
    transport: { timeoutMs: 1_000, retries: 0, baseDelayMs: 0 },
    ...overrides,
  });

export const draftFrom = (rule: unknown, id: string, index = 0): RuleDraft => ({
  id,
  index,
  raw: stringify(rule),
  attempts: 1,
  ...validateRule(rule),
});

import { z } from "zod";
import {
  severityLevels,
  type DetectionTree,
  type LogSource,
  type RuleFields,
  type RuleValidation,
  type Selection,
  type Severity,
} from "../../core/entities/rule";

export const knownModifiers: ReadonlySet<string> = new Set([
  "contains",
  "startswith",
  "endswith",
  "all",
  "re",
  "base64",
  "base64offset",
  "windash",
  "cidr",
  "exists",
  "gt",
  "gte",
  "lt",
  "lte",
  "cased",
  "utf16le",
  "utf16be",
  "wide",
]);

const knownStatuses = new Set([
  "experimental",
  "test",
  "stable",
  "deprecated",
  "unsupported",
]);

const conditionKeywords = new Set(["and", "or", "not", "of", "all", "them"]);
const reservedDetectionKeys = new Set(["condition", "timeframe"]);

const fieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const fieldMapSchema = z.record(
  z.string(),
  z.union([fieldValueSchema, z.array(fieldValueSchema)]),
);
const selectionSchema = z.union([
  fieldMapSchema,
  z.array(fieldMapSchema),
  z.array(fieldValueSchema),
]);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isSeverity = (value: string): value is Severity =>
  severityLevels.some((level) => level === value);

export const fieldNameOf = (key: string): string => key.split("|")[0] ?? key;

const validateModifiers = (
  selectionName: string,
  selection: Selection,
  errors: string[],
): void => {
  const items: unknown[] = Array.isArray(selection) ? selection : [selection];
  const maps = items.filter(isRecord);

  for (const map of maps) {
    for (const key of Object.keys(map)) {
      const [, ...modifiers] = key.split("|");
      for (const modifier of modifiers) {
        if (!knownModifiers.has(modifier.toLowerCase())) {
          errors.push(
            `Unknown modifier '${modifier}' on field '${fieldNameOf(key)}' in selection '${selectionName}'.`,
          );
        }
      }
    }
  }
};

const wildcardPattern = (identifier: string): RegExp =>
  new RegExp(
    `^${identifier
      .split("*")
      .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
      .join(".*")}$`,
  );

/**
 * Checks a detection condition against the defined selection names.
 * Supports `and`, `or`, `not`, parentheses, `N of`, `all of`, `them` and `name*` wildcards.
 */
export const validateCondition = (
  condition: string,
  selectionNames: readonly string[],
): string[] => {
  const errors: string[] = [];

  if (condition.includes("|")) {
    errors.push("Aggregation pipes ('|') are not supported in conditions.");
  }
  if (/\bnear\b/i.test(condition)) {
    errors.push("The 'near' operator is not supported in conditions.");
  }

  const tokens = condition.match(/\(|\)|[^\s()|]+/g) ?? [];
  if (tokens.length === 0) {
    errors.push("Condition is empty.");
    return errors;
  }

  let depth = 0;
  for (const token of tokens) {
    if (token === "(") {
      depth += 1;
      continue;
    }
    if (token === ")") {
      depth -= 1;
      if (depth < 0) {
        break;
      }
      continue;
    }

    const lower = token.toLowerCase();
    if (conditionKeywords.has(lower) || /^\d+$/.test(token)) {
      continue;
    }

    if (token.includes("*")) {
      const pattern = wildcardPattern(token);
      if (!selectionNames.some((name) => pattern.test(name))) {
        errors.push(`Condition wildcard '${token}' matches no selection.`);
      }
      continue;
    }

    if (!selectionNames.includes(token)) {
      errors.push(`Condition references undefined selection '${token}'.`);
    }
  }

  if (depth !== 0) {
    errors.push("Condition has unbalanced parentheses.");
  }

  return errors;
};

const readLogSource = (value: unknown, errors: string[]): LogSource | null => {
  if (!isRecord(value)) {
    errors.push("Missing required field: logsource (an object).");
    return null;
  }

  const logSource: LogSource = {};
  for (const key of ["category", "product", "service"] as const) {
    const entry = value[key];
    if (typeof entry === "string" && entry.trim().length > 0) {
      logSource[key] = entry.trim();
    } else if (entry !== undefined) {
      errors.push(`logsource.${key} must be a non-empty string.`);
    }
  }

  if (!logSource.category && !logSource.product && !logSource.service) {
    errors.push("logsource must specify at least one of category, product or service.");
  }
  return logSource;
};

const readDetection = (
  value: unknown,
  errors: string[],
): DetectionTree | null => {
  if (!isRecord(value)) {
    errors.push("Missing required field: detection (an object).");
    return null;
  }

  const condition = value.condition;
  if (typeof condition !== "string" || condition.trim().length === 0) {
    errors.push("detection.condition must be a non-empty string.");
  }

  const selections: Record<string, Selection> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (reservedDetectionKeys.has(name)) {
      continue;
    }
    const parsed = selectionSchema.safeParse(entry);
    if (!parsed.success) {
      errors.push(
        `Selection '${name}' must be a field map, a list of field maps or a keyword list.`,
      );
      continue;
    }
    if (
      (Array.isArray(parsed.data) && parsed.data.length === 0) ||
      (isRecord(parsed.data) && Object.keys(parsed.data).length === 0)
    ) {
      errors.push(`Selection '${name}' is empty.`);
      continue;
    }
    validateModifiers(name, parsed.data, errors);
    selections[name] = parsed.data;
  }

  const names = Object.keys(value).filter((name) => !reservedDetectionKeys.has(name));
  if (names.length === 0) {
    errors.push("detection must define at least one selection.");
  }

  if (typeof condition !== "string") {
    return null;
  }

  errors.push(...validateCondition(condition, names));
  return { selections, condition: condition.trim() };
};

/**
 * Validates one generated rule object. `fields` is only populated when the rule is valid.
 */
export const validateRule = (
  rule: unknown,
): { validation: RuleValidation; fields: RuleFields | null } => {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isRecord(rule)) {
    return {
      validation: { valid: false, errors: ["Rule must be an object."], warnings },
      fields: null,
    };
  }

  const title = typeof rule.title === "string" ? rule.title.trim() : "";
  if (!title) {
    errors.push("Missing required field: title.");
  }

  const logSource = readLogSource(rule.logsource, errors);
  const detection = readDetection(rule.detection, errors);

  let description = "";
  if (typeof rule.description === "string" && rule.description.trim()) {
    description = rule.description.trim();
  } else {
    warnings.push("Rule has no description.");
  }

  let severity: Severity | undefined;
  if (rule.level !== undefined) {
    const level = typeof rule.level === "string" ? rule.level.toLowerCase() : "";
    if (isSeverity(level)) {
      severity = level;
    } else {
      errors.push(
        `Invalid level '${String(rule.level)}'; expected one of ${severityLevels.join(", ")}.`,
      );
    }
  }

  let tags: string[] = [];
  if (rule.tags !== undefined) {
    if (
      Array.isArray(rule.tags) &&
      rule.tags.every((tag): tag is string => typeof tag === "string")
    ) {
      tags = rule.tags;
    } else {
      errors.push("tags must be a list of strings.");
    }
  }
  if (tags.length === 0) {
    warnings.push("Rule has no tags.");
  }

  if (typeof rule.status === "string" && !knownStatuses.has(rule.status)) {
    warnings.push(`Unknown status '${rule.status}'.`);
  }

  const valid = errors.length === 0;
  return {
    validation: { valid, errors, warnings },
    fields:
      valid && logSource && detection
        ? {
            title,
            description,
            logSource,
            detection,
            tags,
            ...(severity ? { severity } : {}),
          }
        : null,
  };
};

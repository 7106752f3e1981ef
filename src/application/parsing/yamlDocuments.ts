import { err, ok, type Result } from "neverthrow";
import { parseAllDocuments } from "yaml";
import { excerptOf, extractJson, type ParseError } from "./tolerantParse";

const FENCED_BLOCK = /```(?:ya?ml|json)?[ \t]*\r?\n([\s\S]*?)```/g;

/**
 * A column-0 rule key, an optional list dash before it, or the start of a JSON value or document marker.
 */
const DOCUMENT_START =
  /^(?:-[ \t]+)?(?:rules|title|id|name|status|description|author|date|modified|references|tags|logsource|detection|falsepositives|level|fields|related)[ \t]*:|^[{[]|^---/;

const isCollection = (value: unknown): boolean =>
  typeof value === "object" && value !== null;

/**
 * Fenced blocks joined as separate documents; otherwise the text from the first line that starts a rule.
 */
const yamlBody = (text: string): string | null => {
  const blocks = [...text.matchAll(FENCED_BLOCK)]
    .map((match) => match[1]?.trim() ?? "")
    .filter((block) => block.length > 0);
  if (blocks.length > 0) {
    return blocks.join("\n---\n");
  }

  const lines = text.split(/\r?\n/);
  const start = lines.findIndex((line) => DOCUMENT_START.test(line));
  return start < 0 ? null : lines.slice(start).join("\n");
};

/**
 * Reads every YAML document in model output or a reviewer edit.
 * Text that is not YAML collections falls back to the tolerant JSON extraction.
 */
export const extractYamlDocuments = (text: string): Result<unknown[], ParseError> => {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return err({ stage: "empty", message: "Response was empty.", excerpt: "" });
  }

  let yamlError: string | null = null;
  const body = yamlBody(trimmed);
  if (body !== null) {
    const values: unknown[] = [];
    for (const document of parseAllDocuments(body)) {
      const [first] = document.errors;
      if (first) {
        yamlError = first.message;
        break;
      }
      const value: unknown = document.toJS();
      if (value !== null && value !== undefined) {
        values.push(value);
      }
    }
    if (yamlError === null && values.length > 0 && values.every(isCollection)) {
      return ok(values);
    }
  }

  const json = extractJson(trimmed);
  if (json.isOk()) {
    return ok([json.value]);
  }
  return yamlError === null
    ? err(json.error)
    : err({ stage: "yaml", message: yamlError, excerpt: excerptOf(trimmed) });
};

import { err, ok, Result } from "neverthrow";
import type { z } from "zod";

export type ParseErrorStage = "empty" | "json" | "yaml" | "schema";

export type ParseError = {
  stage: ParseErrorStage;
  message: string;
  excerpt: string;
};

const CODE_FENCE = /```[a-zA-Z]*[ \t]*\r?\n?([\s\S]*?)```/;
const TRAILING_COMMA = /,(\s*[}\]])/g;

export const excerptOf = (text: string): string =>
  text.length > 200 ? `${text.slice(0, 200)}...` : text;

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (error) => (error instanceof Error ? error.message : String(error)),
);

/**
 * Returns the body of the first Markdown code fence, or the text unchanged when there is none.
 */
export const stripCodeFence = (text: string): string => {
  const body = CODE_FENCE.exec(text)?.[1];
  return body === undefined ? text : body.trim();
};

/**
 * Finds the first balanced JSON object or array, skipping brackets inside string literals.
 */
export const findBalancedBlock = (text: string): string | null => {
  const start = text.search(/[{[]/);
  if (start < 0) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < text.length; index += 1) {
    const char = text[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === "{" || char === "[") {
      depth += 1;
    } else if (char === "}" || char === "]") {
      depth -= 1;
      if (depth === 0) {
        return text.slice(start, index + 1);
      }
    }
  }

  return null;
};

/**
 * Recovers a JSON value from model output.
 * Order: whole text, first fenced block, first balanced block; each retried once without trailing commas.
 * Anything else is a ParseError, never a guess.
 */
export const extractJson = (text: string): Result<unknown, ParseError> => {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return err({ stage: "empty", message: "Response was empty.", excerpt: "" });
  }

  const unfenced = stripCodeFence(trimmed);
  const candidates = [unfenced];
  const block = findBalancedBlock(unfenced);
  if (block !== null && block !== unfenced) {
    candidates.push(block);
  }

  let lastError = "No JSON value found.";
  for (const candidate of candidates) {
    for (const variant of [candidate, candidate.replace(TRAILING_COMMA, "$1")]) {
      const parsed = parseJson(variant);
      if (parsed.isOk()) {
        return ok(parsed.value);
      }
      lastError = parsed.error;
    }
  }

  return err({ stage: "json", message: lastError, excerpt: excerptOf(trimmed) });
};

/**
 * Extracts JSON from model output and validates it against the expected shape.
 */
export const tolerantParse = <Schema extends z.ZodTypeAny>(
  text: string,
  schema: Schema,
): Result<z.infer<Schema>, ParseError> =>
  extractJson(text).andThen((value): Result<z.infer<Schema>, ParseError> => {
    const validated = schema.safeParse(value);
    if (!validated.success) {
      return err({
        stage: "schema",
        message: validated.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
          .join("; "),
        excerpt: excerptOf(text.trim()),
      });
    }
    return ok(validated.data);
  });

export const describeParseError = (error: ParseError): string =>
  `${error.stage} parse error: ${error.message}`;

import { readFile } from "node:fs/promises";
import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import type {
  ClassifierLoadError,
  ClassifierModel,
} from "../../core/entities/contentFilter";
import type { ClassifierArtifactPort } from "../../core/ports/inboundPorts";

const artifactSchema = z.object({
  version: z.string().min(1),
  bias: z.number(),
  weights: z.record(z.string(), z.number()),
  trainedAt: z.string().optional(),
  notes: z.string().optional(),
});

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (error) => (error instanceof Error ? error.message : String(error)),
);

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Reads the trained logistic classifier from a JSON artifact on disk.
 * The artifact is read once per adapter; a failed read is retried on the next load.
 */
export class JsonClassifierArtifact implements ClassifierArtifactPort {
  private cached: ClassifierModel | null = null;

  constructor(private readonly artifactPath: string) {}

  async load(): Promise<Result<ClassifierModel, ClassifierLoadError>> {
    if (this.cached) {
      return ok(this.cached);
    }

    let text: string;
    try {
      text = await readFile(this.artifactPath, "utf8");
    } catch (error) {
      return err({
        kind: "unavailable",
        message: isMissingFile(error)
          ? `No classifier artifact at ${this.artifactPath}.`
          : `Classifier artifact at ${this.artifactPath} could not be read: ${
              error instanceof Error ? error.message : String(error)
            }`,
      });
    }

    const json = parseJson(text);
    if (json.isErr()) {
      return err({
        kind: "corrupt",
        message: `Classifier artifact at ${this.artifactPath} is not valid JSON.`,
        details: [json.error],
      });
    }

    const parsed = artifactSchema.safeParse(json.value);
    if (!parsed.success) {
      return err({
        kind: "corrupt",
        message: `Classifier artifact at ${this.artifactPath} has an unexpected shape.`,
        details: parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
        ),
      });
    }

    this.cached = {
      version: parsed.data.version,
      bias: parsed.data.bias,
      weights: parsed.data.weights,
    };
    return ok(this.cached);
  }
}

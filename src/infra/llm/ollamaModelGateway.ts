import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { ModelGatewayError } from "../../core/entities/appError";
import type {
  ModelCallOptions,
  ModelGatewayPort,
  ModelPrompt,
} from "../../core/ports/outboundPorts";
import { HttpJsonClient } from "../http/httpJsonClient";
import { ollamaErrorCode } from "./ollamaErrors";

const chatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
});

/**
 * Chat-model access for every workflow agent; transport retries happen here, never in the stages.
 */
export class OllamaModelGateway implements ModelGatewayPort {
  constructor(
    private readonly baseUrl: string,
    private readonly defaultModel: string,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async complete(
    prompt: ModelPrompt,
    options: ModelCallOptions,
  ): Promise<Result<string, ModelGatewayError>> {
    const messages = [
      ...(prompt.system ? [{ role: "system", content: prompt.system }] : []),
      { role: "user", content: prompt.user },
    ];

    const response = await this.httpClient.requestJson({
      url: `${this.baseUrl}/api/chat`,
      method: "POST",
      body: {
        model: options.model ?? this.defaultModel,
        stream: false,
        messages,
        options: { temperature: options.temperature },
      },
      timeoutMs: options.timeoutMs,
      retries: options.retries,
      retryDelayMs: options.retryDelayMs,
    });

    if (response.isErr()) {
      return err({
        source: "model",
        code: ollamaErrorCode(response.error),
        provider: "ollama",
        message: `Agent ${options.agent}: ${response.error.message}`,
        retryable: response.error.retryable,
        httpStatus: response.error.httpStatus,
        cause: response.error.cause,
      });
    }

    const parsed = chatResponseSchema.safeParse(response.value);
    const content = parsed.success ? parsed.data.message.content.trim() : "";
    if (!content) {
      return err({
        source: "model",
        code: "invalid_response",
        provider: "ollama",
        message: `Ollama chat payload for agent ${options.agent} did not contain message.content.`,
        retryable: false,
      });
    }

    return ok(content);
  }
}

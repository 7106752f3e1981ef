import { describe, expect, it, vi } from "vitest";
import { HttpJsonClient } from "../http/httpJsonClient";
import { checkEmbeddingBatch, OllamaEmbedding } from "./ollamaEmbedding";
import { OllamaModelGateway } from "./ollamaModelGateway";

const callOptions = {
  agent: "ranker",
  temperature: 0,
  timeoutMs: 500,
  retries: 0,
  retryDelayMs: 0,
};

const httpReturning = (status: number, body: unknown) => {
  const fetch = vi.fn(
    async (_input: string, _init: RequestInit) =>
      new Response(typeof body === "string" ? body : JSON.stringify(body), { status }),
  );
  return { fetch, client: new HttpJsonClient({ fetch, sleep: async () => undefined }) };
};

describe("OllamaModelGateway", () => {
  it("sends system and user messages to the default model", async () => {
    const http = httpReturning(200, { message: { content: '  {"score": 80}\n' } });
    const gateway = new OllamaModelGateway("http://ollama.test", "qwen-test", http.client);

    const reply = await gateway.complete({ system: "be terse", user: "rank this" }, callOptions);

    expect(reply._unsafeUnwrap()).toBe('{"score": 80}');
    const [url, init] = http.fetch.mock.calls[0] ?? [];
    expect(url).toBe("http://ollama.test/api/chat");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "qwen-test",
      stream: false,
      messages: [
        { role: "system", content: "be terse" },
        { role: "user", content: "rank this" },
      ],
      options: { temperature: 0 },
    });
  });

  it("reports a model that was never pulled as an invalid response", async () => {
    const http = httpReturning(404, { error: "model 'missing' not found" });
    const gateway = new OllamaModelGateway("http://ollama.test", "missing", http.client);

    const failure = (await gateway.complete({ user: "x" }, callOptions))._unsafeUnwrapErr();

    expect(failure.code).toBe("invalid_response");
    expect(failure.retryable).toBe(false);
    expect(failure.message).toBe(
      'Agent ranker: HTTP 404: {"error":"model \'missing\' not found"}',
    );
  });

  it("maps 429 to rate_limited", async () => {
    const http = httpReturning(429, "");
    const gateway = new OllamaModelGateway("http://ollama.test", "m", http.client);

    const failure = (await gateway.complete({ user: "x" }, callOptions))._unsafeUnwrapErr();

    expect(failure.code).toBe("rate_limited");
    expect(failure.message).toBe("Agent ranker: HTTP 429");
  });

  it("rejects an empty reply", async () => {
    const http = httpReturning(200, { message: { content: "   " } });
    const gateway = new OllamaModelGateway("http://ollama.test", "m", http.client);

    const failure = (await gateway.complete({ user: "x" }, callOptions))._unsafeUnwrapErr();

    expect(failure.code).toBe("invalid_response");
  });
});

describe("OllamaEmbedding", () => {
  const options = { baseUrl: "http://ollama.test", model: "embed-test", dimensions: 3, timeoutMs: 500 };

  it("returns one vector per text", async () => {
    const http = httpReturning(200, { embeddings: [[1, 0, 0], [0, 1, 0]] });

    const vectors = await new OllamaEmbedding(options, http.client).embedTexts(["a", "b"]);

    expect(vectors._unsafeUnwrap()).toEqual([[1, 0, 0], [0, 1, 0]]);
    expect(JSON.parse(String(http.fetch.mock.calls[0]?.[1].body))).toEqual({
      model: "embed-test",
      input: ["a", "b"],
      truncate: true,
    });
  });

  it("skips the call for an empty batch", async () => {
    const http = httpReturning(200, { embeddings: [] });

    expect((await new OllamaEmbedding(options, http.client).embedTexts([]))._unsafeUnwrap()).toEqual([]);
    expect(http.fetch).not.toHaveBeenCalled();
  });

  it("refuses vectors that do not fit the index", () => {
    expect(checkEmbeddingBatch([[1, 2]], 1, 3)._unsafeUnwrapErr().message).toBe(
      "Embedding 0 has 2 dimensions; the rule index stores 3.",
    );
    expect(checkEmbeddingBatch([[1, 2, 3]], 2, 3)._unsafeUnwrapErr().code).toBe(
      "invalid_response",
    );
    expect(checkEmbeddingBatch([[1, Number.NaN, 3]], 1, 3)._unsafeUnwrapErr().code).toBe(
      "validation_error",
    );
  });
});

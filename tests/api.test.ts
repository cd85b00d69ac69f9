// ============================================
// REST API Tests — express on an ephemeral localhost port
// ============================================

import type { Server } from "http";
import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest";
import { createApp } from "../src/api/index.js";
import type { AnswerOptions, Pipeline } from "../src/app/types.js";
import { createRefusal, type AnswerResult } from "../src/evidence/types.js";
import { synthesisError } from "../src/lib/errors.js";
import { EmbeddingIndex } from "../src/store/embeddingIndex.js";
import { IndexHandle } from "../src/store/indexHandle.js";
import { narrativeChunk } from "./helpers/factories.js";

class StubPipeline implements Pipeline {
  calls: Array<{ question: string; options?: AnswerOptions }> = [];
  next: () => Promise<AnswerResult> = async () => createRefusal(["nothing"]);

  answer(question: string, options?: AnswerOptions): Promise<AnswerResult> {
    this.calls.push({ question, options });
    return this.next();
  }
}

describe("REST API", () => {
  const pipeline = new StubPipeline();
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const index = new EmbeddingIndex();
    index.add(narrativeChunk("a", "memo", "text"), [1, 0]);
    const handle = new IndexHandle(index.freeze(), () => new Date("2024-06-01T00:00:00.000Z"));

    const app = createApp(pipeline, handle);
    server = app.listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));

    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Expected a TCP address");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  beforeEach(() => {
    pipeline.calls = [];
    pipeline.next = async () => createRefusal(["nothing"]);
  });

  function postAnswer(body: string, headers: Record<string, string> = {}): Promise<Response> {
    return fetch(`${baseUrl}/api/v1/answer`, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body,
    });
  }

  it("reports the served snapshot on /health", async () => {
    const res = await fetch(`${baseUrl}/api/v1/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "ok",
      generation: 1,
      builtAt: "2024-06-01T00:00:00.000Z",
      size: 1,
      bySourceType: { narrative: 1, "tabular-row": 0, "chat-message": 0 },
    });
  });

  it("passes the validated question, filters and request id to the pipeline", async () => {
    const res = await postAnswer(
      JSON.stringify({ question: "  Which queue?  ", filters: { sourceTypes: ["narrative"] } }),
      { "X-Request-Id": "req-123" }
    );

    expect(res.status).toBe(200);
    expect(res.headers.get("x-request-id")).toBe("req-123");
    expect(await res.json()).toEqual({ status: "insufficient_evidence", missing: ["nothing"] });
    expect(pipeline.calls).toEqual([
      { question: "Which queue?", options: { filters: { sourceTypes: ["narrative"] }, requestId: "req-123" } },
    ]);
  });

  it("rejects an empty question", async () => {
    const res = await postAnswer(JSON.stringify({ question: "   " }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "VALIDATION_ERROR",
      message: "Invalid request body",
      details: [{ field: "question", message: "Question cannot be empty" }],
    });
    expect(pipeline.calls).toEqual([]);
  });

  it("rejects unknown filter keys", async () => {
    const res = await postAnswer(JSON.stringify({ question: "Which?", filters: { tag: "x" } }));

    expect(res.status).toBe(400);
    expect(pipeline.calls).toEqual([]);
  });

  it("rejects malformed JSON", async () => {
    const res = await postAnswer("{not json");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "VALIDATION_ERROR", message: "Request body must be valid JSON" });
  });

  it("turns a fatal pipeline error into a 503 refusal", async () => {
    pipeline.next = async () => {
      throw synthesisError("Decision synthesis failed after one retry");
    };

    const res = await postAnswer(JSON.stringify({ question: "Which queue?" }));

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      status: "insufficient_evidence",
      missing: ["Evidence was found but no verifiable recommendation could be produced from it."],
    });
  });
});

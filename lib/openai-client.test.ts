import OpenAI from "openai";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ProviderError, errorMessage } from "./errors";
import { StudyBuddyClient } from "./openai-client";
import type { LocalFile, ProviderSession } from "./types";

type Reply = { status?: number; body: unknown };
type Call = { key: string; body: unknown };

/** Answers SDK requests from a route table, keyed by "METHOD /path". */
function fakeApi(routes: Record<string, Reply>) {
  const calls: Call[] = [];
  const fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const key = `${(init?.method ?? "GET").toUpperCase()} ${url.pathname}`;
    const body = init?.body;
    calls.push({ key, body: typeof body === "string" ? JSON.parse(body) : undefined });

    const reply = routes[key] ?? { status: 404, body: { error: { message: `No route for ${key}` } } };
    return new Response(JSON.stringify(reply.body), {
      status: reply.status ?? 200,
      headers: { "content-type": "application/json" },
    });
  };
  const client = new StudyBuddyClient(new OpenAI({ apiKey: "test-secret", maxRetries: 0, fetch }), "test-model");
  return { client, calls, keys: () => calls.map(c => c.key) };
}

function handle(overrides: Partial<ProviderSession> = {}): ProviderSession {
  return {
    assistantId: "asst-1",
    vectorStore: { id: "vs-1", fileIds: new Set() },
    chatThreadId: "thread-1",
    quizThreadId: "thread-2",
    ...overrides,
  };
}

const runRoutes = (thread: string, run: Record<string, unknown>): Record<string, Reply> => ({
  [`POST /v1/threads/${thread}/messages`]: { body: { id: "msg-1", object: "thread.message" } },
  [`POST /v1/threads/${thread}/runs`]: { body: { id: "run-1", object: "thread.run", status: "queued" } },
  [`GET /v1/threads/${thread}/runs/run-1`]: { body: { id: "run-1", object: "thread.run", usage: null, last_error: null, ...run } },
});

const assistantReply = (content: unknown[]): Reply => ({
  body: {
    object: "list",
    data: [{ id: "msg-2", object: "thread.message", role: "assistant", content }],
    has_more: false,
  },
});

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("StudyBuddyClient", () => {
  it("uploads file bytes for the assistants purpose", async () => {
    const { client, keys } = fakeApi({ "POST /v1/files": { body: { id: "file-9", object: "file" } } });
    const file: LocalFile = { name: "notes.txt", size: 5, type: "text/plain", data: new TextEncoder().encode("hello") };

    expect(await client.uploadFile(file)).toBe("file-9");
    expect(keys()).toEqual(["POST /v1/files"]);
  });

  describe("createSession", () => {
    it("creates a vector store and an assistant searching it", async () => {
      const { client, calls } = fakeApi({
        "POST /v1/vector_stores": { body: { id: "vs-1", object: "vector_store" } },
        "POST /v1/assistants": { body: { id: "asst-1", object: "assistant" } },
      });

      const session = await client.createSession();

      expect(session).toEqual({ assistantId: "asst-1", vectorStore: { id: "vs-1", fileIds: new Set() }, chatThreadId: null, quizThreadId: null });
      expect(calls[1].body).toMatchObject({
        model: "test-model",
        tools: [{ type: "file_search" }],
        tool_resources: { file_search: { vector_store_ids: ["vs-1"] } },
      });
    });

    it("deletes the new vector store when the assistant cannot be created", async () => {
      const { client, keys } = fakeApi({
        "POST /v1/vector_stores": { body: { id: "vs-1", object: "vector_store" } },
        "POST /v1/assistants": { status: 404, body: { error: { message: "The model `test-model` does not exist" } } },
        "DELETE /v1/vector_stores/vs-1": { body: { id: "vs-1", deleted: true } },
      });

      const error = await client.createSession().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ status: 404 });
      expect(keys()).toEqual(["POST /v1/vector_stores", "POST /v1/assistants", "DELETE /v1/vector_stores/vs-1"]);
    });

    it("keeps the original error when the cleanup fails too", async () => {
      const { client } = fakeApi({
        "POST /v1/vector_stores": { body: { id: "vs-1", object: "vector_store" } },
        "POST /v1/assistants": { status: 400, body: { error: { message: "Invalid tools" } } },
        "DELETE /v1/vector_stores/vs-1": { status: 500, body: { error: { message: "Internal error" } } },
      });

      const error = await client.createSession().catch((e: unknown) => e);

      expect(error).toMatchObject({ name: "ProviderError", status: 400 });
      expect(errorMessage(error)).toContain("Invalid tools");
      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining("vector store cleanup failed"));
    });
  });

  describe("attach", () => {
    it("resolves once indexing completes", async () => {
      const { client, keys } = fakeApi({
        "POST /v1/vector_stores/vs-1/files": { body: { id: "file-1", status: "in_progress" } },
        "GET /v1/vector_stores/vs-1/files/file-1": { body: { id: "file-1", status: "completed", last_error: null } },
      });

      await expect(client.attach("file-1", handle())).resolves.toBeUndefined();
      expect(keys()).toEqual(["POST /v1/vector_stores/vs-1/files", "GET /v1/vector_stores/vs-1/files/file-1"]);
    });

    it("turns a failed indexing status into a ProviderError", async () => {
      const { client } = fakeApi({
        "POST /v1/vector_stores/vs-1/files": { body: { id: "file-1", status: "in_progress" } },
        "GET /v1/vector_stores/vs-1/files/file-1": {
          body: { id: "file-1", status: "failed", last_error: { code: "unsupported_file", message: "File could not be parsed" } },
        },
      });

      const error = await client.attach("file-1", handle()).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ProviderError);
      expect(errorMessage(error)).toBe("File could not be parsed");
    });
  });

  describe("ask", () => {
    it("collects text, citation markers and usage from the run", async () => {
      const { client } = fakeApi({
        ...runRoutes("thread-1", {
          status: "completed",
          usage: { prompt_tokens: 12, completion_tokens: 8, total_tokens: 20 },
        }),
        "GET /v1/threads/thread-1/messages": assistantReply([
          {
            type: "text",
            text: {
              value: "Cells divide【4:0†source】. Chart: sandbox:/mnt/data/chart.csv",
              annotations: [
                { type: "file_citation", text: "【4:0†source】", file_citation: { file_id: "file-1" }, start_index: 12, end_index: 24 },
                { type: "file_path", text: "sandbox:/mnt/data/chart.csv", file_path: { file_id: "file-2" }, start_index: 33, end_index: 60 },
              ],
            },
          },
        ]),
      });

      const answer = await client.ask("How do cells divide?", handle());

      expect(answer).toEqual({
        text: "Cells divide【4:0†source】. Chart: sandbox:/mnt/data/chart.csv",
        markers: [
          { text: "【4:0†source】", fileId: "file-1" },
          { text: "sandbox:/mnt/data/chart.csv", fileId: "file-2" },
        ],
        usage: { promptTokens: 12, completionTokens: 8, totalTokens: 20 },
      });
    });

    it("raises when the run ends in any other status", async () => {
      const { client } = fakeApi(runRoutes("thread-1", { status: "expired" }));

      await expect(client.ask("hi", handle())).rejects.toThrow("Chat response generation did not complete: expired");
    });

    it("keeps the provider's status on API errors", async () => {
      const { client } = fakeApi({
        "POST /v1/threads/thread-1/messages": {
          status: 429,
          body: { error: { message: "Rate limit reached", type: "requests", code: "rate_limit_exceeded" } },
        },
      });

      const error = await client.ask("hi", handle()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ status: 429 });
      expect(errorMessage(error)).toContain("Rate limit reached");
    });

    it("refuses to run without a chat thread", async () => {
      const { client, calls } = fakeApi({});

      await expect(client.ask("hi", handle({ chatThreadId: null }))).rejects.toMatchObject({ status: 409 });
      expect(calls).toEqual([]);
    });
  });

  describe("generateQuiz", () => {
    it("attaches every file to the quiz prompt and returns the raw reply", async () => {
      const { client, calls } = fakeApi({
        ...runRoutes("thread-2", { status: "completed" }),
        "GET /v1/threads/thread-2/messages": assistantReply([{ type: "text", text: { value: "  []  ", annotations: [] } }]),
      });

      expect(await client.generateQuiz(["file-1", "file-2"], 4, handle())).toBe("[]");
      expect(calls[0].body).toMatchObject({
        role: "user",
        attachments: [
          { file_id: "file-1", tools: [{ type: "file_search" }] },
          { file_id: "file-2", tools: [{ type: "file_search" }] },
        ],
      });
      expect(calls[1].body).toMatchObject({ assistant_id: "asst-1" });
    });

    it("includes the run's last error in the message", async () => {
      const { client } = fakeApi(
        runRoutes("thread-2", { status: "failed", last_error: { code: "rate_limit_exceeded", message: "Quota hit" } }),
      );

      await expect(client.generateQuiz(["file-1"], 3, handle())).rejects.toThrow(
        "Quiz generation run did not complete: failed (Quota hit)",
      );
    });
  });
});

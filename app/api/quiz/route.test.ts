import { NextRequest } from "next/server";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { sessionStore } from "@/lib/session";
import { uploadDocuments } from "@/lib/study-buddy";
import { FakeProvider, localFile } from "@/test/fake-provider";
import { POST } from "./route";

const { getProviderClient } = vi.hoisted(() => ({ getProviderClient: vi.fn() }));
vi.mock("@/lib/openai-client", () => ({ getProviderClient }));

let provider: FakeProvider;

function quizRequest(sessionId: string | null, body: unknown) {
  const headers: Record<string, string> = { "content-type": "application/json" };
  if (sessionId) headers.cookie = `sb_session=${sessionId}`;
  return new NextRequest("http://localhost/api/quiz", { method: "POST", headers, body: JSON.stringify(body) });
}

async function sessionWithFile(id: string) {
  const session = sessionStore.open(id, provider);
  await uploadDocuments(session, provider, [localFile("notes.pdf")]);
  return session;
}

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => {});
  provider = new FakeProvider();
  getProviderClient.mockReturnValue(provider);
});

describe("POST /api/quiz", () => {
  it("answers 401 without a session cookie", async () => {
    const res = await POST(quizRequest(null, { count: 3 }));

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: "No active session. Reload the page to start a new one." });
  });

  it("rejects a count outside 1..10", async () => {
    await sessionWithFile("quiz-range");

    for (const count of [0, 11]) {
      const res = await POST(quizRequest("quiz-range", { count }));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Question count must be between 1 and 10." });
    }
    expect(provider.quizCalls).toEqual([]);
  });

  it("defaults to three questions", async () => {
    await sessionWithFile("quiz-default");
    provider.quizText = JSON.stringify([{ question: "Q?", options: ["a", "b"], correct: "b" }]);

    const res = await POST(quizRequest("quiz-default", {}));

    expect(res.status).toBe(200);
    expect(provider.quizCalls).toEqual([{ fileIds: ["file-1"], count: 3 }]);
    expect(await res.json()).toEqual({ items: [{ question: "Q?", options: ["a", "b"], correctIndex: 1 }], notice: null });
  });

  it("asks for files first", async () => {
    const res = await POST(quizRequest("quiz-empty", { count: 2 }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Please upload files before generating a quiz." });
  });
});

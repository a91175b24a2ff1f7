// lib/openai-client.ts
import OpenAI, { toFile } from "openai";
import {
  ASSISTANT_INSTRUCTIONS,
  ASSISTANT_NAME,
  CHAT_RESPONSE_TIMEOUT_MS,
  CHAT_RUN_INSTRUCTIONS,
  QUIZ_GENERATION_TIMEOUT_MS,
  QUIZ_RUN_INSTRUCTIONS,
  VECTOR_STORE_NAME,
  buildQuizPrompt,
} from "./config";
import { OPENAI_MODEL, requireEnv } from "./env";
import { ProviderError, errorMessage } from "./errors";
import { logWarn } from "./logger";
import type { CitationMarker, LocalFile, ProviderAnswer, ProviderSession, TokenUsage } from "./types";

export interface FileUploader {
  uploadFile(file: LocalFile): Promise<string>;
}

/**
 * Everything the app asks of the hosted assistant. Route handlers and the
 * study-buddy service only see this interface; tests swap in a fake.
 */
export interface ProviderClient extends FileUploader {
  deleteFile(fileId: string): Promise<void>;
  createSession(name?: string): Promise<ProviderSession>;
  closeSession(session: ProviderSession): Promise<void>;
  attach(fileId: string, session: ProviderSession): Promise<void>;
  detach(fileId: string, session: ProviderSession): Promise<void>;
  createThread(): Promise<string>;
  ask(question: string, session: ProviderSession): Promise<ProviderAnswer>;
  generateQuiz(fileIds: string[], count: number, session: ProviderSession): Promise<string>;
}

type RunOutcome = { text: string; markers: CitationMarker[]; usage: TokenUsage | null };

export class StudyBuddyClient implements ProviderClient {
  constructor(
    private readonly openai: OpenAI,
    private readonly model: string = OPENAI_MODEL,
  ) {}

  async uploadFile(file: LocalFile): Promise<string> {
    return this.call(`upload ${file.name}`, async () => {
      const uploadable = await toFile(file.data, file.name, { type: file.type || undefined });
      const created = await this.openai.files.create({ file: uploadable, purpose: "assistants" });
      return created.id;
    });
  }

  async deleteFile(fileId: string): Promise<void> {
    await this.call(`delete file ${fileId}`, () => this.openai.files.delete(fileId));
  }

  async createSession(name: string = VECTOR_STORE_NAME): Promise<ProviderSession> {
    const store = await this.call("create vector store", () => this.openai.vectorStores.create({ name }));
    let assistantId: string;
    try {
      const assistant = await this.call("create assistant", () =>
        this.openai.beta.assistants.create({
          name: ASSISTANT_NAME,
          instructions: ASSISTANT_INSTRUCTIONS,
          model: this.model,
          tools: [{ type: "file_search" }],
          tool_resources: { file_search: { vector_store_ids: [store.id] } },
        }),
      );
      assistantId = assistant.id;
    } catch (error) {
      await this.openai.vectorStores.delete(store.id).catch(cleanupError =>
        logWarn("vector store cleanup failed", { vectorStoreId: store.id, error: errorMessage(cleanupError) }),
      );
      throw error;
    }
    return {
      assistantId,
      vectorStore: { id: store.id, fileIds: new Set() },
      chatThreadId: null,
      quizThreadId: null,
    };
  }

  async closeSession(session: ProviderSession): Promise<void> {
    await this.call("delete assistant", () => this.openai.beta.assistants.delete(session.assistantId));
    await this.call("delete vector store", () => this.openai.vectorStores.delete(session.vectorStore.id));
  }

  async attach(fileId: string, session: ProviderSession): Promise<void> {
    const record = await this.call(`attach ${fileId}`, () =>
      this.openai.vectorStores.files.createAndPoll(session.vectorStore.id, { file_id: fileId }),
    );
    if (record.status === "failed") {
      throw new ProviderError(record.last_error?.message || "Vector store indexing failed.");
    }
  }

  async detach(fileId: string, session: ProviderSession): Promise<void> {
    await this.call(`detach ${fileId}`, () =>
      this.openai.vectorStores.files.delete(fileId, { vector_store_id: session.vectorStore.id }),
    );
  }

  async createThread(): Promise<string> {
    const thread = await this.call("create thread", () => this.openai.beta.threads.create());
    return thread.id;
  }

  async ask(question: string, session: ProviderSession): Promise<ProviderAnswer> {
    const threadId = session.chatThreadId;
    if (!threadId) throw new ProviderError("Chat thread has not been started.", 409);

    await this.call("send message", () =>
      this.openai.beta.threads.messages.create(threadId, { role: "user", content: question }),
    );
    return this.runAndCollect(threadId, session.assistantId, CHAT_RUN_INSTRUCTIONS, CHAT_RESPONSE_TIMEOUT_MS, "Chat response generation");
  }

  async generateQuiz(fileIds: string[], count: number, session: ProviderSession): Promise<string> {
    const threadId = session.quizThreadId;
    if (!threadId) throw new ProviderError("Quiz thread has not been started.", 409);

    await this.call("send quiz prompt", () =>
      this.openai.beta.threads.messages.create(threadId, {
        role: "user",
        content: buildQuizPrompt(count),
        attachments: fileIds.map(file_id => ({ file_id, tools: [{ type: "file_search" as const }] })),
      }),
    );
    const { text } = await this.runAndCollect(threadId, session.assistantId, QUIZ_RUN_INSTRUCTIONS, QUIZ_GENERATION_TIMEOUT_MS, "Quiz generation run");
    return text;
  }

  private async runAndCollect(
    threadId: string,
    assistantId: string,
    instructions: string,
    timeoutMs: number,
    label: string,
  ): Promise<RunOutcome> {
    const run = await this.call(label, () =>
      this.openai.beta.threads.runs.createAndPoll(
        threadId,
        { assistant_id: assistantId, instructions },
        { signal: AbortSignal.timeout(timeoutMs) },
      ),
    );
    if (run.status !== "completed") {
      const reason = run.last_error?.message ? ` (${run.last_error.message})` : "";
      throw new ProviderError(`${label} did not complete: ${run.status}${reason}`);
    }

    const page = await this.call("list messages", () =>
      this.openai.beta.threads.messages.list(threadId, { run_id: run.id, order: "asc" }),
    );
    const reply = page.data.find(m => m.role === "assistant");
    if (!reply) throw new ProviderError(`No assistant message returned for ${label.toLowerCase()}.`);

    const parts: string[] = [];
    const markers: CitationMarker[] = [];
    for (const part of reply.content) {
      if (part.type !== "text") continue;
      parts.push(part.text.value);
      for (const a of part.text.annotations) {
        if (a.type === "file_citation") markers.push({ text: a.text, fileId: a.file_citation.file_id });
        else if (a.type === "file_path") markers.push({ text: a.text, fileId: a.file_path.file_id });
      }
    }

    const usage = run.usage
      ? {
          promptTokens: run.usage.prompt_tokens,
          completionTokens: run.usage.completion_tokens,
          totalTokens: run.usage.total_tokens,
        }
      : null;

    return { text: parts.join("\n").trim(), markers, usage };
  }

  /** Re-raises SDK failures as ProviderError, keeping the provider's wording and status. */
  private async call<T>(step: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      if (error instanceof OpenAI.APIError) {
        throw new ProviderError(error.message, error.status ?? 502, { cause: error });
      }
      throw new ProviderError(`${step} failed: ${errorMessage(error)}`, 502, { cause: error });
    }
  }
}

let client: StudyBuddyClient | null = null;

export function getProviderClient(): ProviderClient {
  if (!client) {
    client = new StudyBuddyClient(new OpenAI({ apiKey: requireEnv("OPENAI_API_KEY") }));
  }
  return client;
}

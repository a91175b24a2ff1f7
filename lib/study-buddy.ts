// lib/study-buddy.ts
import { resolveCitations } from "./citations";
import { DEFAULT_QUIZ_SIZE, MAX_QUIZ_SIZE, MIN_QUIZ_SIZE } from "./config";
import { ValidationError, errorMessage } from "./errors";
import { logInfo, logWarn } from "./logger";
import type { ProviderClient } from "./openai-client";
import { parseQuiz } from "./quiz";
import type { SessionStore, StudySession } from "./session";
import type { ChatTurn, LocalFile, ProviderSession, QuizResult, UploadOutcome } from "./types";

const NO_FILES_MESSAGE = "No files found. Please upload at least one file to get started.";

/**
 * Creates the vector store and assistant on first use. Concurrent callers share
 * the one in-flight creation, so a session never ends up with two stores.
 */
export async function ensureProviderSession(session: StudySession, provider: ProviderClient): Promise<ProviderSession> {
  if (session.provider) return session.provider;
  if (session.pendingProvider) return session.pendingProvider;

  const pending = provider.createSession();
  session.pendingProvider = pending;
  try {
    const handle = await pending;
    session.provider = handle;
    logInfo("provider session created", {
      sessionId: session.id,
      assistantId: handle.assistantId,
      vectorStoreId: handle.vectorStore.id,
    });
    return handle;
  } finally {
    session.pendingProvider = null;
  }
}

async function attachOnce(fileId: string, handle: ProviderSession, provider: ProviderClient): Promise<void> {
  const attached = handle.vectorStore.fileIds;
  if (attached.has(fileId)) return;
  // Claimed before the await so an overlapping upload of the same file skips it.
  attached.add(fileId);
  try {
    await provider.attach(fileId, handle);
  } catch (error) {
    attached.delete(fileId);
    throw error;
  }
}

export async function uploadDocuments(
  session: StudySession,
  provider: ProviderClient,
  files: LocalFile[],
): Promise<UploadOutcome[]> {
  const results: UploadOutcome[] = [];

  for (const file of files) {
    let fileId: string | undefined;
    try {
      const registration = await session.files.register(file);
      fileId = registration.fileId;
      const handle = await ensureProviderSession(session, provider);
      await attachOnce(fileId, handle, provider);
      results.push({ name: file.name, status: registration.created ? "uploaded" : "duplicate", fileId });
    } catch (error) {
      const status = error instanceof ValidationError ? "rejected" : "failed";
      if (status === "failed") logWarn("upload failed", { sessionId: session.id, name: file.name, error: errorMessage(error) });
      results.push({ name: file.name, status, fileId, error: errorMessage(error) });
    }
  }

  return results;
}

/** Runs one chat turn. Both turns are recorded only once the provider has answered. */
export async function askQuestion(
  session: StudySession,
  provider: ProviderClient,
  question: string,
): Promise<[ChatTurn, ChatTurn]> {
  const prompt = question.trim();
  if (!prompt) throw new ValidationError("Question is empty.");
  if (session.files.size === 0) throw new ValidationError(NO_FILES_MESSAGE);

  const handle = await ensureProviderSession(session, provider);
  if (!handle.chatThreadId) handle.chatThreadId = await provider.createThread();

  const answer = await provider.ask(prompt, handle);
  const resolved = resolveCitations(answer.text, id => session.files.filename(id), answer.markers);

  const userTurn = session.transcript.append("user", prompt);
  const assistantTurn = session.transcript.append("assistant", resolved.text, resolved.citations, answer.usage);
  return [userTurn, assistantTurn];
}

export async function generateQuiz(
  session: StudySession,
  provider: ProviderClient,
  count: number = DEFAULT_QUIZ_SIZE,
): Promise<QuizResult> {
  if (!Number.isInteger(count) || count < MIN_QUIZ_SIZE || count > MAX_QUIZ_SIZE) {
    throw new ValidationError(`Question count must be between ${MIN_QUIZ_SIZE} and ${MAX_QUIZ_SIZE}.`);
  }
  if (session.files.size === 0) throw new ValidationError("Please upload files before generating a quiz.");

  const handle = await ensureProviderSession(session, provider);
  if (!handle.quizThreadId) handle.quizThreadId = await provider.createThread();

  const raw = await provider.generateQuiz(session.files.fileIds(), count, handle);
  const result = parseQuiz(raw);
  if (result.notice) {
    logWarn("quiz output unusable", { sessionId: session.id, preview: raw.slice(0, 200) });
  }
  session.quiz = result.items;
  return result;
}

/**
 * Removes a document locally and, best effort, from the provider.
 * When the last document goes, the assistant and vector store go with it.
 */
export async function removeDocument(
  session: StudySession,
  provider: ProviderClient,
  fileId: string,
): Promise<boolean> {
  const file = session.files.get(fileId);
  if (!file) return false;

  const handle = session.provider;
  if (handle?.vectorStore.fileIds.has(fileId)) {
    try {
      await provider.detach(fileId, handle);
    } catch (error) {
      logWarn("detach from vector store failed", { sessionId: session.id, name: file.name, error: errorMessage(error) });
    }
    handle.vectorStore.fileIds.delete(fileId);
  }
  try {
    await provider.deleteFile(fileId);
  } catch (error) {
    logWarn("provider file delete failed", { sessionId: session.id, name: file.name, error: errorMessage(error) });
  }

  session.files.remove(fileId);
  logInfo("file removed", { sessionId: session.id, name: file.name });

  if (session.files.size === 0 && handle) {
    await closeProviderSession(session, provider, handle);
    session.reset();
  }
  return true;
}

async function closeProviderSession(session: StudySession, provider: ProviderClient, handle: ProviderSession) {
  try {
    await provider.closeSession(handle);
  } catch (error) {
    logWarn("provider session cleanup failed", { sessionId: session.id, error: errorMessage(error) });
  }
}

/** Tears a session down: remote files, assistant and vector store (best effort), then the local state. */
export async function endSession(store: SessionStore, session: StudySession, provider: ProviderClient): Promise<void> {
  for (const fileId of session.files.fileIds()) {
    try {
      await provider.deleteFile(fileId);
    } catch (error) {
      logWarn("provider file delete failed", { sessionId: session.id, fileId, error: errorMessage(error) });
    }
  }
  if (session.provider) await closeProviderSession(session, provider, session.provider);

  session.files.clear();
  session.reset();
  store.close(session.id);
  logInfo("session ended", { sessionId: session.id });
}

/** Ends every session that has been idle longer than `maxIdleMs`. Returns how many were ended. */
export async function evictIdleSessions(
  store: SessionStore,
  provider: () => ProviderClient,
  maxIdleMs: number,
  now = Date.now(),
): Promise<number> {
  const idle = store.takeIdle(maxIdleMs, now);
  if (!idle.length) return 0;

  const client = provider();
  await Promise.all(idle.map(session => endSession(store, session, client)));
  logInfo("idle sessions evicted", { count: idle.length });
  return idle.length;
}

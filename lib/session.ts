// lib/session.ts
import { describeSupportedExtensions } from "./config";
import { FileManager, type FileManagerOptions } from "./file-manager";
import type { FileUploader } from "./openai-client";
import { Transcript } from "./transcript";
import type { ProviderSession, QuizItem, SessionSnapshot } from "./types";

/** Everything one browser session owns. Passed explicitly to every service call. */
export class StudySession {
  readonly files: FileManager;
  readonly transcript = new Transcript();
  readonly createdAt = Date.now();
  lastSeenAt = this.createdAt;
  provider: ProviderSession | null = null;
  /** Set while the assistant and vector store are being created. */
  pendingProvider: Promise<ProviderSession> | null = null;
  quiz: QuizItem[] | null = null;

  constructor(
    readonly id: string,
    uploader: FileUploader,
    options: FileManagerOptions = {},
  ) {
    this.files = new FileManager(uploader, options);
  }

  /** Forget the provider handle and everything derived from it; registered files stay. */
  reset(): void {
    this.provider = null;
    this.quiz = null;
    this.transcript.clear();
  }

  snapshot(): SessionSnapshot {
    return {
      sessionId: this.id,
      files: this.files.list(),
      transcript: [...this.transcript.list()],
      quiz: this.quiz,
      supported: describeSupportedExtensions(),
    };
  }
}

export class SessionStore {
  private readonly sessions = new Map<string, StudySession>();

  get(id: string): StudySession | undefined {
    return this.sessions.get(id);
  }

  /** Returns the session for `id`, creating it on first use, and marks it as seen. */
  open(id: string, uploader: FileUploader, options?: FileManagerOptions): StudySession {
    let session = this.sessions.get(id);
    if (!session) {
      session = new StudySession(id, uploader, options);
      this.sessions.set(id, session);
    }
    session.lastSeenAt = Date.now();
    return session;
  }

  /** Removes and returns every session not seen for longer than `maxIdleMs`. */
  takeIdle(maxIdleMs: number, now = Date.now()): StudySession[] {
    const idle: StudySession[] = [];
    for (const [id, session] of this.sessions) {
      if (now - session.lastSeenAt > maxIdleMs) {
        idle.push(session);
        this.sessions.delete(id);
      }
    }
    return idle;
  }

  close(id: string): boolean {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }
}

// Survives dev-server module reloads.
declare global {
  // eslint-disable-next-line no-var
  var __studySessions__: SessionStore | undefined;
}

export const sessionStore: SessionStore = globalThis.__studySessions__ ?? new SessionStore();
globalThis.__studySessions__ = sessionStore;

// lib/types.ts
// Shared between route handlers and the client bundle.

export interface UploadedFile {
  name: string;
  size: number;
  sizeMb: number;
  extension: string;
  mimeType: string;
  hash: string;
  fileId: string;
  uploadedAt: number;
}

/** A file as received from the browser, before it reaches the provider. */
export interface LocalFile {
  name: string;
  size: number;
  type: string;
  data: Uint8Array;
}

export interface VectorStoreHandle {
  id: string;
  fileIds: Set<string>;
}

export interface ProviderSession {
  assistantId: string;
  vectorStore: VectorStoreHandle;
  chatThreadId: string | null;
  quizThreadId: string | null;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/** A provider-emitted marker string and the file it points to. */
export interface CitationMarker {
  text: string;
  fileId: string;
}

export interface ProviderAnswer {
  text: string;
  markers: CitationMarker[];
  usage: TokenUsage | null;
}

export interface Citation {
  index: number;
  fileId: string;
  filename: string;
}

export type ChatRole = "user" | "assistant";

export interface ChatTurn {
  id: string;
  role: ChatRole;
  text: string;
  citations: readonly Citation[];
  usage: TokenUsage | null;
  createdAt: number;
}

export interface QuizItem {
  question: string;
  options: string[];
  correctIndex: number;
}

export interface QuizResult {
  items: QuizItem[];
  notice: string | null;
}

export type UploadStatus = "uploaded" | "duplicate" | "rejected" | "failed";

export interface UploadOutcome {
  name: string;
  status: UploadStatus;
  fileId?: string;
  error?: string;
}

export interface SessionSnapshot {
  sessionId: string;
  files: UploadedFile[];
  transcript: ChatTurn[];
  quiz: QuizItem[] | null;
  supported: string;
}

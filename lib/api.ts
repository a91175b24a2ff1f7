// lib/api.ts
// Browser-side calls to the route handlers.
import type { ChatTurn, QuizResult, SessionSnapshot, UploadedFile, UploadOutcome } from "./types";

async function request<T>(path: string, options: RequestInit = {}): Promise<T> {
  const res = await fetch(`/api${path}`, { credentials: "same-origin", ...options });
  if (!res.ok) {
    let detail = res.statusText;
    try {
      const data: unknown = await res.json();
      if (data && typeof data === "object" && "error" in data && typeof data.error === "string") {
        detail = data.error;
      }
    } catch {
      // body was not JSON; keep the status text
    }
    throw new Error(detail || "Request failed");
  }
  return res.json();
}

function json(body: unknown): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}

export function fetchSession(): Promise<SessionSnapshot> {
  return request<SessionSnapshot>("/session");
}

export async function endSession(): Promise<void> {
  await request<{ ok: boolean }>("/session", { method: "DELETE" });
}

export function uploadFiles(files: File[]): Promise<{ results: UploadOutcome[]; files: UploadedFile[] }> {
  const formData = new FormData();
  for (const file of files) formData.append("files", file);
  return request("/files", { method: "POST", body: formData });
}

export async function removeFile(fileId: string): Promise<UploadedFile[]> {
  const data = await request<{ files: UploadedFile[] }>(`/files?id=${encodeURIComponent(fileId)}`, {
    method: "DELETE",
  });
  return data.files;
}

export async function sendChat(question: string): Promise<ChatTurn[]> {
  const data = await request<{ turns: ChatTurn[] }>("/chat", json({ question }));
  return data.turns;
}

export function requestQuiz(count: number): Promise<QuizResult> {
  return request<QuizResult>("/quiz", json({ count }));
}

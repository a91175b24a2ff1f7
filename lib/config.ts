// lib/config.ts
// Shared by the browser bundle and the route handlers: no env access here (see lib/env.ts).

export const SUPPORTED_EXTS = [
  "pdf", "txt", "md", "docx", "pptx", "csv", "json", "html",
  "py", "java", "rb", "tex", "c", "cpp",
] as const;

export type SupportedExt = (typeof SUPPORTED_EXTS)[number];

export const DEFAULT_OPENAI_MODEL = "gpt-4-1106-preview";

export const MAX_FILE_SIZE_MB = 200;
export const MAX_FILE_SIZE_BYTES = MAX_FILE_SIZE_MB * 1024 * 1024;

export const DEFAULT_QUIZ_SIZE = 3;
export const MIN_QUIZ_SIZE = 1;
export const MAX_QUIZ_SIZE = 10;

export const QUIZ_GENERATION_TIMEOUT_MS = 120_000;
export const CHAT_RESPONSE_TIMEOUT_MS = 120_000;

export const SESSION_COOKIE = "sb_session";
export const SESSION_MAX_AGE_SECONDS = 60 * 60 * 24;
export const VECTOR_STORE_NAME = "StudyBuddyVectorStore";
export const ASSISTANT_NAME = "Study Buddy";

export const QUIZ_FAILURE_NOTICE =
  "Could not generate a quiz from the assistant's reply. Try again.";

export const ASSISTANT_INSTRUCTIONS = `You are a helpful study assistant. When the user asks to 'teach', 'summarize', or similar,
respond immediately with a concise, well-structured summary of the uploaded document:
- 5–8 bullet key points
- Main definitions/terms
- Any notable figures/examples.
Use the file_search tool to ground answers in the uploaded document. Provide citations inline as [1], [2] when available.
Only ask clarifying questions if the request is ambiguous or requires user preference. Be direct and avoid back-and-forth.`;

export const CHAT_RUN_INSTRUCTIONS =
  "Answer directly and concisely using only information grounded in the uploaded document(s). " +
  "When summarizing, provide 5–8 bullet points plus key terms. " +
  "Include inline citations like [1], [2] where the assistant provides references. " +
  "Do not ask clarifying questions unless strictly necessary.";

export const QUIZ_RUN_INSTRUCTIONS =
  "Use the file_search tool to base questions on the uploaded document content. Return only JSON.";

export function buildQuizPrompt(count: number): string {
  const noun = count === 1 ? "question" : "questions";
  return `Using the uploaded document(s) attached to this assistant via file_search,
generate a multiple-choice quiz with ${count} ${noun}. For each question, provide 4 options
and indicate the correct answer. Respond with STRICT JSON only in the format:
[
  {
    "question": "<question text>",
    "options": ["option1", "option2", "option3", "option4"],
    "correct": "<correct option>"
  }
]
Do not include any prose or code fences.`;
}

export function isSupportedExt(ext: string): ext is SupportedExt {
  return (SUPPORTED_EXTS as readonly string[]).includes(ext);
}

export function fileExtension(name: string): string {
  const dot = name.lastIndexOf(".");
  if (dot <= 0 || dot === name.length - 1) return "";
  return name.slice(dot + 1).toLowerCase();
}

export function describeSupportedExtensions(exts: readonly string[] = SUPPORTED_EXTS): string {
  if (exts.length <= 3) return exts.join(", ");
  return `${exts.slice(0, 3).join(", ")}, and ${exts.length - 3} more`;
}

export function toMegabytes(bytes: number): number {
  return Math.round((bytes / (1024 * 1024)) * 10) / 10;
}

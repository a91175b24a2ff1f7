// lib/quiz.ts
import { z } from "zod";
import { QUIZ_FAILURE_NOTICE } from "./config";
import type { QuizItem, QuizResult } from "./types";

const correctSchema = z.union([z.number(), z.string()]);

// Models sometimes emit numeric options ("options": [1, 2, 3, 4]).
const optionSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform(value => String(value).trim())
  .pipe(z.string().min(1));

const rawQuizItemSchema = z.object({
  question: z.string().trim().min(1),
  options: z.array(optionSchema).min(2),
  correct: correctSchema.optional(),
  answer: correctSchema.optional(),
});

type RawQuizItem = z.infer<typeof rawQuizItemSchema>;

function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith("```")) return text;
  return trimmed
    .replace(/^```[a-zA-Z]*\s*\n?/, "")
    .replace(/\n?```\s*$/, "");
}

function tryParse(source: string): unknown[] | null {
  try {
    const value: unknown = JSON.parse(source);
    return Array.isArray(value) ? value : null;
  } catch {
    return null;
  }
}

/**
 * Splits the array that opens at `source[0]` into its top-level entries.
 * An entry cut off by the end of the text is not returned.
 */
export function splitTopLevelEntries(source: string): string[] {
  const entries: string[] = [];
  let depth = 0;
  let inString = false;
  let escaped = false;
  let start = 1;

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === "[" || ch === "{") {
      depth++;
    } else if (ch === "]" || ch === "}") {
      depth--;
      if (depth === 0) {
        const last = source.slice(start, i).trim();
        if (last) entries.push(last);
        return entries;
      }
    } else if (ch === "," && depth === 1) {
      entries.push(source.slice(start, i).trim());
      start = i + 1;
    }
  }
  return entries;
}

/** Keeps the well-formed leading entries; everything from the first malformed one on is dropped. */
export function dropMalformedTrailingEntries(source: string): string | null {
  const kept: string[] = [];
  for (const entry of splitTopLevelEntries(source)) {
    try {
      JSON.parse(entry);
    } catch {
      break;
    }
    kept.push(entry);
  }
  return kept.length ? `[${kept.join(",")}]` : null;
}

/** Pulls the JSON array out of free-form text: one parse, then at most one repaired re-parse. */
export function extractJsonArray(text: string): unknown[] | null {
  const cleaned = stripCodeFence(text);
  const first = cleaned.indexOf("[");
  if (first === -1) return null;

  const last = cleaned.lastIndexOf("]");
  if (last > first) {
    const parsed = tryParse(cleaned.slice(first, last + 1));
    if (parsed) return parsed;
  }

  const repaired = dropMalformedTrailingEntries(cleaned.slice(first));
  return repaired ? tryParse(repaired) : null;
}

function resolveCorrectIndex(item: RawQuizItem): number | null {
  const correct = item.correct ?? item.answer;
  const { options } = item;
  if (correct === undefined) return null;

  if (typeof correct === "number") {
    return Number.isInteger(correct) && correct >= 0 && correct < options.length ? correct : null;
  }

  const wanted = correct.trim();
  const exact = options.indexOf(wanted);
  if (exact !== -1) return exact;

  const lowered = wanted.toLowerCase();
  const loose = options.findIndex(o => o.toLowerCase() === lowered);
  if (loose !== -1) return loose;

  if (/^[A-Za-z]$/.test(wanted)) {
    const letter = wanted.toUpperCase().charCodeAt(0) - 65;
    if (letter < options.length) return letter;
  }
  return null;
}

export function toQuizItem(entry: unknown): QuizItem | null {
  const parsed = rawQuizItemSchema.safeParse(entry);
  if (!parsed.success) return null;
  const correctIndex = resolveCorrectIndex(parsed.data);
  if (correctIndex === null) return null;
  return { question: parsed.data.question, options: parsed.data.options, correctIndex };
}

export function parseQuiz(text: string): QuizResult {
  const entries = extractJsonArray(text);
  const items = (entries ?? []).flatMap(entry => toQuizItem(entry) ?? []);
  return { items, notice: items.length ? null : QUIZ_FAILURE_NOTICE };
}

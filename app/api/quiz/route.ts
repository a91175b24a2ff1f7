import { NextRequest, NextResponse } from "next/server";
import { z } from "zod";
import { DEFAULT_QUIZ_SIZE, MAX_QUIZ_SIZE, MIN_QUIZ_SIZE } from "@/lib/config";
import { ValidationError } from "@/lib/errors";
import { errorResponse, openSession } from "@/lib/http";
import { getProviderClient } from "@/lib/openai-client";
import { generateQuiz } from "@/lib/study-buddy";

export const runtime = "nodejs";

const quizBodySchema = z.object({
  count: z.coerce
    .number()
    .int("Question count must be a whole number.")
    .min(MIN_QUIZ_SIZE, `Question count must be between ${MIN_QUIZ_SIZE} and ${MAX_QUIZ_SIZE}.`)
    .max(MAX_QUIZ_SIZE, `Question count must be between ${MIN_QUIZ_SIZE} and ${MAX_QUIZ_SIZE}.`)
    .default(DEFAULT_QUIZ_SIZE),
});

export async function POST(req: NextRequest) {
  try {
    const session = openSession(req);
    const parsed = quizBodySchema.safeParse(await req.json().catch(() => ({})));
    if (!parsed.success) throw new ValidationError(parsed.error.issues[0]?.message ?? "Invalid request");

    const result = await generateQuiz(session, getProviderClient(), parsed.data.count);
    return NextResponse.json(result);
  } catch (error) {
    return errorResponse(error, "quiz.POST", "Error generating quiz");
  }
}

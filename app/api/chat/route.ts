import { NextRequest, NextResponse } from "next/server";
import { z } from "zod";
import { ValidationError } from "@/lib/errors";
import { errorResponse, openSession } from "@/lib/http";
import { getProviderClient } from "@/lib/openai-client";
import { askQuestion } from "@/lib/study-buddy";

export const runtime = "nodejs";

const chatBodySchema = z.object({
  question: z.string().trim().min(1, "Question is empty.").max(4000, "Question is too long."),
});

export async function POST(req: NextRequest) {
  try {
    const session = openSession(req);
    const parsed = chatBodySchema.safeParse(await req.json().catch(() => ({})));
    if (!parsed.success) throw new ValidationError(parsed.error.issues[0]?.message ?? "Invalid request");

    const turns = await askQuestion(session, getProviderClient(), parsed.data.question);
    return NextResponse.json({ turns });
  } catch (error) {
    return errorResponse(error, "chat.POST", "Failed to generate response");
  }
}

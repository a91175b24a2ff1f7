import { NextRequest, NextResponse } from "next/server";
import { ValidationError } from "@/lib/errors";
import { errorResponse, openSession } from "@/lib/http";
import { getProviderClient } from "@/lib/openai-client";
import { removeDocument, uploadDocuments } from "@/lib/study-buddy";
import type { LocalFile } from "@/lib/types";

export const runtime = "nodejs";

export async function GET(req: NextRequest) {
  try {
    const session = openSession(req);
    return NextResponse.json({ files: session.files.list() });
  } catch (error) {
    return errorResponse(error, "files.GET");
  }
}

export async function POST(req: NextRequest) {
  try {
    const session = openSession(req);
    const formData = await req.formData();
    const entries = formData.getAll("files").filter((v): v is File => typeof v !== "string");
    if (!entries.length) throw new ValidationError("No file uploaded");

    const files: LocalFile[] = await Promise.all(
      entries.map(async f => ({
        name: f.name,
        size: f.size,
        type: f.type,
        data: new Uint8Array(await f.arrayBuffer()),
      })),
    );

    const results = await uploadDocuments(session, getProviderClient(), files);
    return NextResponse.json({ results, files: session.files.list() });
  } catch (error) {
    return errorResponse(error, "files.POST", "Failed to process upload");
  }
}

export async function DELETE(req: NextRequest) {
  try {
    const session = openSession(req);
    const fileId = req.nextUrl.searchParams.get("id");
    if (!fileId) throw new ValidationError("File id required");

    const removed = await removeDocument(session, getProviderClient(), fileId);
    if (!removed) return NextResponse.json({ error: "File not found" }, { status: 404 });
    return NextResponse.json({ ok: true, files: session.files.list() });
  } catch (error) {
    return errorResponse(error, "files.DELETE", "Failed to remove file");
  }
}

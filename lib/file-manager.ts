// lib/file-manager.ts
import { createHash } from "crypto";
import {
  MAX_FILE_SIZE_BYTES,
  fileExtension,
  isSupportedExt,
  toMegabytes,
} from "./config";
import { ValidationError } from "./errors";
import { logInfo } from "./logger";
import type { FileUploader } from "./openai-client";
import type { LocalFile, UploadedFile } from "./types";

const MIME_BY_EXT: Record<string, string> = {
  pdf: "application/pdf",
  txt: "text/plain",
  md: "text/markdown",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  pptx: "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  csv: "text/csv",
  json: "application/json",
  html: "text/html",
  py: "text/x-python",
  java: "text/x-java",
  rb: "text/x-ruby",
  tex: "text/x-tex",
  c: "text/x-c",
  cpp: "text/x-c++",
};

export function guessMimeType(name: string): string {
  return MIME_BY_EXT[fileExtension(name)] ?? "application/octet-stream";
}

export function contentHash(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Throws a ValidationError for anything the provider should never see.
 * `maxBytes` defaults to the configured cap.
 */
export function validateUpload(file: Pick<LocalFile, "name" | "size">, maxBytes = MAX_FILE_SIZE_BYTES): void {
  if (!isSupportedExt(fileExtension(file.name))) {
    throw new ValidationError(`File type not supported: ${file.name}`);
  }
  if (file.size > maxBytes) {
    throw new ValidationError(
      `File too large: ${toMegabytes(file.size)}MB (max: ${toMegabytes(maxBytes)}MB)`,
    );
  }
}

export interface FileManagerOptions {
  maxFileSizeBytes?: number;
}

export interface Registration {
  fileId: string;
  /** False when the same name and content was already registered or in flight. */
  created: boolean;
}

/** Per-session registry of the documents handed to the provider. */
export class FileManager {
  private readonly files: UploadedFile[] = [];
  private readonly pending = new Map<string, Promise<string>>();
  private readonly maxBytes: number;

  constructor(
    private readonly uploader: FileUploader,
    options: FileManagerOptions = {},
  ) {
    this.maxBytes = options.maxFileSizeBytes ?? MAX_FILE_SIZE_BYTES;
  }

  /** The same name and content always map to the same provider file id, even when calls overlap. */
  async register(file: LocalFile): Promise<Registration> {
    validateUpload(file, this.maxBytes);

    const hash = contentHash(file.data);
    const existing = this.files.find(f => f.name === file.name && f.hash === hash);
    if (existing) return { fileId: existing.fileId, created: false };

    const key = `${file.name}\u0000${hash}`;
    const inFlight = this.pending.get(key);
    if (inFlight) return { fileId: await inFlight, created: false };

    const upload = this.upload(file, hash);
    this.pending.set(key, upload);
    try {
      return { fileId: await upload, created: true };
    } finally {
      this.pending.delete(key);
    }
  }

  private async upload(file: LocalFile, hash: string): Promise<string> {
    const fileId = await this.uploader.uploadFile(file);
    const record: UploadedFile = {
      name: file.name,
      size: file.size,
      sizeMb: toMegabytes(file.size),
      extension: fileExtension(file.name),
      mimeType: file.type || guessMimeType(file.name),
      hash,
      fileId,
      uploadedAt: Date.now(),
    };
    this.files.push(record);
    logInfo("file registered", { name: file.name, fileId, sizeMb: record.sizeMb });
    return fileId;
  }

  list(): UploadedFile[] {
    return this.files.map(f => ({ ...f }));
  }

  get(fileId: string): UploadedFile | undefined {
    return this.files.find(f => f.fileId === fileId);
  }

  has(fileId: string): boolean {
    return this.files.some(f => f.fileId === fileId);
  }

  filename(fileId: string): string | undefined {
    return this.get(fileId)?.name;
  }

  fileIds(): string[] {
    return this.files.map(f => f.fileId);
  }

  remove(fileId: string): UploadedFile | undefined {
    const index = this.files.findIndex(f => f.fileId === fileId);
    if (index === -1) return undefined;
    const [removed] = this.files.splice(index, 1);
    return removed;
  }

  clear(): void {
    this.files.length = 0;
  }

  get size(): number {
    return this.files.length;
  }
}

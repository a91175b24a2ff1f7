import { beforeEach, describe, expect, it, vi } from "vitest";
import { FileManager, guessMimeType, validateUpload } from "./file-manager";
import { ValidationError } from "./errors";
import type { LocalFile } from "./types";

function localFile(name: string, text: string, type = ""): LocalFile {
  const data = new TextEncoder().encode(text);
  return { name, size: data.byteLength, type, data };
}

describe("validateUpload", () => {
  it("rejects unsupported extensions", () => {
    expect(() => validateUpload({ name: "slides.key", size: 10 })).toThrow("File type not supported: slides.key");
  });

  it("rejects files over the cap and reports both sizes", () => {
    const oneMb = 1024 * 1024;
    expect(() => validateUpload({ name: "big.pdf", size: 3 * oneMb }, 2 * oneMb)).toThrow(
      "File too large: 3MB (max: 2MB)",
    );
  });

  it("accepts a supported file exactly at the cap", () => {
    expect(() => validateUpload({ name: "NOTES.MD", size: 100 }, 100)).not.toThrow();
  });
});

describe("guessMimeType", () => {
  it("maps known extensions and falls back to octet-stream", () => {
    expect(guessMimeType("a.pdf")).toBe("application/pdf");
    expect(guessMimeType("README")).toBe("application/octet-stream");
  });
});

describe("FileManager", () => {
  const uploadFile = vi.fn<(file: LocalFile) => Promise<string>>();
  let manager: FileManager;

  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    uploadFile.mockReset();
    let n = 0;
    uploadFile.mockImplementation(async () => `file-${++n}`);
    manager = new FileManager({ uploadFile }, { maxFileSizeBytes: 64 });
  });

  it("uploads once per name and content", async () => {
    const first = await manager.register(localFile("notes.txt", "hello"));
    const again = await manager.register(localFile("notes.txt", "hello"));

    expect(first).toEqual({ fileId: "file-1", created: true });
    expect(again).toEqual({ fileId: "file-1", created: false });
    expect(uploadFile).toHaveBeenCalledTimes(1);
    expect(manager.size).toBe(1);
  });

  it("shares one upload between overlapping registrations of the same file", async () => {
    const [a, b] = await Promise.all([
      manager.register(localFile("a.pdf", "same")),
      manager.register(localFile("a.pdf", "same")),
    ]);

    expect(a).toEqual({ fileId: "file-1", created: true });
    expect(b).toEqual({ fileId: "file-1", created: false });
    expect(uploadFile).toHaveBeenCalledTimes(1);
    expect(manager.size).toBe(1);
  });

  it("lets a later registration retry after a failed upload", async () => {
    uploadFile.mockRejectedValueOnce(new Error("network down"));

    await expect(manager.register(localFile("a.pdf", "same"))).rejects.toThrow("network down");
    expect(await manager.register(localFile("a.pdf", "same"))).toEqual({ fileId: "file-1", created: true });
  });

  it("treats changed content under the same name as a new file", async () => {
    await manager.register(localFile("notes.txt", "v1"));
    const second = await manager.register(localFile("notes.txt", "v2"));

    expect(second.fileId).toBe("file-2");
    expect(manager.fileIds()).toEqual(["file-1", "file-2"]);
  });

  it("never hands rejected files to the uploader", async () => {
    await expect(manager.register(localFile("photo.png", "x"))).rejects.toBeInstanceOf(ValidationError);
    await expect(manager.register(localFile("long.txt", "x".repeat(65)))).rejects.toThrow("File too large");
    expect(uploadFile).not.toHaveBeenCalled();
    expect(manager.size).toBe(0);
  });

  it("records metadata for registered files", async () => {
    await manager.register(localFile("Lecture.MD", "# one"));
    const [record] = manager.list();

    expect(record).toMatchObject({
      name: "Lecture.MD",
      size: 5,
      sizeMb: 0,
      extension: "md",
      mimeType: "text/markdown",
      fileId: "file-1",
    });
    expect(record.hash).toHaveLength(64);
  });

  it("keeps the browser-reported type when there is one", async () => {
    await manager.register(localFile("data.csv", "a,b", "text/csv; charset=utf-8"));
    expect(manager.get("file-1")?.mimeType).toBe("text/csv; charset=utf-8");
  });

  it("removes and looks up by provider id", async () => {
    await manager.register(localFile("a.txt", "a"));
    await manager.register(localFile("b.txt", "b"));

    expect(manager.filename("file-2")).toBe("b.txt");
    expect(manager.remove("file-1")?.name).toBe("a.txt");
    expect(manager.remove("file-1")).toBeUndefined();
    expect(manager.has("file-1")).toBe(false);
    expect(manager.fileIds()).toEqual(["file-2"]);
  });

  it("hands out copies from list()", async () => {
    await manager.register(localFile("a.txt", "a"));
    const [copy] = manager.list();
    copy.name = "changed.txt";
    expect(manager.filename("file-1")).toBe("a.txt");
  });
});

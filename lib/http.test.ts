import { NextRequest } from "next/server";
import { describe, expect, it, vi } from "vitest";
import { ProviderError, SessionError, ValidationError } from "./errors";
import { errorResponse, sessionIdFrom } from "./http";

describe("sessionIdFrom", () => {
  it("reads the session cookie", () => {
    const req = new NextRequest("http://localhost/api/files", { headers: { cookie: "sb_session=abc-123" } });
    expect(sessionIdFrom(req)).toBe("abc-123");
  });

  it("throws a SessionError without the cookie", () => {
    const req = new NextRequest("http://localhost/api/files");
    expect(() => sessionIdFrom(req)).toThrow(SessionError);
  });
});

describe("errorResponse", () => {
  it("passes app error messages and statuses through", async () => {
    const res = errorResponse(new ValidationError("Question is empty."), "chat");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Question is empty." });
  });

  it("keeps the provider's own status and wording", async () => {
    const res = errorResponse(new ProviderError("Rate limit reached", 429), "chat");
    expect(res.status).toBe(429);
    expect(await res.json()).toEqual({ error: "Rate limit reached" });
  });

  it("hides unexpected errors behind the fallback", async () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const res = errorResponse(new Error("db exploded"), "quiz", "Failed to generate quiz");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "Failed to generate quiz" });
    expect(spy).toHaveBeenCalledTimes(1);
    spy.mockRestore();
  });
});

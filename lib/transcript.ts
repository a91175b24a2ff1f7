// lib/transcript.ts
import { nanoid } from "nanoid";
import type { ChatRole, ChatTurn, Citation, TokenUsage } from "./types";

/** Append-only chat history. Turns are frozen once appended. */
export class Transcript {
  private readonly turns: ChatTurn[] = [];

  append(role: ChatRole, text: string, citations: readonly Citation[] = [], usage: TokenUsage | null = null): ChatTurn {
    const turn: ChatTurn = Object.freeze({
      id: nanoid(12),
      role,
      text,
      citations: Object.freeze(citations.map(c => Object.freeze({ ...c }))),
      usage: usage ? Object.freeze({ ...usage }) : null,
      createdAt: Date.now(),
    });
    this.turns.push(turn);
    return turn;
  }

  list(): readonly ChatTurn[] {
    return [...this.turns];
  }

  get size(): number {
    return this.turns.length;
  }

  clear(): void {
    this.turns.length = 0;
  }
}

import type { Speaker, Turn } from "../types.js";

/**
 * Append-only log of the turns exchanged in one signed-in session.
 * Order of insertion is the chronological order; nothing is ever reordered,
 * deduplicated or evicted.
 */
export class TranscriptStore {
  private readonly turns: Turn[] = [];

  public get size(): number {
    return this.turns.length;
  }

  public append(turn: Turn): void {
    this.turns.push(Object.freeze({ ...turn }));
  }

  public clear(): void {
    this.turns.length = 0;
  }

  /** Snapshot of the log; later appends or clears do not show up in it. */
  public all(): readonly Turn[] {
    return this.turns.slice();
  }
}

export function createTurn(speaker: Speaker, text: string, now: Date = new Date()): Turn {
  return {
    speaker,
    text,
    createdAt: now.toISOString()
  };
}

import { describe, expect, it } from "vitest";

import { TranscriptStore, createTurn } from "./transcriptStore.js";

describe("TranscriptStore", () => {
  it("keeps turns in insertion order without deduplicating", () => {
    const store = new TranscriptStore();
    store.append(createTurn("user", "same"));
    store.append(createTurn("user", "same"));
    store.append(createTurn("tutor", "answer"));

    expect(store.all().map((turn) => [turn.speaker, turn.text])).toEqual([
      ["user", "same"],
      ["user", "same"],
      ["tutor", "answer"]
    ]);
    expect(store.size).toBe(3);
  });

  it("returns a snapshot that later appends do not change", () => {
    const store = new TranscriptStore();
    store.append(createTurn("user", "first"));

    const snapshot = store.all();
    store.append(createTurn("tutor", "second"));
    store.clear();

    expect(snapshot).toHaveLength(1);
    expect(snapshot[0]?.text).toBe("first");
  });

  it("freezes appended turns", () => {
    const store = new TranscriptStore();
    const turn = createTurn("user", "question");
    store.append(turn);
    turn.text = "edited";

    const [stored] = store.all();
    expect(stored?.text).toBe("question");
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it("clears to empty regardless of prior length", () => {
    const store = new TranscriptStore();
    for (let index = 0; index < 5; index += 1) {
      store.append(createTurn("user", `q${index}`));
    }

    store.clear();
    expect(store.all()).toEqual([]);

    store.clear();
    expect(store.size).toBe(0);
  });

  it("stamps turns with the given time", () => {
    const turn = createTurn("tutor", "hi", new Date("2024-03-01T10:00:00.000Z"));
    expect(turn).toEqual({ speaker: "tutor", text: "hi", createdAt: "2024-03-01T10:00:00.000Z" });
  });
});

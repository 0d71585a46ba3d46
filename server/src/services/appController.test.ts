import { describe, expect, it } from "vitest";

import { BusyError, DecodeError, GenerationError, SessionNotFoundError, UnsupportedFormatError, ValidationError } from "../errors.js";
import { FakeRasterizer, StubModel, jpegBytes, pdfBytes, pngBytes } from "../testUtils.js";
import { AppController } from "./appController.js";
import { PageExtractor } from "./pageExtractor.js";
import { TutorClient } from "./tutorClient.js";

const FIXED_NOW = new Date("2024-05-06T07:08:09.000Z");

function createController(model: StubModel): AppController {
  return new AppController({
    extractor: new PageExtractor(new FakeRasterizer()),
    tutor: new TutorClient(model),
    now: () => FIXED_NOW
  });
}

describe("AppController", () => {
  it("walks through sign in, upload, ask and logout", async () => {
    const model = StubModel.answering("It is a flowchart.");
    const controller = createController(model);

    const session = controller.signIn("alice", "pw1");
    expect(session.gate.isSignedIn).toBe(true);
    expect(session.gate.username).toBe("alice");

    const summary = controller.upload(session, { mimeType: "application/pdf", bytes: pdfBytes(3) });
    expect(summary.pageCount).toBe(3);
    expect(summary.caption).toBe("Converted 3 PDF pages. Page 1 of 3");
    expect(summary.preview).toEqual({
      width: 1000,
      height: 1400,
      dataUrl: `data:image/png;base64,${Buffer.from("page-0").toString("base64")}`
    });

    await controller.ask(session, "What is this diagram?");
    expect(controller.history(session)).toEqual([
      { speaker: "user", text: "What is this diagram?", createdAt: FIXED_NOW.toISOString() },
      { speaker: "tutor", text: "It is a flowchart.", createdAt: FIXED_NOW.toISOString() }
    ]);

    const transcript = session.gate.transcript;
    controller.signOut(session);
    expect(transcript.size).toBe(0);
    expect(session.gate.status).toBe("signed_out");
    expect(() => controller.getSession(session.id)).toThrow(SessionNotFoundError);
  });

  it("rejects empty credentials without registering a session", () => {
    const controller = createController(StubModel.answering("unused"));

    expect(() => controller.signIn("", "pw1")).toThrow(ValidationError);
    expect(() => controller.getSession(undefined)).toThrow(SessionNotFoundError);
  });

  it("starts every new sign in with an empty transcript", async () => {
    const controller = createController(StubModel.answering("answer"));
    const first = controller.signIn("alice", "pw1");
    controller.upload(first, { mimeType: "image/png", bytes: pngBytes() });
    await controller.ask(first, "question");
    controller.signOut(first);

    const second = controller.signIn("alice", "pw1");

    expect(controller.history(second)).toEqual([]);
    expect(second.pages).toEqual([]);
    expect(second.id).not.toBe(first.id);
  });

  it("never calls the tutor without pages", async () => {
    const model = StubModel.answering("unused");
    const controller = createController(model);
    const session = controller.signIn("alice", "pw1");

    await expect(controller.ask(session, "What is this?")).rejects.toThrow("Please upload an image or PDF first!");
    expect(model.calls).toHaveLength(0);
    expect(controller.history(session)).toEqual([]);
  });

  it("never calls the tutor without a question", async () => {
    const model = StubModel.answering("unused");
    const controller = createController(model);
    const session = controller.signIn("alice", "pw1");
    controller.upload(session, { mimeType: "image/jpeg", bytes: jpegBytes() });

    await expect(controller.ask(session, "")).rejects.toThrow("Please ask a question!");
    await expect(controller.ask(session, "   ")).rejects.toThrow("Please ask a question!");
    expect(model.calls).toHaveLength(0);
  });

  it("never calls the tutor after an empty PDF", async () => {
    const model = StubModel.answering("unused");
    const controller = createController(model);
    const session = controller.signIn("alice", "pw1");

    const summary = controller.upload(session, { mimeType: "application/pdf", bytes: pdfBytes(0) });
    expect(summary).toEqual({ pageCount: 0, caption: "The PDF has no pages.", preview: null });

    await expect(controller.ask(session, "Anything?")).rejects.toBeInstanceOf(ValidationError);
    expect(model.calls).toHaveLength(0);
  });

  it("leaves the transcript untouched when generation fails", async () => {
    const controller = createController(StubModel.failing("network down"));
    const session = controller.signIn("alice", "pw1");
    controller.upload(session, { mimeType: "image/png", bytes: pngBytes() });

    await expect(controller.ask(session, "Explain")).rejects.toBeInstanceOf(GenerationError);

    expect(controller.history(session)).toEqual([]);
    expect(session.busy).toBe(false);
  });

  it("drops the previous pages when a replacement upload cannot be read", async () => {
    const model = StubModel.answering("unused");
    const controller = createController(model);
    const session = controller.signIn("alice", "pw1");
    controller.upload(session, { mimeType: "application/pdf", bytes: pdfBytes(2) });

    expect(() => controller.upload(session, { mimeType: "image/png", bytes: Buffer.from("bad") })).toThrow(
      DecodeError
    );
    expect(session.pages).toEqual([]);
    await expect(controller.ask(session, "What about page 2?")).rejects.toThrow(
      "Please upload an image or PDF first!"
    );
    expect(model.calls).toHaveLength(0);
  });

  it("drops the previous pages when a replacement upload has an unsupported type", () => {
    const controller = createController(StubModel.answering("unused"));
    const session = controller.signIn("alice", "pw1");
    controller.upload(session, { mimeType: "image/png", bytes: pngBytes() });

    expect(() => controller.upload(session, { mimeType: "text/plain", bytes: Buffer.from("x") })).toThrow(
      UnsupportedFormatError
    );
    expect(session.pages).toEqual([]);
  });

  it("describes a single image upload", () => {
    const controller = createController(StubModel.answering("unused"));
    const session = controller.signIn("alice", "pw1");

    const summary = controller.upload(session, { mimeType: "image/png", bytes: pngBytes() });

    expect(summary.pageCount).toBe(1);
    expect(summary.caption).toBe("Your uploaded image");
    expect(summary.preview?.dataUrl).toBe(`data:image/png;base64,${pngBytes().toString("base64")}`);
  });

  it("clears history but keeps the session and pages", async () => {
    const controller = createController(StubModel.answering("a"));
    const session = controller.signIn("alice", "pw1");
    controller.upload(session, { mimeType: "image/png", bytes: pngBytes() });
    await controller.ask(session, "q1");
    await controller.ask(session, "q2");
    expect(controller.history(session)).toHaveLength(4);

    controller.clearHistory(session);

    expect(controller.history(session)).toEqual([]);
    expect(controller.getSession(session.id)).toBe(session);
    expect(session.pages).toHaveLength(1);
  });

  it("rejects mutating actions while a question is in flight", async () => {
    let release: (answer: string) => void = () => undefined;
    const model = new StubModel(
      () =>
        new Promise<string>((resolve) => {
          release = resolve;
        })
    );
    const controller = createController(model);
    const session = controller.signIn("alice", "pw1");
    controller.upload(session, { mimeType: "image/png", bytes: pngBytes() });

    const pending = controller.ask(session, "slow question");
    expect(session.busy).toBe(true);

    await expect(controller.ask(session, "another")).rejects.toBeInstanceOf(BusyError);
    expect(() => controller.clearHistory(session)).toThrow(BusyError);
    expect(() => controller.signOut(session)).toThrow(BusyError);
    expect(() => controller.upload(session, { mimeType: "image/png", bytes: pngBytes() })).toThrow(
      BusyError
    );

    release("done");
    await pending;

    expect(session.busy).toBe(false);
    expect(controller.history(session).map((turn) => turn.text)).toEqual(["slow question", "done"]);
    expect(model.calls).toHaveLength(1);
  });

  it("keeps sessions isolated from each other", async () => {
    const controller = createController(StubModel.answering("a"));
    const alice = controller.signIn("alice", "pw1");
    const bob = controller.signIn("bob", "pw2");
    controller.upload(alice, { mimeType: "image/png", bytes: pngBytes() });

    await controller.ask(alice, "q");

    expect(controller.history(alice)).toHaveLength(2);
    expect(controller.history(bob)).toEqual([]);
    expect(bob.pages).toEqual([]);
  });
});

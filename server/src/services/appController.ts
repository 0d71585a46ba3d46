import { randomUUID } from "node:crypto";

import { BusyError, SessionNotFoundError, ValidationError } from "../errors.js";
import type { PageImage, Turn, UploadSummary, UploadedDocument } from "../types.js";
import { toPreview, type PageExtractor } from "./pageExtractor.js";
import { SessionGate, type CredentialVerifier } from "./sessionGate.js";
import { createTurn } from "./transcriptStore.js";
import type { TutorClient } from "./tutorClient.js";

export type Session = {
  id: string;
  gate: SessionGate;
  pages: PageImage[];
  busy: boolean;
};

type AppControllerOptions = {
  extractor: PageExtractor;
  tutor: TutorClient;
  verifier?: CredentialVerifier;
  now?: () => Date;
};

export class AppController {
  private readonly sessions = new Map<string, Session>();
  private readonly now: () => Date;

  public constructor(private readonly options: AppControllerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  public signIn(username: string, password: string): Session {
    const gate = new SessionGate(this.options.verifier);
    gate.signIn(username, password);

    const session: Session = {
      id: randomUUID(),
      gate,
      pages: [],
      busy: false
    };
    this.sessions.set(session.id, session);
    return session;
  }

  public getSession(sessionId: string | undefined): Session {
    const session = sessionId ? this.sessions.get(sessionId) : undefined;
    if (!session || !session.gate.isSignedIn) {
      throw new SessionNotFoundError();
    }

    return session;
  }

  public upload(session: Session, document: UploadedDocument): UploadSummary {
    // A new upload replaces the material even when it cannot be read.
    this.discardMaterial(session);
    const pages = this.options.extractor.extract(document);
    session.pages = pages;

    return summarizeUpload(pages, document.mimeType);
  }

  public discardMaterial(session: Session): void {
    assertIdle(session);
    session.pages = [];
  }

  /**
   * Runs one tutoring round. The question and answer are appended together
   * once the model has answered; a failed call leaves the transcript as it was.
   */
  public async ask(session: Session, question: string): Promise<[Turn, Turn]> {
    assertIdle(session);

    if (session.pages.length === 0) {
      throw new ValidationError("Please upload an image or PDF first!");
    }

    if (question.trim().length === 0) {
      throw new ValidationError("Please ask a question!");
    }

    session.busy = true;
    try {
      const answer = await this.options.tutor.ask(question, session.pages);

      const transcript = session.gate.transcript;
      const userTurn = createTurn("user", question, this.now());
      const tutorTurn = createTurn("tutor", answer, this.now());
      transcript.append(userTurn);
      transcript.append(tutorTurn);

      return [userTurn, tutorTurn];
    } finally {
      session.busy = false;
    }
  }

  public history(session: Session): readonly Turn[] {
    return session.gate.transcript.all();
  }

  public clearHistory(session: Session): void {
    assertIdle(session);
    session.gate.clearTranscript();
  }

  public signOut(session: Session): void {
    assertIdle(session);
    session.gate.signOut();
    session.pages = [];
    this.sessions.delete(session.id);
  }
}

function assertIdle(session: Session): void {
  if (session.busy) {
    throw new BusyError();
  }
}

function summarizeUpload(pages: PageImage[], mimeType: string): UploadSummary {
  const first = pages[0];
  const isPdf = mimeType.toLowerCase().startsWith("application/pdf");

  let caption: string;
  if (!first) {
    caption = "The PDF has no pages.";
  } else if (isPdf) {
    caption = `Converted ${pages.length} PDF ${pages.length === 1 ? "page" : "pages"}. Page 1 of ${pages.length}`;
  } else {
    caption = "Your uploaded image";
  }

  return {
    pageCount: pages.length,
    caption,
    preview: first ? toPreview(first) : null
  };
}

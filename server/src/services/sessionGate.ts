import { ValidationError } from "../errors.js";
import { TranscriptStore } from "./transcriptStore.js";

export interface CredentialVerifier {
  verify(username: string, password: string): boolean;
}

/**
 * Demo-only check: any non-empty username and password pair is accepted.
 * Swap in a real identity provider by implementing CredentialVerifier.
 */
export class PlaceholderVerifier implements CredentialVerifier {
  public verify(username: string, password: string): boolean {
    return username.length > 0 && password.length > 0;
  }
}

export type SignedOutState = {
  status: "signed_out";
};

export type SignedInState = {
  status: "signed_in";
  username: string;
  transcript: TranscriptStore;
};

export type GateState = SignedOutState | SignedInState;

const SIGNED_OUT: SignedOutState = { status: "signed_out" };

export class SessionGate {
  private state: GateState = SIGNED_OUT;

  public constructor(private readonly verifier: CredentialVerifier = new PlaceholderVerifier()) {}

  public get status(): GateState["status"] {
    return this.state.status;
  }

  public get isSignedIn(): boolean {
    return this.state.status === "signed_in";
  }

  public get username(): string {
    return this.state.status === "signed_in" ? this.state.username : "";
  }

  public get transcript(): TranscriptStore {
    return this.requireSignedIn().transcript;
  }

  public signIn(username: string, password: string): SignedInState {
    if (!this.verifier.verify(username, password)) {
      throw new ValidationError("Please enter both username and password.");
    }

    const next: SignedInState = {
      status: "signed_in",
      username,
      transcript: new TranscriptStore()
    };
    this.state = next;
    return next;
  }

  public signOut(): void {
    if (this.state.status === "signed_in") {
      this.state.transcript.clear();
    }

    this.state = SIGNED_OUT;
  }

  public clearTranscript(): void {
    this.requireSignedIn().transcript.clear();
  }

  private requireSignedIn(): SignedInState {
    if (this.state.status !== "signed_in") {
      throw new ValidationError("Sign in first.");
    }

    return this.state;
  }
}

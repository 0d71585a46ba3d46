import { AskBox } from "./components/AskBox.js";
import { SignInForm } from "./components/SignInForm.js";
import { TranscriptPanel } from "./components/TranscriptPanel.js";
import { UploadPanel } from "./components/UploadPanel.js";
import { useStudySession } from "./hooks/useStudySession.js";

export function App(): JSX.Element {
  const study = useStudySession();
  const busy = study.state !== "idle";

  if (!study.username) {
    return <SignInForm notice={study.notice} onSubmit={study.signIn} />;
  }

  return (
    <main className="app-shell">
      <aside className="sidebar">
        <p className="welcome">
          Welcome, <strong>{study.username}</strong>!
        </p>
        <button
          type="button"
          disabled={busy}
          onClick={() => {
            void study.clearHistory();
          }}
        >
          Clear chat history
        </button>
        <button
          type="button"
          disabled={busy}
          onClick={() => {
            void study.signOut();
          }}
        >
          Logout
        </button>
      </aside>

      <section className="layout-grid">
        <div className="left-rail">
          <UploadPanel material={study.material} busy={busy} onUpload={study.uploadMaterial} />
          <AskBox busy={busy} onAsk={study.ask} />
          {study.notice ? (
            <p className={study.notice.kind === "warning" ? "status-warning" : "status-error"} aria-live="polite">
              {study.notice.message}
            </p>
          ) : null}
        </div>

        <TranscriptPanel turns={study.turns} />
      </section>
    </main>
  );
}

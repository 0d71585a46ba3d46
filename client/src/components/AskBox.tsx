import { useState } from "react";

type AskBoxProps = {
  busy: boolean;
  onAsk: (question: string) => Promise<boolean>;
};

export function AskBox({ busy, onAsk }: AskBoxProps): JSX.Element {
  const [question, setQuestion] = useState("");

  return (
    <form
      className="ask-box"
      onSubmit={(event) => {
        event.preventDefault();
        void onAsk(question).then((sent) => {
          if (sent) {
            setQuestion("");
          }
        });
      }}
    >
      <label>
        What's confusing you about this material?
        <input value={question} disabled={busy} onChange={(event) => setQuestion(event.target.value)} />
      </label>
      <button type="submit" disabled={busy}>
        {busy ? "Reading your material..." : "Ask"}
      </button>
    </form>
  );
}

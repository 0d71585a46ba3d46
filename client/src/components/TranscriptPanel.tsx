import type { TranscriptItem } from "../hooks/useStudySession.js";

type TranscriptPanelProps = {
  turns: TranscriptItem[];
};

const timeFormatter = new Intl.DateTimeFormat("en-US", {
  hour: "2-digit",
  minute: "2-digit",
  second: "2-digit"
});

export function TranscriptPanel({ turns }: TranscriptPanelProps): JSX.Element {
  return (
    <section className="transcript-panel" aria-label="Chat history">
      <header className="transcript-header">
        <h2>Chat history</h2>
        <span>{turns.length} turns</span>
      </header>

      {turns.length === 0 ? (
        <p className="transcript-empty">Your chat with the tutor will appear here.</p>
      ) : (
        <ol className="transcript-list">
          {turns.map((turn, index) => (
            <li className="turn-card" data-speaker={turn.speaker} key={`${turn.createdAt}-${index}`}>
              <div className="turn-time">{timeFormatter.format(new Date(turn.createdAt))}</div>
              <p>
                <strong>{labelForSpeaker(turn.speaker)}:</strong> {turn.text}
              </p>
            </li>
          ))}
        </ol>
      )}
    </section>
  );
}

function labelForSpeaker(speaker: TranscriptItem["speaker"]): string {
  return speaker === "user" ? "You" : "Tutor";
}

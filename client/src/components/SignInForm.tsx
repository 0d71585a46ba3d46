import { useState } from "react";

import type { Notice } from "../hooks/useStudySession.js";

type SignInFormProps = {
  notice: Notice | null;
  onSubmit: (username: string, password: string) => Promise<void>;
};

export function SignInForm({ notice, onSubmit }: SignInFormProps): JSX.Element {
  const [username, setUsername] = useState("");
  const [password, setPassword] = useState("");

  return (
    <main className="sign-in-shell">
      <header className="hero">
        <p className="eyebrow">Your AI study buddy</p>
        <h1>Lecture Buddy</h1>
      </header>

      <p className="helper-text">This is a demo: any username and password will let you in.</p>

      <form
        className="sign-in-form"
        onSubmit={(event) => {
          event.preventDefault();
          void onSubmit(username, password);
        }}
      >
        <label>
          Username
          <input
            value={username}
            placeholder="e.g. cs_student"
            autoComplete="username"
            onChange={(event) => setUsername(event.target.value)}
          />
        </label>
        <label>
          Password
          <input
            type="password"
            value={password}
            autoComplete="current-password"
            onChange={(event) => setPassword(event.target.value)}
          />
        </label>
        <button type="submit">Sign In</button>
      </form>

      {notice ? <p className="status-error">{notice.message}</p> : null}
    </main>
  );
}

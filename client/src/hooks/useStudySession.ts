import { useCallback, useMemo, useRef, useState } from "react";

const API_BASE = import.meta.env.VITE_API_BASE_URL ?? "http://127.0.0.1:8787";

export type StudyState = "idle" | "uploading" | "thinking";

export type TranscriptItem = {
  speaker: "user" | "tutor";
  text: string;
  createdAt: string;
};

export type MaterialPreview = {
  pageCount: number;
  caption: string;
  preview: {
    width: number;
    height: number;
    dataUrl: string;
  } | null;
};

export type Notice = {
  kind: "warning" | "error";
  message: string;
};

export type UseStudySessionResult = {
  state: StudyState;
  username: string | null;
  material: MaterialPreview | null;
  turns: TranscriptItem[];
  notice: Notice | null;
  signIn: (username: string, password: string) => Promise<void>;
  signOut: () => Promise<void>;
  uploadMaterial: (file: File) => Promise<void>;
  ask: (question: string) => Promise<boolean>;
  clearHistory: () => Promise<void>;
};

export function useStudySession(): UseStudySessionResult {
  const sessionIdRef = useRef<string | null>(null);
  const busyRef = useRef(false);

  const [state, setState] = useState<StudyState>("idle");
  const [username, setUsername] = useState<string | null>(null);
  const [material, setMaterial] = useState<MaterialPreview | null>(null);
  const [turns, setTurns] = useState<TranscriptItem[]>([]);
  const [notice, setNotice] = useState<Notice | null>(null);

  const resetLocalState = useCallback(() => {
    sessionIdRef.current = null;
    setUsername(null);
    setMaterial(null);
    setTurns([]);
    setState("idle");
  }, []);

  const signIn = useCallback(async (name: string, password: string) => {
    if (!name || !password) {
      setNotice({ kind: "error", message: "Please enter both username and password." });
      return;
    }

    try {
      const data = await requestJson<{ sessionId: string; username: string }>("/api/session", null, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ username: name, password })
      });

      sessionIdRef.current = data.sessionId;
      setUsername(data.username);
      setTurns([]);
      setMaterial(null);
      setNotice(null);
    } catch (cause) {
      setNotice({ kind: "error", message: toErrorMessage(cause, "Sign in failed") });
    }
  }, []);

  const signOut = useCallback(async () => {
    if (busyRef.current) {
      return;
    }

    try {
      await requestJson("/api/session", sessionIdRef.current, { method: "DELETE" });
    } catch (cause) {
      setNotice({ kind: "error", message: toErrorMessage(cause, "Logout failed") });
    } finally {
      resetLocalState();
    }
  }, [resetLocalState]);

  const uploadMaterial = useCallback(async (file: File) => {
    if (busyRef.current) {
      return;
    }

    busyRef.current = true;
    setState("uploading");
    setNotice(null);

    try {
      const formData = new FormData();
      formData.set("file", file, file.name);

      const data = await requestJson<MaterialPreview>("/api/material", sessionIdRef.current, {
        method: "POST",
        body: formData
      });
      setMaterial(data);
    } catch (cause) {
      setMaterial(null);
      setNotice({ kind: "error", message: toErrorMessage(cause, "Upload failed") });
    } finally {
      busyRef.current = false;
      setState("idle");
    }
  }, []);

  const ask = useCallback(
    async (question: string) => {
      if (busyRef.current) {
        return false;
      }

      if (!material || material.pageCount === 0) {
        setNotice({ kind: "warning", message: "Please upload an image or PDF first!" });
        return false;
      }

      if (!question.trim()) {
        setNotice({ kind: "warning", message: "Please ask a question!" });
        return false;
      }

      busyRef.current = true;
      setState("thinking");
      setNotice(null);

      try {
        const data = await requestJson<{ turns: TranscriptItem[] }>("/api/ask", sessionIdRef.current, {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify({ question })
        });
        setTurns((current) => [...current, ...data.turns]);
        return true;
      } catch (cause) {
        setNotice({ kind: "error", message: toErrorMessage(cause, "Tutor request failed") });
        return false;
      } finally {
        busyRef.current = false;
        setState("idle");
      }
    },
    [material]
  );

  const clearHistory = useCallback(async () => {
    if (busyRef.current) {
      return;
    }

    try {
      await requestJson("/api/history", sessionIdRef.current, { method: "DELETE" });
      setTurns([]);
    } catch (cause) {
      setNotice({ kind: "error", message: toErrorMessage(cause, "Could not clear history") });
    }
  }, []);

  return useMemo(
    () => ({
      state,
      username,
      material,
      turns,
      notice,
      signIn,
      signOut,
      uploadMaterial,
      ask,
      clearHistory
    }),
    [state, username, material, turns, notice, signIn, signOut, uploadMaterial, ask, clearHistory]
  );
}

async function requestJson<T = unknown>(
  path: string,
  sessionId: string | null,
  init: RequestInit
): Promise<T> {
  const headers = new Headers(init.headers);
  if (sessionId) {
    headers.set("x-session-id", sessionId);
  }

  const response = await fetch(`${API_BASE}${path}`, { ...init, headers });
  if (!response.ok) {
    throw new Error(await getErrorResponseMessage(response));
  }

  return (await response.json()) as T;
}

async function getErrorResponseMessage(response: Response): Promise<string> {
  const contentType = response.headers.get("content-type") ?? "";

  if (contentType.includes("application/json")) {
    try {
      const data = (await response.json()) as { error?: string; message?: string };
      return data.message ?? data.error ?? `Request failed (${response.status})`;
    } catch {
      return `Request failed (${response.status})`;
    }
  }

  try {
    const rawText = await response.text();
    return rawText || `Request failed (${response.status})`;
  } catch {
    return `Request failed (${response.status})`;
  }
}

function toErrorMessage(cause: unknown, fallback: string): string {
  if (cause instanceof Error && cause.message.trim().length > 0) {
    return cause.message;
  }

  return fallback;
}

// Copyright 2026 jem-sec-attest contributors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

/**
 * Training page: name entry, module selection, material and video, the quiz
 * with per-question feedback, completion review and the advisor chat.
 * Every user action is one request; the returned session view is re-rendered.
 */

"use client";

import type { SessionAction, SessionView } from "@/session";
import type React from "react";
import { useEffect, useState } from "react";
import { derivePageState, formatScore, moduleFileUrl } from "./derive-page-state";

// ---------------------------------------------------------------------------
// Shared inline style objects
// ---------------------------------------------------------------------------

const styles = {
  container: {
    maxWidth: "1100px",
    margin: "2rem auto",
    padding: "0 1rem",
    fontFamily: "system-ui, sans-serif",
  },
  heading: {
    fontSize: "1.5rem",
    fontWeight: 600,
    marginBottom: "0.5rem",
    color: "#111",
  },
  subheading: {
    fontSize: "1.125rem",
    fontWeight: 600,
    marginBottom: "0.5rem",
    color: "#111",
  },
  paragraph: {
    color: "#555",
    marginBottom: "1.25rem",
    lineHeight: 1.6,
  },
  primaryButton: {
    padding: "0.65rem 1.5rem",
    backgroundColor: "#1a73e8",
    color: "white",
    border: "none",
    borderRadius: "4px",
    fontSize: "0.95rem",
    fontWeight: 500,
    cursor: "pointer",
  },
  secondaryButton: {
    padding: "0.65rem 1.5rem",
    backgroundColor: "#f5f5f5",
    color: "#111",
    border: "1px solid #ddd",
    borderRadius: "4px",
    fontSize: "0.95rem",
    fontWeight: 500,
    cursor: "pointer",
  },
  card: {
    border: "1px solid #e0e0e0",
    borderRadius: "6px",
    padding: "1.25rem",
    marginBottom: "1rem",
    backgroundColor: "#fafafa",
  },
  input: {
    width: "100%",
    padding: "0.6rem 0.75rem",
    border: "1px solid #ccc",
    borderRadius: "4px",
    fontSize: "0.95rem",
    boxSizing: "border-box",
  },
  radioLabel: {
    display: "flex",
    alignItems: "flex-start",
    gap: "0.5rem",
    marginBottom: "0.5rem",
    cursor: "pointer",
    fontSize: "0.95rem",
    color: "#222",
  },
  scoreDisplay: {
    fontSize: "2rem",
    fontWeight: 700,
    color: "#111",
    marginBottom: "0.5rem",
  },
  layoutWithSidebar: {
    display: "flex",
    gap: "2rem",
    alignItems: "flex-start",
  },
  mainContent: {
    flex: 1,
    minWidth: 0,
  },
  sidebar: {
    width: "320px",
    flexShrink: 0,
    border: "1px solid #e0e0e0",
    borderRadius: "6px",
    padding: "1rem",
    backgroundColor: "#fafafa",
  },
  sidebarHeading: {
    fontSize: "0.875rem",
    fontWeight: 600,
    color: "#111",
    marginBottom: "0.75rem",
  },
  chatLog: {
    maxHeight: "360px",
    overflowY: "auto",
    marginBottom: "0.75rem",
  },
  chatEntry: {
    fontSize: "0.85rem",
    lineHeight: 1.5,
    marginBottom: "0.6rem",
    whiteSpace: "pre-wrap",
  },
} satisfies Record<string, React.CSSProperties>;

const noticeColors: Record<SessionView["notices"][number]["level"], React.CSSProperties> = {
  info: { backgroundColor: "#e8f0fe", border: "1px solid #c7d7f5", color: "#1e40af" },
  warning: { backgroundColor: "#fff8e1", border: "1px solid #f9a825", color: "#5f4c00" },
  error: { backgroundColor: "#fee2e2", border: "1px solid #fca5a5", color: "#991b1b" },
};

function resultBadge(pass: boolean): React.CSSProperties {
  return {
    display: "inline-block",
    padding: "0.35rem 1rem",
    borderRadius: "4px",
    fontWeight: 700,
    fontSize: "1rem",
    backgroundColor: pass ? "#dcfce7" : "#fee2e2",
    color: pass ? "#166534" : "#991b1b",
    marginBottom: "1rem",
  };
}

// ---------------------------------------------------------------------------
// API calls
// ---------------------------------------------------------------------------

interface ApiErrorBody {
  error?: string;
  message?: string;
}

class ApiRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = "ApiRequestError";
  }
}

async function requestView(url: string, init?: RequestInit): Promise<SessionView> {
  const res = await fetch(url, {
    ...init,
    headers: { "Content-Type": "application/json", ...init?.headers },
  });
  if (!res.ok) {
    const body: ApiErrorBody = await res.json().catch(() => ({}));
    throw new ApiRequestError(body.message ?? `Request failed (${res.status})`, res.status);
  }
  const view: SessionView = await res.json();
  return view;
}

// ---------------------------------------------------------------------------
// Sub-components
// ---------------------------------------------------------------------------

function Notices({ notices }: { notices: SessionView["notices"] }) {
  if (notices.length === 0) return null;
  return (
    <div role="status" aria-live="polite">
      {notices.map((notice, i) => (
        <div
          // biome-ignore lint/suspicious/noArrayIndexKey: notices have no identity
          key={i}
          style={{
            ...noticeColors[notice.level],
            padding: "0.75rem 1rem",
            borderRadius: "4px",
            marginBottom: "1rem",
            fontSize: "0.9rem",
          }}
        >
          {notice.message}
          {notice.detail ? (
            <details style={{ marginTop: "0.5rem" }}>
              <summary>Show raw response</summary>
              <pre style={{ whiteSpace: "pre-wrap", fontSize: "0.8rem" }}>{notice.detail}</pre>
            </details>
          ) : null}
        </div>
      ))}
    </div>
  );
}

function NameEntry({ onSubmit, busy }: { onSubmit: (name: string) => void; busy: boolean }) {
  const [name, setName] = useState("");
  return (
    <form
      style={styles.card}
      onSubmit={(e) => {
        e.preventDefault();
        onSubmit(name);
      }}
    >
      <h1 style={styles.heading}>Training Assistant</h1>
      <p style={styles.paragraph}>Enter your name to begin.</p>
      <label htmlFor="user-name" style={styles.sidebarHeading}>
        Your name
      </label>
      <input
        id="user-name"
        style={{ ...styles.input, marginBottom: "1rem" }}
        value={name}
        maxLength={100}
        onChange={(e) => setName(e.target.value)}
      />
      <button type="submit" style={styles.primaryButton} disabled={busy || name.trim() === ""}>
        Start
      </button>
    </form>
  );
}

function QuizPanel({
  view,
  busy,
  onAction,
}: {
  view: SessionView;
  busy: boolean;
  onAction: (action: SessionAction) => void;
}) {
  const [selected, setSelected] = useState<string | null>(null);
  const { question, feedback } = view.quiz;

  useEffect(() => {
    setSelected(null);
  }, [question?.number, view.quiz.phase]);

  if (!question) return null;

  return (
    <section style={styles.card} aria-labelledby="question-heading">
      <h2 id="question-heading" style={styles.subheading}>
        Question {question.number} of {view.quiz.questionCount}
      </h2>
      <p style={{ ...styles.paragraph, color: "#111" }}>{question.question}</p>
      <fieldset style={{ border: "none", padding: 0, margin: "0 0 1rem" }}>
        <legend style={{ position: "absolute", left: "-9999px" }}>Answer options</legend>
        {question.options.map((option) => (
          <label key={option} style={styles.radioLabel}>
            <input
              type="radio"
              name="answer"
              value={option}
              checked={(feedback?.selected ?? selected) === option}
              disabled={feedback !== null || busy}
              onChange={() => setSelected(option)}
            />
            {option}
          </label>
        ))}
      </fieldset>

      {feedback === null ? (
        <button
          type="button"
          style={styles.primaryButton}
          disabled={selected === null || busy}
          onClick={() => {
            if (selected !== null) onAction({ type: "answer", option: selected });
          }}
        >
          Submit answer
        </button>
      ) : (
        <div>
          <p style={resultBadge(feedback.correct)}>
            {feedback.correct ? "✅ Correct!" : `❌ Incorrect. Answer: ${feedback.correctAnswer}`}
          </p>
          {question.page !== null ? (
            <p style={{ ...styles.paragraph, fontSize: "0.85rem" }}>
              See page {question.page} of the training material.
            </p>
          ) : null}
          {view.quiz.phase === "showing-feedback" ? (
            <div>
              <button
                type="button"
                style={styles.primaryButton}
                disabled={busy}
                onClick={() => onAction({ type: "next-question" })}
              >
                Next question
              </button>
            </div>
          ) : null}
        </div>
      )}
    </section>
  );
}

function CompletionPanel({
  view,
  busy,
  onAction,
}: {
  view: SessionView;
  busy: boolean;
  onAction: (action: SessionAction) => void;
}) {
  const passed = view.quiz.passed === true;
  const active = view.activeModule;

  return (
    <section style={styles.card} aria-labelledby="result-heading">
      <h2 id="result-heading" style={styles.subheading}>
        Quiz complete
      </h2>
      <p style={styles.scoreDisplay}>{formatScore(view)}</p>
      <p style={resultBadge(passed)}>{passed ? "🎉 You passed!" : "You did not pass this time."}</p>

      {passed && active?.hasTrophy ? (
        <div style={{ marginBottom: "1rem" }}>
          {/* biome-ignore lint/performance/noImgElement: served from the module folder */}
          <img src={moduleFileUrl(active.name, "trophy")} alt="Trophy" width={160} />
        </div>
      ) : null}

      {view.quiz.missed.length > 0 ? (
        <div style={{ marginBottom: "1rem" }}>
          <h3 style={styles.sidebarHeading}>Review missed questions</h3>
          <ul style={{ paddingLeft: "1.25rem", margin: 0 }}>
            {view.quiz.missed.map((m) => (
              <li key={m.index} style={{ marginBottom: "0.75rem", fontSize: "0.9rem" }}>
                <strong>{m.question}</strong>
                <br />
                Your answer: {m.userAnswer}
                <br />
                Correct answer: {m.correctAnswer}
              </li>
            ))}
          </ul>
        </div>
      ) : null}

      {passed ? (
        <button
          type="button"
          style={styles.primaryButton}
          disabled={busy}
          onClick={() => onAction({ type: "continue" })}
        >
          Continue to next module
        </button>
      ) : (
        <button
          type="button"
          style={styles.primaryButton}
          disabled={busy}
          onClick={() => onAction({ type: "retry" })}
        >
          Retry quiz
        </button>
      )}
    </section>
  );
}

function ChatPanel({
  view,
  busy,
  onSend,
  onSummary,
}: {
  view: SessionView;
  busy: boolean;
  onSend: (message: string) => void;
  onSummary: () => void;
}) {
  const [message, setMessage] = useState("");

  return (
    <aside style={styles.sidebar} aria-labelledby="chat-heading">
      <h2 id="chat-heading" style={styles.sidebarHeading}>
        Training advisor
      </h2>
      <div style={styles.chatLog}>
        {view.chat.map((entry, i) => (
          <p
            // biome-ignore lint/suspicious/noArrayIndexKey: transcript entries are append-only
            key={i}
            style={{ ...styles.chatEntry, color: entry.error ? "#991b1b" : "#222" }}
          >
            <strong>{entry.role === "user" ? "You" : "Advisor"}:</strong> {entry.message}
          </p>
        ))}
      </div>
      <form
        onSubmit={(e) => {
          e.preventDefault();
          if (message.trim() === "") return;
          onSend(message);
          setMessage("");
        }}
      >
        <input
          aria-label="Ask about the training material"
          placeholder="Ask about the training material"
          style={{ ...styles.input, marginBottom: "0.5rem" }}
          value={message}
          maxLength={2000}
          onChange={(e) => setMessage(e.target.value)}
        />
        <button type="submit" style={styles.secondaryButton} disabled={busy}>
          Send
        </button>
      </form>
      {view.summaryGenerated ? null : (
        <button
          type="button"
          style={{ ...styles.secondaryButton, marginTop: "0.75rem" }}
          disabled={busy}
          onClick={onSummary}
        >
          Generate summary
        </button>
      )}
    </aside>
  );
}

// ---------------------------------------------------------------------------
// Page
// ---------------------------------------------------------------------------

export default function TrainingPage() {
  const [view, setView] = useState<SessionView | null>(null);
  const [loading, setLoading] = useState(true);
  const [busy, setBusy] = useState(false);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    void requestView("/api/session")
      .then(setView)
      .catch((err: unknown) => {
        if (!(err instanceof ApiRequestError && err.status === 401)) {
          setError(err instanceof Error ? err.message : "Failed to load session");
        }
      })
      .finally(() => setLoading(false));
  }, []);

  async function run(request: () => Promise<SessionView>) {
    setBusy(true);
    setError(null);
    try {
      setView(await request());
    } catch (err) {
      if (err instanceof ApiRequestError && err.status === 401) setView(null);
      setError(err instanceof Error ? err.message : "Request failed");
    } finally {
      setBusy(false);
    }
  }

  const post = (url: string, body?: unknown) =>
    run(() =>
      requestView(url, {
        method: "POST",
        body: body === undefined ? undefined : JSON.stringify(body),
      }),
    );

  const act = (action: SessionAction) => {
    void post("/api/session/actions", action);
  };

  async function leave() {
    await fetch("/api/session", { method: "DELETE" });
    setView(null);
  }

  const pageState = derivePageState(view, loading);

  if (pageState === "loading") {
    return (
      <main id="main-content" style={styles.container} aria-busy="true">
        <p style={styles.paragraph}>Loading…</p>
      </main>
    );
  }

  if (view === null) {
    return (
      <main id="main-content" style={{ ...styles.container, maxWidth: "480px" }}>
        {error ? <Notices notices={[{ level: "error", message: error }]} /> : null}
        <NameEntry busy={busy} onSubmit={(userName) => void post("/api/session", { userName })} />
      </main>
    );
  }

  const active = view.activeModule;

  return (
    <main id="main-content" style={styles.container}>
      <div style={{ display: "flex", justifyContent: "space-between", alignItems: "center" }}>
        <h1 style={styles.heading}>Welcome, {view.userName}</h1>
        <button type="button" style={styles.secondaryButton} onClick={() => void leave()}>
          Leave
        </button>
      </div>

      {error ? <Notices notices={[{ level: "error", message: error }]} /> : null}
      <Notices notices={view.notices} />

      <div style={styles.layoutWithSidebar}>
        <div style={styles.mainContent}>
          <section style={styles.card} aria-labelledby="module-heading">
            <h2 id="module-heading" style={styles.subheading}>
              Training module
            </h2>
            {view.modules.length > 0 ? (
              <select
                aria-label="Select training module"
                style={{ ...styles.input, marginBottom: "1rem" }}
                value={active?.name ?? ""}
                disabled={busy}
                onChange={(e) => act({ type: "select-module", moduleName: e.target.value })}
              >
                {view.modules.map((m) => (
                  <option key={m.name} value={m.name}>
                    {m.name}
                  </option>
                ))}
              </select>
            ) : null}

            {active ? (
              <div style={{ display: "flex", gap: "0.75rem", flexWrap: "wrap" }}>
                {active.hasDocument ? (
                  <a href={moduleFileUrl(active.name, "material")} style={styles.secondaryButton}>
                    Download {active.documentFileName}
                  </a>
                ) : (
                  <span style={styles.paragraph}>No training material found.</span>
                )}
                {active.hasVideo ? (
                  <button
                    type="button"
                    style={styles.secondaryButton}
                    disabled={busy}
                    onClick={() => act({ type: view.showVideo ? "close-video" : "open-video" })}
                  >
                    {view.showVideo ? "Close video" : "Watch training video"}
                  </button>
                ) : null}
              </div>
            ) : null}

            {active?.hasVideo && view.showVideo ? (
              // biome-ignore lint/a11y/useMediaCaption: training videos ship without captions
              <video
                controls
                src={moduleFileUrl(active.name, "video")}
                style={{ width: "100%", marginTop: "1rem" }}
              />
            ) : null}
          </section>

          {pageState === "all-complete" ? (
            <section style={styles.card}>
              <p style={resultBadge(true)}>You've completed all modules.</p>
            </section>
          ) : null}

          {pageState === "ready" ? (
            <section style={styles.card}>
              <p style={styles.paragraph}>
                Generate a quiz from this module&apos;s training material.
              </p>
              <button
                type="button"
                style={styles.primaryButton}
                disabled={busy || !active?.hasDocument}
                onClick={() => act({ type: "start-quiz" })}
              >
                {busy ? "Generating questions…" : "Start quiz"}
              </button>
            </section>
          ) : null}

          {pageState === "question" ||
          pageState === "feedback" ||
          pageState === "passed" ||
          pageState === "failed" ? (
            <QuizPanel view={view} busy={busy} onAction={act} />
          ) : null}

          {pageState === "passed" || pageState === "failed" ? (
            <CompletionPanel view={view} busy={busy} onAction={act} />
          ) : null}
        </div>

        {active ? (
          <ChatPanel
            view={view}
            busy={busy}
            onSend={(message) => void post("/api/chat", { message })}
            onSummary={() => void post("/api/chat/summary")}
          />
        ) : null}
      </div>
    </main>
  );
}

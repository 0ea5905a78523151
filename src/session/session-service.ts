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
 * SessionService: maps each user action to one round of state updates.
 * Side effects (document extraction, model calls, progress writes) happen
 * here; the resulting state change is always applied through the pure
 * session reducer. Every method takes the session it acts on and returns the
 * next session; nothing is held between calls.
 */

import { randomUUID } from "node:crypto";
import type { LanguageModel } from "ai";
import type { CompletionOptions } from "../ai/completion.js";
import { SUMMARY_QUESTION, consultAdvisor } from "../chat/chat-advisor.js";
import {
  type DocumentPage,
  ExtractionError,
  loadDocumentPages,
  loadDocumentText,
} from "../content/content-loader.js";
import { type ModuleContext, findModule } from "../content/module-catalog.js";
import type { ProgressEntry } from "../progress/progress-recorder.js";
import { PersistenceError } from "../progress/progress-recorder.js";
import {
  type GenerationResult,
  type QuizEventType,
  type QuizItem,
  type QuizRules,
  StateTransitionError,
  canTransitionQuiz,
  deriveQuizPhase,
  generateQuestions,
  totalScore,
} from "../quiz/index.js";
import { advanceModule } from "./module-selector.js";
import type { Notice, TrainingSession } from "./schemas.js";
import { type SessionEvent, applySessionEvent, createSession } from "./session-reducer.js";

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface DocumentReader {
  loadPages(documentPath: string | null): Promise<DocumentPage[]>;
  loadText(documentPath: string | null): Promise<string>;
}

export interface ProgressSink {
  record(entry: ProgressEntry): Promise<void>;
}

export interface SessionServiceOptions {
  questionsPerSession: number;
  passingScore: number;
  model: LanguageModel;
  completion?: CompletionOptions;
  progress: ProgressSink;
  listModules(): Promise<ModuleContext[]>;
  documents?: DocumentReader;
  now?: () => Date;
  newId?: () => string;
}

const defaultDocuments: DocumentReader = {
  loadPages: loadDocumentPages,
  loadText: loadDocumentText,
};

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class SessionActionError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "module_not_found"
      | "no_active_module"
      | "no_video"
      | "summary_already_generated",
  ) {
    super(message);
    this.name = "SessionActionError";
  }
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export class SessionService {
  private readonly rules: QuizRules;
  private readonly documents: DocumentReader;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(private readonly options: SessionServiceOptions) {
    this.rules = { passingScore: options.passingScore };
    this.documents = options.documents ?? defaultDocuments;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  /** Enter name: creates a session positioned on the first module. */
  async startSession(userName: string): Promise<TrainingSession> {
    const modules = await this.options.listModules();
    const session = createSession({
      id: this.newId(),
      userName,
      moduleName: modules[0]?.name ?? null,
      now: this.now(),
    });

    if (modules.length === 0) {
      return this.apply(session, {
        type: "notices-set",
        notices: [{ level: "error", message: "No training modules are available." }],
      });
    }
    return session;
  }

  async selectModule(session: TrainingSession, moduleName: string): Promise<TrainingSession> {
    await this.requireModule(moduleName);
    return this.apply(this.begin(session), { type: "module-selected", moduleName });
  }

  /**
   * Start quiz: extract the active module's document, generate questions and
   * enter the first question. Extraction and generation failures leave the
   * quiz not started and are reported as notices.
   */
  async startQuiz(session: TrainingSession): Promise<TrainingSession> {
    this.assertQuizEvent(session, "quiz-started");
    const current = this.begin(session);

    const outcome = await this.generateFor(current);
    if ("notices" in outcome) {
      return this.apply(current, { type: "notices-set", notices: outcome.notices });
    }
    return this.apply(current, { type: "quiz-started", items: outcome.items });
  }

  async answer(session: TrainingSession, option: string): Promise<TrainingSession> {
    const answered = this.apply(this.begin(session), { type: "answer-selected", option });
    return this.settleCompletion(answered);
  }

  async nextQuestion(session: TrainingSession): Promise<TrainingSession> {
    return this.apply(this.begin(session), { type: "next-question" });
  }

  /**
   * Retry after a failed quiz: a fresh question set from the same material.
   * Rows already written to the progress log are left untouched.
   */
  async retryQuiz(session: TrainingSession): Promise<TrainingSession> {
    this.assertQuizEvent(session, "quiz-retried");
    const current = this.begin(session);

    const outcome = await this.generateFor(current);
    if ("notices" in outcome) {
      return this.apply(current, { type: "notices-set", notices: outcome.notices });
    }
    return this.apply(current, { type: "quiz-retried", items: outcome.items });
  }

  /** Continue after a passed quiz: advance to the next module in catalog order. */
  async continueToNextModule(session: TrainingSession): Promise<TrainingSession> {
    const phase = deriveQuizPhase(session.quiz);
    if (phase !== "passed") {
      throw new StateTransitionError(phase, "module-continued");
    }

    const advance = advanceModule(await this.options.listModules(), session.moduleName);
    const next = this.apply(this.begin(session), { type: "module-continued", advance });

    switch (advance.kind) {
      case "next":
        return next;
      case "all-complete":
        return this.apply(next, {
          type: "notices-set",
          notices: [{ level: "info", message: "You've completed all modules." }],
        });
      case "unknown":
        return this.apply(next, {
          type: "notices-set",
          notices: [{ level: "warning", message: "Could not determine next module." }],
        });
    }
  }

  async openVideo(session: TrainingSession): Promise<TrainingSession> {
    const mod = await this.requireActiveModule(session);
    if (mod.videoPath === null) {
      throw new SessionActionError(`Module "${mod.name}" has no video`, "no_video");
    }
    return this.apply(this.begin(session), { type: "video-opened" });
  }

  async closeVideo(session: TrainingSession): Promise<TrainingSession> {
    return this.apply(this.begin(session), { type: "video-closed" });
  }

  /**
   * Send a chat message about the active module. The question and the reply
   * (or a visible error entry) are appended to the transcript.
   */
  async sendChatMessage(session: TrainingSession, message: string): Promise<TrainingSession> {
    const current = this.begin(session);
    const mod = await this.requireActiveModule(current);

    let documentText: string;
    try {
      documentText = await this.documents.loadText(mod.documentPath);
    } catch (error) {
      if (error instanceof ExtractionError) {
        return this.apply(current, { type: "notices-set", notices: [extractionNotice(error)] });
      }
      throw error;
    }

    const transcript = await consultAdvisor({
      transcript: current.chat,
      question: message,
      documentText,
      model: this.options.model,
      completion: this.options.completion,
    });
    return this.apply(current, { type: "chat-updated", transcript });
  }

  /** Generate summary: the canonical summary question, at most once per session. */
  async requestSummary(session: TrainingSession): Promise<TrainingSession> {
    if (session.summaryGenerated) {
      throw new SessionActionError(
        "A training summary has already been generated in this session",
        "summary_already_generated",
      );
    }
    await this.requireActiveModule(session);
    const flagged = this.apply(session, { type: "summary-requested" });
    return this.sendChatMessage(flagged, SUMMARY_QUESTION);
  }

  /**
   * Write the progress entry the first time the quiz is seen complete.
   * Safe to call on every render: once `progressSaved` is set it is a no-op.
   * A failed write becomes a warning; the quiz result is kept either way.
   */
  async settleCompletion(session: TrainingSession): Promise<TrainingSession> {
    if (!session.quiz.complete || session.progressSaved || session.moduleName === null) {
      return session;
    }

    try {
      await this.options.progress.record({
        timestamp: this.now(),
        moduleName: session.moduleName,
        userName: session.userName,
        score: totalScore(session.quiz.scores),
        sessionId: session.id,
      });
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      console.error(`[session] ${error.message}`);
      return this.apply(session, {
        type: "notices-set",
        notices: [...session.notices, { level: "warning", message: `⚠️ ${error.message}` }],
      });
    }

    return this.apply(session, { type: "progress-saved" });
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private apply(session: TrainingSession, event: SessionEvent): TrainingSession {
    return applySessionEvent(session, event, this.rules);
  }

  /** Notices describe the outcome of a single action. */
  private begin(session: TrainingSession): TrainingSession {
    if (session.notices.length === 0) return session;
    return this.apply(session, { type: "notices-set", notices: [] });
  }

  private assertQuizEvent(session: TrainingSession, event: QuizEventType): void {
    const phase = deriveQuizPhase(session.quiz);
    if (!canTransitionQuiz(phase, event)) {
      throw new StateTransitionError(phase, event);
    }
  }

  private async requireModule(name: string): Promise<ModuleContext> {
    const mod = findModule(await this.options.listModules(), name);
    if (!mod) {
      throw new SessionActionError(`Training module "${name}" not found`, "module_not_found");
    }
    return mod;
  }

  private async requireActiveModule(session: TrainingSession): Promise<ModuleContext> {
    if (session.moduleName === null) {
      throw new SessionActionError("No training module is selected", "no_active_module");
    }
    return this.requireModule(session.moduleName);
  }

  private async generateFor(
    session: TrainingSession,
  ): Promise<{ items: QuizItem[] } | { notices: Notice[] }> {
    const mod = await this.requireActiveModule(session);

    let pages: DocumentPage[];
    try {
      pages = await this.documents.loadPages(mod.documentPath);
    } catch (error) {
      if (error instanceof ExtractionError) return { notices: [extractionNotice(error)] };
      throw error;
    }

    const result = await generateQuestions({
      source: pages,
      count: this.options.questionsPerSession,
      model: this.options.model,
      completion: this.options.completion,
    });
    if (result.items.length === 0) return { notices: [generationNotice(result)] };
    return { items: result.items };
  }
}

function extractionNotice(error: ExtractionError): Notice {
  return { level: "error", message: error.message };
}

function generationNotice(result: GenerationResult): Notice {
  switch (result.status) {
    case "parse-failed":
      return { level: "warning", message: `⚠️ ${result.warning}`, detail: result.raw };
    case "model-failed":
      return { level: "error", message: `❌ ${result.warning}` };
    case "ok":
      return { level: "error", message: "❌ No questions were generated. Please try again." };
  }
}

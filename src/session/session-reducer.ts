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
 * Pure session reducer: (session, event) → session'.
 * All side effects (extraction, model calls, progress writes) happen in
 * SessionService before or after an event is applied; this module only
 * decides what the next state is.
 */

import type { ChatEntry } from "../chat/chat-advisor.js";
import {
  type QuizEvent,
  type QuizRules,
  StateTransitionError,
  createEmptyQuiz,
  deriveQuizPhase,
  transitionQuiz,
} from "../quiz/state-machine.js";
import type { ModuleAdvance } from "./module-selector.js";
import type { Notice, TrainingSession } from "./schemas.js";

export type SessionEvent =
  | Exclude<QuizEvent, { type: "quiz-reset" }>
  | { type: "module-selected"; moduleName: string }
  | { type: "module-continued"; advance: ModuleAdvance }
  | { type: "progress-saved" }
  | { type: "video-opened" }
  | { type: "video-closed" }
  | { type: "chat-updated"; transcript: readonly ChatEntry[] }
  | { type: "summary-requested" }
  | { type: "notices-set"; notices: readonly Notice[] };

export interface NewSessionInput {
  id: string;
  userName: string;
  moduleName: string | null;
  now: Date;
}

export function createSession(input: NewSessionInput): TrainingSession {
  const timestamp = input.now.toISOString();
  return {
    id: input.id,
    userName: input.userName,
    moduleName: input.moduleName,
    quiz: createEmptyQuiz(),
    progressSaved: false,
    showVideo: false,
    summaryGenerated: false,
    chat: [],
    notices: [],
    allModulesComplete: false,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/** Fields cleared whenever a different module becomes active. */
function withFreshModule(session: TrainingSession, moduleName: string | null): TrainingSession {
  return {
    ...session,
    moduleName,
    quiz: createEmptyQuiz(),
    progressSaved: false,
    showVideo: false,
  };
}

export function applySessionEvent(
  session: TrainingSession,
  event: SessionEvent,
  rules: QuizRules,
): TrainingSession {
  switch (event.type) {
    case "quiz-started":
    case "answer-selected":
    case "next-question":
    case "quiz-retried":
      return { ...session, quiz: transitionQuiz(session.quiz, event, rules) };

    case "module-selected":
      return { ...withFreshModule(session, event.moduleName), allModulesComplete: false };

    case "module-continued": {
      const phase = deriveQuizPhase(session.quiz);
      if (phase !== "passed") {
        throw new StateTransitionError(phase, event.type);
      }
      const { advance } = event;
      const nextName = advance.kind === "next" ? advance.module.name : session.moduleName;
      return {
        ...withFreshModule(session, nextName),
        allModulesComplete: advance.kind === "all-complete",
      };
    }

    case "progress-saved":
      return { ...session, progressSaved: true };

    case "video-opened":
      return { ...session, showVideo: true };

    case "video-closed":
      return { ...session, showVideo: false };

    case "chat-updated":
      return { ...session, chat: [...event.transcript] };

    case "summary-requested":
      return { ...session, summaryGenerated: true };

    case "notices-set":
      return { ...session, notices: [...event.notices] };

    default: {
      const _exhaustive: never = event;
      throw new Error(`Unhandled session event: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

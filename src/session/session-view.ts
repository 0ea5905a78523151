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
 * Client-safe projection of a training session.
 * The correct answer of a question is only included once it has been
 * answered.
 */

import type { ChatEntry } from "../chat/chat-advisor.js";
import type { ModuleContext } from "../content/module-catalog.js";
import {
  type MissedQuestion,
  type QuizItemType,
  type QuizPhase,
  deriveQuizPhase,
  isQuizComplete,
  missedQuestions,
  totalScore,
} from "../quiz/index.js";
import type { Notice, TrainingSession } from "./schemas.js";

export interface ModuleSummaryView {
  name: string;
  hasDocument: boolean;
  documentFileName: string | null;
  hasVideo: boolean;
  hasTrophy: boolean;
}

export interface QuestionView {
  /** 1-based question number. */
  number: number;
  question: string;
  type: QuizItemType;
  options: string[];
  page: number | null;
}

export interface FeedbackView {
  correct: boolean;
  selected: string;
  correctAnswer: string;
}

export interface SessionView {
  sessionId: string;
  userName: string;
  modules: ModuleSummaryView[];
  activeModule: ModuleSummaryView | null;
  allModulesComplete: boolean;
  showVideo: boolean;
  quiz: {
    phase: QuizPhase;
    questionCount: number;
    question: QuestionView | null;
    feedback: FeedbackView | null;
    score: number;
    passed: boolean | null;
    missed: MissedQuestion[];
  };
  progressSaved: boolean;
  summaryGenerated: boolean;
  chat: ChatEntry[];
  notices: Notice[];
}

export function toModuleSummary(mod: ModuleContext): ModuleSummaryView {
  return {
    name: mod.name,
    hasDocument: mod.documentPath !== null,
    documentFileName: mod.documentFileName,
    hasVideo: mod.videoPath !== null,
    hasTrophy: mod.trophyPath !== null,
  };
}

export function toSessionView(
  session: TrainingSession,
  modules: readonly ModuleContext[],
): SessionView {
  const { quiz } = session;
  const phase = deriveQuizPhase(quiz);
  const item = phase === "not-started" ? undefined : quiz.items[quiz.currentIndex];
  const active = modules.find((m) => m.name === session.moduleName);

  const selected = quiz.answers[quiz.currentIndex];
  const feedback: FeedbackView | null =
    quiz.feedbackShown && item && selected !== undefined
      ? { correct: quiz.lastCorrect === true, selected, correctAnswer: item.answer }
      : null;

  return {
    sessionId: session.id,
    userName: session.userName,
    modules: modules.map(toModuleSummary),
    activeModule: active ? toModuleSummary(active) : null,
    allModulesComplete: session.allModulesComplete,
    showVideo: session.showVideo,
    quiz: {
      phase,
      questionCount: quiz.items.length,
      question: item
        ? {
            number: quiz.currentIndex + 1,
            question: item.question,
            type: item.type,
            options: [...item.options],
            page: item.page ?? null,
          }
        : null,
      feedback,
      score: totalScore(quiz.scores),
      passed: quiz.passed,
      missed: isQuizComplete(phase) ? missedQuestions(quiz) : [],
    },
    progressSaved: session.progressSaved,
    summaryGenerated: session.summaryGenerated,
    chat: [...session.chat],
    notices: [...session.notices],
  };
}

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

import type { QuizItem, QuizPhase, QuizState } from "./schemas.js";
import { isPassing, scoreAnswer, totalScore } from "./score-calculator.js";

// ---------------------------------------------------------------------------
// Event types
// ---------------------------------------------------------------------------

export type QuizEvent =
  | { type: "quiz-started"; items: readonly QuizItem[] }
  | { type: "answer-selected"; option: string }
  | { type: "next-question" }
  | { type: "quiz-retried"; items: readonly QuizItem[] }
  | { type: "quiz-reset" };

export type QuizEventType = QuizEvent["type"];

export interface QuizRules {
  passingScore: number;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class StateTransitionError extends Error {
  constructor(
    public readonly currentState: string,
    public readonly event: string,
  ) {
    super(`Invalid transition: cannot apply event '${event}' in state '${currentState}'`);
    this.name = "StateTransitionError";
  }
}

export class InvalidAnswerError extends Error {
  constructor(public readonly option: string) {
    super(`'${option}' is not one of the current question's options`);
    this.name = "InvalidAnswerError";
  }
}

// ---------------------------------------------------------------------------
// Transition table
// ---------------------------------------------------------------------------

/**
 * Events accepted in each phase. `quiz-reset` is accepted everywhere so that
 * continuing or switching modules always starts from a clean quiz.
 */
const QUIZ_TRANSITIONS: Record<QuizPhase, ReadonlySet<QuizEventType>> = {
  "not-started": new Set(["quiz-started", "quiz-reset"]),
  "awaiting-answer": new Set(["answer-selected", "quiz-reset"]),
  "showing-feedback": new Set(["next-question", "quiz-reset"]),
  passed: new Set(["quiz-reset"]),
  failed: new Set(["quiz-retried", "quiz-reset"]),
};

export function createEmptyQuiz(): QuizState {
  return {
    items: [],
    currentIndex: 0,
    answers: [],
    scores: [],
    feedbackShown: false,
    lastCorrect: null,
    complete: false,
    passed: null,
  };
}

export function deriveQuizPhase(quiz: QuizState): QuizPhase {
  if (quiz.complete) return quiz.passed ? "passed" : "failed";
  if (quiz.items.length === 0) return "not-started";
  return quiz.feedbackShown ? "showing-feedback" : "awaiting-answer";
}

export function isQuizComplete(phase: QuizPhase): boolean {
  return phase === "passed" || phase === "failed";
}

/**
 * Returns true when the event is accepted in the given phase. Never throws.
 */
export function canTransitionQuiz(phase: QuizPhase, event: QuizEventType): boolean {
  return QUIZ_TRANSITIONS[phase].has(event);
}

function beginQuiz(items: readonly QuizItem[]): QuizState {
  if (items.length === 0) {
    throw new RangeError("A quiz needs at least one question");
  }
  return { ...createEmptyQuiz(), items: [...items] };
}

function recordAnswer(quiz: QuizState, option: string, rules: QuizRules): QuizState {
  const item = quiz.items[quiz.currentIndex];
  if (!item || !item.options.includes(option)) {
    throw new InvalidAnswerError(option);
  }

  const score = scoreAnswer(option, item.answer);
  const scores = [...quiz.scores, score];
  const isLast = quiz.currentIndex === quiz.items.length - 1;

  return {
    ...quiz,
    answers: [...quiz.answers, option],
    scores,
    lastCorrect: score === 1,
    feedbackShown: true,
    complete: isLast,
    passed: isLast ? isPassing(totalScore(scores), rules.passingScore) : null,
  };
}

// ---------------------------------------------------------------------------
// Pure transition function
// ---------------------------------------------------------------------------

/**
 * Apply an event to the quiz and return the next state. The input is never
 * mutated. Throws StateTransitionError when the event is not accepted in the
 * current phase.
 */
export function transitionQuiz(quiz: QuizState, event: QuizEvent, rules: QuizRules): QuizState {
  const phase = deriveQuizPhase(quiz);
  if (!canTransitionQuiz(phase, event.type)) {
    throw new StateTransitionError(phase, event.type);
  }

  switch (event.type) {
    case "quiz-started":
    case "quiz-retried":
      return beginQuiz(event.items);
    case "answer-selected":
      return recordAnswer(quiz, event.option, rules);
    case "next-question":
      if (quiz.currentIndex >= quiz.items.length - 1) {
        throw new StateTransitionError(phase, event.type);
      }
      return {
        ...quiz,
        currentIndex: quiz.currentIndex + 1,
        feedbackShown: false,
        lastCorrect: null,
      };
    case "quiz-reset":
      return createEmptyQuiz();
    default: {
      const _exhaustive: never = event;
      throw new Error(`Unhandled quiz event: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

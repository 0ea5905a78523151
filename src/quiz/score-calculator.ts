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

import type { QuizState, Score } from "./schemas.js";

/**
 * Compare a selected option with the expected answer, ignoring case and
 * surrounding whitespace.
 */
export function evaluateAnswer(selected: string, expected: string): boolean {
  return selected.trim().toLowerCase() === expected.trim().toLowerCase();
}

export function scoreAnswer(selected: string, expected: string): Score {
  return evaluateAnswer(selected, expected) ? 1 : 0;
}

/** Number of correctly answered questions. */
export function totalScore(scores: readonly Score[]): number {
  return scores.filter((s) => s === 1).length;
}

/** Pass/fail: the threshold itself passes. */
export function isPassing(total: number, passingScore: number): boolean {
  return total >= passingScore;
}

export interface MissedQuestion {
  /** 0-based position in the quiz. */
  index: number;
  question: string;
  userAnswer: string;
  correctAnswer: string;
}

/**
 * Questions answered incorrectly, for review once the quiz is complete.
 */
export function missedQuestions(quiz: QuizState): MissedQuestion[] {
  const missed: MissedQuestion[] = [];
  quiz.scores.forEach((score, index) => {
    const item = quiz.items[index];
    if (score === 0 && item) {
      missed.push({
        index,
        question: item.question,
        userAnswer: quiz.answers[index] ?? "",
        correctAnswer: item.answer,
      });
    }
  });
  return missed;
}

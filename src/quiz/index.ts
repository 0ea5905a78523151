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
 * Quiz module public API.
 */

// --- Schemas ---
export {
  ModelQuizItemSchema,
  QuizItemSchema,
  QuizItemTypeSchema,
  QuizPhaseSchema,
  QuizStateSchema,
  ScoreSchema,
} from "./schemas.js";
export type { QuizItem, QuizItemType, QuizPhase, QuizState, Score } from "./schemas.js";

// --- State machine ---
export type { QuizEvent, QuizEventType, QuizRules } from "./state-machine.js";
export {
  InvalidAnswerError,
  StateTransitionError,
  canTransitionQuiz,
  createEmptyQuiz,
  deriveQuizPhase,
  isQuizComplete,
  transitionQuiz,
} from "./state-machine.js";

// --- Score calculator ---
export type { MissedQuestion } from "./score-calculator.js";
export {
  evaluateAnswer,
  isPassing,
  missedQuestions,
  scoreAnswer,
  totalScore,
} from "./score-calculator.js";

// --- Response parser ---
export type { ParseOutcome } from "./response-parser.js";
export { GenerationParseError, parseQuizItems, sanitizeModelJson } from "./response-parser.js";

// --- Question generator ---
export type { GenerateQuestionsInput, GenerationResult } from "./question-generator.js";
export {
  SOURCE_TEXT_LIMIT,
  buildQuestionPrompt,
  buildSourceText,
  generateQuestions,
} from "./question-generator.js";

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
 * Zod schemas for quiz items and quiz state.
 */

import { z } from "zod";

export const QuizItemTypeSchema = z.enum(["multiple_choice", "true_false"]);

export const QuizItemSchema = z.object({
  question: z.string(),
  type: QuizItemTypeSchema,
  options: z.array(z.string()),
  answer: z.string(),
  page: z.number().int().positive().optional(),
});

/**
 * Lenient shape for model output. Missing or mistyped optional fields are
 * defaulted or dropped; only question text and options are required to
 * present an item.
 */
const ScalarTextSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

export const ModelQuizItemSchema = z.object({
  question: z.string().trim().min(1),
  type: QuizItemTypeSchema.catch("multiple_choice"),
  options: z.array(ScalarTextSchema).min(1),
  answer: ScalarTextSchema.catch(""),
  page: z.coerce.number().int().positive().optional().catch(undefined),
});

export const ScoreSchema = z.union([z.literal(0), z.literal(1)]);

export const QuizStateSchema = z.object({
  items: z.array(QuizItemSchema),
  currentIndex: z.number().int().min(0),
  answers: z.array(z.string()),
  scores: z.array(ScoreSchema),
  feedbackShown: z.boolean(),
  lastCorrect: z.boolean().nullable(),
  complete: z.boolean(),
  passed: z.boolean().nullable(),
});

export const QuizPhaseSchema = z.enum([
  "not-started",
  "awaiting-answer",
  "showing-feedback",
  "passed",
  "failed",
]);

export type QuizItemType = z.infer<typeof QuizItemTypeSchema>;
export type QuizItem = z.infer<typeof QuizItemSchema>;
export type Score = z.infer<typeof ScoreSchema>;
export type QuizState = z.infer<typeof QuizStateSchema>;
export type QuizPhase = z.infer<typeof QuizPhaseSchema>;

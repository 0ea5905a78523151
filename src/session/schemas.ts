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
 * Zod schemas for the per-user training session and the API requests that
 * drive it.
 */

import { z } from "zod";
import { ChatEntrySchema } from "../chat/chat-advisor.js";
import { QuizStateSchema } from "../quiz/schemas.js";

export const NoticeSchema = z.object({
  level: z.enum(["info", "warning", "error"]),
  message: z.string(),
  /** Extra diagnostic text, e.g. the raw model response that failed to parse. */
  detail: z.string().optional(),
});

export const TrainingSessionSchema = z.object({
  id: z.string().uuid(),
  userName: z.string().min(1),
  moduleName: z.string().nullable(),
  quiz: QuizStateSchema,
  progressSaved: z.boolean(),
  showVideo: z.boolean(),
  summaryGenerated: z.boolean(),
  chat: z.array(ChatEntrySchema),
  notices: z.array(NoticeSchema),
  allModulesComplete: z.boolean(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

// ---------------------------------------------------------------------------
// API request schemas
// ---------------------------------------------------------------------------

export const StartSessionRequestSchema = z.object({
  userName: z.string().trim().min(1, "Please enter your name").max(100),
});

export const SessionActionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("select-module"), moduleName: z.string().min(1) }),
  z.object({ type: z.literal("start-quiz") }),
  z.object({ type: z.literal("answer"), option: z.string().min(1) }),
  z.object({ type: z.literal("next-question") }),
  z.object({ type: z.literal("continue") }),
  z.object({ type: z.literal("retry") }),
  z.object({ type: z.literal("open-video") }),
  z.object({ type: z.literal("close-video") }),
]);

export const ChatRequestSchema = z.object({
  message: z.string().trim().min(1).max(2000),
});

export type Notice = z.infer<typeof NoticeSchema>;
export type TrainingSession = z.infer<typeof TrainingSessionSchema>;
export type SessionAction = z.infer<typeof SessionActionSchema>;

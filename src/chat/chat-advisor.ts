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
 * Chat advisor: answers free-text questions about the active module's
 * material. A failed model call is turned into a visible transcript entry.
 */

import type { LanguageModel } from "ai";
import { z } from "zod";
import { type CompletionOptions, requestCompletion } from "../ai/completion.js";

/** Characters of training material included in every advisor prompt. */
export const ADVISOR_CONTEXT_LIMIT = 5000;

/** Canonical question submitted by the "generate summary" action. */
export const SUMMARY_QUESTION = "Generate a training summary based on the material.";

export const ChatRoleSchema = z.enum(["user", "assistant"]);

export const ChatEntrySchema = z.object({
  role: ChatRoleSchema,
  message: z.string(),
  error: z.literal(true).optional(),
});

export type ChatRole = z.infer<typeof ChatRoleSchema>;
export type ChatEntry = z.infer<typeof ChatEntrySchema>;
export type ChatTranscript = readonly ChatEntry[];

export interface ConsultAdvisorInput {
  transcript: ChatTranscript;
  question: string;
  documentText: string;
  model: LanguageModel;
  completion?: CompletionOptions;
}

export function buildAdvisorPrompt(documentText: string, question: string): string {
  return `You are a strategic training advisor. Based on the training material below, answer the user's question.

Training Material:
${documentText.slice(0, ADVISOR_CONTEXT_LIMIT)}

User's Question:
${question}

Provide a clear, strategic, and actionable response.`;
}

/**
 * Ask the advisor and return the transcript with the question and the reply
 * appended, in that order.
 */
export async function consultAdvisor(input: ConsultAdvisorInput): Promise<ChatEntry[]> {
  const userEntry: ChatEntry = { role: "user", message: input.question };

  let reply: ChatEntry;
  try {
    const message = await requestCompletion(
      input.model,
      buildAdvisorPrompt(input.documentText, input.question),
      input.completion,
    );
    reply = { role: "assistant", message };
  } catch (error) {
    console.error("[chat-advisor] model call failed:", error);
    reply = {
      role: "assistant",
      message: `⚠️ The training advisor could not answer: ${
        error instanceof Error ? error.message : String(error)
      }`,
      error: true,
    };
  }

  return [...input.transcript, userEntry, reply];
}

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
 * AI-powered quiz question generator.
 * Sends page-tagged training text to the model with a single user-role prompt
 * and parses the raw completion as a JSON array of quiz items. Failures are
 * recovered here and reported through the result, never thrown.
 */

import type { LanguageModel } from "ai";
import { type CompletionOptions, requestCompletion } from "../ai/completion.js";
import type { DocumentPage } from "../content/content-loader.js";
import { parseQuizItems } from "./response-parser.js";
import type { QuizItem } from "./schemas.js";

/** Only this many characters of source text are sent to the model. */
export const SOURCE_TEXT_LIMIT = 5000;

const RAW_PREVIEW_LENGTH = 200;

const PROMPT_TEMPLATE = `You are a training assistant. Based on the training material below, generate exactly {COUNT} quiz questions.
Only include two formats:
1. Multiple choice with exactly 4 options, labelled "A. ", "B. ", "C. ", "D. "
2. True or False with exactly two options: "True", "False"

Each question must include:
- "question": the question text
- "type": either "multiple_choice" or "true_false"
- "options": a list of answer options
- "answer": the correct answer (must match one of the options exactly)
- "page": the page number of the material the question is based on

Favour conceptual and comprehension questions about the subject matter.
Do not ask about addresses, URLs, copyright notices, page headers or footers, or other boilerplate.

Format your response as a raw JSON array, with no markdown and no code block.

[
  {
    "question": "Which step comes first when reporting an incident?",
    "type": "multiple_choice",
    "options": ["A. Notify the customer", "B. Record the incident", "C. Close the ticket", "D. Restart the system"],
    "answer": "B. Record the incident",
    "page": 2
  },
  {
    "question": "Incidents must be reported within one working day.",
    "type": "true_false",
    "options": ["True", "False"],
    "answer": "True",
    "page": 3
  }
]

Text:
{TEXT}`;

export type GenerationResult =
  | { status: "ok"; items: QuizItem[]; raw: string }
  | { status: "parse-failed"; items: []; raw: string; warning: string }
  | { status: "model-failed"; items: []; warning: string };

export interface GenerateQuestionsInput {
  source: readonly DocumentPage[] | string;
  count: number;
  model: LanguageModel;
  completion?: CompletionOptions;
}

/**
 * Combine the source into page-tagged text and cut it to SOURCE_TEXT_LIMIT.
 */
export function buildSourceText(source: readonly DocumentPage[] | string): string {
  const combined =
    typeof source === "string"
      ? source
      : source.map((p) => `[Page ${p.page}]\n${p.text}`).join("\n\n");
  return combined.slice(0, SOURCE_TEXT_LIMIT);
}

export function buildQuestionPrompt(sourceText: string, count: number): string {
  return PROMPT_TEMPLATE.replace("{COUNT}", String(count)).replace("{TEXT}", () => sourceText);
}

export async function generateQuestions(input: GenerateQuestionsInput): Promise<GenerationResult> {
  const prompt = buildQuestionPrompt(buildSourceText(input.source), input.count);

  let raw: string;
  try {
    raw = await requestCompletion(input.model, prompt, input.completion);
  } catch (error) {
    console.error("[question-generator] model call failed:", error);
    return {
      status: "model-failed",
      items: [],
      warning: error instanceof Error ? error.message : String(error),
    };
  }

  const outcome = parseQuizItems(raw);
  if (!outcome.ok) {
    console.warn(
      `[question-generator] ${outcome.error.message}; preview: ${raw.slice(0, RAW_PREVIEW_LENGTH)}`,
    );
    return {
      status: "parse-failed",
      items: [],
      raw: outcome.error.sanitized,
      warning: "The model returned invalid JSON. Please try again.",
    };
  }

  if (outcome.skipped > 0) {
    console.warn(`[question-generator] skipped ${outcome.skipped} unusable item(s)`);
  }
  if (outcome.items.length !== input.count) {
    console.warn(
      `[question-generator] requested ${input.count} questions, received ${outcome.items.length}`,
    );
  }

  return { status: "ok", items: outcome.items, raw };
}

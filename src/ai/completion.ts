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
 * Single-shot text completion against the configured model.
 * Request: one user-role prompt string. Response: the completion text.
 * There is no retry; callers decide how a failure is surfaced.
 */

import type { LanguageModel } from "ai";
import { generateText } from "ai";

export class ModelCallError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModelCallError";
  }
}

export interface CompletionOptions {
  temperature?: number;
}

export async function requestCompletion(
  model: LanguageModel,
  prompt: string,
  options: CompletionOptions = {},
): Promise<string> {
  try {
    const { text } = await generateText({
      model,
      messages: [{ role: "user", content: prompt }],
      ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
    });
    return text.trim();
  } catch (error) {
    throw new ModelCallError(
      `AI provider error: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

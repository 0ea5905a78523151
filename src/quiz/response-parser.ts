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
 * Parsing of the model's quiz response.
 * Model output is not trusted to be valid JSON: a named sanitization pass
 * repairs the common formatting slips before JSON.parse is attempted.
 */

import { ModelQuizItemSchema, type QuizItem } from "./schemas.js";

const LEADING_FENCE = /^```(?:json)?/i;
const TRAILING_FENCE = /```$/;
const CURLY_DOUBLE_QUOTES = /[“”]/g;
const CURLY_SINGLE_QUOTES = /[‘’]/g;
const TRAILING_COMMA = /,(\s*[\]}])/g;

export class GenerationParseError extends Error {
  constructor(
    message: string,
    public readonly sanitized: string,
  ) {
    super(message);
    this.name = "GenerationParseError";
  }
}

export type ParseOutcome =
  | { ok: true; items: QuizItem[]; skipped: number }
  | { ok: false; error: GenerationParseError };

/**
 * Strip code fences, straighten curly quotes, and drop trailing commas
 * before a closing bracket or brace.
 */
export function sanitizeModelJson(raw: string): string {
  let text = raw.trim();
  text = text.replace(LEADING_FENCE, "").trim();
  text = text.replace(TRAILING_FENCE, "").trim();
  text = text.replace(CURLY_DOUBLE_QUOTES, '"').replace(CURLY_SINGLE_QUOTES, "'");
  return text.replace(TRAILING_COMMA, "$1");
}

/**
 * Parse sanitized model output into quiz items. Never throws.
 * Elements that cannot be presented (not an object, no question text,
 * no options) are skipped and counted; nothing else is validated.
 */
export function parseQuizItems(raw: string): ParseOutcome {
  const sanitized = sanitizeModelJson(raw);

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    return {
      ok: false,
      error: new GenerationParseError(
        `Model returned invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        sanitized,
      ),
    };
  }

  if (!Array.isArray(parsed)) {
    return {
      ok: false,
      error: new GenerationParseError("Model response is not a JSON array", sanitized),
    };
  }

  const items: QuizItem[] = [];
  let skipped = 0;
  for (const element of parsed) {
    const result = ModelQuizItemSchema.safeParse(element);
    if (!result.success) {
      skipped++;
      continue;
    }
    const { page, ...rest } = result.data;
    items.push(page === undefined ? rest : { ...rest, page });
  }

  return { ok: true, items, skipped };
}

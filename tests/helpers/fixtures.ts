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
 * Shared builders for session-layer tests.
 */

import type { ModuleContext } from "../../src/content/module-catalog.js";
import type { QuizItem } from "../../src/quiz/schemas.js";

export const SESSION_ID = "11111111-1111-4111-8111-111111111111";
export const FIXED_NOW = new Date("2026-03-02T10:00:00.000Z");

export function makeModule(name: string, overrides: Partial<ModuleContext> = {}): ModuleContext {
  return {
    name,
    documentPath: `/training/${name}/${name}.pdf`,
    documentFileName: `${name}.pdf`,
    videoPath: null,
    trophyPath: null,
    ...overrides,
  };
}

export function trueFalse(n: number, answer: "True" | "False" = "True"): QuizItem {
  return {
    question: `Statement ${n} is correct.`,
    type: "true_false",
    options: ["True", "False"],
    answer,
    page: n,
  };
}

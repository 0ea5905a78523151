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
 * Pure helper: derives the page UI state from the session view.
 * Kept out of page.tsx because Next.js restricts named exports from page files.
 */

import type { SessionView } from "@/session";

export type PageState =
  | "loading"
  | "enter-name"
  | "no-modules"
  | "all-complete"
  | "ready"
  | "question"
  | "feedback"
  | "passed"
  | "failed";

export function derivePageState(view: SessionView | null, loading: boolean): PageState {
  if (loading) return "loading";
  if (view === null) return "enter-name";
  if (view.modules.length === 0) return "no-modules";
  if (view.allModulesComplete) return "all-complete";

  switch (view.quiz.phase) {
    case "not-started":
      return "ready";
    case "awaiting-answer":
      return "question";
    case "showing-feedback":
      return "feedback";
    case "passed":
      return "passed";
    case "failed":
      return "failed";
  }
}

/** Score line shown once a quiz is complete, e.g. "7 / 10". */
export function formatScore(view: SessionView): string {
  return `${view.quiz.score} / ${view.quiz.questionCount}`;
}

export function moduleFileUrl(moduleName: string, file: "material" | "video" | "trophy"): string {
  return `/api/modules/${encodeURIComponent(moduleName)}/${file}`;
}

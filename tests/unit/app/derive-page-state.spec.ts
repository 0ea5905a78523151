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
 * Unit tests for the page state helpers.
 */

import { describe, expect, it } from "vitest";
import { derivePageState, formatScore, moduleFileUrl } from "../../../app/derive-page-state";
import type { QuizPhase } from "../../../src/quiz/schemas.js";
import type { SessionView } from "../../../src/session/session-view.js";
import { SESSION_ID } from "../../helpers/fixtures.js";

const intro = {
  name: "01-intro",
  hasDocument: true,
  documentFileName: "01-intro.pdf",
  hasVideo: false,
  hasTrophy: false,
};

function makeView(phase: QuizPhase, overrides: Partial<SessionView> = {}): SessionView {
  return {
    sessionId: SESSION_ID,
    userName: "Alex",
    modules: [intro],
    activeModule: intro,
    allModulesComplete: false,
    showVideo: false,
    quiz: {
      phase,
      questionCount: 10,
      question: null,
      feedback: null,
      score: 8,
      passed: null,
      missed: [],
    },
    progressSaved: false,
    summaryGenerated: false,
    chat: [],
    notices: [],
    ...overrides,
  };
}

describe("derivePageState", () => {
  it("is loading while a request is in flight", () => {
    expect(derivePageState(makeView("passed"), true)).toBe("loading");
  });

  it("asks for a name when there is no session", () => {
    expect(derivePageState(null, false)).toBe("enter-name");
  });

  it("reports an empty catalog", () => {
    expect(derivePageState(makeView("not-started", { modules: [], activeModule: null }), false)).toBe(
      "no-modules",
    );
  });

  it("reports completion of every module ahead of the quiz phase", () => {
    expect(derivePageState(makeView("passed", { allModulesComplete: true }), false)).toBe(
      "all-complete",
    );
  });

  it.each([
    ["not-started", "ready"],
    ["awaiting-answer", "question"],
    ["showing-feedback", "feedback"],
    ["passed", "passed"],
    ["failed", "failed"],
  ] as const)("maps quiz phase %s to %s", (phase, expected) => {
    expect(derivePageState(makeView(phase), false)).toBe(expected);
  });
});

describe("formatScore", () => {
  it("shows score over question count", () => {
    expect(formatScore(makeView("passed"))).toBe("8 / 10");
  });
});

describe("moduleFileUrl", () => {
  it("encodes the module name", () => {
    expect(moduleFileUrl("01 intro & basics", "video")).toBe(
      "/api/modules/01%20intro%20%26%20basics/video",
    );
  });
});

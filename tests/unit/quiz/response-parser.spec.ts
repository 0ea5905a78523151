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

import { describe, expect, it } from "vitest";
import {
  GenerationParseError,
  parseQuizItems,
  sanitizeModelJson,
} from "../../../src/quiz/response-parser.js";

const TRUE_FALSE = {
  question: "Incidents must be logged.",
  type: "true_false",
  options: ["True", "False"],
  answer: "True",
  page: 2,
};

// ---------------------------------------------------------------------------
// sanitizeModelJson
// ---------------------------------------------------------------------------

describe("sanitizeModelJson", () => {
  it("removes a trailing comma before a closing bracket", () => {
    expect(sanitizeModelJson('[{"a": 1},]')).toBe('[{"a": 1}]');
  });

  it("removes a trailing comma before a closing brace, keeping whitespace", () => {
    expect(sanitizeModelJson('{"a": 1,\n}')).toBe('{"a": 1\n}');
  });

  it("strips a json code fence", () => {
    expect(sanitizeModelJson('```json\n[{"a": 1}]\n```')).toBe('[{"a": 1}]');
  });

  it("strips a bare code fence", () => {
    expect(sanitizeModelJson('```\n["x"]\n```')).toBe('["x"]');
  });

  it("straightens curly quotes", () => {
    expect(sanitizeModelJson("[“a”, ‘b’]")).toBe("[\"a\", 'b']");
  });

  it("leaves commas inside strings followed by text alone", () => {
    expect(sanitizeModelJson('["a, b"]')).toBe('["a, b"]');
  });
});

// ---------------------------------------------------------------------------
// parseQuizItems
// ---------------------------------------------------------------------------

describe("parseQuizItems", () => {
  it("parses output with a trailing comma before ]", () => {
    const outcome = parseQuizItems(`[${JSON.stringify(TRUE_FALSE)},]`);

    expect(outcome).toEqual({ ok: true, items: [TRUE_FALSE], skipped: 0 });
  });

  it("returns a parse error with the sanitized text for invalid JSON", () => {
    const outcome = parseQuizItems("```json\n[{question: 'x'}]\n```");

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(GenerationParseError);
      expect(outcome.error.sanitized).toBe("[{question: 'x'}]");
      expect(outcome.error.message).toMatch(/^Model returned invalid JSON: /);
    }
  });

  it("rejects a JSON value that is not an array", () => {
    const outcome = parseQuizItems(JSON.stringify(TRUE_FALSE));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe("Model response is not a JSON array");
    }
  });

  it("parses an empty array as zero items", () => {
    expect(parseQuizItems("[]")).toEqual({ ok: true, items: [], skipped: 0 });
  });

  it("skips elements without question text or options", () => {
    const outcome = parseQuizItems(
      JSON.stringify([TRUE_FALSE, { question: "", options: ["a"] }, { question: "q" }, "text"]),
    );

    expect(outcome).toEqual({ ok: true, items: [TRUE_FALSE], skipped: 3 });
  });

  it("defaults an unknown type and a missing answer", () => {
    const outcome = parseQuizItems(
      JSON.stringify([{ question: "Pick one", type: "essay", options: ["A. x", "B. y"] }]),
    );

    expect(outcome).toEqual({
      ok: true,
      items: [{ question: "Pick one", type: "multiple_choice", options: ["A. x", "B. y"], answer: "" }],
      skipped: 0,
    });
  });

  it("coerces scalar options and answers to strings", () => {
    const outcome = parseQuizItems(
      JSON.stringify([{ question: "Is it?", type: "true_false", options: [true, false], answer: true }]),
    );

    expect(outcome.ok && outcome.items[0]).toEqual({
      question: "Is it?",
      type: "true_false",
      options: ["true", "false"],
      answer: "true",
    });
  });

  it("coerces a numeric page string and drops an unusable page", () => {
    const outcome = parseQuizItems(
      JSON.stringify([
        { ...TRUE_FALSE, page: "4" },
        { ...TRUE_FALSE, page: "n/a" },
      ]),
    );

    expect(outcome.ok && outcome.items.map((i) => i.page)).toEqual([4, undefined]);
    expect(outcome.ok && "page" in (outcome.items[1] ?? {})).toBe(false);
  });
});

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
import { computeConfigHash } from "../../../src/config/hasher.js";
import { AppSettingsSchema } from "../../../src/config/schema.js";

describe("computeConfigHash", () => {
  it("produces a 64-character hex digest", () => {
    const hash = computeConfigHash(AppSettingsSchema.parse({}));
    expect(hash).toMatch(/^[a-f0-9]{64}$/);
  });

  it("is independent of key order", () => {
    const a = AppSettingsSchema.parse({
      ai: { provider: "anthropic", model: "m" },
      training: { contentDir: "x", passingScore: 1, questionsPerSession: 2 },
    });
    const b = AppSettingsSchema.parse({
      training: { questionsPerSession: 2, passingScore: 1, contentDir: "x" },
      ai: { model: "m", provider: "anthropic" },
    });
    expect(computeConfigHash(a)).toBe(computeConfigHash(b));
  });

  it("changes when a setting changes", () => {
    const a = AppSettingsSchema.parse({ training: { passingScore: 7 } });
    const b = AppSettingsSchema.parse({ training: { passingScore: 6 } });
    expect(computeConfigHash(a)).not.toBe(computeConfigHash(b));
  });
});

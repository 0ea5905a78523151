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
import { ConfigError, ConfigValidationError } from "../../../src/config/errors.js";
import {
  deepMergeSettings,
  validateMergedSettings,
  validateSettingsFile,
} from "../../../src/config/validator.js";

describe("deepMergeSettings", () => {
  it("returns defaults when overrides are empty", () => {
    const defaults = { training: { passingScore: 7, questionsPerSession: 10 } };
    expect(deepMergeSettings(defaults, {})).toEqual(defaults);
  });

  it("overrides specific values while keeping defaults for unspecified", () => {
    const result = deepMergeSettings(
      { training: { passingScore: 7, questionsPerSession: 10, contentDir: "training" } },
      { training: { passingScore: 1, questionsPerSession: 2 } },
    );
    expect(result).toEqual({
      training: { passingScore: 1, questionsPerSession: 2, contentDir: "training" },
    });
  });

  it("replaces arrays instead of concatenating", () => {
    const result = deepMergeSettings({ list: [1, 2] }, { list: [3] });
    expect(result.list).toEqual([3]);
  });
});

describe("validateSettingsFile", () => {
  it("substitutes env vars before parsing YAML", () => {
    const result = validateSettingsFile(
      { content: "training:\n  contentDir: ${TRAINING_DIR:-training}\n", sourceFile: "d.yaml" },
      { TRAINING_DIR: "/data/modules" },
    );
    expect(result.settings).toEqual({ training: { contentDir: "/data/modules" } });
  });

  it("treats an empty file as an empty settings object", () => {
    expect(validateSettingsFile({ content: "", sourceFile: "empty.yaml" }, {}).settings).toEqual(
      {},
    );
  });

  it("throws ConfigError for malformed YAML", () => {
    expect(() =>
      validateSettingsFile({ content: "training: [unclosed", sourceFile: "bad.yaml" }, {}),
    ).toThrow(ConfigError);
  });

  it("throws ConfigValidationError for unknown sections", () => {
    expect(() =>
      validateSettingsFile({ content: "tenants: {}\n", sourceFile: "bad.yaml" }, {}),
    ).toThrow(ConfigValidationError);
  });
});

describe("validateMergedSettings", () => {
  it("collects every issue with file and field path", () => {
    try {
      validateMergedSettings(
        { ai: { provider: "local" }, training: { questionsPerSession: 100 } },
        ["defaults.yaml", "profiles/x.yaml"],
      );
      expect.unreachable("validation should fail");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.errors.map((e) => e.path)).toEqual([
          "ai.provider",
          "training.questionsPerSession",
        ]);
        expect(error.errors[0]?.file).toBe("defaults.yaml + profiles/x.yaml");
      }
    }
  });
});

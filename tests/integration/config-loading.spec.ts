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

import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { redactSensitiveValues } from "../../src/config/env-substitute.js";
import {
  getSnapshot,
  loadConfig,
  loadConfigFromFiles,
  resolveProgressFile,
} from "../../src/config/index.js";
import type { ConfigProvider } from "../../src/config/provider.js";
import { setSnapshot } from "../../src/config/snapshot.js";

const FIXTURES = join(import.meta.dirname, "../fixtures/config");

describe("Config loading pipeline (integration)", () => {
  afterEach(() => {
    setSnapshot(null);
    vi.restoreAllMocks();
  });

  it("loads defaults when no profile is selected", async () => {
    const snapshot = await loadConfigFromFiles(FIXTURES, { env: {} });

    expect(snapshot.settings.training).toEqual({
      contentDir: "training",
      questionsPerSession: 10,
      passingScore: 7,
    });
    expect(snapshot.settings.session.ttlSeconds).toBe(900);
    expect(snapshot.sourceFiles).toEqual([join(FIXTURES, "defaults.yaml")]);
  });

  it("overlays the profile named by CONFIG_PROFILE", async () => {
    const snapshot = await loadConfigFromFiles(FIXTURES, { env: { CONFIG_PROFILE: "quick" } });

    expect(snapshot.settings.training.questionsPerSession).toBe(2);
    expect(snapshot.settings.training.passingScore).toBe(1);
    expect(snapshot.settings.training.contentDir).toBe("training");
    expect(snapshot.sourceFiles).toEqual([
      join(FIXTURES, "defaults.yaml"),
      join(FIXTURES, "profiles", "quick.yaml"),
    ]);
  });

  it("falls back to defaults with a warning when the profile is missing", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const snapshot = await loadConfigFromFiles(FIXTURES, { env: {}, profile: "absent" });

    expect(snapshot.settings.training.questionsPerSession).toBe(10);
    expect(warn).toHaveBeenCalledWith('[config] Profile "absent" not found, using defaults only');
  });

  it("substitutes env vars from the supplied environment", async () => {
    const snapshot = await loadConfigFromFiles(FIXTURES, {
      env: { TEST_TRAINING_DIR: "/srv/modules", TEST_AI_MODEL: "test-model" },
    });

    expect(snapshot.settings.training.contentDir).toBe("/srv/modules");
    expect(snapshot.settings.ai.model).toBe("test-model");
  });

  it("produces a deterministic hash across loads", async () => {
    const first = await loadConfigFromFiles(FIXTURES, { env: {} });
    const second = await loadConfigFromFiles(FIXTURES, { env: {} });

    expect(first.configHash).toMatch(/^[a-f0-9]{64}$/);
    expect(first.configHash).toBe(second.configHash);
  });

  it("stores the frozen snapshot", async () => {
    const snapshot = await loadConfigFromFiles(FIXTURES, { env: {} });

    expect(getSnapshot()).toBe(snapshot);
    expect(Object.isFrozen(snapshot.settings.training)).toBe(true);
  });

  it("tracks secret-looking variables so logged settings can be redacted", async () => {
    const provider: ConfigProvider = {
      loadDefaults: async () => ({
        sourceFile: "inline-defaults.yaml",
        content: [
          "ai:",
          "  provider: openai",
          "  gatewayUrl: https://gateway.example.test/${TEST_GATEWAY_KEY}",
          "training:",
          "  contentDir: training",
          "session:",
          "  ttlSeconds: 900",
        ].join("\n"),
      }),
      loadProfile: async () => null,
    };
    const env = { TEST_GATEWAY_KEY: "test-secret" };

    const snapshot = await loadConfig(provider, { env });

    expect([...snapshot.sensitiveVars]).toEqual(["TEST_GATEWAY_KEY"]);
    expect(snapshot.settings.ai.gatewayUrl).toBe("https://gateway.example.test/test-secret");
    expect(redactSensitiveValues(snapshot.settings.ai, snapshot.sensitiveVars, env)).toEqual({
      provider: "openai",
      model: "gpt-4-turbo",
      gatewayUrl: "[REDACTED]",
    });
  });

  it("places the progress log inside the content directory by default", async () => {
    const snapshot = await loadConfigFromFiles(FIXTURES, { env: {} });
    expect(resolveProgressFile(snapshot.settings.training)).toBe(join("training", "progress.csv"));
  });
});

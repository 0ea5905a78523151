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
 * Public config API.
 * Orchestrates: load → substitute → validate → merge → hash → freeze.
 */

import { join } from "node:path";
import type { Env } from "./env-substitute.js";
import { FileConfigProvider } from "./file-provider.js";
import { computeConfigHash } from "./hasher.js";
import type { ConfigProvider } from "./provider.js";
import type { AppSettings, TrainingConfigParsed } from "./schema.js";
import { type ConfigSnapshot, getSnapshot as getSnapshotFromStore, setSnapshot } from "./snapshot.js";
import { deepMergeSettings, validateMergedSettings, validateSettingsFile } from "./validator.js";

export interface LoadConfigOptions {
  env?: Env;
  /** Name of an overlay under profiles/. Falls back to env.CONFIG_PROFILE. */
  profile?: string;
}

function freezeSettings(settings: AppSettings): Readonly<AppSettings> {
  return Object.freeze({
    ai: Object.freeze({ ...settings.ai }),
    training: Object.freeze({ ...settings.training }),
    session: Object.freeze({ ...settings.session }),
  });
}

/**
 * Load, validate, and freeze the configuration from a provider.
 */
export async function loadConfig(
  provider: ConfigProvider,
  options: LoadConfigOptions = {},
): Promise<ConfigSnapshot> {
  const env = options.env ?? process.env;
  const profile = options.profile ?? env.CONFIG_PROFILE;

  const defaultsFile = await provider.loadDefaults();
  const defaults = validateSettingsFile(defaultsFile, env);
  const sourceFiles = [defaultsFile.sourceFile];
  const sensitiveVars = new Set(defaults.sensitiveVars);

  let merged: Record<string, unknown> = defaults.settings;

  if (profile) {
    const profileFile = await provider.loadProfile(profile);
    if (!profileFile) {
      console.warn(`[config] Profile "${profile}" not found, using defaults only`);
    } else {
      const overlay = validateSettingsFile(profileFile, env);
      merged = deepMergeSettings(merged, overlay.settings);
      for (const name of overlay.sensitiveVars) sensitiveVars.add(name);
      sourceFiles.push(profileFile.sourceFile);
    }
  }

  const settings = validateMergedSettings(merged, sourceFiles);

  const snapshot: ConfigSnapshot = Object.freeze({
    settings: freezeSettings(settings),
    configHash: computeConfigHash(settings),
    sourceFiles: Object.freeze([...sourceFiles]),
    sensitiveVars,
    loadedAt: new Date(),
  });

  setSnapshot(snapshot);
  return snapshot;
}

/**
 * Load config from `<configDir>/defaults.yaml` and the optional profile overlay.
 */
export async function loadConfigFromFiles(
  configDir: string,
  options: LoadConfigOptions = {},
): Promise<ConfigSnapshot> {
  return loadConfig(new FileConfigProvider({ configDir }), options);
}

export { getSnapshot } from "./snapshot.js";
export type { ConfigSnapshot } from "./snapshot.js";
export type { AppSettings, AIConfigParsed, TrainingConfigParsed } from "./schema.js";

let _initPromise: Promise<ConfigSnapshot> | null = null;

/**
 * Ensures config is loaded, loading it lazily on first call.
 * Concurrent callers share the same Promise. A failed load is not cached.
 * Reads the config directory from CONFIG_DIR or defaults to ./config.
 */
export async function ensureConfigLoaded(): Promise<ConfigSnapshot> {
  const existing = getSnapshotFromStore();
  if (existing) return existing;

  if (!_initPromise) {
    const configDir = process.env.CONFIG_DIR ?? join(process.cwd(), "config");
    _initPromise = loadConfigFromFiles(configDir, { env: process.env });
  }

  try {
    return await _initPromise;
  } catch (e) {
    console.error("[config] ensureConfigLoaded failed:", e);
    throw e;
  } finally {
    _initPromise = null;
  }
}

/**
 * Resolve the progress log path: explicit setting, else `<contentDir>/progress.csv`.
 */
export function resolveProgressFile(training: TrainingConfigParsed): string {
  return training.progressFile ?? join(training.contentDir, "progress.csv");
}

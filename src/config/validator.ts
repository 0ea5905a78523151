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
 * Config validation pipeline:
 * 1. Substitute env vars in raw text
 * 2. Parse YAML
 * 3. Validate each file against the partial schema
 * 4. Deep merge the profile overlay over the defaults
 * 5. Validate the merged settings (applies defaults and cross-field rules)
 */

import { parse as parseYaml } from "yaml";
import { type Env, isPlainObject, substituteEnvVars } from "./env-substitute.js";
import { ConfigError, ConfigValidationError, issuesToDetails } from "./errors.js";
import type { RawConfigFile } from "./provider.js";
import {
  type AppSettings,
  AppSettingsSchema,
  type PartialSettings,
  PartialSettingsSchema,
} from "./schema.js";

export interface ValidatedFile {
  settings: PartialSettings;
  sensitiveVars: ReadonlySet<string>;
}

/**
 * Deep merge two settings objects. Override values win over defaults.
 * Arrays are replaced, not concatenated. Objects are recursively merged.
 */
export function deepMergeSettings(
  defaults: Record<string, unknown>,
  overrides: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const allKeys = new Set([...Object.keys(defaults), ...Object.keys(overrides)]);

  for (const key of allKeys) {
    const defaultVal = defaults[key];
    const overrideVal = overrides[key];

    if (overrideVal === undefined) {
      result[key] = defaultVal;
    } else if (isPlainObject(defaultVal) && isPlainObject(overrideVal)) {
      result[key] = deepMergeSettings(defaultVal, overrideVal);
    } else {
      result[key] = overrideVal;
    }
  }

  return result;
}

/**
 * Substitute, parse, and shape-check one YAML file. An empty file counts as `{}`.
 */
export function validateSettingsFile(file: RawConfigFile, env?: Env): ValidatedFile {
  const sub = substituteEnvVars(file.content, file.sourceFile, env);

  let parsed: unknown;
  try {
    parsed = parseYaml(sub.text) ?? {};
  } catch (error) {
    throw new ConfigError({
      file: file.sourceFile,
      message: `Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`,
    });
  }

  const result = PartialSettingsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigValidationError(issuesToDetails(result.error.issues, file.sourceFile));
  }

  return { settings: result.data, sensitiveVars: sub.sensitiveVars };
}

/**
 * Validate merged settings and apply schema defaults.
 */
export function validateMergedSettings(
  merged: Record<string, unknown>,
  sourceFiles: readonly string[],
): AppSettings {
  const result = AppSettingsSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigValidationError(issuesToDetails(result.error.issues, sourceFiles.join(" + ")));
  }
  return result.data;
}

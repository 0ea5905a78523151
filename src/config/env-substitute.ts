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
 * Environment variable substitution for config files.
 * Supports ${VAR} and ${VAR:-default} syntax.
 * Runs on raw YAML text BEFORE parsing.
 */

import { ConfigError } from "./errors.js";

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

const SENSITIVE_PATTERNS = [/_SECRET$/i, /_KEY$/i, /_PASSWORD$/i, /_TOKEN$/i];

export type Env = Record<string, string | undefined>;

export interface SubstitutionResult {
  text: string;
  sensitiveVars: ReadonlySet<string>;
}

function isSensitiveVar(varName: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(varName));
}

function splitExpression(expr: string): { varName: string; defaultValue?: string } {
  const sep = expr.indexOf(":-");
  if (sep === -1) return { varName: expr };
  return { varName: expr.slice(0, sep), defaultValue: expr.slice(sep + 2) };
}

/**
 * Substitute ${VAR} and ${VAR:-default} references in raw text.
 * @throws ConfigError naming the first variable that is unset and has no default.
 */
export function substituteEnvVars(
  text: string,
  sourceFile: string,
  env: Env = process.env,
): SubstitutionResult {
  const sensitiveVars = new Set<string>();
  const unresolved: string[] = [];

  const result = text.replace(ENV_VAR_PATTERN, (match, expr: string) => {
    const { varName, defaultValue } = splitExpression(expr);

    if (isSensitiveVar(varName)) {
      sensitiveVars.add(varName);
    }

    const value = env[varName];
    if (value !== undefined) return value;
    if (defaultValue !== undefined) return defaultValue;

    unresolved.push(varName);
    return match;
  });

  const [firstUnresolved] = unresolved;
  if (firstUnresolved !== undefined) {
    throw new ConfigError({
      file: sourceFile,
      message: `Unresolved environment variable: \${${firstUnresolved}}`,
    });
  }

  return { text: result, sensitiveVars };
}

/**
 * Replace every string value that contains the value of a sensitive variable
 * with [REDACTED]. Used before settings are logged.
 */
export function redactSensitiveValues(
  obj: Record<string, unknown>,
  sensitiveVars: ReadonlySet<string>,
  env: Env = process.env,
): Record<string, unknown> {
  const secrets = [...sensitiveVars]
    .map((name) => env[name])
    .filter((value): value is string => typeof value === "string" && value.length > 0);

  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isPlainObject(value)) {
      redacted[key] = redactSensitiveValues(value, sensitiveVars, env);
    } else if (typeof value === "string" && secrets.some((s) => value.includes(s))) {
      redacted[key] = "[REDACTED]";
    } else {
      redacted[key] = value;
    }
  }
  return redacted;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

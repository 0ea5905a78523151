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
 * Holder for the loaded config snapshot.
 * Populated by loadConfig() in index.ts.
 */

import type { AppSettings } from "./schema.js";

export interface ConfigSnapshot {
  readonly settings: Readonly<AppSettings>;
  readonly configHash: string;
  readonly sourceFiles: readonly string[];
  /** Environment variables with secret-looking names referenced by the files. */
  readonly sensitiveVars: ReadonlySet<string>;
  readonly loadedAt: Date;
}

let currentSnapshot: ConfigSnapshot | null = null;

/**
 * Get the current loaded config snapshot.
 * Returns null if config has not been loaded yet.
 */
export function getSnapshot(): ConfigSnapshot | null {
  return currentSnapshot;
}

/**
 * @internal: do not call outside of src/config/index.ts and tests
 */
export function setSnapshot(snapshot: ConfigSnapshot | null): void {
  currentSnapshot = snapshot;
}

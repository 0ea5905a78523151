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

import type { ModuleContext } from "../content/module-catalog.js";

export type ModuleAdvance =
  | { kind: "next"; module: ModuleContext }
  | { kind: "all-complete" }
  | { kind: "unknown" };

/**
 * Pick the module after `current` in catalog order.
 */
export function advanceModule(
  modules: readonly ModuleContext[],
  current: string | null,
): ModuleAdvance {
  const index = current === null ? -1 : modules.findIndex((m) => m.name === current);
  if (index === -1) return { kind: "unknown" };

  const next = modules[index + 1];
  return next ? { kind: "next", module: next } : { kind: "all-complete" };
}

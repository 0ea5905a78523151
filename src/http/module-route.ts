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
 * Shared lookup for the per-module file routes. Files are only served to a
 * request that carries a live session.
 */

import type { NextResponse } from "next/server";
import { type ModuleContext, findModule } from "../content/module-catalog.js";
import { loadCurrentSession } from "../session/current-session.js";
import { jsonError, unauthorized } from "./error-response.js";

export type ModuleParams = { params: Promise<{ module: string }> };

export async function resolveModuleRequest(
  { params }: ModuleParams,
): Promise<{ ok: true; module: ModuleContext } | { ok: false; response: NextResponse }> {
  const { module: moduleName } = await params;

  const current = await loadCurrentSession();
  if (!current) return { ok: false, response: unauthorized() };

  const mod = findModule(await current.context.listModules(), moduleName);
  if (!mod) {
    return {
      ok: false,
      response: jsonError("not_found", `Training module "${moduleName}" not found`, 404),
    };
  }
  return { ok: true, module: mod };
}

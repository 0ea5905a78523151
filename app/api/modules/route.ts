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
 * Module catalog API route.
 * GET /api/modules: training modules in catalog order.
 */

import { toErrorResponse } from "@/http/error-response";
import { getAssistantContext } from "@/session/context";
import { toModuleSummary } from "@/session/session-view";
import { NextResponse } from "next/server";

export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const context = await getAssistantContext();
    const modules = await context.listModules();
    return NextResponse.json({ modules: modules.map(toModuleSummary) });
  } catch (err) {
    return toErrorResponse(err);
  }
}

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
 * Chat API route.
 * POST /api/chat: ask the training advisor about the active module.
 */

import { readJsonBody, toErrorResponse, unauthorized } from "@/http/error-response";
import { withCurrentSession } from "@/session/current-session";
import { ChatRequestSchema } from "@/session/schemas";
import { toSessionView } from "@/session/session-view";
import { NextResponse } from "next/server";

export const dynamic = "force-dynamic";

export async function POST(request: Request) {
  const parsedBody = await readJsonBody(request);
  if (!parsedBody.ok) return parsedBody.response;

  const parsed = ChatRequestSchema.safeParse(parsedBody.body);
  if (!parsed.success) return toErrorResponse(parsed.error);

  try {
    const view = await withCurrentSession(async ({ context, session }) => {
      const next = await context.service.sendChatMessage(session, parsed.data.message);
      const saved = await context.store.save(next);
      return toSessionView(saved, await context.listModules());
    });
    if (!view) return unauthorized();

    return NextResponse.json(view);
  } catch (err) {
    return toErrorResponse(err);
  }
}

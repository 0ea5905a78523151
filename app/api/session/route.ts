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
 * Training session API routes.
 * POST   /api/session: enter name, start a new session
 * GET    /api/session: current session view
 * DELETE /api/session: leave the session
 */

import { readJsonBody, toErrorResponse, unauthorized } from "@/http/error-response";
import { getAssistantContext } from "@/session/context";
import { loadCurrentSession, withCurrentSession } from "@/session/current-session";
import { StartSessionRequestSchema } from "@/session/schemas";
import { clearSessionId, writeSessionId } from "@/session/session-cookie";
import { toSessionView } from "@/session/session-view";
import { NextResponse } from "next/server";

export const dynamic = "force-dynamic";

// ---------------------------------------------------------------------------
// POST: enter name
// ---------------------------------------------------------------------------

export async function POST(request: Request) {
  const parsedBody = await readJsonBody(request);
  if (!parsedBody.ok) return parsedBody.response;

  const parsed = StartSessionRequestSchema.safeParse(parsedBody.body);
  if (!parsed.success) return toErrorResponse(parsed.error);

  try {
    const context = await getAssistantContext();

    const previous = await loadCurrentSession();
    if (previous) {
      await context.store.delete(previous.session.id);
    }

    const session = await context.store.save(
      await context.service.startSession(parsed.data.userName),
    );
    await writeSessionId(session.id);

    console.log(`[session] Started session ${session.id}`);
    return NextResponse.json(toSessionView(session, await context.listModules()), {
      status: 201,
    });
  } catch (err) {
    return toErrorResponse(err);
  }
}

// ---------------------------------------------------------------------------
// GET: render the current view
// ---------------------------------------------------------------------------

export async function GET() {
  try {
    const view = await withCurrentSession(async ({ context, session }) => {
      const settled = await context.service.settleCompletion(session);
      const current = settled === session ? session : await context.store.save(settled);
      return toSessionView(current, await context.listModules());
    });
    if (!view) return unauthorized();

    return NextResponse.json(view);
  } catch (err) {
    return toErrorResponse(err);
  }
}

// ---------------------------------------------------------------------------
// DELETE: leave
// ---------------------------------------------------------------------------

export async function DELETE() {
  try {
    const current = await loadCurrentSession();
    if (current) {
      await current.context.store.delete(current.session.id);
    }
    await clearSessionId();
    return new NextResponse(null, { status: 204 });
  } catch (err) {
    return toErrorResponse(err);
  }
}

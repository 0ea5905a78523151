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
 * Session action API route.
 * POST /api/session/actions: one user action, one round of state updates.
 */

import { readJsonBody, toErrorResponse, unauthorized } from "@/http/error-response";
import { withCurrentSession } from "@/session/current-session";
import {
  type SessionAction,
  SessionActionSchema,
  type SessionService,
  type TrainingSession,
  toSessionView,
} from "@/session";
import { NextResponse } from "next/server";

export const dynamic = "force-dynamic";

function dispatch(
  service: SessionService,
  session: TrainingSession,
  action: SessionAction,
): Promise<TrainingSession> {
  switch (action.type) {
    case "select-module":
      return service.selectModule(session, action.moduleName);
    case "start-quiz":
      return service.startQuiz(session);
    case "answer":
      return service.answer(session, action.option);
    case "next-question":
      return service.nextQuestion(session);
    case "continue":
      return service.continueToNextModule(session);
    case "retry":
      return service.retryQuiz(session);
    case "open-video":
      return service.openVideo(session);
    case "close-video":
      return service.closeVideo(session);
  }
}

export async function POST(request: Request) {
  const parsedBody = await readJsonBody(request);
  if (!parsedBody.ok) return parsedBody.response;

  const parsed = SessionActionSchema.safeParse(parsedBody.body);
  if (!parsed.success) return toErrorResponse(parsed.error);

  try {
    const view = await withCurrentSession(async ({ context, session }) => {
      const next = await dispatch(context.service, session, parsed.data);
      const saved = await context.store.save(next);
      return toSessionView(saved, await context.listModules());
    });
    if (!view) return unauthorized();

    return NextResponse.json(view);
  } catch (err) {
    return toErrorResponse(err);
  }
}

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
 * Resolves the training session a request belongs to from its cookie.
 */

import { type AssistantContext, getAssistantContext } from "./context.js";
import type { TrainingSession } from "./schemas.js";
import { readSessionId } from "./session-cookie.js";

export interface CurrentSession {
  context: AssistantContext;
  session: TrainingSession;
}

/** Null when there is no cookie or the session has expired. */
export async function loadCurrentSession(): Promise<CurrentSession | null> {
  const sessionId = await readSessionId();
  if (!sessionId) return null;

  const context = await getAssistantContext();
  const session = await context.store.get(sessionId);
  if (!session) return null;

  return { context, session };
}

/**
 * Runs `task` on the request's session with no other task for that session in
 * flight. The session is read inside the turn, so each task sees what the one
 * before it saved. Null when there is no cookie or the session has expired.
 */
export async function withCurrentSession<T>(
  task: (current: CurrentSession) => Promise<T>,
): Promise<T | null> {
  const sessionId = await readSessionId();
  if (!sessionId) return null;

  const context = await getAssistantContext();
  return context.store.runExclusive(sessionId, async () => {
    const session = await context.store.get(sessionId);
    return session ? task({ context, session }) : null;
  });
}

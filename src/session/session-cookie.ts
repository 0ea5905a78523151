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
 * Session cookie using iron-session. The cookie only carries the session id;
 * the session state itself stays on the server in the SessionStore.
 */

import { getIronSession } from "iron-session";
import { cookies } from "next/headers";

const COOKIE_NAME = "training_session";

export interface SessionCookieData {
  sessionId?: string;
}

function getSessionSecret(): string {
  const secret = process.env.SESSION_SECRET;
  if (!secret || secret.length < 32) {
    throw new Error("SESSION_SECRET must be set and at least 32 characters");
  }
  return secret;
}

function getCookieOptions() {
  return {
    password: getSessionSecret(),
    cookieName: COOKIE_NAME,
    cookieOptions: {
      httpOnly: true,
      secure: process.env.NODE_ENV === "production",
      sameSite: "lax" as const,
      path: "/",
    },
  };
}

async function openCookie() {
  const cookieStore = await cookies();
  return getIronSession<SessionCookieData>(cookieStore, getCookieOptions());
}

export async function readSessionId(): Promise<string | null> {
  const cookie = await openCookie();
  return cookie.sessionId ?? null;
}

export async function writeSessionId(sessionId: string): Promise<void> {
  const cookie = await openCookie();
  cookie.sessionId = sessionId;
  await cookie.save();
}

export async function clearSessionId(): Promise<void> {
  const cookie = await openCookie();
  cookie.destroy();
}

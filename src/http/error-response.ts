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
 * Maps errors thrown by the session layer to JSON `{ error, message }` responses.
 */

import { NextResponse } from "next/server";
import { ZodError } from "zod";
import { ExtractionError } from "../content/content-loader.js";
import { InvalidAnswerError, StateTransitionError } from "../quiz/state-machine.js";
import { SessionActionError } from "../session/session-service.js";

export type ApiErrorCode =
  | "validation_error"
  | "invalid_request"
  | "unauthorized"
  | "not_found"
  | "conflict"
  | "extraction_failed"
  | "internal_error";

export function jsonError(error: ApiErrorCode, message: string, status: number): NextResponse {
  return NextResponse.json({ error, message }, { status });
}

export function unauthorized(): NextResponse {
  return jsonError("unauthorized", "No active training session", 401);
}

export function toErrorResponse(err: unknown): NextResponse {
  if (err instanceof ZodError) {
    const message = err.issues.map((i) => i.message).join("; ");
    return jsonError("validation_error", message, 400);
  }
  if (err instanceof InvalidAnswerError) {
    return jsonError("invalid_request", err.message, 400);
  }
  if (err instanceof StateTransitionError) {
    return jsonError("conflict", err.message, 409);
  }
  if (err instanceof SessionActionError) {
    switch (err.code) {
      case "module_not_found":
      case "no_video":
        return jsonError("not_found", err.message, 404);
      case "no_active_module":
      case "summary_already_generated":
        return jsonError("conflict", err.message, 409);
    }
  }
  if (err instanceof ExtractionError) {
    if (err.code === "file_not_found") return jsonError("not_found", err.message, 404);
    return jsonError("extraction_failed", err.message, 422);
  }

  console.error("[api] Unhandled error:", err);
  return jsonError("internal_error", "An unexpected error occurred", 500);
}

/**
 * Reads a JSON request body, answering 400 when it is not JSON.
 */
export async function readJsonBody(
  request: Request,
): Promise<{ ok: true; body: unknown } | { ok: false; response: NextResponse }> {
  try {
    return { ok: true, body: await request.json() };
  } catch {
    return {
      ok: false,
      response: jsonError("invalid_request", "Request body must be valid JSON", 400),
    };
  }
}

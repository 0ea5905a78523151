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
 * ProgressRecorder: append-only log of completed quiz attempts.
 * The log is shared by every session. Writes through one recorder are
 * queued, so rows land whole and in call order.
 */

import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { formatCsvRow } from "./csv.js";

export const PROGRESS_COLUMNS = ["timestamp", "module", "user", "score", "session_id"] as const;

export interface ProgressEntry {
  timestamp: Date;
  moduleName: string;
  userName: string;
  score: number;
  sessionId: string;
}

export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message);
    this.name = "PersistenceError";
  }
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

export class ProgressRecorder {
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  /**
   * Append one entry. Creates the log with a header row when it does not
   * exist yet.
   * @throws PersistenceError when the log cannot be written.
   */
  record(entry: ProgressEntry): Promise<void> {
    const write = this.pending.then(() => this.write(entry));
    // A failed write must not block the ones queued behind it.
    this.pending = write.catch(() => undefined);
    return write;
  }

  private async write(entry: ProgressEntry): Promise<void> {
    const row = formatCsvRow([
      formatTimestamp(entry.timestamp),
      entry.moduleName,
      entry.userName,
      entry.score,
      entry.sessionId,
    ]);

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      try {
        await writeFile(this.filePath, formatCsvRow(PROGRESS_COLUMNS) + row, {
          encoding: "utf-8",
          flag: "wx",
        });
      } catch (error) {
        if (!isAlreadyExists(error)) throw error;
        await appendFile(this.filePath, row, "utf-8");
      }
    } catch (error) {
      throw new PersistenceError(
        `Failed to save progress: ${error instanceof Error ? error.message : String(error)}`,
        this.filePath,
      );
    }
  }
}

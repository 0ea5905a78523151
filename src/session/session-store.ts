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
 * SessionStore: where per-user session state lives between requests.
 * Sessions are in memory only and expire after a period of inactivity.
 */

import type { TrainingSession } from "./schemas.js";

export interface SessionStore {
  get(id: string): Promise<TrainingSession | null>;
  save(session: TrainingSession): Promise<TrainingSession>;
  delete(id: string): Promise<void>;
  /** Runs `task` once every earlier task for the same session has settled. */
  runExclusive<T>(id: string, task: () => Promise<T>): Promise<T>;
}

export interface MemorySessionStoreOptions {
  ttlSeconds: number;
  now?: () => Date;
}

interface StoredSession {
  session: TrainingSession;
  expiresAt: number;
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, StoredSession>();
  private readonly queues = new Map<string, Promise<void>>();
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(options: MemorySessionStoreOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? (() => new Date());
  }

  async get(id: string): Promise<TrainingSession | null> {
    const stored = this.sessions.get(id);
    if (!stored) return null;

    if (stored.expiresAt <= this.now().getTime()) {
      this.sessions.delete(id);
      return null;
    }
    return stored.session;
  }

  /**
   * Store the session, stamping updatedAt and extending its lifetime.
   */
  async save(session: TrainingSession): Promise<TrainingSession> {
    const now = this.now();
    this.evictExpired(now.getTime());

    const saved: TrainingSession = { ...session, updatedAt: now.toISOString() };
    this.sessions.set(saved.id, { session: saved, expiresAt: now.getTime() + this.ttlMs });
    return saved;
  }

  async delete(id: string): Promise<void> {
    this.sessions.delete(id);
  }

  runExclusive<T>(id: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(id) ?? Promise.resolve();
    const run = previous.then(() => task());

    // A failed task must not block the ones queued behind it.
    const tail: Promise<void> = run.then(
      () => this.releaseQueue(id, tail),
      () => this.releaseQueue(id, tail),
    );
    this.queues.set(id, tail);
    return run;
  }

  get size(): number {
    return this.sessions.size;
  }

  private releaseQueue(id: string, tail: Promise<void>): void {
    if (this.queues.get(id) === tail) {
      this.queues.delete(id);
    }
  }

  private evictExpired(nowMs: number): void {
    for (const [id, stored] of this.sessions) {
      if (stored.expiresAt <= nowMs) {
        this.sessions.delete(id);
      }
    }
  }
}

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

import { describe, expect, it } from "vitest";
import { createSession } from "../../../src/session/session-reducer.js";
import { MemorySessionStore } from "../../../src/session/session-store.js";
import { FIXED_NOW, SESSION_ID } from "../../helpers/fixtures.js";

function clock(start: Date) {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance: (seconds: number) => {
      current += seconds * 1000;
    },
  };
}

const session = createSession({
  id: SESSION_ID,
  userName: "Alex",
  moduleName: null,
  now: FIXED_NOW,
});

describe("MemorySessionStore", () => {
  it("returns a saved session with updatedAt stamped", async () => {
    const time = clock(new Date("2026-03-02T10:05:00.000Z"));
    const store = new MemorySessionStore({ ttlSeconds: 60, now: time.now });

    await store.save(session);

    expect(await store.get(SESSION_ID)).toEqual({
      ...session,
      updatedAt: "2026-03-02T10:05:00.000Z",
    });
  });

  it("returns null for an unknown id", async () => {
    const store = new MemorySessionStore({ ttlSeconds: 60 });
    expect(await store.get("missing")).toBeNull();
  });

  it("expires a session after the idle ttl", async () => {
    const time = clock(FIXED_NOW);
    const store = new MemorySessionStore({ ttlSeconds: 60, now: time.now });
    await store.save(session);

    time.advance(59);
    expect(await store.get(SESSION_ID)).not.toBeNull();

    time.advance(1);
    expect(await store.get(SESSION_ID)).toBeNull();
    expect(store.size).toBe(0);
  });

  it("extends the lifetime on every save", async () => {
    const time = clock(FIXED_NOW);
    const store = new MemorySessionStore({ ttlSeconds: 60, now: time.now });
    await store.save(session);

    time.advance(50);
    await store.save(session);
    time.advance(50);

    expect(await store.get(SESSION_ID)).not.toBeNull();
  });

  it("evicts other expired sessions when saving", async () => {
    const time = clock(FIXED_NOW);
    const store = new MemorySessionStore({ ttlSeconds: 60, now: time.now });
    await store.save(session);

    time.advance(120);
    await store.save({ ...session, id: "22222222-2222-4222-8222-222222222222" });

    expect(store.size).toBe(1);
  });

  it("deletes a session", async () => {
    const store = new MemorySessionStore({ ttlSeconds: 60 });
    await store.save(session);
    await store.delete(SESSION_ID);

    expect(await store.get(SESSION_ID)).toBeNull();
  });

  // -------------------------------------------------------------------------
  // runExclusive
  // -------------------------------------------------------------------------

  it("runs tasks for one session in call order without overlap", async () => {
    const store = new MemorySessionStore({ ttlSeconds: 60 });
    const events: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = store.runExclusive(SESSION_ID, async () => {
      events.push("first:start");
      await gate;
      events.push("first:end");
      return 1;
    });
    const second = store.runExclusive(SESSION_ID, async () => {
      events.push("second");
      return 2;
    });

    await Promise.resolve();
    release();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not hold up other sessions", async () => {
    const store = new MemorySessionStore({ ttlSeconds: 60 });
    const events: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const blocked = store.runExclusive(SESSION_ID, async () => {
      await gate;
      events.push("blocked");
    });
    await store.runExclusive("22222222-2222-4222-8222-222222222222", async () => {
      events.push("other");
    });
    release();
    await blocked;

    expect(events).toEqual(["other", "blocked"]);
  });

  it("keeps running queued tasks after one fails", async () => {
    const store = new MemorySessionStore({ ttlSeconds: 60 });

    const failed = store.runExclusive(SESSION_ID, async () => {
      throw new Error("disk full");
    });
    const next = store.runExclusive(SESSION_ID, async () => "ran");

    await expect(failed).rejects.toThrow("disk full");
    await expect(next).resolves.toBe("ran");
  });
});

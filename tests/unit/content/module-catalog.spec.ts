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

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { findModule, listModules } from "../../../src/content/module-catalog.js";

describe("listModules", () => {
  let root: string;

  async function addModule(name: string, files: string[]): Promise<void> {
    await mkdir(join(root, name), { recursive: true });
    for (const file of files) {
      await writeFile(join(root, name, file), "x");
    }
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "module-catalog-test-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("lists module directories in sorted order", async () => {
    await addModule("02-phishing", []);
    await addModule("01-onboarding", []);
    await writeFile(join(root, "progress.csv"), "timestamp\n");

    const modules = await listModules(root);
    expect(modules.map((m) => m.name)).toEqual(["01-onboarding", "02-phishing"]);
  });

  it("picks the first PDF and MP4 by name and detects the trophy", async () => {
    await addModule("safety", ["b.pdf", "a.pdf", "intro.mp4", "trophy.png", "notes.txt"]);

    const [mod] = await listModules(root);
    expect(mod).toEqual({
      name: "safety",
      documentPath: join(root, "safety", "a.pdf"),
      documentFileName: "a.pdf",
      videoPath: join(root, "safety", "intro.mp4"),
      trophyPath: join(root, "safety", "trophy.png"),
    });
  });

  it("reports absent files as null", async () => {
    await addModule("empty", []);

    const [mod] = await listModules(root);
    expect(mod).toEqual({
      name: "empty",
      documentPath: null,
      documentFileName: null,
      videoPath: null,
      trophyPath: null,
    });
  });

  it("matches extensions case-insensitively", async () => {
    await addModule("caps", ["GUIDE.PDF"]);

    const [mod] = await listModules(root);
    expect(mod?.documentFileName).toBe("GUIDE.PDF");
  });

  it("returns an empty catalog when the content root is missing", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const missing = join(root, "nope");

    await expect(listModules(missing)).resolves.toEqual([]);
    expect(warn).toHaveBeenCalledWith(`[module-catalog] Content directory not found: ${missing}`);
  });
});

describe("findModule", () => {
  const modules = [
    { name: "a", documentPath: null, documentFileName: null, videoPath: null, trophyPath: null },
  ];

  it("finds by exact name", () => {
    expect(findModule(modules, "a")?.name).toBe("a");
  });

  it("returns undefined for an unknown name", () => {
    expect(findModule(modules, "b")).toBeUndefined();
  });
});

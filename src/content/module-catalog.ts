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
 * Module catalog: one training module per directory under the content root.
 * Module order is the sorted directory names.
 */

import { readdir } from "node:fs/promises";
import { join } from "node:path";

export const TROPHY_FILE = "trophy.png";

export interface ModuleContext {
  readonly name: string;
  readonly documentPath: string | null;
  readonly documentFileName: string | null;
  readonly videoPath: string | null;
  readonly trophyPath: string | null;
}

function firstWithExtension(files: readonly string[], ext: string): string | null {
  return files.find((f) => f.toLowerCase().endsWith(ext)) ?? null;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function describeModule(contentDir: string, name: string): Promise<ModuleContext> {
  const moduleDir = join(contentDir, name);
  const files = (await readdir(moduleDir, { withFileTypes: true }))
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();

  const documentFileName = firstWithExtension(files, ".pdf");
  const video = firstWithExtension(files, ".mp4");

  return {
    name,
    documentPath: documentFileName ? join(moduleDir, documentFileName) : null,
    documentFileName,
    videoPath: video ? join(moduleDir, video) : null,
    trophyPath: files.includes(TROPHY_FILE) ? join(moduleDir, TROPHY_FILE) : null,
  };
}

/**
 * List every module directory under `contentDir`, sorted by name.
 * A missing content root yields an empty catalog.
 */
export async function listModules(contentDir: string): Promise<ModuleContext[]> {
  let entries: string[];
  try {
    entries = (await readdir(contentDir, { withFileTypes: true }))
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (isNotFound(error)) {
      console.warn(`[module-catalog] Content directory not found: ${contentDir}`);
      return [];
    }
    throw error;
  }

  return Promise.all(entries.map((name) => describeModule(contentDir, name)));
}

export function findModule(
  modules: readonly ModuleContext[],
  name: string,
): ModuleContext | undefined {
  return modules.find((m) => m.name === name);
}

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
 * FileConfigProvider: reads YAML settings from a local directory:
 * `<configDir>/defaults.yaml` and `<configDir>/profiles/<name>.yaml`.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { ConfigError } from "./errors.js";
import type { ConfigProvider, FileConfigProviderOptions, RawConfigFile } from "./provider.js";

const PROFILE_NAME_PATTERN = /^[a-z0-9][a-z0-9-]*$/i;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FileConfigProvider implements ConfigProvider {
  private readonly configDir: string;
  private readonly defaultsFile: string;
  private readonly profilesDir: string;

  constructor(options: FileConfigProviderOptions) {
    this.configDir = options.configDir;
    this.defaultsFile = options.defaultsFile ?? "defaults.yaml";
    this.profilesDir = options.profilesDir ?? "profiles";
  }

  async loadDefaults(): Promise<RawConfigFile> {
    const filePath = join(this.configDir, this.defaultsFile);
    try {
      return { content: await readFile(filePath, "utf-8"), sourceFile: filePath };
    } catch (error) {
      if (isNotFound(error)) {
        throw new ConfigError({ file: filePath, message: `Defaults file not found: ${filePath}` });
      }
      throw error;
    }
  }

  async loadProfile(name: string): Promise<RawConfigFile | null> {
    if (!PROFILE_NAME_PATTERN.test(name)) {
      throw new ConfigError({ message: `Invalid config profile name: "${name}"` });
    }

    const filePath = join(this.configDir, this.profilesDir, `${name}.yaml`);
    try {
      return { content: await readFile(filePath, "utf-8"), sourceFile: filePath };
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }
}

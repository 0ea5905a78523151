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
 * Application startup.
 * Loads dotenv and config, then logs the config hash and the module count.
 */

import { config as loadDotenv } from "dotenv";
import { redactSensitiveValues } from "./config/env-substitute.js";
import { ensureConfigLoaded } from "./config/index.js";
import { listModules } from "./content/module-catalog.js";

export async function bootstrap(): Promise<void> {
  loadDotenv();

  try {
    const snapshot = await ensureConfigLoaded();

    for (const file of snapshot.sourceFiles) {
      console.log(`[config] Loaded ${file}`);
    }
    console.log(`[config] Config hash: ${snapshot.configHash} (SHA-256)`);
    console.log(
      "[config] AI settings:",
      JSON.stringify(redactSensitiveValues(snapshot.settings.ai, snapshot.sensitiveVars)),
    );

    const { contentDir } = snapshot.settings.training;
    const modules = await listModules(contentDir);
    console.log(`[config] ${modules.length} training module(s) found in ${contentDir}`);
  } catch (error) {
    console.error("ERROR: Config startup failed");
    console.error(error instanceof Error ? error.message : String(error));
    throw error;
  }
}

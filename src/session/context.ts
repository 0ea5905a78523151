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
 * Assistant context factory: wires config, model, catalog, progress log and
 * session store together once per process.
 * Route handlers take the per-user session from the store and pass it
 * explicitly to the service; the context itself holds no user state.
 */

import { completionSettings, resolveModel } from "../ai/model-resolver.js";
import { type AppSettings, ensureConfigLoaded, resolveProgressFile } from "../config/index.js";
import { type ModuleContext, listModules } from "../content/module-catalog.js";
import { ProgressRecorder } from "../progress/progress-recorder.js";
import { SessionService } from "./session-service.js";
import { MemorySessionStore, type SessionStore } from "./session-store.js";

export interface AssistantContext {
  settings: Readonly<AppSettings>;
  service: SessionService;
  store: SessionStore;
  listModules(): Promise<ModuleContext[]>;
}

let instance: AssistantContext | null = null;
let initPromise: Promise<AssistantContext> | null = null;

export function createAssistantContext(settings: Readonly<AppSettings>): AssistantContext {
  const catalog = () => listModules(settings.training.contentDir);

  const service = new SessionService({
    questionsPerSession: settings.training.questionsPerSession,
    passingScore: settings.training.passingScore,
    model: resolveModel(settings.ai),
    completion: completionSettings(settings.ai),
    progress: new ProgressRecorder(resolveProgressFile(settings.training)),
    listModules: catalog,
  });

  return {
    settings,
    service,
    store: new MemorySessionStore({ ttlSeconds: settings.session.ttlSeconds }),
    listModules: catalog,
  };
}

/**
 * Returns the shared context, creating it from the loaded config on first call.
 */
export function getAssistantContext(): Promise<AssistantContext> {
  if (instance) {
    return Promise.resolve(instance);
  }

  if (!initPromise) {
    initPromise = (async () => {
      try {
        const snapshot = await ensureConfigLoaded();
        instance = createAssistantContext(snapshot.settings);
        return instance;
      } finally {
        initPromise = null;
      }
    })();
  }

  return initPromise;
}

/** Drops the shared context so the next call rebuilds it from config. */
export function resetAssistantContext(): void {
  instance = null;
  initPromise = null;
}

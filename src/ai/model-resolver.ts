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
 * Resolves the configured AI settings to an AI SDK LanguageModel instance.
 * Requests go straight to the provider unless a gateway URL is configured.
 */

import { createAnthropic } from "@ai-sdk/anthropic";
import { createAzure } from "@ai-sdk/azure";
import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";
import type { AIConfigParsed } from "../config/schema.js";
import type { CompletionOptions } from "./completion.js";

function requireKey(env: Record<string, string | undefined>, name: string, label: string): string {
  const key = env[name];
  if (!key) {
    throw new Error(`${name} environment variable is required for ${label} provider`);
  }
  return key;
}

export function resolveModel(
  ai: AIConfigParsed,
  env: Record<string, string | undefined> = process.env,
): LanguageModel {
  const gatewayUrl = ai.gatewayUrl ?? env.AI_GATEWAY_URL;
  const baseURL = gatewayUrl ? { baseURL: gatewayUrl } : {};

  switch (ai.provider) {
    case "openai": {
      const openai = createOpenAI({ apiKey: requireKey(env, "OPENAI_API_KEY", "OpenAI"), ...baseURL });
      return openai(ai.model);
    }
    case "anthropic": {
      const anthropic = createAnthropic({
        apiKey: requireKey(env, "ANTHROPIC_API_KEY", "Anthropic"),
        ...baseURL,
      });
      return anthropic(ai.model);
    }
    case "azure-openai": {
      const azure = createAzure({
        apiKey: requireKey(env, "AZURE_OPENAI_API_KEY", "Azure OpenAI"),
        ...baseURL,
      });
      return azure(ai.model);
    }
    default: {
      const _exhaustive: never = ai.provider;
      throw new Error(`Unsupported AI provider: ${_exhaustive}`);
    }
  }
}

/**
 * Call options shared by every completion request.
 */
export function completionSettings(ai: AIConfigParsed): CompletionOptions {
  return ai.temperature !== undefined ? { temperature: ai.temperature } : {};
}

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
 * Zod schemas for the assistant configuration files.
 * Every object is .strict() so a misspelt key fails at startup instead of being ignored.
 */

import { z } from "zod";

export const AIConfigSchema = z
  .object({
    provider: z.enum(["openai", "anthropic", "azure-openai"]).default("openai"),
    model: z.string().min(1).default("gpt-4-turbo"),
    temperature: z.number().min(0).max(2).optional(),
    gatewayUrl: z
      .string()
      .url()
      .optional()
      .describe("Proxy base URL. When set, provider requests are routed through it."),
  })
  .strict();

export const TrainingConfigSchema = z
  .object({
    contentDir: z.string().min(1).default("training"),
    progressFile: z.string().min(1).optional(),
    questionsPerSession: z.number().int().positive().max(50).default(10),
    passingScore: z.number().int().nonnegative().default(7),
  })
  .strict()
  .refine((data) => data.passingScore <= data.questionsPerSession, {
    message: "passingScore cannot exceed questionsPerSession",
    path: ["passingScore"],
  });

export const SessionConfigSchema = z
  .object({
    ttlSeconds: z.number().int().positive().default(3600),
  })
  .strict();

/** Shape of a single YAML file: every section optional so overlays can be partial. */
export const PartialSettingsSchema = z
  .object({
    ai: z.record(z.string(), z.unknown()).optional(),
    training: z.record(z.string(), z.unknown()).optional(),
    session: z.record(z.string(), z.unknown()).optional(),
  })
  .strict();

/** Shape after defaults and profile overlay are merged. */
export const AppSettingsSchema = z
  .object({
    ai: AIConfigSchema.default({}),
    training: TrainingConfigSchema.default({}),
    session: SessionConfigSchema.default({}),
  })
  .strict();

export type AIConfigParsed = z.output<typeof AIConfigSchema>;
export type TrainingConfigParsed = z.output<typeof TrainingConfigSchema>;
export type PartialSettings = z.output<typeof PartialSettingsSchema>;
export type AppSettings = z.output<typeof AppSettingsSchema>;

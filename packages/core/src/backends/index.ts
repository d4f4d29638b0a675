// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Backend factory — builds the configured local and remote backends. */

import { FALLBACK_PRICING, PRICING_TABLE } from "../config/tables.js";
import type { TollgateConfig } from "../types.js";
import { envVar } from "../utils/security.js";
import type { ExecutionBackends } from "./base.js";
import { OllamaBackend } from "./ollama.js";
import { OpenAIBackend } from "./openai.js";

export { BaseBackend, taskInstruction } from "./base.js";
export type { BackendCallOptions, BackendResult, ExecutionBackend, ExecutionBackends } from "./base.js";
export { OllamaBackend } from "./ollama.js";
export { OpenAIBackend } from "./openai.js";
export type { OpenAIBackendOptions } from "./openai.js";

/**
 * Local Ollama backend always; the OpenAI backend only when its API key is set.
 * Without a remote backend the router keeps every request local.
 */
export function createBackends(config: TollgateConfig): ExecutionBackends {
  const local = new OllamaBackend(config.local.baseUrl, config.local.model);
  const apiKey = envVar(config.cloud.apiKeyEnv);
  if (!apiKey) return { local };

  const pricing = config.cost.pricing[config.cloud.model] ?? PRICING_TABLE[config.cloud.model] ?? FALLBACK_PRICING;
  return {
    local,
    cloud: new OpenAIBackend({
      model: config.cloud.model,
      pricing,
      apiKey,
      baseUrl: config.cloud.baseUrl,
    }),
  };
}

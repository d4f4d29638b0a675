// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * OpenAIBackend — remote execution via the OpenAI SDK.
 * Any OpenAI-compatible endpoint works through `baseUrl`.
 */

import OpenAI from "openai";

import { ExecutionBackendError } from "../exceptions.js";
import type { ModelPricing } from "../types.js";
import { requireEnvVar } from "../utils/security.js";
import { BaseBackend, taskInstruction, type BackendCallOptions, type BackendResult } from "./base.js";

export interface OpenAIBackendOptions {
  model: string;
  /** Used to report the USD cost of each call. */
  pricing: ModelPricing;
  apiKey?: string;
  /** Read when apiKey is not given. */
  apiKeyEnv?: string;
  baseUrl?: string;
}

export class OpenAIBackend extends BaseBackend {
  readonly name = "openai";
  readonly location = "remote" as const;
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly pricing: ModelPricing;

  constructor(options: OpenAIBackendOptions) {
    super();
    this.client = new OpenAI({
      apiKey: options.apiKey ?? requireEnvVar(options.apiKeyEnv ?? "OPENAI_API_KEY"),
      baseURL: options.baseUrl,
      // Retries are the executor's fallback chain
      maxRetries: 0,
    });
    this.model = options.model;
    this.pricing = options.pricing;
  }

  async execute(content: string, taskType: string, options: BackendCallOptions): Promise<BackendResult> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: taskInstruction(taskType) },
            { role: "user", content },
          ],
          stream: false,
        },
        { signal: options.signal, timeout: options.timeoutMs },
      );

      const choice = response.choices[0];
      const inputTokens = response.usage?.prompt_tokens ?? 0;
      const outputTokens = response.usage?.completion_tokens ?? 0;

      return {
        output: choice?.message?.content ?? "",
        qualityScore: qualityFor(choice?.finish_reason),
        inputTokens,
        outputTokens,
        costUsd: this.calcCostUsd(this.pricing, inputTokens, outputTokens),
      };
    } catch (err) {
      throw new ExecutionBackendError(this.name, String(err));
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch {
      return false;
    }
  }
}

function qualityFor(finishReason: string | undefined): number {
  switch (finishReason) {
    case "stop":
      return 0.9;
    case "length":
      return 0.6;
    default:
      return 0.5;
  }
}

// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * OllamaBackend — local execution via the Ollama HTTP API.
 * Docs: https://github.com/ollama/ollama/blob/main/docs/api.md
 */

import { z } from "zod";

import { ExecutionBackendError } from "../exceptions.js";
import { BaseBackend, taskInstruction, type BackendCallOptions, type BackendResult } from "./base.js";

const OllamaChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({ role: z.string(), content: z.string() }),
  done: z.boolean(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

type OllamaChatResponse = z.infer<typeof OllamaChatResponseSchema>;

export class OllamaBackend extends BaseBackend {
  readonly name: string;
  readonly location = "local" as const;
  private readonly baseUrl: string;
  private readonly model: string;

  constructor(baseUrl: string, model: string) {
    super();
    this.baseUrl = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
    this.model = model;
    let host: string;
    try {
      host = new URL(baseUrl).hostname;
    } catch {
      host = "unknown-host";
    }
    this.name = `ollama[@${host}]`;
  }

  async execute(content: string, taskType: string, options: BackendCallOptions): Promise<BackendResult> {
    let resp: Response;
    try {
      resp = await fetch(`${this.baseUrl}/api/chat`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: "system", content: taskInstruction(taskType) },
            { role: "user", content },
          ],
          stream: false,
        }),
        signal: options.signal,
      });
    } catch (err) {
      throw new ExecutionBackendError(this.name, String(err));
    }

    if (!resp.ok) {
      throw new ExecutionBackendError(this.name, `HTTP ${resp.status}`);
    }

    const parsed = OllamaChatResponseSchema.safeParse(await resp.json());
    if (!parsed.success) {
      throw new ExecutionBackendError(this.name, "unexpected response shape");
    }
    const data = parsed.data;

    return {
      output: data.message.content,
      qualityScore: qualityFor(data),
      inputTokens: data.prompt_eval_count ?? 0,
      outputTokens: data.eval_count ?? 0,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const resp = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(3000),
      });
      return resp.ok;
    } catch {
      return false;
    }
  }
}

// Truncated generations score below the default quality threshold
function qualityFor(data: OllamaChatResponse): number {
  if (!data.done || data.done_reason === "length") return 0.5;
  return 0.8;
}

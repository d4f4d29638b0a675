// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * ExecutionBackend — contract every execution adapter implements.
 * Adding a backend: extend BaseBackend and pass it to the PrivacyRouter constructor.
 */

import type { ModelPricing } from "../types.js";

export interface BackendCallOptions {
  /** Budget for this call. The executor enforces it independently. */
  timeoutMs: number;
  /** Aborted on timeout, deadline or caller cancellation. */
  signal: AbortSignal;
}

export interface BackendResult {
  output: string;
  /** 0–1 self-reported quality of the output. */
  qualityScore: number;
  inputTokens?: number;
  outputTokens?: number;
  /** USD actually charged, when the backend knows it. */
  costUsd?: number;
}

export interface ExecutionBackend {
  /** Display name used in logs and attempt records. */
  readonly name: string;
  readonly location: "local" | "remote";
  execute(content: string, taskType: string, options: BackendCallOptions): Promise<BackendResult>;
  /** True if the backend is reachable. */
  healthCheck(): Promise<boolean>;
}

/** Injected backends. Without `cloud`, only the local venue is admissible. */
export interface ExecutionBackends {
  local: ExecutionBackend;
  cloud?: ExecutionBackend;
}

export abstract class BaseBackend implements ExecutionBackend {
  abstract readonly name: string;
  abstract readonly location: "local" | "remote";

  abstract execute(content: string, taskType: string, options: BackendCallOptions): Promise<BackendResult>;

  abstract healthCheck(): Promise<boolean>;

  /** Calculate cost in USD given token counts. */
  protected calcCostUsd(pricing: ModelPricing, inputTokens: number, outputTokens: number): number {
    return (inputTokens / 1000) * pricing.input + (outputTokens / 1000) * pricing.output;
  }
}

/** Instruction sent ahead of the content so the model knows the task. */
export function taskInstruction(taskType: string): string {
  return `Task: ${taskType.replace(/_/g, " ")}. Respond with the result only.`;
}

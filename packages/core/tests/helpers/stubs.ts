// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** In-process stand-ins for execution backends. */

import { BaseBackend, type BackendCallOptions, type BackendResult } from "../../src/backends/base.js";

export type Behaviour = (content: string, options: BackendCallOptions) => Promise<BackendResult>;

export class StubBackend extends BaseBackend {
  readonly calls: string[] = [];
  readonly signals: AbortSignal[] = [];
  healthy = true;

  constructor(
    readonly name: string,
    readonly location: "local" | "remote",
    private behaviour: Behaviour,
  ) {
    super();
  }

  /** Swap the behaviour for subsequent calls. */
  setBehaviour(behaviour: Behaviour): void {
    this.behaviour = behaviour;
  }

  async execute(content: string, _taskType: string, options: BackendCallOptions): Promise<BackendResult> {
    this.calls.push(content);
    this.signals.push(options.signal);
    return this.behaviour(content, options);
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}

export const ok =
  (output: string, extra: Partial<BackendResult> = {}): Behaviour =>
  async () => ({ output, qualityScore: 0.9, ...extra });

export const echo =
  (prefix = ""): Behaviour =>
  async (content) => ({ output: `${prefix}${content}`, qualityScore: 0.9 });

export const fail =
  (message: string): Behaviour =>
  async () => {
    throw new Error(message);
  };

/** Never settles on its own; rejects once the call is aborted. */
export const hang: Behaviour = (_content, { signal }) =>
  new Promise<BackendResult>((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });

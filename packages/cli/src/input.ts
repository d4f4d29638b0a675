// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/cli/src/input.ts
// Shared option parsing for the request-taking commands.

import { readFileSync } from "fs";

import { InvalidArgumentError } from "commander";
import type { RequestInput } from "@tollgate/core";

export interface RequestFlags {
    taskType: string;
    id?: string;
    file?: string;
    costPriority?: number;
    qualityThreshold?: number;
    config?: string;
    json?: boolean;
}

/** Commander parser for options in [0, 1]. */
export function parseUnit(value: string): number {
    const n = Number(value);
    if (!Number.isFinite(n) || n < 0 || n > 1) {
        throw new InvalidArgumentError("Expected a number between 0 and 1.");
    }
    return n;
}

/** Commander parser for whole-number counts such as --days. */
export function parsePositiveInt(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1) {
        throw new InvalidArgumentError("Expected a positive whole number.");
    }
    return n;
}

/** Content comes from --file when given, otherwise from the positional argument. */
export function readContent(content: string | undefined, file: string | undefined): string {
    if (file) return readFileSync(file, "utf8");
    if (content !== undefined) return content;
    throw new Error("Provide the content as an argument or with --file <path>");
}

export function toRequestInput(content: string, flags: RequestFlags): RequestInput {
    return {
        ...(flags.id ? { id: flags.id } : {}),
        content,
        taskType: flags.taskType,
        preferences: {
            ...(flags.costPriority !== undefined ? { costPriority: flags.costPriority } : {}),
            ...(flags.qualityThreshold !== undefined ? { qualityThreshold: flags.qualityThreshold } : {}),
        },
    };
}

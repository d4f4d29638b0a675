// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/schemas.ts
// JSON schemas shared by the routing endpoints, and the snake_case → core mapping.

import type { RequestInput } from "@tollgate/core";

import type { RoutingRequestBody } from "../types.js";

export const routingRequestSchema = {
    type: "object",
    required: ["content", "task_type"],
    properties: {
        id: { type: "string", minLength: 1 },
        content: { type: "string" },
        task_type: { type: "string", minLength: 1 },
        preferences: {
            type: "object",
            properties: {
                cost_priority: { type: "number", minimum: 0, maximum: 1 },
                quality_threshold: { type: "number", minimum: 0, maximum: 1 },
            },
        },
    },
} as const;

export function toRequestInput(body: RoutingRequestBody): RequestInput {
    const prefs = body.preferences ?? {};
    return {
        ...(body.id !== undefined ? { id: body.id } : {}),
        content: body.content,
        taskType: body.task_type,
        preferences: {
            ...(prefs.cost_priority !== undefined ? { costPriority: prefs.cost_priority } : {}),
            ...(prefs.quality_threshold !== undefined ? { qualityThreshold: prefs.quality_threshold } : {}),
        },
    };
}

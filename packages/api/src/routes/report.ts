// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/report.ts
// GET  /v1/report        — accounting snapshot (+ stored daily history when persisted)
// POST /v1/report/reset  — zero the in-memory counters

import type { FastifyPluginAsync } from "fastify";
import type { PrivacyRouter, SqliteAccountingSink } from "@tollgate/core";

import type { ReportResponse } from "../types.js";

interface ReportRouteOptions {
    router: PrivacyRouter;
    sink?: SqliteAccountingSink;
}

const reportRoute: FastifyPluginAsync<ReportRouteOptions> = async (fastify, opts) => {
    fastify.get<{ Querystring: { days: number } }>(
        "/v1/report",
        {
            schema: {
                summary: "Cost, savings and compliance report",
                description:
                    "Returns the accounting snapshot: totals, per-venue and per-strategy counts, " +
                    "privacy compliance and the rolling window. Includes daily history when persistence is on.",
                tags: ["Metrics"],
                querystring: {
                    type: "object",
                    properties: {
                        days: { type: "integer", minimum: 1, maximum: 90, default: 7 },
                    },
                },
            },
        },
        async (request): Promise<ReportResponse> => {
            const snapshot = opts.router.report();
            const daily = opts.sink?.getDailySummary(request.query.days);
            return { snapshot, ...(daily ? { daily } : {}) } satisfies ReportResponse;
        },
    );

    fastify.post(
        "/v1/report/reset",
        {
            schema: {
                summary: "Reset statistics",
                description: "Zeroes every in-memory counter. Stored history is kept.",
                tags: ["Metrics"],
            },
        },
        async (request) => {
            opts.router.resetStatistics();
            request.log.info("statistics reset via API");
            return { status: "reset" };
        },
    );
};

export default reportRoute;

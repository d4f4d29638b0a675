// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/health.ts
// GET /v1/health — backend reachability

import type { FastifyPluginAsync } from "fastify";
import { VERSION, type PrivacyRouter } from "@tollgate/core";

import type { HealthResponse } from "../types.js";

// uptime start
const startedAt = Date.now();

interface HealthRouteOptions {
    router: PrivacyRouter;
}

const healthRoute: FastifyPluginAsync<HealthRouteOptions> = async (fastify, opts) => {
    fastify.get(
        "/v1/health",
        {
            schema: {
                summary: "Backend health check",
                description: "Returns the reachability of the local and remote execution backends.",
                tags: ["System"],
            },
        },
        async (): Promise<HealthResponse> => {
            const backends = await opts.router.healthCheck();
            return {
                status: backends.local ? "ok" : "degraded",
                version: VERSION,
                uptime: Math.floor((Date.now() - startedAt) / 1000),
                backends,
            };
        },
    );
};

export default healthRoute;

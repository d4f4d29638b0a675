// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/execute.ts
// POST /v1/execute — route, execute along the fallback chain and record the outcome.
// A client disconnect cancels the in-flight backend call.

import type { FastifyPluginAsync } from "fastify";
import type { ExecutionErrorCode, ExecutionResult, PrivacyRouter } from "@tollgate/core";

import type { RoutingRequestBody } from "../types.js";
import { routingRequestSchema, toRequestInput } from "./schemas.js";

interface ExecuteRouteOptions {
    router: PrivacyRouter;
}

function statusFor(error: ExecutionErrorCode | undefined): number {
    switch (error) {
        case undefined:
            return 200;
        case "invalid_request":
            return 400;
        case "cancelled":
            return 499;
        case "routing_failed":
            return 502;
    }
}

const executeRoute: FastifyPluginAsync<ExecuteRouteOptions> = async (fastify, opts) => {
    fastify.post<{ Body: RoutingRequestBody }>(
        "/v1/execute",
        {
            schema: {
                summary: "Route and execute",
                description:
                    "Routes the request, executes it on the chosen venue (falling back along the chain) " +
                    "and records the outcome. Responds 502 when every venue failed.",
                tags: ["Routing"],
                body: routingRequestSchema,
            },
        },
        async (request, reply): Promise<ExecutionResult> => {
            const controller = new AbortController();
            reply.raw.on("close", () => {
                if (!reply.raw.writableFinished) controller.abort();
            });

            const result = await opts.router.routeAndExecute(toRequestInput(request.body), {
                signal: controller.signal,
            });
            reply.code(statusFor(result.error));
            return result;
        },
    );
};

export default executeRoute;

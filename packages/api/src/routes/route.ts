// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/route.ts
// POST /v1/route — explain the routing decision for a request without executing it.

import type { FastifyPluginAsync } from "fastify";
import type { PrivacyRouter } from "@tollgate/core";

import type { RouteResponse, RoutingRequestBody } from "../types.js";
import { routingRequestSchema, toRequestInput } from "./schemas.js";

interface RouteRouteOptions {
    router: PrivacyRouter;
}

const routeRoute: FastifyPluginAsync<RouteRouteOptions> = async (fastify, opts) => {
    fastify.post<{ Body: RoutingRequestBody }>(
        "/v1/route",
        {
            schema: {
                summary: "Explain routing decision",
                description:
                    "Returns the routing decision for a request — sensitivity, capability, " +
                    "cost estimate, primary venue and fallback chain. Does NOT execute the request.",
                tags: ["Routing"],
                body: routingRequestSchema,
            },
        },
        async (request): Promise<RouteResponse> => {
            const decision = await opts.router.route(toRequestInput(request.body));
            return { decision } satisfies RouteResponse;
        },
    );
};

export default routeRoute;

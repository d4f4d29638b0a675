// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/middleware/auth.ts
// Optional API key authentication for the Tollgate REST API.
// If no API key is configured, all requests are allowed (local-by-default).

import type { FastifyPluginAsync, FastifyRequest, FastifyReply } from "fastify";
import fp from "fastify-plugin";

import type { ApiError } from "../types.js";

export interface AuthOptions {
    /** Required API key — if undefined, auth is disabled */
    apiKey?: string;
}

const PUBLIC_PATHS = new Set(["/", "/v1/health"]);

function presentedKey(request: FastifyRequest): string | undefined {
    const authHeader = request.headers["authorization"];
    if (authHeader?.startsWith("Bearer ")) return authHeader.slice(7);
    const keyHeader = request.headers["x-api-key"];
    return typeof keyHeader === "string" ? keyHeader : undefined;
}

const authPlugin: FastifyPluginAsync<AuthOptions> = async (fastify, opts) => {
    if (!opts.apiKey) {
        return;
    }

    fastify.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
        const path = request.url.split("?")[0] ?? request.url;
        if (PUBLIC_PATHS.has(path) || path.startsWith("/docs")) {
            return;
        }

        if (presentedKey(request) !== opts.apiKey) {
            return reply.code(401).send({
                error: {
                    type: "authentication_error",
                    code: "invalid_api_key",
                    message: "Invalid API key. Pass your key via 'Authorization: Bearer <key>' or 'x-api-key: <key>'.",
                },
            } satisfies ApiError);
        }
    });
};

export default fp(authPlugin, { name: "tollgate-auth" });

// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/server.ts
// The Tollgate REST API server at localhost:4141.
//
// Endpoints:
//   POST /v1/route         ← explain routing decision (no execution)
//   POST /v1/execute       ← route, execute and record
//   GET  /v1/report        ← cost, savings and compliance snapshot
//   POST /v1/report/reset  ← zero the counters
//   GET  /v1/health        ← backend health check
//   GET  /docs             ← Swagger UI (if enabled)

import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import {
    createRouterFromConfig,
    InvalidRequestError,
    TollgateError,
    VERSION,
    type PrivacyRouter,
    type SqliteAccountingSink,
} from "@tollgate/core";

import type { ApiError, ApiServerOptions } from "./types.js";
import authPlugin from "./middleware/auth.js";
import healthRoute from "./routes/health.js";
import routeRoute from "./routes/route.js";
import executeRoute from "./routes/execute.js";
import reportRoute from "./routes/report.js";

export interface ApiServer {
    fastify: FastifyInstance;
    router: PrivacyRouter;
    sink?: SqliteAccountingSink;
    port: number;
    host: string;
}

function errorBody(error: FastifyError): { status: number; body: ApiError } {
    if (error.validation || error instanceof InvalidRequestError) {
        return {
            status: 400,
            body: { error: { type: "invalid_request_error", code: "invalid_request", message: error.message } },
        };
    }
    if (error instanceof TollgateError) {
        return { status: 500, body: { error: { type: "routing_error", code: error.name, message: error.message } } };
    }
    const status = error.statusCode !== undefined && error.statusCode >= 400 ? error.statusCode : 500;
    return { status, body: { error: { type: "server_error", code: error.code ?? "internal", message: error.message } } };
}

export async function createServer(opts: ApiServerOptions): Promise<ApiServer> {
    const { config, port = 4141, host = "127.0.0.1", apiKey, swagger: enableSwagger = true } = opts;

    const fastify = Fastify({
        logger:
            opts.logger === false
                ? false
                : {
                      level: config.logging.level,
                      transport: { target: "pino-pretty", options: { colorize: true } },
                  },
    });

    // ── CORS (allow any local app to call the API) ──────────────────────────────
    await fastify.register(cors, {
        origin: (origin, cb) => {
            // Allow localhost origins (any port) and requests with no origin (curl, etc.)
            if (!origin || /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/.test(origin)) {
                cb(null, true);
            } else {
                cb(new Error("CORS: origin not allowed"), false);
            }
        },
        methods: ["GET", "POST", "OPTIONS"],
    });

    // ── Swagger / OpenAPI docs ──────────────────────────────────────────────────
    if (enableSwagger) {
        await fastify.register(swagger, {
            openapi: {
                openapi: "3.0.0",
                info: {
                    title: "Tollgate REST API",
                    description:
                        "Privacy-aware request routing. Classifies each request, picks a venue " +
                        "(local, anonymized cloud, direct cloud or hybrid) and keeps a cost ledger.",
                    version: VERSION,
                    license: { name: "BUSL 1.1" },
                },
                servers: [{ url: `http://${host}:${port}`, description: "Tollgate local API" }],
                tags: [
                    { name: "Routing", description: "Routing decisions and execution" },
                    { name: "Metrics", description: "Cost, savings and compliance accounting" },
                    { name: "System", description: "Health and status" },
                ],
            },
        });

        await fastify.register(swaggerUi, {
            routePrefix: "/docs",
            uiConfig: { docExpansion: "list" },
        });
    }

    // ── Authentication (optional) ────────────────────────────────────────────────
    await fastify.register(authPlugin, { apiKey });

    // ── Errors → { error: { type, code, message } } ──────────────────────────────
    fastify.setErrorHandler((error, request, reply) => {
        const { status, body } = errorBody(error);
        if (status >= 500) {
            request.log.error({ err: error }, "request failed");
        }
        return reply.code(status).send(body);
    });

    // ── Build router ─────────────────────────────────────────────────────────────
    let router: PrivacyRouter;
    let sink = opts.sink;
    if (opts.router) {
        router = opts.router;
    } else {
        const configured = createRouterFromConfig(config);
        router = configured.router;
        sink = sink ?? configured.sink;
    }
    if (sink) {
        const owned = sink;
        fastify.addHook("onClose", async () => {
            owned.close();
        });
    }

    // ── Register routes ──────────────────────────────────────────────────────────
    await fastify.register(healthRoute, { router });
    await fastify.register(routeRoute, { router });
    await fastify.register(executeRoute, { router });
    await fastify.register(reportRoute, { router, sink });

    // Root redirect
    if (enableSwagger) {
        fastify.get("/", async (_req, reply) => {
            return reply.redirect("/docs");
        });
    }

    return { fastify, router, sink, port, host };
}

export async function startServer(opts: ApiServerOptions): Promise<void> {
    const { fastify, port, host } = await createServer(opts);

    try {
        await fastify.listen({ port, host });
        console.log(
            `\n  Tollgate API  v${VERSION}\n` +
                `  Listening  → http://${host}:${port}/v1\n` +
                (opts.swagger === false ? "" : `  Swagger UI → http://${host}:${port}/docs\n`),
        );
    } catch (err) {
        fastify.log.error(err);
        process.exit(1);
    }
}

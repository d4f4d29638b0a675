// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/types.ts
// Wire types for the Tollgate REST API layer.

import type {
    AccountingSnapshot,
    DailySummary,
    PrivacyRouter,
    RoutingDecision,
    SqliteAccountingSink,
    TollgateConfig,
} from "@tollgate/core";

// ── Requests ─────────────────────────────────────────────────────────────────

export interface RoutingRequestBody {
    id?: string;
    content: string;
    task_type: string;
    preferences?: {
        cost_priority?: number;
        quality_threshold?: number;
    };
}

// ── Responses ────────────────────────────────────────────────────────────────

export interface RouteResponse {
    decision: RoutingDecision;
}

export interface ReportResponse {
    snapshot: AccountingSnapshot;
    /** Stored per-day history; present only when persistence is enabled. */
    daily?: DailySummary[];
}

export interface HealthResponse {
    status: "ok" | "degraded";
    version: string;
    uptime: number;
    backends: {
        local: boolean;
        /** null when no remote backend is configured. */
        cloud: boolean | null;
    };
}

export interface ApiError {
    error: {
        type: "invalid_request_error" | "authentication_error" | "routing_error" | "server_error";
        code: string;
        message: string;
    };
}

// ── Server options ────────────────────────────────────────────────────────────

export interface ApiServerOptions {
    config: TollgateConfig;
    /** Pre-built router; built from config when omitted. */
    router?: PrivacyRouter;
    /** Accounting sink backing GET /v1/report history. */
    sink?: SqliteAccountingSink;
    port?: number;
    host?: string;
    /** API key for authentication (optional — if not set, no auth required) */
    apiKey?: string;
    /** Enable Swagger UI at /docs */
    swagger?: boolean;
    /** Request logging through pino-pretty; false silences it. */
    logger?: boolean;
}

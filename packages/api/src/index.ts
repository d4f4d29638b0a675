// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

export { createServer, startServer } from "./server.js";
export type { ApiServer } from "./server.js";
export type * from "./types.js";

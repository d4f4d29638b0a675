// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { createBackends } from "./backends/index.js";
import type { ExecutionBackends } from "./backends/base.js";
import { SqliteAccountingSink } from "./persistence/sqliteSink.js";
import { PrivacyRouter } from "./router/router.js";
import type { TollgateConfig } from "./types.js";

export interface ConfiguredRouter {
  router: PrivacyRouter;
  /** Present when accounting.persist is on. Close it on shutdown. */
  sink?: SqliteAccountingSink;
}

/** Wire a router from config: configured backends plus the SQLite sink when persistence is on. */
export function createRouterFromConfig(
  config: TollgateConfig,
  backends: ExecutionBackends = createBackends(config),
): ConfiguredRouter {
  const sink = config.accounting.persist ? new SqliteAccountingSink(config.accounting.dbPath) : undefined;
  return { router: new PrivacyRouter(backends, config, { sink }), sink };
}

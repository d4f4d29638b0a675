#!/usr/bin/env node
// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import chalk from "chalk";
import { VERSION } from "@tollgate/core";

import { routeCommand } from "./route.js";
import { execCommand } from "./exec.js";
import { reportCommand } from "./report.js";
import { serveCommand } from "./serve.js";

const program = new Command();

program
    .name("tollgate")
    .description("Privacy-aware request router: local first, cloud when it is safe and worth it")
    .version(VERSION);

program.addCommand(routeCommand);
program.addCommand(execCommand);
program.addCommand(reportCommand);
program.addCommand(serveCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(chalk.red(`\nFatal error: ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
});

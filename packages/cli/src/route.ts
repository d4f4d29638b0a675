// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import chalk from "chalk";
import { createRouterFromConfig, formatDecision, loadConfig } from "@tollgate/core";

import { parseUnit, readContent, toRequestInput, type RequestFlags } from "./input.js";

export const routeCommand = new Command("route")
    .description("Explain where a request would run, without executing it")
    .argument("[content]", "Request content (or use --file)")
    .requiredOption("-t, --task-type <type>", "Task type, e.g. code_completion")
    .option("-f, --file <path>", "Read the content from a file")
    .option("--id <id>", "Request id")
    .option("--cost-priority <n>", "0 = quality first, 1 = cost first", parseUnit)
    .option("-c, --config <path>", "Path to tollgate.yaml")
    .option("--json", "Print the decision as JSON")
    .action(async (content: string | undefined, options: RequestFlags) => {
        const config = loadConfig(options.config);
        const { router, sink } = createRouterFromConfig(config);
        try {
            const decision = await router.route(toRequestInput(readContent(content, options.file), options));
            if (options.json) {
                console.log(JSON.stringify(decision, null, 2));
                return;
            }
            console.log(chalk.bold.cyan(`\n  Routing decision ${chalk.dim(decision.requestId)}\n`));
            console.log(formatDecision(decision));
            for (const rec of decision.sensitivity.recommendations) {
                console.log(chalk.yellow(`  • ${rec}`));
            }
            console.log("");
        } finally {
            sink?.close();
        }
    });

// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import chalk from "chalk";
import { createRouterFromConfig, loadConfig, type ExecutionResult } from "@tollgate/core";

import { parseUnit, readContent, toRequestInput, type RequestFlags } from "./input.js";

function printResult(result: ExecutionResult): void {
    if (result.error) {
        console.error(chalk.red(`\n  ${result.error}: ${result.errorMessage ?? ""}`));
    } else {
        console.log(
            chalk.dim(
                `\n  venue ${result.venueUsed} · cost $${result.actualCost.toFixed(6)} · ` +
                    `saved $${result.costSaved.toFixed(6)} · quality ${result.qualityScore.toFixed(2)} · ` +
                    `${Math.round(result.latencyMs)}ms`,
            ),
        );
    }
    for (const attempt of result.attempts.filter((a) => a.outcome !== "success")) {
        console.log(chalk.dim(`  ↳ ${attempt.venue} (${attempt.backend}): ${attempt.outcome}${attempt.message ? ` — ${attempt.message}` : ""}`));
    }
    for (const warning of result.warnings) {
        console.log(chalk.yellow(`  ⚠ ${warning}`));
    }
    if (result.output) {
        console.log(`\n${result.output}\n`);
    }
}

export const execCommand = new Command("exec")
    .description("Route and execute a request on the chosen venue")
    .argument("[content]", "Request content (or use --file)")
    .requiredOption("-t, --task-type <type>", "Task type, e.g. code_completion")
    .option("-f, --file <path>", "Read the content from a file")
    .option("--id <id>", "Request id")
    .option("--cost-priority <n>", "0 = quality first, 1 = cost first", parseUnit)
    .option("--quality-threshold <n>", "Minimum acceptable quality score", parseUnit)
    .option("-c, --config <path>", "Path to tollgate.yaml")
    .option("--json", "Print the result as JSON")
    .action(async (content: string | undefined, options: RequestFlags) => {
        const config = loadConfig(options.config);
        const { router, sink } = createRouterFromConfig(config);

        // Ctrl-C cancels the in-flight call instead of killing the process
        const controller = new AbortController();
        const onInterrupt = (): void => controller.abort();
        process.once("SIGINT", onInterrupt);

        try {
            const input = toRequestInput(readContent(content, options.file), options);
            const result = await router.routeAndExecute(input, { signal: controller.signal });
            if (options.json) {
                console.log(JSON.stringify(result, null, 2));
            } else {
                printResult(result);
            }
            if (result.error) process.exitCode = 1;
        } finally {
            process.off("SIGINT", onInterrupt);
            sink?.close();
        }
    });

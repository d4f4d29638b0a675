// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import chalk from "chalk";
import { SqliteAccountingSink, formatDailySummary, loadConfig } from "@tollgate/core";

import { parsePositiveInt } from "./input.js";

export const reportCommand = new Command("report")
    .description("Show stored cost and savings history")
    .option("-d, --days <n>", "Number of days to include", parsePositiveInt, 7)
    .option("-c, --config <path>", "Path to tollgate.yaml")
    .action(async (options: { days: number; config?: string }) => {
        const config = loadConfig(options.config);
        if (!config.accounting.persist) {
            console.log(chalk.dim("  accounting.persist is off — only previously stored history is shown."));
        }
        const sink = new SqliteAccountingSink(config.accounting.dbPath);
        try {
            console.log(chalk.bold.cyan(`\n  Tollgate history — last ${options.days} day(s)`));
            console.log(formatDailySummary(sink.getDailySummary(options.days)));
        } finally {
            sink.close();
        }
    });

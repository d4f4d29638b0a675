// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import chalk from "chalk";
import { envVar, loadConfig, maskKey } from "@tollgate/core";

import { parsePositiveInt } from "./input.js";

export const serveCommand = new Command("serve")
    .description("Start the Tollgate REST API")
    .option("-p, --port <number>", "Port to bind to", parsePositiveInt, 4141)
    .option("-H, --host <host>", "Host to bind to", "127.0.0.1")
    .option("-c, --config <path>", "Path to tollgate.yaml")
    .option("--no-docs", "Disable the Swagger UI at /docs")
    .action(async (options: { port: number; host: string; config?: string; docs: boolean }) => {
        const config = loadConfig(options.config);
        const apiKey = envVar("TOLLGATE_API_KEY");
        console.log(chalk.green(`[Tollgate API] Booting on port ${options.port}...`));
        if (apiKey) {
            console.log(chalk.dim(`  API key: ${maskKey(apiKey)}`));
        } else {
            console.log(chalk.yellow("  TOLLGATE_API_KEY is not set — the API accepts unauthenticated requests."));
        }
        const { startServer } = await import("@tollgate/api");
        await startServer({
            config,
            port: options.port,
            host: options.host,
            apiKey,
            swagger: options.docs,
        });
    });

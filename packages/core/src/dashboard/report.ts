// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Terminal report formatters — render accounting data with chalk. */

import chalk from "chalk";

import type { DailySummary } from "../persistence/sqliteSink.js";
import type { AccountingSnapshot, RoutingDecision } from "../types.js";
import { VENUES } from "../types.js";

function usd(value: number): string {
  return `$${value.toFixed(6)}`;
}

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

export function formatAccountingReport(snapshot: AccountingSnapshot): string {
  const lines: string[] = [];
  lines.push("");
  lines.push(chalk.bold.cyan("  Tollgate Accounting Report"));
  lines.push(chalk.dim("  ─────────────────────────────────────────"));

  if (snapshot.totalRequests === 0) {
    lines.push(chalk.dim("  No requests recorded yet."));
    lines.push("");
    return lines.join("\n");
  }

  lines.push(`  ${chalk.bold("Total requests:")}  ${snapshot.totalRequests}`);
  lines.push(
    `  ${chalk.bold("Succeeded:")}       ${chalk.green(String(snapshot.successfulRequests))}` +
      `   ${chalk.bold("Failed:")} ${chalk.red(String(snapshot.failedRequests))}` +
      `   ${chalk.bold("Failed attempts:")} ${snapshot.failedAttempts}`,
  );
  lines.push(`  ${chalk.bold("Total cost:")}      ${chalk.green(usd(snapshot.totalCost))}`);
  lines.push(`  ${chalk.bold("Cost saved:")}      ${chalk.yellow(usd(snapshot.totalCostSaved))}`);

  const compliance = pct(snapshot.privacyComplianceRate);
  lines.push(
    `  ${chalk.bold("Privacy:")}         ${
      snapshot.privacyViolations === 0 ? chalk.green(compliance) : chalk.red(compliance)
    } compliant (${snapshot.privacyViolations} violation(s))`,
  );
  lines.push(
    `  ${chalk.bold("Averages:")}        latency ${Math.round(snapshot.averageLatencyMs)}ms, ` +
      `quality ${snapshot.averageQualityScore.toFixed(2)}, confidence ${snapshot.averageConfidence.toFixed(2)}`,
  );

  lines.push("");
  lines.push(chalk.dim(`  ${"Venue".padEnd(18)} Requests`));
  lines.push(chalk.dim("  " + "─".repeat(30)));
  for (const venue of [...VENUES, "none" as const]) {
    lines.push(`  ${venue.padEnd(18)} ${snapshot.perVenueCounts[venue]}`);
  }

  lines.push("");
  lines.push(
    chalk.dim(
      `  Last ${snapshot.recentWindowHours}h: ${snapshot.recentRequests} request(s), ` +
        `cost ${usd(snapshot.recentCost)}, saved ${usd(snapshot.recentCostSaved)}`,
    ),
  );
  lines.push("");
  return lines.join("\n");
}

export function formatDailySummary(days: DailySummary[]): string {
  const lines: string[] = [""];
  if (days.length === 0) {
    lines.push(chalk.dim("  No stored history yet."), "");
    return lines.join("\n");
  }
  lines.push(chalk.dim(`  ${"Date".padEnd(12)} ${"Requests".padEnd(9)} ${"Local".padEnd(6)} ${"Cost ($)".padEnd(12)} Saved ($)`));
  lines.push(chalk.dim("  " + "─".repeat(54)));
  for (const day of days) {
    lines.push(
      `  ${chalk.white(day.date.padEnd(12))} ${String(day.requests).padEnd(9)} ${String(day.localRequests).padEnd(6)} ` +
        `${chalk.green(day.costUsd.toFixed(6).padEnd(12))} ${chalk.yellow(day.savedUsd.toFixed(6))}`,
    );
  }
  lines.push("");
  return lines.join("\n");
}

export function formatDecision(decision: RoutingDecision): string {
  const venueColor = decision.primaryVenue === "local" ? chalk.green : chalk.yellow;
  return [
    `  ${chalk.bold("Strategy:")}     ${decision.strategy}`,
    `  ${chalk.bold("Venue:")}        ${venueColor(decision.primaryVenue)}`,
    `  ${chalk.bold("Fallbacks:")}    ${decision.fallbackChain.length > 0 ? decision.fallbackChain.join(" → ") : "(none)"}`,
    `  ${chalk.bold("Sensitivity:")}  ${decision.sensitivity.level}`,
    `  ${chalk.bold("Capability:")}   ${decision.capability.tier} (${decision.capability.complexity})`,
    `  ${chalk.bold("Confidence:")}   ${decision.confidence.toFixed(2)}`,
    `  ${chalk.bold("Est. cost:")}    ${usd(decision.costImpact)} (saves ${usd(decision.estimatedSavings)})`,
    chalk.dim(`  ${decision.reasoning}`),
  ].join("\n");
}

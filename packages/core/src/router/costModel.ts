// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * CostModel — estimated USD cost of running a request on each venue.
 *
 *   local             fixed amortised per-call cost, no per-token term
 *   cloud_direct      in/1000 × priceIn + out/1000 × priceOut on the cloud model
 *   cloud_anonymized  cloud_direct × (1 + anonymizationOverhead)
 *   hybrid            local fixed + cloud_direct × hybridRemoteShare
 *
 * Savings are measured against the most expensive model in the pricing table.
 */

import { FALLBACK_PRICING } from "../config/tables.js";
import { CostDataMissingError } from "../exceptions.js";
import type { CostEstimate, ModelPricing, TollgateConfig, Venue, VenueCost } from "../types.js";
import { componentLogger } from "../utils/logger.js";

const log = componentLogger("cost");

// Han, kana and hangul ranges
const CJK = /[\u3040-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uac00-\ud7af\uf900-\ufaff]/g;

/** Language-aware token estimate: 1.5 chars/token for CJK, 4 otherwise. */
export function estimateTokens(content: string): number {
  const cjk = (content.match(CJK) ?? []).length;
  const other = content.length - cjk;
  return Math.ceil(cjk / 1.5 + other / 4);
}

export function priceTokens(pricing: ModelPricing, inputTokens: number, outputTokens: number): number {
  return (inputTokens / 1000) * pricing.input + (outputTokens / 1000) * pricing.output;
}

export class CostModel {
  private readonly options: TollgateConfig["cost"];
  private readonly cloudModel: string;
  private readonly pricing: Readonly<Record<string, ModelPricing>>;

  constructor(
    options: TollgateConfig["cost"],
    cloudModel: string,
    pricing: Readonly<Record<string, ModelPricing>>,
  ) {
    this.options = options;
    this.cloudModel = cloudModel;
    this.pricing = pricing;
  }

  /** Pure; every venue is priced so the policy can rank fallbacks by cost. */
  estimate(content: string): CostEstimate {
    const inputTokens = estimateTokens(content);
    const outputTokens = Math.ceil(inputTokens * this.options.outputMultiplier);

    const { pricing, source } = this.cloudPricing();
    const direct = priceTokens(pricing, inputTokens, outputTokens);
    const local = this.options.localCostPerCall;

    const venues: Record<Venue, VenueCost> = {
      local: venueCost(local, 0),
      cloud_direct: venueCost(0, direct),
      cloud_anonymized: venueCost(0, direct * (1 + this.options.anonymizationOverhead)),
      hybrid: venueCost(local, direct * this.options.hybridRemoteShare),
    };

    const { model: baselineModel, cost: baselineCost } = this.baseline(inputTokens, outputTokens, direct);

    return {
      inputTokens,
      outputTokens,
      venues,
      baselineModel,
      baselineCost,
      pricingSource: source,
    };
  }

  /** Pricing for an arbitrary model; unknown models use the fallback table. */
  pricingFor(model: string): ModelPricing {
    try {
      return this.lookup(model);
    } catch (err) {
      if (!(err instanceof CostDataMissingError)) throw err;
      return FALLBACK_PRICING;
    }
  }

  private cloudPricing(): { pricing: ModelPricing; source: CostEstimate["pricingSource"] } {
    try {
      return { pricing: this.lookup(this.cloudModel), source: "configured" };
    } catch (err) {
      if (!(err instanceof CostDataMissingError)) throw err;
      log.warn({ model: this.cloudModel }, "no pricing for cloud model, using default prices");
      return { pricing: FALLBACK_PRICING, source: "default" };
    }
  }

  private lookup(model: string): ModelPricing {
    const entry = Object.hasOwn(this.pricing, model) ? this.pricing[model] : undefined;
    if (!entry) throw new CostDataMissingError(model);
    return entry;
  }

  private baseline(inputTokens: number, outputTokens: number, direct: number): { model: string; cost: number } {
    let best = { model: this.cloudModel, cost: direct };
    for (const [model, pricing] of Object.entries(this.pricing)) {
      const cost = priceTokens(pricing, inputTokens, outputTokens);
      if (cost > best.cost) best = { model, cost };
    }
    return best;
  }
}

function venueCost(fixedCost: number, variableCost: number): VenueCost {
  return { fixedCost, variableCost, totalCost: fixedCost + variableCost };
}

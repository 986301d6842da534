import type { CallUsageRecord, CostRates, MeteringSummary, PricingTable, UsageRecord } from './types.js';
import { DEFAULT_COST_RATES } from './types.js';
import type { Clock } from '../types.js';

/**
 * Rates for `modelId`: an exact entry, else the longest entry the id starts
 * with, so dated ids such as "gpt-4o-mini-2024-07-18" resolve.
 */
export function resolveModelCost(modelId: string, pricing: PricingTable): CostRates | undefined {
	const exact = pricing[modelId];
	if (exact) return exact;

	let best: string | undefined;
	for (const key of Object.keys(pricing)) {
		if (modelId.startsWith(key) && (!best || key.length > best.length)) {
			best = key;
		}
	}
	return best ? pricing[best] : undefined;
}

/** USD cost of one call; 0 for models missing from the table. */
export function computeCost(
	inputTokens: number,
	outputTokens: number,
	modelId: string,
	pricing: PricingTable = DEFAULT_COST_RATES,
): number {
	const rates = resolveModelCost(modelId, pricing);
	if (!rates) return 0;
	return (
		(inputTokens / 1_000_000) * rates.inputCostPerMillion +
		(outputTokens / 1_000_000) * rates.outputCostPerMillion
	);
}

/** Accumulates per-call token usage and cost for one run. */
export class UsageMeter {
	private usage: UsageRecord = { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
	private readonly calls: CallUsageRecord[] = [];
	private readonly pricing: PricingTable;
	private readonly clock: Clock;

	constructor(customPricing?: PricingTable, clock: Clock = Date.now) {
		this.pricing = customPricing ?? DEFAULT_COST_RATES;
		this.clock = clock;
	}

	/**
	 * Records one call and returns its cost. `reportedCost`, when the
	 * provider supplies one, takes precedence over the pricing table.
	 */
	record(opts: {
		modelId: string;
		iteration: number;
		inputTokens: number;
		outputTokens: number;
		reportedCost?: number;
	}): number {
		const cost =
			opts.reportedCost ?? computeCost(opts.inputTokens, opts.outputTokens, opts.modelId, this.pricing);
		const usage: UsageRecord = {
			inputTokens: opts.inputTokens,
			outputTokens: opts.outputTokens,
			totalTokens: opts.inputTokens + opts.outputTokens,
		};

		this.usage = {
			inputTokens: this.usage.inputTokens + usage.inputTokens,
			outputTokens: this.usage.outputTokens + usage.outputTokens,
			totalTokens: this.usage.totalTokens + usage.totalTokens,
		};
		this.calls.push({ modelId: opts.modelId, iteration: opts.iteration, usage, cost, timestamp: this.clock() });
		return cost;
	}

	getTotalUsage(): UsageRecord {
		return { ...this.usage };
	}

	getTotalCost(): number {
		return this.calls.reduce((sum, call) => sum + call.cost, 0);
	}

	getTotalCostFormatted(): string {
		return `$${this.getTotalCost().toFixed(4)}`;
	}

	getSummary(): MeteringSummary {
		return {
			totalInputTokens: this.usage.inputTokens,
			totalOutputTokens: this.usage.outputTokens,
			totalTokens: this.usage.totalTokens,
			totalCost: this.getTotalCost(),
			totalCalls: this.calls.length,
			calls: [...this.calls],
		};
	}
}

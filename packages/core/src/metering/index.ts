export { UsageMeter, computeCost, resolveModelCost } from './meter.js';
export { BudgetTracker } from './budget.js';
export {
	DEFAULT_COST_RATES,
	type UsageRecord,
	type CostRates,
	type PricingTable,
	type CallUsageRecord,
	type MeteringSummary,
	type BudgetExceededReason,
	type BudgetLimits,
	type BudgetVerdict,
	type BudgetSnapshot,
} from './types.js';

export { Config, deepMerge } from './config.js';
export {
	type BudgetConfig,
	BudgetConfigSchema,
	type ContextConfig,
	ContextConfigSchema,
	type LoopConfig,
	LoopConfigSchema,
	type ModelConfig,
	ModelConfigSchema,
	ModelProviderSchema,
	type GlobalConfig,
	GlobalConfigSchema,
} from './types.js';

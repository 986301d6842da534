import { z } from 'zod';
import { LOG_LEVEL_NAMES } from '../types.js';

export const BudgetConfigSchema = z.object({
	maxIterations: z.number().int().min(1).default(20),
	maxTimeSeconds: z.number().positive().default(60),
	maxTokensPerCall: z.number().int().positive().default(4096),
	costLimitUsd: z.number().nonnegative().default(0.5),
});

export type BudgetConfig = z.infer<typeof BudgetConfigSchema>;

export const ContextConfigSchema = z.object({
	maxTokens: z.number().int().positive().default(8000),
	compressionThreshold: z.number().gt(0).lte(1).default(0.85),
	keepRecentMessages: z.number().int().min(1).default(6),
	/** Share of `maxTokens` a compression summary may occupy. */
	summaryShare: z.number().gt(0).lt(1).default(0.15),
});

export type ContextConfig = z.infer<typeof ContextConfigSchema>;

export const LoopConfigSchema = z.object({
	modelTimeoutMs: z.number().int().positive().default(30000),
	maxModelTimeoutRetries: z.number().int().nonnegative().default(2),
	maxThrottleRetries: z.number().int().nonnegative().default(3),
	maxConsecutiveInconclusive: z.number().int().min(1).default(3),
	maxToolPayloadChars: z.number().int().positive().default(4000),
	temperature: z.number().min(0).max(2).default(0.7),
});

export type LoopConfig = z.infer<typeof LoopConfigSchema>;

export const ModelProviderSchema = z.enum(['openai', 'anthropic', 'google']);

export const ModelConfigSchema = z.object({
	provider: ModelProviderSchema.default('openai'),
	modelId: z.string().min(1).default('gpt-4o-mini'),
});

export type ModelConfig = z.infer<typeof ModelConfigSchema>;

export const GlobalConfigSchema = z.object({
	budget: BudgetConfigSchema.default({}),
	context: ContextConfigSchema.default({}),
	loop: LoopConfigSchema.default({}),
	model: ModelConfigSchema.default({}),
	traceDir: z.string().default('./traces'),
	logLevel: z.enum(LOG_LEVEL_NAMES).default('info'),
});

export type GlobalConfig = z.infer<typeof GlobalConfigSchema>;

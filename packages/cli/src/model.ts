import type { LanguageModelV1 } from 'ai';
import { VercelChatModel, type ChatModel, type GlobalConfig } from 'sous';

export type ProviderName = GlobalConfig['model']['provider'];

export const PROVIDERS: readonly ProviderName[] = ['openai', 'anthropic', 'google'];

export function isProviderName(value: string): value is ProviderName {
	return PROVIDERS.some((provider) => provider === value);
}

/**
 * Dynamically import the provider package and create a Vercel AI SDK
 * language model. Credentials come from the provider's usual environment
 * variables (OPENAI_API_KEY, ANTHROPIC_API_KEY, GOOGLE_GENERATIVE_AI_API_KEY).
 */
async function createLanguageModel(provider: ProviderName, modelId: string): Promise<LanguageModelV1> {
	switch (provider) {
		case 'openai': {
			const { createOpenAI } = await import('@ai-sdk/openai');
			return createOpenAI({})(modelId);
		}
		case 'anthropic': {
			const { createAnthropic } = await import('@ai-sdk/anthropic');
			return createAnthropic({})(modelId);
		}
		case 'google': {
			const { createGoogleGenerativeAI } = await import('@ai-sdk/google');
			return createGoogleGenerativeAI({})(modelId);
		}
	}
}

export async function createChatModel(
	provider: ProviderName,
	modelId: string,
	settings: { temperature: number; maxTokens: number },
): Promise<ChatModel> {
	return new VercelChatModel({
		model: await createLanguageModel(provider, modelId),
		provider,
		temperature: settings.temperature,
		maxTokens: settings.maxTokens,
	});
}

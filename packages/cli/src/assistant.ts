import {
	Config,
	JsonFileTraceSink,
	OrchestrationLoop,
	createLogger,
	type DeepPartial,
	type GlobalConfig,
	type IterationEvent,
	type ToolRegistry,
} from 'sous';
import { PROVIDERS, createChatModel, isProviderName } from './model.js';
import { createKitchenRegistry } from './kitchen/tools.js';

const logger = createLogger('cli');

/** Options shared by the commands that talk to the model. */
export interface AssistantFlags {
	model?: string;
	provider?: string;
	maxIterations?: string;
	trace: boolean;
}

export function configOverrides(flags: AssistantFlags): DeepPartial<GlobalConfig> {
	const { provider } = flags;
	if (provider !== undefined && !isProviderName(provider)) {
		throw new Error(`Unsupported provider: ${provider}. Supported: ${PROVIDERS.join(', ')}`);
	}
	const maxIterations = flags.maxIterations === undefined ? undefined : Number.parseInt(flags.maxIterations, 10);
	if (maxIterations !== undefined && !(maxIterations >= 1)) {
		throw new Error(`--max-iterations must be a positive integer, got ${flags.maxIterations}`);
	}

	return {
		model: { provider, modelId: flags.model },
		budget: { maxIterations },
	};
}

export async function createAssistant(
	flags: AssistantFlags,
	options: { registry?: ToolRegistry; onIteration?: (event: IterationEvent) => void } = {},
): Promise<OrchestrationLoop> {
	const config = Config.instance(configOverrides(flags));
	const settings = config.toLoopSettings();

	const model = await createChatModel(config.model.provider, config.model.modelId, {
		temperature: settings.temperature,
		maxTokens: settings.maxTokensPerCall,
	});
	logger.debug('Model ready', { provider: config.model.provider, model: config.model.modelId });

	return new OrchestrationLoop({
		model,
		registry: options.registry ?? createKitchenRegistry(),
		settings,
		sink: flags.trace ? new JsonFileTraceSink(config.config.traceDir) : undefined,
		onIteration: options.onIteration,
	});
}

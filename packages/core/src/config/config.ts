import { config as loadDotenv } from 'dotenv';
import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs';
import { type GlobalConfig, GlobalConfigSchema } from './types.js';
import type { DeepPartial } from '../types.js';
import { parseLogLevel } from '../types.js';
import type { LoopSettings } from '../agent/types.js';
import { createLogger, errorMessage, setGlobalLogLevel } from '../logging.js';
import { SchemaViolationError } from '../errors.js';

const logger = createLogger('config');

let _instance: Config | undefined;

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberFromEnv(value: string | undefined): number | undefined {
	if (value === undefined || value.trim() === '') return undefined;
	return Number(value);
}

export function deepMerge(...objects: PlainObject[]): PlainObject {
	const result: PlainObject = {};

	for (const obj of objects) {
		for (const [key, value] of Object.entries(obj)) {
			const current = result[key];
			if (isPlainObject(value) && isPlainObject(current)) {
				result[key] = deepMerge(current, value);
			} else if (value !== undefined) {
				result[key] = value;
			}
		}
	}

	return result;
}

/**
 * Deployment-wide settings. Sources, lowest precedence first: environment
 * (after `.env` is loaded), the JSON config file, then explicit overrides.
 */
export class Config {
	readonly config: GlobalConfig;

	private constructor(overrides: DeepPartial<GlobalConfig> = {}) {
		loadDotenv();

		const merged = deepMerge(Config.fromEnv(process.env), Config.loadConfigFile(), overrides);
		const parsed = GlobalConfigSchema.safeParse(merged);
		if (!parsed.success) {
			throw new SchemaViolationError(
				'config',
				parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
			);
		}
		this.config = parsed.data;
		setGlobalLogLevel(parseLogLevel(this.config.logLevel));
	}

	static instance(overrides?: DeepPartial<GlobalConfig>): Config {
		if (!_instance) {
			_instance = new Config(overrides);
		}
		return _instance;
	}

	static reset(): void {
		_instance = undefined;
	}

	static fromEnv(env: NodeJS.ProcessEnv): PlainObject {
		return {
			budget: {
				maxIterations: numberFromEnv(env.SOUS_MAX_ITERATIONS),
				maxTimeSeconds: numberFromEnv(env.SOUS_MAX_TIME_SECONDS),
				maxTokensPerCall: numberFromEnv(env.SOUS_MAX_TOKENS_PER_CALL),
				costLimitUsd: numberFromEnv(env.SOUS_COST_LIMIT),
			},
			context: {
				maxTokens: numberFromEnv(env.SOUS_CONTEXT_MAX_TOKENS),
			},
			model: {
				provider: env.SOUS_PROVIDER || undefined,
				modelId: env.SOUS_MODEL || undefined,
			},
			traceDir: env.SOUS_TRACE_DIR || undefined,
			logLevel: env.SOUS_LOG_LEVEL?.toLowerCase() || undefined,
		};
	}

	get budget() {
		return this.config.budget;
	}

	get context() {
		return this.config.context;
	}

	get loop() {
		return this.config.loop;
	}

	get model() {
		return this.config.model;
	}

	/** Flattens the configuration into the settings struct the loop is built with. */
	toLoopSettings(): LoopSettings {
		const { budget, context, loop } = this.config;
		return {
			maxIterations: budget.maxIterations,
			maxTimeSeconds: budget.maxTimeSeconds,
			maxTokensPerCall: budget.maxTokensPerCall,
			costLimitUsd: budget.costLimitUsd,
			contextMaxTokens: context.maxTokens,
			compressionThreshold: context.compressionThreshold,
			keepRecentMessages: context.keepRecentMessages,
			summaryShare: context.summaryShare,
			modelTimeoutMs: loop.modelTimeoutMs,
			maxModelTimeoutRetries: loop.maxModelTimeoutRetries,
			maxThrottleRetries: loop.maxThrottleRetries,
			maxConsecutiveInconclusive: loop.maxConsecutiveInconclusive,
			maxToolPayloadChars: loop.maxToolPayloadChars,
			temperature: loop.temperature,
		};
	}

	static get configDir(): string {
		return path.join(os.homedir(), '.sous');
	}

	static get configFilePath(): string {
		return process.env.SOUS_CONFIG_FILE || path.join(Config.configDir, 'config.json');
	}

	static loadConfigFile(filePath = Config.configFilePath): PlainObject {
		if (!fs.existsSync(filePath)) return {};
		try {
			const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
			if (!isPlainObject(parsed)) {
				logger.warn('Ignoring config file: top level is not an object', { path: filePath });
				return {};
			}
			logger.debug('Loaded config file', { path: filePath });
			return parsed;
		} catch (error) {
			logger.warn(`Failed to load config file: ${errorMessage(error)}`, { path: filePath });
			return {};
		}
	}
}

import { LogLevel } from './types.js';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

const LEVEL_NAMES: Record<number, string> = {
	[LogLevel.DEBUG]: 'DEBUG',
	[LogLevel.INFO]: 'INFO',
	[LogLevel.WARN]: 'WARN',
	[LogLevel.ERROR]: 'ERROR',
};

const LEVEL_COLORS: Record<number, string> = {
	[LogLevel.DEBUG]: '\x1b[36m', // cyan
	[LogLevel.INFO]: '\x1b[32m',  // green
	[LogLevel.WARN]: '\x1b[33m',  // yellow
	[LogLevel.ERROR]: '\x1b[31m', // red
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';

let globalLevel: LogLevel = LogLevel.INFO;
let useColors = process.stdout.isTTY === true;
let logTimestamps = true;

export function setGlobalLogLevel(level: LogLevel): void {
	globalLevel = level;
}

export function setLogColors(enabled: boolean): void {
	useColors = enabled;
}

export function setLogTimestamps(enabled: boolean): void {
	logTimestamps = enabled;
}

function formatTimestamp(): string {
	const now = new Date();
	const h = now.getHours().toString().padStart(2, '0');
	const m = now.getMinutes().toString().padStart(2, '0');
	const s = now.getSeconds().toString().padStart(2, '0');
	const ms = now.getMilliseconds().toString().padStart(3, '0');
	return `${h}:${m}:${s}.${ms}`;
}

/** Renders `key=value` pairs, quoting values that contain whitespace. */
export function formatFields(fields: LogFields): string {
	const pairs: string[] = [];
	for (const [key, value] of Object.entries(fields)) {
		if (value === undefined) continue;
		const text = String(value);
		pairs.push(/\s/.test(text) ? `${key}=${JSON.stringify(text)}` : `${key}=${text}`);
	}
	return pairs.join(' ');
}

function formatLine(
	level: LogLevel,
	name: string,
	message: string,
	fields?: LogFields,
): string {
	const parts: string[] = [];

	if (logTimestamps) {
		const ts = formatTimestamp();
		parts.push(useColors ? `${DIM}${ts}${RESET}` : ts);
	}

	const levelName = LEVEL_NAMES[level] ?? 'UNKNOWN';
	const color = LEVEL_COLORS[level] ?? '';

	if (useColors) {
		parts.push(`${color}${levelName.padEnd(5)}${RESET}`);
		parts.push(`${BOLD}[${name}]${RESET}`);
	} else {
		parts.push(levelName.padEnd(5));
		parts.push(`[${name}]`);
	}

	parts.push(message);

	if (fields) {
		const rendered = formatFields(fields);
		if (rendered) parts.push(useColors ? `${DIM}${rendered}${RESET}` : rendered);
	}

	return parts.join(' ');
}

export class Logger {
	readonly name: string;
	private level: LogLevel | null = null;

	constructor(name: string) {
		this.name = name;
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	getEffectiveLevel(): LogLevel {
		return this.level ?? globalLevel;
	}

	isEnabled(level: LogLevel): boolean {
		return level >= this.getEffectiveLevel();
	}

	debug(message: string, fields?: LogFields): void {
		this.log(LogLevel.DEBUG, message, fields);
	}

	info(message: string, fields?: LogFields): void {
		this.log(LogLevel.INFO, message, fields);
	}

	warn(message: string, fields?: LogFields): void {
		this.log(LogLevel.WARN, message, fields);
	}

	error(message: string, fields?: LogFields): void {
		this.log(LogLevel.ERROR, message, fields);
	}

	private log(level: LogLevel, message: string, fields?: LogFields): void {
		if (!this.isEnabled(level)) return;

		const formatted = formatLine(level, this.name, message, fields);

		switch (level) {
			case LogLevel.ERROR:
				console.error(formatted);
				break;
			case LogLevel.WARN:
				console.warn(formatted);
				break;
			default:
				console.log(formatted);
		}
	}
}

const loggerCache = new Map<string, Logger>();

export function createLogger(name: string): Logger {
	let logger = loggerCache.get(name);
	if (!logger) {
		logger = new Logger(name);
		loggerCache.set(name, logger);
	}
	return logger;
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

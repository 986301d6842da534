import chalk from 'chalk';
import type { IterationRecord, TerminationReason, Trace, ToolResult } from 'sous';

// ── Spinner ──

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export class Spinner {
	private intervalId: ReturnType<typeof setInterval> | null = null;
	private frameIndex = 0;
	private message: string;

	constructor(message: string) {
		this.message = message;
	}

	start(): void {
		if (this.intervalId || !process.stdout.isTTY) return;
		this.frameIndex = 0;

		this.intervalId = setInterval(() => {
			const frame = SPINNER_FRAMES[this.frameIndex % SPINNER_FRAMES.length];
			process.stdout.write(`\r${chalk.cyan(frame)} ${this.message}`);
			this.frameIndex++;
		}, 80);
	}

	update(message: string): void {
		this.message = message;
	}

	stop(finalMessage?: string): void {
		if (this.intervalId) {
			clearInterval(this.intervalId);
			this.intervalId = null;
			process.stdout.write('\r\x1b[K');
		}
		if (finalMessage) {
			console.log(finalMessage);
		}
	}
}

// ── Iterations ──

const OUTCOME_LABELS: Record<IterationRecord['outcome'], string> = {
	tool_calls: 'tools',
	final_message: 'answer',
	inconclusive: 'no decision',
	model_timeout: 'timed out',
	model_error: 'model failed',
};

function describeResult(result: ToolResult): string {
	return result.success
		? `${chalk.green('✓')} ${result.toolName} ${chalk.dim(`${result.metadata.durationMs.toFixed(0)}ms`)}`
		: `${chalk.red('✗')} ${result.toolName} ${chalk.red(`${result.errorKind}: ${result.message}`)}`;
}

/** Lines shown for one iteration in verbose mode. */
export function describeIteration(record: IterationRecord): string[] {
	const ok = record.outcome === 'tool_calls' || record.outcome === 'final_message';
	const header =
		`${chalk.bold.white(`Step ${record.index + 1}`)} ` +
		`${ok ? chalk.green(OUTCOME_LABELS[record.outcome]) : chalk.yellow(OUTCOME_LABELS[record.outcome])} ` +
		chalk.dim(`${record.durationMs.toFixed(0)}ms`);

	const lines = [header];
	if (record.reasoning) {
		const preview = record.reasoning.length > 120 ? `${record.reasoning.slice(0, 120)}...` : record.reasoning;
		lines.push(`  ${chalk.dim('thinking:')} ${preview}`);
	}
	for (const result of record.toolResults) {
		lines.push(`  ${describeResult(result)}`);
	}
	return lines;
}

export function displayIteration(record: IterationRecord): void {
	for (const line of describeIteration(record)) {
		console.log(line);
	}
}

// ── Summary ──

const REASON_LABELS: Record<TerminationReason, string> = {
	final_message: 'answered',
	iteration_limit: 'step limit reached',
	time_limit: 'time limit reached',
	cost_limit: 'cost limit reached',
	parse_failure: 'no usable reply',
	fatal_error: 'failed',
};

export function describeTermination(reason: TerminationReason): string {
	return REASON_LABELS[reason];
}

/** Summary block printed after a run. */
export function describeTrace(trace: Trace): string[] {
	const rows: Array<[string, string]> = [
		['Outcome:', describeTermination(trace.terminationReason)],
		['Steps:', String(trace.iterations.length)],
		['Tool calls:', String(trace.totalToolCalls)],
		['Duration:', `${(trace.totalDurationMs / 1000).toFixed(1)}s`],
		['Input tokens:', trace.usage.inputTokens.toLocaleString('en-US')],
		['Output tokens:', trace.usage.outputTokens.toLocaleString('en-US')],
		['Total cost:', `$${trace.totalCost.toFixed(4)}`],
	];
	if (trace.error) rows.push(['Error:', trace.error]);

	return [
		chalk.bold('Summary'),
		chalk.dim('─'.repeat(50)),
		...rows.map(([label, value]) => `  ${chalk.white(label.padEnd(15))}${value}`),
		chalk.dim('─'.repeat(50)),
	];
}

export function displayTraceSummary(trace: Trace): void {
	console.log('');
	for (const line of describeTrace(trace)) {
		console.log(line);
	}
}

// ── Answer ──

export function displayAnswer(answer: string, reason: TerminationReason): void {
	console.log('');
	console.log(reason === 'final_message' ? answer : chalk.yellow(answer));
}

// ── Helpers ──

export function displayError(message: string): void {
	console.error(chalk.red('Error:'), message);
}

export function displayInfo(message: string): void {
	console.log(chalk.blue('Info:'), message);
}

export function displaySeparator(): void {
	console.log(chalk.dim('─'.repeat(60)));
}

import * as readline from 'node:readline';
import type { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from 'sous';
import { createAssistant, type AssistantFlags } from '../assistant.js';
import { ChatSession, parseSlashCommand } from '../session.js';
import {
	Spinner,
	displayAnswer,
	displayError,
	displayInfo,
	displayIteration,
	displaySeparator,
} from '../display.js';

interface ChatOptions extends AssistantFlags {
	verbose: boolean;
	about?: string;
	turns: string;
}

/**
 * Conversational session: each line is one run of the loop, seeded with the
 * last few answered turns.
 */
export function registerChatCommand(program: Command): void {
	program
		.command('chat')
		.alias('repl')
		.description('Start an interactive meal-planning conversation')
		.option('-m, --model <model>', 'Model ID to use')
		.option('-p, --provider <provider>', 'LLM provider (openai, anthropic, google)')
		.option('--max-iterations <n>', 'Maximum number of model calls per message')
		.option('--about <text>', 'Facts about you the assistant should take into account')
		.option('--turns <n>', 'Earlier turns kept as context', '5')
		.option('-v, --verbose', 'Show each step', false)
		.option('--no-trace', 'Do not write run traces to disk')
		.action(async (options: ChatOptions) => {
			const spinner = new Spinner('Thinking...');

			try {
				const assistant = await createAssistant(options, {
					onIteration: ({ record }) => {
						if (!options.verbose) return;
						spinner.stop();
						displayIteration(record);
						spinner.start();
					},
				});
				const session = new ChatSession(Number.parseInt(options.turns, 10) || 5);

				console.log(chalk.bold.white('Sous meal-planning chat'));
				console.log(chalk.dim('Type /help for commands, /quit to exit. Ctrl+C cancels a running request.'));
				displaySeparator();

				const rl = readline.createInterface({
					input: process.stdin,
					output: process.stdout,
					prompt: chalk.cyan('you> '),
					terminal: process.stdin.isTTY === true,
				});

				let running: AbortController | undefined;
				rl.on('SIGINT', () => {
					if (running) {
						running.abort();
					} else {
						rl.close();
					}
				});

				rl.prompt();
				for await (const line of rl) {
					const message = line.trim();
					const command = parseSlashCommand(message);

					if (command === 'quit') break;
					if (command === 'help') {
						printHelp();
					} else if (command === 'reset') {
						session.reset();
						displayInfo('Conversation history cleared.');
					} else if (command === 'unknown') {
						console.log(chalk.yellow(`Unknown command: ${message}`));
					} else if (message) {
						running = new AbortController();
						spinner.start();
						const result = await assistant.run(message, {
							history: session.history,
							userContext: options.about,
							signal: running.signal,
						});
						spinner.stop();
						running = undefined;

						displayAnswer(result.answer, result.terminationReason);
						session.record(message, result);
						console.log('');
					}

					rl.prompt();
				}

				rl.close();
				process.exit(0);
			} catch (error) {
				spinner.stop();
				displayError(errorMessage(error));
				process.exit(1);
			}
		});
}

function printHelp(): void {
	console.log(chalk.bold('Available commands:'));
	const commands = [
		['/help', 'Show this help message'],
		['/reset', 'Forget earlier turns'],
		['/quit', 'Exit the session'],
	];
	for (const [cmd, desc] of commands) {
		console.log(`  ${chalk.cyan(cmd.padEnd(10))} ${desc}`);
	}
}

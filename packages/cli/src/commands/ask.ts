import type { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from 'sous';
import { createAssistant, type AssistantFlags } from '../assistant.js';
import {
	Spinner,
	displayAnswer,
	displayError,
	displayIteration,
	displayTraceSummary,
} from '../display.js';

interface AskOptions extends AssistantFlags {
	verbose: boolean;
	about?: string;
}

export function registerAskCommand(program: Command): void {
	program
		.command('ask')
		.description('Ask the assistant one question and print its answer')
		.argument('<message>', 'What you want help with')
		.option('-m, --model <model>', 'Model ID to use')
		.option('-p, --provider <provider>', 'LLM provider (openai, anthropic, google)')
		.option('--max-iterations <n>', 'Maximum number of model calls')
		.option('--about <text>', 'Facts about you the assistant should take into account')
		.option('-v, --verbose', 'Show each step and a run summary', false)
		.option('--no-trace', 'Do not write the run trace to disk')
		.action(async (message: string, options: AskOptions) => {
			const spinner = new Spinner('Thinking...');

			try {
				const assistant = await createAssistant(options, {
					onIteration: ({ record }) => {
						spinner.update(`Step ${record.index + 2}: thinking...`);
						if (options.verbose) {
							spinner.stop();
							displayIteration(record);
							spinner.start();
						}
					},
				});

				spinner.start();
				const result = await assistant.run(message, { userContext: options.about });
				spinner.stop();

				displayAnswer(result.answer, result.terminationReason);
				if (options.verbose) {
					displayTraceSummary(result.trace);
				}
				if (options.trace) {
					console.log(chalk.dim(`\ntrace: ${result.conversationId}`));
				}

				process.exit(result.terminationReason === 'final_message' ? 0 : 1);
			} catch (error) {
				spinner.stop();
				displayError(errorMessage(error));
				process.exit(1);
			}
		});
}

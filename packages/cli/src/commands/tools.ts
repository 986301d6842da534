import type { Command } from 'commander';
import chalk from 'chalk';
import { createKitchenRegistry } from '../kitchen/tools.js';

interface ToolsOptions {
	category?: string[];
	json: boolean;
}

export function registerToolsCommand(program: Command): void {
	program
		.command('tools')
		.description('List the tools the assistant can call')
		.option('-c, --category <names...>', 'Only show tools in these categories')
		.option('--json', 'Print the JSON schemas sent to the model', false)
		.action((options: ToolsOptions) => {
			const registry = createKitchenRegistry();
			const schemas = registry.exportSchema(options.category);

			if (options.json) {
				console.log(JSON.stringify(schemas, null, 2));
				return;
			}
			if (schemas.length === 0) {
				console.log(chalk.dim(`No tools in ${options.category?.join(', ')}.`));
				console.log(chalk.dim(`Categories: ${registry.categories().join(', ')}`));
				return;
			}
			console.log(registry.describe(options.category));
		});
}

#!/usr/bin/env tsx
import { Command } from 'commander';
import { setLogColors, setLogTimestamps } from 'sous';
import { registerAskCommand } from './commands/ask.js';
import { registerChatCommand } from './commands/chat.js';
import { registerToolsCommand } from './commands/tools.js';

const program = new Command();

program
	.name('sous')
	.description('Meal-planning assistant that plans with tools before it answers')
	.version('0.1.0')
	.option('--no-color', 'disable colored log output')
	.option('--no-log-timestamps', 'omit timestamps from log lines')
	.hook('preAction', (command) => {
		const opts = command.opts<{ color: boolean; logTimestamps: boolean }>();
		if (!opts.color) setLogColors(false);
		setLogTimestamps(opts.logTimestamps);
	});

// ── Conversation commands ──
registerAskCommand(program);
registerChatCommand(program);

// ── Catalog ──
registerToolsCommand(program);

await program.parseAsync();

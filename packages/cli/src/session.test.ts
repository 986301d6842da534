import { test, expect, describe } from 'vitest';
import { ChatSession, parseSlashCommand } from './session.js';

describe('ChatSession', () => {
	test('keeps answered turns as user and assistant messages', () => {
		const session = new ChatSession();
		session.record('Dinner ideas?', { answer: 'Try the curry.', terminationReason: 'final_message' });

		expect(session.history).toEqual([
			{ role: 'user', content: 'Dinner ideas?' },
			{ role: 'assistant', content: 'Try the curry.' },
		]);
	});

	test('skips turns that did not end in an answer', () => {
		const session = new ChatSession();
		session.record('Dinner ideas?', { answer: 'Sorry.', terminationReason: 'fatal_error' });

		expect(session.turnCount).toBe(0);
	});

	test('keeps only the most recent turns', () => {
		const session = new ChatSession(2);
		for (const n of [1, 2, 3]) {
			session.record(`q${n}`, { answer: `a${n}`, terminationReason: 'final_message' });
		}

		expect(session.history.map((m) => m.content)).toEqual(['q2', 'a2', 'q3', 'a3']);
	});

	test('reset forgets everything', () => {
		const session = new ChatSession();
		session.record('q', { answer: 'a', terminationReason: 'final_message' });
		session.reset();

		expect(session.history).toEqual([]);
	});
});

describe('parseSlashCommand', () => {
	test.each([
		['/help', 'help'],
		[' /RESET ', 'reset'],
		['/q', 'quit'],
		['/dance', 'unknown'],
	])('%s -> %s', (line, expected) => {
		expect(parseSlashCommand(line)).toBe(expected);
	});

	test('ordinary messages are not commands', () => {
		expect(parseSlashCommand('what about 1/2 a cup?')).toBeUndefined();
	});
});

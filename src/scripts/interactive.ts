import * as readline from 'node:readline/promises';

/**
 * Asks a yes/no question on the terminal.
 *
 * @param prompt The question, e.g. `'Lock User:Example? [y/N]: '`.
 * @returns `true` only if the answer starts with "y".
 * @throws If stdin is not a TTY.
 */
export async function confirm(prompt: string): Promise<boolean> {
	if (!process.stdin.isTTY) {
		throw new Error('TTY is required for interactive input.');
	}
	const rl = readline.createInterface({
		input: process.stdin,
		output: process.stdout
	});
	try {
		const answer = await rl.question(prompt);
		return /^y/i.test(answer.trim());
	} finally {
		rl.close();
	}
}

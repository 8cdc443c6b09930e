import { parseArgs } from 'node:util';
import type { HideLevel } from '../steward/actions';
import { errorMessage } from '../steward/errors';

export const USAGE = `Usage: npm run steward -- <command> <target> [options]

Commands:
  gblock <ip|range>     Globally block an IP or range
  gunblock <ip|range>   Remove a global block
  lock <user>           Lock a global account
  unlock <user>         Unlock a global account

Options:
  --reason <text>       Log reason
  --expiry <duration>   Block expiry (gblock only)
  --anon-only           Block anonymous users only (gblock only)
  --hide <0|1|2>        How hard to hide the account (lock/unlock only)
  --yes                 Don't ask for confirmation`;

export type Command = 'gblock' | 'gunblock' | 'lock' | 'unlock';

const COMMANDS: Command[] = ['gblock', 'gunblock', 'lock', 'unlock'];

/**
 * Options each command takes, besides `--reason` and `--yes`.
 */
const COMMAND_OPTIONS: Record<Command, string[]> = {
	gblock: ['expiry', 'anon-only'],
	gunblock: [],
	lock: ['hide'],
	unlock: ['hide']
};

export interface CommandLine {
	command: Command;
	target: string;
	reason?: string;
	expiry?: string;
	anonOnly?: boolean;
	hide?: HideLevel;
	yes: boolean;
}

/**
 * A command line that can't be run. The message is printed above the usage text.
 */
export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'UsageError';
	}
}

function isCommand(value: string): value is Command {
	return COMMANDS.some((command) => command === value);
}

function parseHide(value: string | undefined): HideLevel | undefined {
	switch (value) {
		case undefined: return undefined;
		case '0': return 0;
		case '1': return 1;
		case '2': return 2;
		default: throw new UsageError(`--hide must be 0, 1 or 2, but got "${value}".`);
	}
}

function parse(args: string[]) {
	try {
		return parseArgs({
			args,
			allowPositionals: true,
			options: {
				reason: { type: 'string' },
				expiry: { type: 'string' },
				'anon-only': { type: 'boolean' },
				hide: { type: 'string' },
				yes: { type: 'boolean', short: 'y' }
			}
		});
	} catch (err) {
		// Unknown options and missing option values
		throw new UsageError(errorMessage(err));
	}
}

/**
 * Parses the arguments of the steward script, without the leading `node` and script paths.
 *
 * @throws {UsageError} On an unknown command or option, a missing target, a bad `--hide`,
 * or an option the command doesn't take.
 */
export function parseCommandLine(args: string[]): CommandLine {
	const { values, positionals } = parse(args);

	const [command, target] = positionals;
	if (!command || !isCommand(command)) {
		throw new UsageError(command ? `Unknown command "${command}".` : 'No command given.');
	}
	if (!target) {
		throw new UsageError(`"${command}" needs a target.`);
	}
	if (positionals.length > 2) {
		throw new UsageError(`Unexpected argument "${positionals[2]}".`);
	}

	const allowed = COMMAND_OPTIONS[command];
	for (const name of ['expiry', 'anon-only', 'hide'] as const) {
		if (values[name] !== undefined && !allowed.includes(name)) {
			throw new UsageError(`--${name} can't be used with "${command}".`);
		}
	}

	return {
		command,
		target,
		reason: values.reason,
		expiry: values.expiry,
		anonOnly: values['anon-only'],
		hide: parseHide(values.hide),
		yes: values.yes ?? false
	};
}

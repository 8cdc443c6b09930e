// npm run steward -- <gblock|gunblock|lock|unlock> <target> [options]

import { loadConfig } from '../config';
import { createSteward } from '../index';
import type { HttpResponse } from '../steward/host';
import type { Steward } from '../steward/steward';
import { type CommandLine, USAGE, UsageError, parseCommandLine } from './args';
import { confirm } from './interactive';

async function run(steward: Steward, cmd: CommandLine): Promise<HttpResponse | null> {
	const { target, reason } = cmd;
	switch (cmd.command) {
		case 'gblock':
			return steward.gBlock({ ip: target, reason, expiry: cmd.expiry, anonOnly: cmd.anonOnly });
		case 'gunblock':
			return steward.gUnblock({ ip: target, reason });
		case 'lock':
			return steward.caLock({ user: target, reason, hide: cmd.hide });
		case 'unlock':
			return steward.caUnlock({ user: target, reason, hide: cmd.hide });
	}
}

async function main(): Promise<number> {
	let cmd: CommandLine;
	try {
		cmd = parseCommandLine(process.argv.slice(2));
	} catch (err) {
		if (err instanceof UsageError) {
			console.error(`${err.message}\n\n${USAGE}`);
			return 2;
		}
		throw err;
	}
	const { command, target } = cmd;

	if (!cmd.yes && !await confirm(`Run "${command}" on ${target}? [y/N]: `)) {
		console.log('Cancelled.');
		return 1;
	}

	const steward = await createSteward(loadConfig());
	const res = await run(steward, cmd);
	if (!res) {
		console.log('Failed.');
		return 1;
	}
	console.log(`Done: ${command} ${target}`);
	return 0;
}

main().then((code) => {
	process.exitCode = code;
}).catch((err) => {
	console.error(err);
	process.exitCode = 1;
});

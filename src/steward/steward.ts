import type { HttpResponse, StewardHost } from './host';
import type { ScrapeResult } from './scrape';
import {
	type AccountLockInput,
	type GlobalBlockInput,
	type GlobalUnblockInput,
	accountLock,
	accountUnlock,
	globalBlock,
	globalUnblock
} from './actions';

/**
 * Steward functions bound to a host.
 *
 * Every method resolves with the response of the form submission, or with `null` after
 * logging a warning if anything went wrong. Check the return value before assuming success.
 *
 * ```ts
 * const steward = new Steward(host);
 * await steward.gBlock({ ip: '192.0.2.1', anonOnly: true, reason: 'bloody vandals...' });
 * await steward.caLock('Example');
 * ```
 *
 * *None of the methods reject*.
 */
export class Steward {

	readonly host: StewardHost;

	constructor(host: StewardHost) {
		this.host = host;
	}

	/**
	 * Places a global block on an IP or IP range. See {@link globalBlock}.
	 */
	gBlock(input: GlobalBlockInput): Promise<HttpResponse | null> {
		return settle(globalBlock(this.host, input));
	}

	/**
	 * Removes the global block affecting an IP or range. See {@link globalUnblock}.
	 */
	gUnblock(input: GlobalUnblockInput): Promise<HttpResponse | null> {
		return settle(globalUnblock(this.host, input));
	}

	/**
	 * Locks a global account. See {@link accountLock}.
	 */
	caLock(input: AccountLockInput): Promise<HttpResponse | null> {
		return settle(accountLock(this.host, input));
	}

	/**
	 * Unlocks a global account. See {@link accountUnlock}.
	 */
	caUnlock(input: AccountLockInput): Promise<HttpResponse | null> {
		return settle(accountUnlock(this.host, input));
	}

}

async function settle(pending: Promise<ScrapeResult>): Promise<HttpResponse | null> {
	const result = await pending;
	if (!result.ok) {
		console.warn(`${result.error.name} (${result.error.code}): ${result.error.message}`);
		return null;
	}
	return result.response;
}

/**
 * @module
 *
 * The four steward actions. Each takes either the bare target (an IP or a username), in which
 * case every other setting falls back to its default, or an options object overriding any of
 * the defaults.
 *
 * All functions here resolve with a {@link ScrapeResult} and never reject.
 */

import type { FormFields, StewardHost } from './host';
import { type NormalizedAddress, normalizeAddress } from './address';
import { StewardError, errorMessage } from './errors';
import { type ScrapeResult, failure } from './scrape';
import { DEFAULT_EXTRA_QUERY, screenscrapePut } from './screenscrape';

// ------------------------------ Global block ------------------------------

export interface GlobalBlockOptions {
	/** A single IP, a CIDR range, or a `start-end` range. */
	ip: string;
	/** Whether to block anonymous users only. */
	anonOnly?: boolean;
	reason?: string;
	expiry?: string;
}

export const GLOBAL_BLOCK_DEFAULTS = {
	anonOnly: false,
	reason: 'cross-wiki abuse',
	expiry: '31 hours'
} as const;

export type GlobalBlockInput = string | GlobalBlockOptions;

export function globalBlockRequest(input: GlobalBlockInput): Required<GlobalBlockOptions> {
	const options = typeof input === 'string' ? { ip: input } : input;
	return {
		ip: options.ip,
		anonOnly: options.anonOnly ?? GLOBAL_BLOCK_DEFAULTS.anonOnly,
		reason: options.reason ?? GLOBAL_BLOCK_DEFAULTS.reason,
		expiry: options.expiry ?? GLOBAL_BLOCK_DEFAULTS.expiry
	};
}

/**
 * Builds the fields for `Special:GlobalBlock`.
 */
export function globalBlockFields(input: GlobalBlockInput): { fields: FormFields; address: NormalizedAddress } {
	const request = globalBlockRequest(input);
	const address = normalizeAddress(request.ip);
	return {
		fields: {
			wpAddress: address.address,
			wpExpiryOther: request.expiry,
			wpReason: request.reason,
			wpAnonOnly: request.anonOnly
		},
		address
	};
}

/**
 * Checks a normalized address, warning about it if it's malformed.
 *
 * @returns A failure if the address is malformed and the site is in strict mode, otherwise `null`.
 */
function checkAddress(host: StewardHost, address: NormalizedAddress): ScrapeResult | null {
	if (address.valid) {
		return null;
	}
	const message = `Invalid IP ${address.input}`;
	if (host.site.strictAddresses) {
		return failure(new StewardError('invalidaddress', message));
	}
	console.warn(message);
	return null;
}

/**
 * Places a global block on an IP or IP range.
 *
 * ```ts
 * await globalBlock(host, {
 * 	ip: '192.0.2.1',
 * 	anonOnly: true,
 * 	reason: 'silly vandals',
 * 	expiry: '1 week'
 * });
 * // Or, use the defaults
 * await globalBlock(host, '192.0.2.0-192.0.2.255');
 * ```
 */
export async function globalBlock(host: StewardHost, input: GlobalBlockInput): Promise<ScrapeResult> {
	const { fields, address } = globalBlockFields(input);
	const invalid = checkAddress(host, address);
	if (invalid) {
		return invalid;
	}
	return screenscrapePut(host, 'Special:GlobalBlock', fields, true);
}

// ------------------------------ Global unblock ------------------------------

export interface GlobalUnblockOptions {
	/**
	 * The IP or range to unblock. Ranges don't need to be converted into the CIDR that was
	 * blocked; the block actually in effect is looked up.
	 */
	ip: string;
	reason?: string;
}

export const GLOBAL_UNBLOCK_DEFAULTS = {
	reason: 'Removing obsolete block'
} as const;

export type GlobalUnblockInput = string | GlobalUnblockOptions;

export function globalUnblockRequest(input: GlobalUnblockInput): Required<GlobalUnblockOptions> {
	const options = typeof input === 'string' ? { ip: input } : input;
	return {
		ip: options.ip,
		reason: options.reason ?? GLOBAL_UNBLOCK_DEFAULTS.reason
	};
}

/**
 * Removes the global block affecting an IP or range.
 *
 * When a range block is placed, the range gets normalized by the wiki, so what the caller
 * blocked is not necessarily what is in effect. For ranges and CIDRs, the range block
 * affecting the first address is looked up and that block is removed. Blocks on single
 * addresses inside the range are left alone.
 */
export async function globalUnblock(host: StewardHost, input: GlobalUnblockInput): Promise<ScrapeResult> {
	const request = globalUnblockRequest(input);
	const address = normalizeAddress(request.ip);
	const invalid = checkAddress(host, address);
	if (invalid) {
		return invalid;
	}

	let target = address.address;
	if (address.start !== null) {
		let found: string | null;
		try {
			found = await host.getGlobalBlockTarget(address.start, address.cidr);
		} catch (err) {
			return failure(new StewardError('http', `Failed to look up global blocks on ${address.start}: ${errorMessage(err)}`));
		}
		if (!found) {
			return failure(new StewardError('notfound', `Couldn't find the matching rangeblock for ${request.ip}`));
		}
		target = found;
	}

	return screenscrapePut(host, 'Special:GlobalUnblock', {
		address: target,
		wpReason: request.reason
	}, true);
}

// ------------------------------ Account lock ------------------------------

/**
 * How hard to hide an account: not at all, from public lists, or oversighted.
 */
export type HideLevel = 0 | 1 | 2;

export interface AccountLockOptions {
	/** The username, with or without a `User:` prefix. */
	user: string;
	/** Whether to lock (`true`) or unlock (`false`) the account. */
	lock?: boolean;
	hide?: HideLevel;
	reason?: string;
}

export const ACCOUNT_LOCK_DEFAULTS = {
	lock: true,
	hide: 0,
	reason: 'cross-wiki abuse'
} as const;

export const ACCOUNT_UNLOCK_DEFAULTS = {
	lock: false,
	hide: 0,
	reason: 'Removing obsolete account lock'
} as const;

export type AccountLockInput = string | AccountLockOptions;

function accountRequest(
	input: AccountLockInput,
	defaults: typeof ACCOUNT_LOCK_DEFAULTS | typeof ACCOUNT_UNLOCK_DEFAULTS
): Required<AccountLockOptions> {
	const options = typeof input === 'string' ? { user: input } : input;
	return {
		user: options.user,
		lock: options.lock ?? defaults.lock,
		hide: options.hide ?? defaults.hide,
		reason: options.reason ?? defaults.reason
	};
}

export function accountLockRequest(input: AccountLockInput): Required<AccountLockOptions> {
	return accountRequest(input, ACCOUNT_LOCK_DEFAULTS);
}

export function accountUnlockRequest(input: AccountLockInput): Required<AccountLockOptions> {
	return accountRequest(input, ACCOUNT_UNLOCK_DEFAULTS);
}

/**
 * Converts a username into the form used in `Special:CentralAuth` URLs.
 */
export function centralAuthTarget(user: string): string {
	return user.trim().replace(/^User:/i, '').replace(/ /g, '_');
}

/**
 * Builds the fields for `Special:CentralAuth` from a fully populated request.
 */
export function accountLockFields(request: Required<AccountLockOptions>): FormFields {
	return {
		wpStatusLocked: request.lock ? 1 : 0,
		wpStatusHidden: request.hide,
		wpReason: request.reason
	};
}

function submitAccountStatus(host: StewardHost, request: Required<AccountLockOptions>): Promise<ScrapeResult> {
	const target = encodeURIComponent(centralAuthTarget(request.user));
	return screenscrapePut(
		host,
		'Special:CentralAuth',
		accountLockFields(request),
		true,
		`&target=${target}${DEFAULT_EXTRA_QUERY}`
	);
}

/**
 * Locks (and optionally hides) a global account.
 *
 * If only a username is passed, the account is locked but not hidden, with the default reason.
 */
export function accountLock(host: StewardHost, input: AccountLockInput): Promise<ScrapeResult> {
	return submitAccountStatus(host, accountLockRequest(input));
}

/**
 * Same as {@link accountLock}, but the account is unlocked unless `lock` is specified.
 */
export function accountUnlock(host: StewardHost, input: AccountLockInput): Promise<ScrapeResult> {
	return submitAccountStatus(host, accountUnlockRequest(input));
}

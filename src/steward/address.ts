/**
 * @module
 *
 * Normalization of user-supplied address expressions (a single IP, a `start-end` range,
 * or a CIDR block) into the form submitted to `Special:GlobalBlock`.
 */

import { IP } from 'ip-wiki';

export interface NormalizedAddress {
	/** The trimmed expression as given. */
	input: string;
	/**
	 * The value to submit. For ranges this is the covering CIDR; otherwise the input itself,
	 * which is also what gets submitted when the expression is invalid.
	 */
	address: string;
	/** The canonical CIDR covering the expression, or `null` if it couldn't be parsed. */
	cidr: string | null;
	/** The first address of a range or CIDR expression. `null` for single addresses. */
	start: string | null;
	valid: boolean;
}

/**
 * Parses a single address (no range, no prefix) with ip-wiki.
 *
 * @returns `null` if the string is not a single valid address.
 */
function parseAddress(address: string): IP | null {
	if (!address || address.includes('/')) {
		return null;
	}
	return IP.newFromText(address);
}

function bitsOf(version: 4 | 6): number {
	return version === 4 ? 32 : 128;
}

/**
 * Converts a parsed address into an unsigned integer.
 */
function toBigInt(ip: IP): bigint {
	// Octets for IPv4, hextets for IPv6
	const width = BigInt(ip.version === 4 ? 8 : 16);
	return ip.getProperties().first.reduce((acc, part) => (acc << width) + BigInt(part), BigInt(0));
}

/**
 * Computes the smallest CIDR block that contains every address from `start` to `end`.
 *
 * @param start The first address of the range.
 * @param end The last address of the range.
 * @returns The abbreviated CIDR string, or `null` if either end is invalid, the IP versions
 * differ, or `start` is greater than `end`.
 */
export function rangeToCidr(start: string, end: string): string | null {
	const firstIp = parseAddress(start);
	const lastIp = parseAddress(end);
	if (!firstIp || !lastIp || firstIp.version !== lastIp.version) {
		return null;
	}
	const first = toBigInt(firstIp);
	const last = toBigInt(lastIp);
	if (first > last) {
		return null;
	}

	let hostBits = 0;
	for (let diff = first ^ last; diff > BigInt(0); diff >>= BigInt(1)) {
		hostBits++;
	}
	// newFromRange masks off the host bits
	const cidr = IP.newFromRange(start, bitsOf(firstIp.version) - hostBits);
	return cidr && cidr.abbreviate();
}

/**
 * Normalizes an address expression for submission to the global block form.
 *
 * - `start-end` ranges are converted into the smallest covering CIDR.
 * - CIDRs (`addr/N`) are kept as they are, and the pre-suffix address is remembered
 *   as `start` so that the block actually in effect can be looked up later.
 * - Single addresses are submitted as they are, and are treated as a `/32` (or `/128`) block.
 *
 * Invalid expressions are not rejected; the returned object has `valid: false` and the
 * unmodified input as its `address`.
 */
export function normalizeAddress(expression: string): NormalizedAddress {
	const input = expression.trim();

	const hyphen = input.indexOf('-');
	if (hyphen !== -1) {
		const start = input.slice(0, hyphen).trim();
		const end = input.slice(hyphen + 1).trim();
		const cidr = rangeToCidr(start, end);
		return {
			input,
			address: cidr ?? input,
			cidr,
			start: parseAddress(start) ? start : null,
			valid: cidr !== null
		};
	}

	const m = input.match(/^(.+)\/(\d{1,3})$/);
	if (m) {
		const start = m[1];
		const prefix = parseInt(m[2], 10);
		const ip = parseAddress(start);
		const valid = ip !== null && prefix <= bitsOf(ip.version);
		return {
			input,
			address: input,
			cidr: valid ? input : null,
			start,
			valid
		};
	}

	const ip = parseAddress(input);
	return {
		input,
		address: input,
		cidr: ip ? `${input}/${bitsOf(ip.version)}` : null,
		start: null,
		valid: ip !== null
	};
}

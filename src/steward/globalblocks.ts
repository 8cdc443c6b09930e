import type { Mwbot } from 'mwbot-ts';
import { IP } from 'ip-wiki';

/**
 * Finds the target of the range block affecting an IP, or `null` if there's none.
 *
 * @param ip The first address of the range.
 * @param cidr The range the caller means, preferred over any other block covering `ip`.
 */
export type GlobalBlockLookup = (ip: string, cidr: string | null) => Promise<string | null>;

/**
 * The part of a `list=globalblocks` entry needed to pick a block.
 */
export interface GlobalBlockEntry {
	target?: string;
	automatic?: boolean;
}

/**
 * Picks the narrowest non-automatic block out of those affecting an address.
 *
 * @param gblocks The `list=globalblocks` response array.
 * @returns The block's target, or `null` if no block qualifies.
 */
export function pickNarrowestTarget(gblocks: GlobalBlockEntry[]): string | null {
	let target: string | null = null;
	let narrowestSubnet = -1;
	for (const gblock of gblocks) {
		if (gblock.automatic || !gblock.target) {
			continue;
		}
		const m = gblock.target.match(/\/(\d{1,3})$/);
		const subnet = m ? parseInt(m[1]) : gblock.target.includes('.') ? 32 : 128;
		if (subnet > narrowestSubnet) {
			target = gblock.target;
			narrowestSubnet = subnet;
		}
	}
	return target;
}

/**
 * Picks the range block to remove for a range: the block on `cidr` itself if there's one,
 * otherwise the narrowest range block. Blocks on single addresses are never picked.
 *
 * @param gblocks The `list=globalblocks` response array.
 * @param cidr The normalized range, if known.
 */
export function pickRangeBlockTarget(gblocks: GlobalBlockEntry[], cidr: string | null): string | null {
	const rangeBlocks = gblocks.filter(({ target, automatic }) => {
		return !automatic && target !== undefined && IP.newFromText(target)?.isCIDR() === true;
	});
	if (cidr !== null) {
		const exact = rangeBlocks.find(({ target }) => target && IP.newFromText(target)?.equals(cidr));
		if (exact) {
			return exact.target ?? null;
		}
	}
	return pickNarrowestTarget(rangeBlocks);
}

/**
 * Creates a lookup that performs a `list=globalblocks&bgip=` API request.
 *
 * @param mwbot An initialized Mwbot instance. No login is needed; global blocks are public.
 */
export function createGlobalBlockLookup(mwbot: Pick<Mwbot, 'get'>): GlobalBlockLookup {
	return async (ip, cidr) => {
		const res = await mwbot.get({
			list: 'globalblocks',
			bgip: ip,
			bgprop: 'target|timestamp|expiry',
			bglimit: 'max'
		});
		const resGblocks = res.query?.globalblocks;
		if (!resGblocks || !resGblocks.length) {
			return null;
		}
		return pickRangeBlockTarget(resGblocks.map(({ target, automatic }) => ({ target, automatic: !!automatic })), cidr);
	};
}

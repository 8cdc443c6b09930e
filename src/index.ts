import type { StewardConfig } from './config';
import { init } from './mwbot';
import { createGlobalBlockLookup } from './steward/globalblocks';
import { FormSession } from './steward/session';
import { Steward } from './steward/steward';

export { loadConfig } from './config';
export type { BotPasswordCredentials, StewardConfig } from './config';
export { Steward } from './steward/steward';
export { FormSession } from './steward/session';
export type { FormSessionOptions } from './steward/session';
export { createGlobalBlockLookup, pickNarrowestTarget, pickRangeBlockTarget } from './steward/globalblocks';
export type { GlobalBlockEntry, GlobalBlockLookup } from './steward/globalblocks';
export * from './steward/actions';
export { normalizeAddress, rangeToCidr } from './steward/address';
export type { NormalizedAddress } from './steward/address';
export { scrapeError } from './steward/scrape';
export type { ScrapeResult } from './steward/scrape';
export { StewardError } from './steward/errors';
export type { StewardErrorCode } from './steward/errors';
export type { FormFields, HttpResponse, SiteInfo, StewardHost } from './steward/host';

/**
 * Creates a {@link Steward} on the configured site, logging in if credentials are given.
 *
 * ```ts
 * const steward = await createSteward(loadConfig());
 * await steward.gBlock('192.0.2.0-192.0.2.255');
 * ```
 */
export async function createSteward(config: StewardConfig): Promise<Steward> {
	const mwbot = await init(config);
	const session = new FormSession({
		site: config.site,
		userAgent: config.userAgent,
		lookup: createGlobalBlockLookup(mwbot)
	});
	if (config.credentials) {
		await session.login(config.credentials.username, config.credentials.password);
	}
	return new Steward(session);
}

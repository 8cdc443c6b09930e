import { Mwbot, MwbotInitOptions } from 'mwbot-ts';
import type { StewardConfig } from './config';

/**
 * Initializes an anonymous Mwbot instance on the configured site.
 *
 * Only read requests (global block lookups) go through this instance, so no login is needed.
 *
 * @param config
 * @returns A Promise resolving to an Mwbot instance.
 */
export async function init(config: StewardConfig): Promise<Mwbot> {
	const { protocol, host, path } = config.site;
	const initOptions: MwbotInitOptions = {
		apiUrl: `${protocol}://${host}/${path ? path + '/' : ''}api.php`,
		userAgent: config.userAgent,
		credentials: {
			anonymous: true
		}
	};
	return Mwbot.init(initOptions);
}

/**
 * @module
 *
 * Reads the site and account settings from environment variables:
 *
 * | Variable | Default |
 * |---|---|
 * | `STEWARD_PROTOCOL` | `https` |
 * | `STEWARD_HOST` | `meta.wikimedia.org` |
 * | `STEWARD_PATH` | `w` |
 * | `STEWARD_DEBUG` | off (`1`, `true` or `yes` to enable) |
 * | `STEWARD_STRICT` | off (likewise) |
 * | `STEWARD_USERNAME` | none |
 * | `STEWARD_PASSWORD` | none |
 *
 * `STEWARD_USERNAME` and `STEWARD_PASSWORD` take a BotPassword, and must be set together.
 */

import type { SiteInfo } from './steward/host';
import { VERSION } from './version';

export interface BotPasswordCredentials {
	username: string;
	password: string;
}

export interface StewardConfig {
	site: SiteInfo;
	userAgent: string;
	/** `null` to stay logged out. */
	credentials: BotPasswordCredentials | null;
}

export const USER_AGENT = `steward-tools/${VERSION}`;

function parseFlag(value: string | undefined): boolean {
	return value !== undefined && /^(1|true|yes)$/i.test(value.trim());
}

/**
 * Builds a configuration object from the environment.
 *
 * @param env Defaults to `process.env`.
 * @throws If `STEWARD_PROTOCOL` is neither `http` nor `https`, or if only one of
 * `STEWARD_USERNAME` and `STEWARD_PASSWORD` is set.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StewardConfig {
	const protocol = (env.STEWARD_PROTOCOL ?? 'https').trim().toLowerCase();
	if (protocol !== 'http' && protocol !== 'https') {
		throw new Error(`STEWARD_PROTOCOL must be "http" or "https", but got "${protocol}".`);
	}

	const username = env.STEWARD_USERNAME?.trim() || null;
	const password = env.STEWARD_PASSWORD || null;
	if ((username === null) !== (password === null)) {
		throw new Error('STEWARD_USERNAME and STEWARD_PASSWORD must be set together.');
	}

	return {
		site: {
			protocol,
			host: env.STEWARD_HOST?.trim() || 'meta.wikimedia.org',
			path: (env.STEWARD_PATH ?? 'w').trim().replace(/^\/+|\/+$/g, ''),
			debug: parseFlag(env.STEWARD_DEBUG),
			strictAddresses: parseFlag(env.STEWARD_STRICT)
		},
		userAgent: USER_AGENT,
		credentials: username !== null && password !== null ? { username, password } : null
	};
}

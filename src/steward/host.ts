/**
 * @module
 *
 * The contract between the steward functions and the bot that hosts them. The host owns the
 * HTTP session (cookies, login) and site settings; the steward functions only build requests
 * and inspect what comes back.
 */

export interface SiteInfo {
	protocol: 'http' | 'https';
	/** e.g. `meta.wikimedia.org` */
	host: string;
	/** The script path without surrounding slashes, e.g. `w`. */
	path: string;
	/** Whether to log every URL retrieved. */
	debug: boolean;
	/** Whether to abort on malformed IP expressions instead of only warning about them. */
	strictAddresses: boolean;
}

export interface HttpResponse {
	/** The final URL, after redirects. */
	url: string;
	status: number;
	body: string;
}

/**
 * Values to fill into a form. Booleans tick (`true`) or clear (`false`) checkboxes.
 */
export type FormFields = Record<string, string | number | boolean>;

export interface StewardHost {
	readonly site: SiteInfo;
	/**
	 * Retrieves a page and keeps it as the current page for {@link submitForm}.
	 * Rejects only on transport failures; HTTP error statuses resolve.
	 */
	get(url: string): Promise<HttpResponse>;
	/**
	 * Fills in the form on the current page that contains all the given fields, and submits it.
	 */
	submitForm(fields: FormFields): Promise<HttpResponse>;
	/**
	 * Finds the target CIDR of the global range block currently affecting an address. A block
	 * on exactly `cidr` wins over other range blocks; blocks on single addresses don't count.
	 *
	 * @returns `null` if no range block covers the address.
	 */
	getGlobalBlockTarget(ip: string, cidr: string | null): Promise<string | null>;
}

/**
 * Checks whether a response has a 2xx status.
 */
export function isSuccess(response: HttpResponse): boolean {
	return response.status >= 200 && response.status < 300;
}

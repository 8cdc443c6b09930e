/**
 * @module
 *
 * Retrieves special pages and submits their forms through the host, the way a human steward
 * would in a browser. Every response is checked for an HTTP error status and for MediaWiki's
 * error box.
 */

import { type FormFields, type HttpResponse, type SiteInfo, type StewardHost, isSuccess } from './host';
import { StewardError, errorMessage } from './errors';
import { type ScrapeResult, failure, scrapeError, success } from './scrape';

/**
 * Query string appended to every page URL unless the caller provides its own.
 * Error messages are only recognizable in a known language and skin.
 */
export const DEFAULT_EXTRA_QUERY = '&uselang=en&useskin=monobook';

/**
 * Builds an `index.php` URL.
 *
 * @param site
 * @param title The page title, e.g. `Special:GlobalBlock`.
 * @param noEscape If `true`, `title` is used as is; otherwise it is percent-encoded.
 * @param extra Extra query string, starting with `&`. Pass an empty string for none.
 */
export function buildIndexUrl(
	site: SiteInfo,
	title: string,
	noEscape = false,
	extra = DEFAULT_EXTRA_QUERY
): string {
	const path = site.path.replace(/^\/+|\/+$/g, '');
	const script = path ? `${path}/index.php` : 'index.php';
	const page = noEscape ? title : encodeURIComponent(title);
	return `${site.protocol}://${site.host}/${script}?title=${page}${extra}`;
}

function inspect(response: HttpResponse): ScrapeResult {
	if (!isSuccess(response)) {
		return failure(new StewardError('http', `HTTP ${response.status} from ${response.url}`));
	}
	const error = scrapeError(response.body);
	if (error !== null) {
		return failure(new StewardError('sitereported', error));
	}
	return success(response);
}

/**
 * Retrieves a page through the host.
 *
 * *This function never rejects*.
 */
export async function screenscrapeGet(
	host: StewardHost,
	title: string,
	noEscape = false,
	extra?: string
): Promise<ScrapeResult> {
	const url = buildIndexUrl(host.site, title, noEscape, extra);
	if (host.site.debug) {
		console.log(`Retrieving ${url}`);
	}
	let response: HttpResponse;
	try {
		response = await host.get(url);
	} catch (err) {
		return failure(new StewardError('http', `Failed to retrieve ${url}: ${errorMessage(err)}`));
	}
	return inspect(response);
}

/**
 * Retrieves a page and submits the form on it filled with `fields`.
 *
 * *This function never rejects*.
 */
export async function screenscrapePut(
	host: StewardHost,
	title: string,
	fields: FormFields,
	noEscape = false,
	extra?: string
): Promise<ScrapeResult> {
	const page = await screenscrapeGet(host, title, noEscape, extra);
	if (!page.ok) {
		return page;
	}
	let response: HttpResponse;
	try {
		response = await host.submitForm(fields);
	} catch (err) {
		if (err instanceof StewardError) {
			return failure(err);
		}
		return failure(new StewardError('http', `Failed to submit the form on ${title}: ${errorMessage(err)}`));
	}
	return inspect(response);
}

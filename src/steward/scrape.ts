import * as cheerio from 'cheerio';
import type { HttpResponse } from './host';
import { StewardError } from './errors';

/**
 * The element MediaWiki wraps form errors in.
 */
export const ERROR_SELECTOR = 'div.error';

/**
 * The outcome of a single page retrieval or form submission.
 */
export type ScrapeResult =
	| { ok: true; response: HttpResponse }
	| { ok: false; error: StewardError };

/**
 * Returns the text of the first error box on a page.
 *
 * @param html The page's HTML. Malformed markup is parsed on a best-effort basis.
 * @returns The whitespace-collapsed text, or `null` if the page has no error box.
 */
export function scrapeError(html: string): string | null {
	const $ = cheerio.load(html);
	const $error = $(ERROR_SELECTOR).first();
	if (!$error.length) {
		return null;
	}
	return $error.text().replace(/\s+/g, ' ').trim();
}

export function success(response: HttpResponse): ScrapeResult {
	return { ok: true, response };
}

export function failure(error: StewardError): ScrapeResult {
	return { ok: false, error };
}

/**
 * @module
 *
 * A browser-like HTTP session that fills in and submits HTML forms, used as the default
 * {@link StewardHost}. Cookies are kept in a tough-cookie jar across requests, including
 * those on intermediate redirects.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { CookieJar } from 'tough-cookie';
import type { FormFields, HttpResponse, SiteInfo, StewardHost } from './host';
import type { GlobalBlockLookup } from './globalblocks';
import { StewardError } from './errors';

const MAX_REDIRECTS = 5;

/**
 * Input types whose values are never submitted unless they are the button clicked.
 */
const NON_VALUE_INPUTS = new Set(['submit', 'button', 'image', 'reset', 'file']);

export interface FormSessionOptions {
	site: SiteInfo;
	userAgent: string;
	lookup: GlobalBlockLookup;
	/**
	 * Custom axios adapter, replacing the network transport.
	 */
	adapter?: AxiosAdapter;
}

interface Control {
	type: string;
	/** Value submitted when a checkbox is ticked. */
	checkedValue: string;
}

export class FormSession implements StewardHost {

	readonly site: SiteInfo;
	readonly jar = new CookieJar();
	private readonly http: AxiosInstance;
	private readonly lookup: GlobalBlockLookup;
	/**
	 * The last page retrieved, whose forms {@link submitForm} works on.
	 */
	private page: HttpResponse | null = null;

	constructor(options: FormSessionOptions) {
		this.site = options.site;
		this.lookup = options.lookup;
		this.http = axios.create({
			headers: { 'User-Agent': options.userAgent },
			responseType: 'text',
			maxRedirects: 0,
			validateStatus: () => true,
			adapter: options.adapter
		});

		this.http.interceptors.request.use(async (config) => {
			const cookies = await this.jar.getCookieString(this.http.getUri(config));
			if (cookies) {
				config.headers.set('Cookie', cookies);
			}
			return config;
		});
		this.http.interceptors.response.use(async (response) => {
			const setCookie: unknown = response.headers['set-cookie'];
			if (Array.isArray(setCookie)) {
				const url = this.http.getUri(response.config);
				for (const cookie of setCookie) {
					if (typeof cookie === 'string') {
						await this.jar.setCookie(cookie, url, { ignoreError: true });
					}
				}
			}
			return response;
		});
	}

	/**
	 * The URL of `api.php` on the site.
	 */
	get apiUrl(): string {
		const path = this.site.path.replace(/^\/+|\/+$/g, '');
		return `${this.site.protocol}://${this.site.host}/${path ? path + '/' : ''}api.php`;
	}

	/**
	 * Sends a request, following redirects by hand so that every hop goes through the cookie jar.
	 */
	private async request(method: 'GET' | 'POST', url: string, body?: string): Promise<HttpResponse> {
		let currentUrl = url;
		let currentMethod = method;
		let data = body;
		for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
			const res = await this.http.request<unknown>({
				method: currentMethod,
				url: currentUrl,
				data,
				headers: data !== undefined ? { 'Content-Type': 'application/x-www-form-urlencoded' } : undefined
			});
			const location: unknown = res.headers['location'];
			if (res.status >= 300 && res.status < 400 && typeof location === 'string') {
				currentUrl = new URL(location, currentUrl).toString();
				// 307 and 308 repeat the request as it was
				if (res.status !== 307 && res.status !== 308) {
					currentMethod = 'GET';
					data = undefined;
				}
				continue;
			}
			return {
				url: currentUrl,
				status: res.status,
				body: typeof res.data === 'string' ? res.data : String(res.data ?? '')
			};
		}
		throw new Error(`Too many redirects from ${url}`);
	}

	async get(url: string): Promise<HttpResponse> {
		const response = await this.request('GET', url);
		this.page = response;
		return response;
	}

	/**
	 * Fills in and submits the first form on the current page that has every field in `fields`.
	 *
	 * The form's own defaults (hidden inputs such as the edit token, ticked checkboxes, selected
	 * options, and so on) are submitted along with the given values.
	 *
	 * @throws {StewardError} `noform` if there's no current page or no such form.
	 */
	async submitForm(fields: FormFields): Promise<HttpResponse> {
		if (!this.page) {
			throw new StewardError('noform', 'No page has been retrieved to submit a form on.');
		}
		const pageUrl = this.page.url;
		const $ = cheerio.load(this.page.body);
		const names = Object.keys(fields);
		const form = $('form').toArray().find((el) => {
			return names.every((name) => $(el).find(`[name="${name}"]`).length > 0);
		});
		if (!form) {
			throw new StewardError('noform', `No form on ${pageUrl} has the fields ${names.join(', ')}.`);
		}
		const $form = $(form);

		// Collect the form's default values
		const params = new URLSearchParams();
		const controls = new Map<string, Control>();
		let buttonClicked = false;
		$form.find('input, select, textarea').each((_, el) => {
			const $el = $(el);
			const name = $el.attr('name');
			if (!name || $el.is('[disabled]')) {
				return;
			}
			const tag = el.tagName.toLowerCase();
			const type = tag === 'input' ? ($el.attr('type') ?? 'text').toLowerCase() : tag;
			if (!controls.has(name)) {
				controls.set(name, { type, checkedValue: $el.attr('value') ?? 'on' });
			}

			if (tag === 'select') {
				const $option = $el.find('option[selected]').first().length
					? $el.find('option[selected]').first()
					: $el.find('option').first();
				if ($option.length) {
					params.append(name, $option.attr('value') ?? $option.text());
				}
			} else if (tag === 'textarea') {
				params.append(name, $el.text());
			} else if (type === 'checkbox' || type === 'radio') {
				if ($el.is('[checked]')) {
					params.append(name, $el.attr('value') ?? 'on');
				}
			} else if (type === 'submit') {
				// Clicking the form submits the first named button
				if (!buttonClicked) {
					params.append(name, $el.attr('value') ?? '');
					buttonClicked = true;
				}
			} else if (!NON_VALUE_INPUTS.has(type)) {
				params.append(name, $el.attr('value') ?? '');
			}
		});

		// Apply the given values
		for (const [name, value] of Object.entries(fields)) {
			const control = controls.get(name);
			if (control?.type === 'checkbox') {
				if (value === true || value === 1 || value === '1') {
					params.set(name, control.checkedValue);
				} else {
					params.delete(name);
				}
			} else if (typeof value === 'boolean') {
				params.set(name, value ? '1' : '0');
			} else {
				params.set(name, String(value));
			}
		}

		const action = new URL($form.attr('action') || pageUrl, pageUrl);
		const method = ($form.attr('method') ?? 'get').toLowerCase() === 'post' ? 'POST' : 'GET';
		let response: HttpResponse;
		if (method === 'POST') {
			response = await this.request('POST', action.toString(), params.toString());
		} else {
			action.search = params.toString();
			response = await this.request('GET', action.toString());
		}
		this.page = response;
		return response;
	}

	getGlobalBlockTarget(ip: string, cidr: string | null): Promise<string | null> {
		return this.lookup(ip, cidr);
	}

	/**
	 * Logs in with a BotPassword through the action API. The session cookies are shared with
	 * the form requests.
	 *
	 * @throws If the login fails.
	 */
	async login(username: string, password: string): Promise<void> {
		const tokenRes = await this.request('GET', `${this.apiUrl}?action=query&meta=tokens&type=login&format=json&formatversion=2`);
		const token = getPath(parseJson(tokenRes), ['query', 'tokens', 'logintoken']);
		if (typeof token !== 'string') {
			throw new Error(`Failed to get a login token (HTTP ${tokenRes.status}).`);
		}

		const body = new URLSearchParams({
			action: 'login',
			lgname: username,
			lgpassword: password,
			lgtoken: token,
			format: 'json',
			formatversion: '2'
		});
		const loginRes = await this.request('POST', this.apiUrl, body.toString());
		const json = parseJson(loginRes);
		const result = getPath(json, ['login', 'result']);
		if (result !== 'Success') {
			const reason = getPath(json, ['login', 'reason']);
			throw new Error(`Failed to log in as ${username}: ${typeof reason === 'string' ? reason : String(result)}`);
		}
		console.log(`Logged in as ${username}@${this.site.host}`);
	}

}

function parseJson(response: HttpResponse): unknown {
	try {
		return JSON.parse(response.body);
	} catch {
		throw new Error(`Expected JSON from ${response.url}, but got HTTP ${response.status} with a non-JSON body.`);
	}
}

/**
 * Walks down nested objects along `keys`.
 */
function getPath(value: unknown, keys: string[]): unknown {
	let current = value;
	for (const key of keys) {
		if (typeof current !== 'object' || current === null) {
			return undefined;
		}
		current = Reflect.get(current, key);
	}
	return current;
}

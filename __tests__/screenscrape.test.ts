import { buildIndexUrl, screenscrapeGet } from '../src/steward/screenscrape';
import type { SiteInfo } from '../src/steward/host';
import { FakeHost } from './helpers/fakeHost';

const site: SiteInfo = {
	protocol: 'https',
	host: 'meta.example.org',
	path: 'w',
	debug: false,
	strictAddresses: false
};

describe('buildIndexUrl', () => {
	test('percent-encodes the title by default', () => {
		expect(buildIndexUrl(site, 'Special:Global Block')).toBe(
			'https://meta.example.org/w/index.php?title=Special%3AGlobal%20Block&uselang=en&useskin=monobook'
		);
	});

	test('uses the title as is when asked not to escape it', () => {
		expect(buildIndexUrl(site, 'Special:GlobalBlock', true)).toBe(
			'https://meta.example.org/w/index.php?title=Special:GlobalBlock&uselang=en&useskin=monobook'
		);
	});

	test('accepts a custom or empty query string', () => {
		expect(buildIndexUrl(site, 'Main_Page', true, '&action=raw')).toBe(
			'https://meta.example.org/w/index.php?title=Main_Page&action=raw'
		);
		expect(buildIndexUrl(site, 'Main_Page', true, '')).toBe(
			'https://meta.example.org/w/index.php?title=Main_Page'
		);
	});

	test('normalizes the script path', () => {
		expect(buildIndexUrl({ ...site, protocol: 'http', path: '/wiki/w/' }, 'X', true, '')).toBe(
			'http://meta.example.org/wiki/w/index.php?title=X'
		);
		expect(buildIndexUrl({ ...site, path: '' }, 'X', true, '')).toBe(
			'https://meta.example.org/index.php?title=X'
		);
	});
});

describe('screenscrapeGet', () => {
	test('resolves with the page when it is free of errors', async () => {
		const host = new FakeHost();
		host.pageBody = '<p>Hello</p>';
		const result = await screenscrapeGet(host, 'Special:GlobalBlock', true);

		expect(result).toEqual({
			ok: true,
			response: {
				url: 'https://meta.example.org/w/index.php?title=Special:GlobalBlock&uselang=en&useskin=monobook',
				status: 200,
				body: '<p>Hello</p>'
			}
		});
	});
});

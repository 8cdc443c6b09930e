import { Steward } from '../src/steward/steward';
import { FakeHost } from './helpers/fakeHost';

describe('Steward', () => {
	let host: FakeHost;
	let steward: Steward;
	let warn: jest.SpyInstance;

	beforeEach(() => {
		host = new FakeHost();
		steward = new Steward(host);
		warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
	});

	afterEach(() => {
		warn.mockRestore();
	});

	test('resolves with the submission response on success', async () => {
		const res = await steward.gBlock('192.0.2.1');

		expect(res).toEqual({ url: 'https://meta.example.org/w/index.php', status: 200, body: '<p>Done</p>' });
		expect(warn).not.toHaveBeenCalled();
	});

	test('resolves with null and warns when no matching rangeblock exists', async () => {
		const res = await steward.gUnblock('127.0.0.0-127.0.0.255');

		expect(res).toBeNull();
		expect(warn).toHaveBeenCalledWith(
			"StewardError (notfound): Couldn't find the matching rangeblock for 127.0.0.0-127.0.0.255"
		);
		expect(host.submissions).toEqual([]);
	});

	test('resolves with null and warns on a site-reported error', async () => {
		host.submitBody = '<div class="error">Account does not exist.</div>';
		const res = await steward.caLock('Nobody');

		expect(res).toBeNull();
		expect(warn).toHaveBeenCalledWith('StewardError (sitereported): Account does not exist.');
	});

	test('never rejects on transport failures', async () => {
		host.getError = new Error('ECONNRESET');

		await expect(steward.caUnlock('Example')).resolves.toBeNull();
		expect(warn).toHaveBeenCalledTimes(1);
	});

	test('logs every URL retrieved in debug mode', async () => {
		host.site.debug = true;
		const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
		try {
			await steward.caUnlock('Example');
			expect(log).toHaveBeenCalledWith(
				'Retrieving https://meta.example.org/w/index.php?title=Special:CentralAuth&target=Example&uselang=en&useskin=monobook'
			);
		} finally {
			log.mockRestore();
		}
	});
});

import { UsageError, parseCommandLine } from '../src/scripts/args';

function usageError(args: string[]): unknown {
	try {
		parseCommandLine(args);
	} catch (err) {
		return err;
	}
	return null;
}

describe('parseCommandLine', () => {
	test('parses a global block with its options', () => {
		expect(parseCommandLine(['gblock', '192.0.2.0-192.0.2.255', '--expiry', '1 week', '--anon-only', '-y'])).toEqual({
			command: 'gblock',
			target: '192.0.2.0-192.0.2.255',
			reason: undefined,
			expiry: '1 week',
			anonOnly: true,
			hide: undefined,
			yes: true
		});
	});

	test('parses a lock with a hide level and a reason', () => {
		expect(parseCommandLine(['lock', 'Example', '--hide', '1', '--reason', 'spam'])).toEqual({
			command: 'lock',
			target: 'Example',
			reason: 'spam',
			expiry: undefined,
			anonOnly: undefined,
			hide: 1,
			yes: false
		});
	});

	test('rejects options the command does not take', () => {
		expect(usageError(['gblock', '192.0.2.1', '--hide', '2'])).toEqual(new UsageError('--hide can\'t be used with "gblock".'));
		expect(usageError(['gunblock', '192.0.2.1', '--expiry', '1 day'])).toEqual(new UsageError('--expiry can\'t be used with "gunblock".'));
		expect(usageError(['lock', 'Example', '--anon-only'])).toEqual(new UsageError('--anon-only can\'t be used with "lock".'));
		expect(usageError(['unlock', 'Example', '--expiry', '1 day'])).toEqual(new UsageError('--expiry can\'t be used with "unlock".'));
	});

	test('rejects a bad hide level', () => {
		expect(usageError(['lock', 'Example', '--hide', '3'])).toEqual(new UsageError('--hide must be 0, 1 or 2, but got "3".'));
	});

	test('rejects unknown commands and missing targets', () => {
		expect(usageError([])).toEqual(new UsageError('No command given.'));
		expect(usageError(['ban', 'Example'])).toEqual(new UsageError('Unknown command "ban".'));
		expect(usageError(['lock'])).toEqual(new UsageError('"lock" needs a target.'));
		expect(usageError(['lock', 'Example', 'Other'])).toEqual(new UsageError('Unexpected argument "Other".'));
	});

	test('reports unknown options as usage errors', () => {
		expect(usageError(['lock', 'Example', '--force'])).toBeInstanceOf(UsageError);
	});
});

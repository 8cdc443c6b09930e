/**
 * Failure kinds of a steward action.
 *
 * - `invalidaddress`: The IP expression is malformed (only raised in strict mode).
 * - `http`: A request failed at the transport level or returned a non-2xx status.
 * - `sitereported`: The wiki returned a page carrying an error box.
 * - `notfound`: No active global block matches the range to unblock.
 * - `noform`: There is no form on the current page that can take the given fields.
 */
export type StewardErrorCode =
	| 'invalidaddress'
	| 'http'
	| 'sitereported'
	| 'notfound'
	| 'noform';

export class StewardError extends Error {

	readonly code: StewardErrorCode;

	constructor(code: StewardErrorCode, message: string) {
		super(message);
		this.name = 'StewardError';
		this.code = code;
	}

}

/**
 * Extracts a message from anything thrown.
 */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

// src/unifi/http.ts
// Shared request plumbing for the Network and Protect integration APIs.
// Every call goes through one RequestGate per client, so a refresh fan-out
// is queued here rather than hitting the console all at once.

import {
	UnifiAuthError,
	UnifiConnectionError,
	UnifiNotFoundError,
	describeError,
} from './errors.js';
import type { UnifiLogger } from './logger.js';
import { RequestGate } from './request-gate.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export interface UnifiHttpOptions {
	/** Console base URL, e.g. https://192.168.1.1 */
	host: string;
	apiKey: string;
	/** Path prefix under the host, e.g. /proxy/network/integration */
	basePath: string;
	requestTimeoutMs: number;
	logger: UnifiLogger;
	fetchImpl?: FetchLike;
	label: string;
}

export function normalizeHost(host: string): string {
	return host.trim().replace(/\/+$/, '');
}

export class UnifiHttp {
	private readonly gate = new RequestGate();
	private readonly fetchImpl: FetchLike;
	private readonly baseUrl: string;

	public constructor(private readonly options: UnifiHttpOptions) {
		this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
		this.baseUrl = `${normalizeHost(options.host)}${options.basePath}`;
	}

	public request(method: HttpMethod, endpoint: string, body?: unknown): Promise<unknown> {
		if (this.gate.pending > 0) {
			this.options.logger.debug(
				'%s: %s %s waits behind %d queued request(s)',
				this.options.label,
				method,
				endpoint,
				this.gate.pending,
			);
		}
		return this.gate.run(() => this.perform(method, endpoint, body));
	}

	private async perform(method: HttpMethod, endpoint: string, body?: unknown): Promise<unknown> {
		const { apiKey, requestTimeoutMs, logger: log, label } = this.options;
		const url = `${this.baseUrl}${endpoint}`;

		const headers: Record<string, string> = {
			Accept: 'application/json',
			'X-API-Key': apiKey,
		};
		if (body !== undefined) {
			headers['Content-Type'] = 'application/json';
		}

		log.debug('%s: %s %s', label, method, url);

		let res: Response;
		try {
			res = await this.fetchImpl(url, {
				method,
				headers,
				body: body === undefined ? undefined : JSON.stringify(body),
				signal: AbortSignal.timeout(requestTimeoutMs),
			});
		} catch (err) {
			const timedOut = err instanceof Error && err.name === 'TimeoutError';
			log.error('%s: request to %s failed: %s', label, endpoint, describeError(err));
			throw new UnifiConnectionError(
				timedOut
					? `Timeout connecting to ${url}`
					: `Error connecting to ${url}: ${describeError(err)}`,
				{ cause: err },
			);
		}

		log.debug('%s: response from %s - status %d', label, endpoint, res.status);

		if (res.status === 401) {
			log.error('%s: authentication failed - invalid API key', label);
			throw new UnifiAuthError('Invalid API key');
		}
		if (res.status === 403) {
			log.error('%s: authorization failed - API key lacks permission', label);
			throw new UnifiAuthError('API key lacks permission');
		}
		if (res.status === 404) {
			throw new UnifiNotFoundError(`Not found: ${method} ${endpoint}`);
		}
		if (!res.ok) {
			const text = await res.text().catch(() => '');
			log.error('%s: HTTP %d %s for %s %s', label, res.status, res.statusText, endpoint, text);
			throw new UnifiConnectionError(
				`HTTP ${res.status} ${res.statusText} from ${endpoint}`,
			);
		}

		const text = await res.text().catch((err: unknown) => {
			throw new UnifiConnectionError(
				`Failed reading response from ${endpoint}: ${describeError(err)}`,
				{ cause: err },
			);
		});

		if (text.trim().length === 0) {
			return null;
		}

		try {
			const parsed: unknown = JSON.parse(text);
			return parsed;
		} catch (err) {
			throw new UnifiConnectionError(`Non-JSON payload from ${endpoint}`, { cause: err });
		}
	}
}

// src/unifi/network-client.ts
// UniFi Network Integration API client (sites, devices, clients, statistics).
//
// Issues calls and classifies failures; what a failure means for the
// snapshot is decided in the coordinator.

import { UnifiAuthError, describeError } from './errors.js';
import { type FetchLike, UnifiHttp } from './http.js';
import { type UnifiLogger, createConsoleLogger } from './logger.js';
import {
	type UnifiClient,
	type UnifiDevice,
	type UnifiEntity,
	type UnifiRecord,
	type UnifiSite,
	isRecord,
	readNumber,
	readString,
	toEntities,
} from './records.js';

const NETWORK_BASE_PATH = '/proxy/network/integration';
const PAGE_SIZE = 200;

export type UnifiDeviceAction = 'RESTART';

export interface UnifiNetworkClientOptions {
	host: string;
	apiKey: string;
	requestTimeoutMs?: number;
	logger?: UnifiLogger;
	fetchImpl?: FetchLike;
}

/** What the coordinator needs from the Network side. */
export interface NetworkResourceClient {
	listSites(): Promise<UnifiSite[]>;
	listDevices(siteId: string): Promise<UnifiDevice[]>;
	getDeviceInfo(siteId: string, deviceId: string): Promise<UnifiRecord>;
	getDeviceStats(siteId: string, deviceId: string): Promise<UnifiRecord>;
	listClients(siteId: string): Promise<UnifiClient[]>;
	sendDeviceCommand(siteId: string, deviceId: string, action: UnifiDeviceAction): Promise<boolean>;
}

export class UnifiNetworkClient implements NetworkResourceClient {
	private readonly log: UnifiLogger;
	private readonly http: UnifiHttp;

	public constructor(options: UnifiNetworkClientOptions) {
		this.log = options.logger ?? createConsoleLogger('unifi-network');
		this.http = new UnifiHttp({
			host: options.host,
			apiKey: options.apiKey,
			basePath: NETWORK_BASE_PATH,
			requestTimeoutMs: options.requestTimeoutMs ?? 10_000,
			logger: this.log,
			fetchImpl: options.fetchImpl,
			label: 'UnifiNetworkClient',
		});
		this.log.debug('UnifiNetworkClient: initialized for host %s', options.host);
	}

	public async listSites(): Promise<UnifiSite[]> {
		this.log.debug('UnifiNetworkClient: fetching all sites');
		const sites = await this.listPaged('/v1/sites');
		this.log.info('UnifiNetworkClient: retrieved %d sites', sites.length);
		return sites;
	}

	public async listDevices(siteId: string): Promise<UnifiDevice[]> {
		const devices = await this.listPaged(`/v1/sites/${encodeURIComponent(siteId)}/devices`);
		this.log.debug('UnifiNetworkClient: retrieved %d devices for site %s', devices.length, siteId);
		return devices;
	}

	public async listClients(siteId: string): Promise<UnifiClient[]> {
		const clients = await this.listPaged(`/v1/sites/${encodeURIComponent(siteId)}/clients`);
		this.log.debug('UnifiNetworkClient: retrieved %d clients for site %s', clients.length, siteId);
		return clients;
	}

	/** Detail view of one device; carries firmwareVersion and friends. */
	public async getDeviceInfo(siteId: string, deviceId: string): Promise<UnifiRecord> {
		const body = await this.http.request('GET', this.devicePath(siteId, deviceId));
		return isRecord(body) ? body : {};
	}

	public async getDeviceStats(siteId: string, deviceId: string): Promise<UnifiRecord> {
		const body = await this.http.request(
			'GET',
			`${this.devicePath(siteId, deviceId)}/statistics/latest`,
		);
		return isRecord(body) ? body : {};
	}

	/**
	 * Send a device action. Success is a 2xx with either an empty body or a
	 * body whose status is "OK".
	 */
	public async sendDeviceCommand(
		siteId: string,
		deviceId: string,
		action: UnifiDeviceAction,
	): Promise<boolean> {
		this.log.debug(
			'UnifiNetworkClient: sending %s to device %s in site %s',
			action,
			deviceId,
			siteId,
		);

		const body = await this.http.request(
			'POST',
			`${this.devicePath(siteId, deviceId)}/actions`,
			{ action },
		);

		const success = body === null || (isRecord(body) && readString(body, 'status') === 'OK');
		if (success) {
			this.log.info('UnifiNetworkClient: %s accepted for device %s in site %s', action, deviceId, siteId);
		} else {
			this.log.error('UnifiNetworkClient: %s rejected for device %s in site %s', action, deviceId, siteId);
		}
		return success;
	}

	public restartDevice(siteId: string, deviceId: string): Promise<boolean> {
		return this.sendDeviceCommand(siteId, deviceId, 'RESTART');
	}

	/** Validate the API key by listing sites. */
	public async validateApiKey(): Promise<boolean> {
		try {
			await this.listSites();
			this.log.info('UnifiNetworkClient: API key validation successful');
			return true;
		} catch (err) {
			if (err instanceof UnifiAuthError) {
				this.log.error('UnifiNetworkClient: API key validation failed');
			} else {
				this.log.error(
					'UnifiNetworkClient: unexpected error during API key validation: %s',
					describeError(err),
				);
			}
			return false;
		}
	}

	private devicePath(siteId: string, deviceId: string): string {
		return `/v1/sites/${encodeURIComponent(siteId)}/devices/${encodeURIComponent(deviceId)}`;
	}

	/**
	 * Collect every page of a list endpoint. Responses look like
	 * { offset, limit, count, totalCount, data: [...] }; one without
	 * totalCount is treated as the only page.
	 */
	private async listPaged(endpoint: string): Promise<UnifiEntity[]> {
		const collected: UnifiEntity[] = [];
		let offset = 0;

		for (;;) {
			const body = await this.http.request('GET', `${endpoint}?offset=${offset}&limit=${PAGE_SIZE}`);
			const page = isRecord(body) && Array.isArray(body.data) ? body.data : [];

			const { entities, dropped } = toEntities(page);
			if (dropped > 0) {
				this.log.debug('UnifiNetworkClient: dropped %d items without an id from %s', dropped, endpoint);
			}
			collected.push(...entities);

			const totalCount = isRecord(body) ? readNumber(body, 'totalCount') : undefined;
			offset += page.length;

			if (totalCount === undefined || page.length === 0 || offset >= totalCount) {
				return collected;
			}
		}
	}
}

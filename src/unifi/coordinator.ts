// src/unifi/coordinator.ts
// Keeps SnapshotStore in sync with the console: scheduled pulls from the
// Network API (plus a Protect bulk pass) and pushes from the Protect sockets.
//
// All snapshot writes happen synchronously between awaits on the event loop,
// so the store has exactly one writer even while fetches fan out.

import {
	UnifiAuthError,
	UnifiConnectionError,
	UnifiNotFoundError,
	describeError,
} from './errors.js';
import { type UnifiLogger, createConsoleLogger } from './logger.js';
import type { NetworkResourceClient } from './network-client.js';
import type { ProtectEventClient } from './protect-client.js';
import {
	PROTECT_BULK_COLLECTIONS,
	type ProtectCollection,
	collectionForModelKind,
	decodeListResponse,
} from './protect-payload.js';
import {
	type UnifiClient,
	type UnifiDevice,
	type UnifiDeviceStats,
	type UnifiEntity,
	type UnifiRecord,
	readNumber,
	readString,
	readStringArray,
	toEntity,
} from './records.js';
import { SnapshotStore } from './snapshot-store.js';

export type RefreshOutcome =
	| { status: 'success'; updatedAt: Date }
	| { status: 'auth-failed'; error: UnifiAuthError }
	| { status: 'retryable'; error: Error }
	| { status: 'not-found'; error: UnifiNotFoundError };

export type SnapshotListener = () => void;

export interface UnifiCoordinatorOptions {
	refreshIntervalMs: number;
	logger?: UnifiLogger;
	store?: SnapshotStore;
	now?: () => Date;
}

interface QueuedRefresh {
	scope: { siteId: string | undefined };
	promise: Promise<RefreshOutcome>;
}

/** Stats stored when the statistics call fails: no metrics, no clients. */
export function emptyStats(deviceId: string): UnifiDeviceStats {
	return { id: deviceId, clients: [] };
}

export function clientsUplinkedTo(clients: readonly UnifiClient[], deviceId: string): UnifiClient[] {
	return clients.filter((client) => readString(client, 'uplinkDeviceId') === deviceId);
}

export class UnifiCoordinator {
	public readonly store: SnapshotStore;

	private readonly log: UnifiLogger;
	private readonly refreshIntervalMs: number;
	private readonly now: () => Date;
	private readonly listeners = new Set<SnapshotListener>();

	private timer: NodeJS.Timeout | null = null;
	private inFlight: Promise<RefreshOutcome> | null = null;
	private queued: QueuedRefresh | null = null;

	public constructor(
		public readonly network: NetworkResourceClient,
		public readonly protect: ProtectEventClient | null,
		options: UnifiCoordinatorOptions,
	) {
		this.log = options.logger ?? createConsoleLogger('unifi-coordinator');
		this.store = options.store ?? new SnapshotStore();
		this.refreshIntervalMs = options.refreshIntervalMs;
		this.now = options.now ?? (() => new Date());

		if (this.protect) {
			this.protect.onDeviceUpdate((modelKind, item) => this.handleDeviceUpdate(modelKind, item));
			this.protect.onEventUpdate((eventKind, item) => this.handleEventUpdate(eventKind, item));
		}
	}

	public get available(): boolean {
		return this.store.available;
	}

	// ----- Scheduling -----

	public start(): void {
		if (this.timer) {
			return;
		}
		this.log.info('UnifiCoordinator: refreshing every %d s', Math.round(this.refreshIntervalMs / 1000));
		this.timer = setInterval(() => this.onScheduledTick(), this.refreshIntervalMs);
	}

	public stop(): void {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
		this.protect?.stopPushConnection();
	}

	private onScheduledTick(): void {
		if (this.inFlight || this.queued) {
			this.log.debug('UnifiCoordinator: previous refresh still running; skipping scheduled tick');
			return;
		}
		void this.refresh().then((outcome) => this.logOutcome(outcome));
	}

	private logOutcome(outcome: RefreshOutcome): void {
		switch (outcome.status) {
		case 'success':
			return;
		case 'auth-failed':
			this.log.error('UnifiCoordinator: authentication failed: %s', outcome.error.message);
			return;
		case 'not-found':
			this.log.warn('UnifiCoordinator: %s', outcome.error.message);
			return;
		case 'retryable':
			this.log.warn('UnifiCoordinator: refresh failed, will retry: %s', outcome.error.message);
			return;
		}
	}

	/**
	 * Run a refresh cycle, optionally limited to one site. Cycles never run
	 * concurrently: a request made while one is running waits for it, and all
	 * such requests share a single follow-up cycle.
	 */
	public refresh(siteId?: string): Promise<RefreshOutcome> {
		// The queued cycle stays joinable until it starts, even once inFlight clears.
		if (this.queued) {
			if (this.queued.scope.siteId !== siteId) {
				this.queued.scope.siteId = undefined;
			}
			return this.queued.promise;
		}

		const running = this.inFlight;
		if (!running) {
			return this.startCycle(siteId);
		}

		const scope = { siteId };
		const next = (): Promise<RefreshOutcome> => {
			this.queued = null;
			return this.startCycle(scope.siteId);
		};
		const promise = running.then(next, next);
		this.queued = { scope, promise };
		return promise;
	}

	private startCycle(siteId: string | undefined): Promise<RefreshOutcome> {
		const cycle = this.runCycle(siteId).finally(() => {
			if (this.inFlight === cycle) {
				this.inFlight = null;
			}
		});
		this.inFlight = cycle;
		return cycle;
	}

	// ----- Scheduled refresh -----

	private async runCycle(siteId: string | undefined): Promise<RefreshOutcome> {
		let outcome: RefreshOutcome;
		try {
			outcome = await this.pull(siteId);
		} catch (err) {
			this.store.markUnavailable();
			outcome = this.classifyFailure(err);
		}
		this.notifyListeners();
		return outcome;
	}

	private classifyFailure(err: unknown): RefreshOutcome {
		if (err instanceof UnifiAuthError) {
			this.log.error('UnifiCoordinator: site listing rejected the API key: %s', err.message);
			return { status: 'auth-failed', error: err };
		}
		if (err instanceof UnifiConnectionError) {
			this.log.warn('UnifiCoordinator: error communicating with API: %s', err.message);
			return { status: 'retryable', error: err };
		}

		this.log.error('UnifiCoordinator: unexpected error updating data: %o', err);
		const error = err instanceof Error
			? err
			: new Error(`Error updating data: ${describeError(err)}`);
		return { status: 'retryable', error };
	}

	private async pull(siteId: string | undefined): Promise<RefreshOutcome> {
		const sites = await this.network.listSites();
		this.store.replaceSites(sites);

		const targets = siteId === undefined ? sites : sites.filter((site) => site.id === siteId);
		if (siteId !== undefined && targets.length === 0) {
			this.store.markAvailable(this.now());
			return {
				status: 'not-found',
				error: new UnifiNotFoundError(`Site ${siteId} is not known to the console`),
			};
		}

		await Promise.all(targets.map((site) => this.refreshSite(site.id)));

		const updatedAt = this.now();
		this.store.markAvailable(updatedAt);

		if (siteId === undefined && this.protect) {
			await this.refreshProtect(this.protect);
			this.protect.startPushConnection();
		}

		return { status: 'success', updatedAt };
	}

	/**
	 * Devices and clients are independent failure domains, but a site is only
	 * written when both succeed; otherwise its previous nested maps stay.
	 */
	private async refreshSite(siteId: string): Promise<void> {
		const [devicesResult, clientsResult] = await Promise.allSettled([
			this.network.listDevices(siteId),
			this.network.listClients(siteId),
		]);

		if (devicesResult.status === 'rejected') {
			this.log.error(
				'UnifiCoordinator: failed to fetch devices for site %s: %s',
				siteId,
				describeError(devicesResult.reason),
			);
		}
		if (clientsResult.status === 'rejected') {
			this.log.error(
				'UnifiCoordinator: failed to fetch clients for site %s: %s',
				siteId,
				describeError(clientsResult.reason),
			);
		}
		if (devicesResult.status === 'rejected' || clientsResult.status === 'rejected') {
			return;
		}

		const clients = clientsResult.value;
		const entries = await Promise.all(
			devicesResult.value.map((device) => this.refreshDevice(siteId, device, clients)),
		);

		this.store.replaceSiteSubtree(siteId, {
			devices: entries.map((entry) => entry.device),
			clients,
			stats: entries.map((entry) => entry.stats),
		});
	}

	private async refreshDevice(
		siteId: string,
		base: UnifiDevice,
		clients: readonly UnifiClient[],
	): Promise<{ device: UnifiDevice; stats: UnifiDeviceStats }> {
		const [infoResult, statsResult] = await Promise.allSettled([
			this.network.getDeviceInfo(siteId, base.id),
			this.network.getDeviceStats(siteId, base.id),
		]);

		let device: UnifiDevice = base;
		if (infoResult.status === 'fulfilled') {
			device = { ...base, ...infoResult.value, id: base.id };
		} else {
			this.log.warn(
				'UnifiCoordinator: failed to fetch info for device %s in site %s: %s',
				base.id,
				siteId,
				describeError(infoResult.reason),
			);
		}

		// Unlike a failed site, a failed stats call overwrites the previous stats.
		let stats = emptyStats(base.id);
		if (statsResult.status === 'fulfilled') {
			stats = {
				...statsResult.value,
				id: base.id,
				clients: clientsUplinkedTo(clients, base.id),
			};
		} else {
			this.log.error(
				'UnifiCoordinator: error getting stats for device %s in site %s: %s',
				base.id,
				siteId,
				describeError(statsResult.reason),
			);
		}

		return { device, stats };
	}

	private async refreshProtect(protect: ProtectEventClient): Promise<void> {
		await Promise.all(
			PROTECT_BULK_COLLECTIONS.map((collection) => this.refreshProtectCollection(protect, collection)),
		);
	}

	private async refreshProtectCollection(
		protect: ProtectEventClient,
		collection: ProtectCollection,
	): Promise<void> {
		try {
			const items = await this.fetchProtectItems(protect, collection);
			for (const item of items) {
				this.store.putProtectEntity(collection, item);
			}
			this.log.debug('UnifiCoordinator: stored %d Protect %s', items.length, collection);
		} catch (err) {
			this.log.error(
				'UnifiCoordinator: failed to fetch Protect %s: %s',
				collection,
				describeError(err),
			);
		}
	}

	private async fetchProtectItems(
		protect: ProtectEventClient,
		collection: ProtectCollection,
	): Promise<UnifiEntity[]> {
		const decoded = decodeListResponse(await protect.listResource(collection), collection);

		switch (decoded.shape) {
		case 'list':
		case 'wrapped':
			if (decoded.dropped > 0) {
				this.log.debug(
					'UnifiCoordinator: dropped %d Protect %s without an id',
					decoded.dropped,
					collection,
				);
			}
			return decoded.items;
		case 'single-object':
			return [decoded.item];
		case 'single-id': {
			this.log.debug(
				'UnifiCoordinator: Protect %s answered with id %s; fetching details',
				collection,
				decoded.id,
			);
			const detail = toEntity(await protect.getResource(collection, decoded.id));
			if (!detail) {
				this.log.warn(
					'UnifiCoordinator: Protect %s detail for %s has no id; skipping',
					collection,
					decoded.id,
				);
				return [];
			}
			return [detail];
		}
		case 'malformed':
			this.log.warn(
				'UnifiCoordinator: unexpected Protect %s response (%s); skipping',
				collection,
				decoded.reason,
			);
			return [];
		}
	}

	// ----- Push merge -----

	/** Wholesale replace of one Protect entity from the devices socket. */
	public handleDeviceUpdate(modelKind: string, payload: unknown): void {
		const collection = collectionForModelKind(modelKind);
		if (!collection) {
			this.log.debug('UnifiCoordinator: ignoring update for unknown model kind %s', modelKind);
			return;
		}

		const entity = toEntity(payload);
		if (!entity) {
			return;
		}

		this.store.putProtectEntity(collection, entity);
		this.notifyListeners();
	}

	/** Store an event from the events socket and correlate it onto its device. */
	public handleEventUpdate(eventKind: string, payload: unknown): void {
		const event = toEntity(payload);
		if (!event) {
			return;
		}

		this.store.putEvent(eventKind, event);

		const deviceId = readString(event, 'device');
		if (deviceId) {
			this.correlateEvent(eventKind, deviceId, event);
		}

		this.notifyListeners();
	}

	private correlateEvent(eventKind: string, deviceId: string, event: UnifiEntity): void {
		const start = readNumber(event, 'start');
		const isCamera = this.store.getProtectEntity('cameras', deviceId) !== undefined;

		let patch: { collection: ProtectCollection; fields: UnifiRecord } | null = null;

		switch (eventKind) {
		case 'motion':
			if (isCamera) {
				// Plain motion supersedes an earlier smart-detection classification.
				patch = { collection: 'cameras', fields: { lastMotion: start ?? null, lastSmartDetectTypes: [] } };
			} else if (this.store.getProtectEntity('lights', deviceId)) {
				patch = { collection: 'lights', fields: { lastMotion: start ?? null } };
			}
			break;
		case 'smartDetectZone':
			if (isCamera) {
				patch = {
					collection: 'cameras',
					fields: {
						lastMotion: start ?? 0,
						lastSmartDetectTypes: readStringArray(event, 'smartDetectTypes') ?? [],
					},
				};
			}
			break;
		case 'ring':
			if (isCamera) {
				patch = { collection: 'cameras', fields: { lastRing: start ?? null } };
			}
			break;
		default:
			break;
		}

		if (patch) {
			this.store.patchProtectEntity(patch.collection, deviceId, patch.fields);
			this.log.debug('UnifiCoordinator: %s event %s applied to %s', eventKind, event.id, deviceId);
		}
	}

	// ----- Listeners -----

	/** Register a listener; returns a function that removes it. */
	public addListener(listener: SnapshotListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	private notifyListeners(): void {
		for (const listener of [...this.listeners]) {
			try {
				listener();
			} catch (err) {
				this.log.error('UnifiCoordinator: snapshot listener failed: %s', describeError(err));
			}
		}
	}

	// ----- Commands -----

	public async restartDevice(siteId: string, deviceId: string): Promise<boolean> {
		this.log.info('UnifiCoordinator: restarting device %s in site %s', deviceId, siteId);
		return this.network.sendDeviceCommand(siteId, deviceId, 'RESTART');
	}
}

// src/unifi/snapshot-store.ts

import type { ProtectCollection } from './protect-payload.js';
import type {
	ProtectEntity,
	ProtectEvent,
	UnifiClient,
	UnifiDevice,
	UnifiDeviceStats,
	UnifiRecord,
	UnifiSite,
} from './records.js';

export interface SiteSubtree {
	devices: UnifiDevice[];
	clients: UnifiClient[];
	stats: UnifiDeviceStats[];
}

export interface SnapshotStoreOptions {
	/** Events kept per event kind; the oldest-inserted id is evicted first. */
	eventHistorySize?: number;
}

function byId<T extends { id: string }>(items: readonly T[]): Map<string, T> {
	return new Map(items.map((item) => [item.id, item]));
}

/**
 * Current known state of the console.
 *
 * Single writer: only UnifiCoordinator calls the mutating methods. Every
 * mutation is a synchronous key-level replacement, so a reader sees either
 * the previous or the new object for a key and never a half-written one.
 */
export class SnapshotStore {
	private sites = new Map<string, UnifiSite>();
	private readonly devices = new Map<string, ReadonlyMap<string, UnifiDevice>>();
	private readonly clients = new Map<string, ReadonlyMap<string, UnifiClient>>();
	private readonly stats = new Map<string, ReadonlyMap<string, UnifiDeviceStats>>();

	private readonly protect: Record<ProtectCollection, Map<string, ProtectEntity>> = {
		cameras: new Map(),
		lights: new Map(),
		sensors: new Map(),
		nvrs: new Map(),
		viewers: new Map(),
		chimes: new Map(),
	};

	private readonly events = new Map<string, Map<string, ProtectEvent>>();
	private readonly eventHistorySize: number;

	private isAvailable = false;
	private updatedAt: Date | null = null;

	public constructor(options: SnapshotStoreOptions = {}) {
		this.eventHistorySize = Math.max(1, Math.floor(options.eventHistorySize ?? 100));
	}

	// ----- Reads -----

	public get available(): boolean {
		return this.isAvailable;
	}

	public get lastUpdate(): Date | null {
		return this.updatedAt;
	}

	public getSite(siteId: string): UnifiSite | undefined {
		return this.sites.get(siteId);
	}

	public getSites(): UnifiSite[] {
		return [...this.sites.values()];
	}

	public getDevice(siteId: string, deviceId: string): UnifiDevice | undefined {
		return this.devices.get(siteId)?.get(deviceId);
	}

	public getDevices(siteId: string): UnifiDevice[] {
		return [...(this.devices.get(siteId)?.values() ?? [])];
	}

	public getClient(siteId: string, clientId: string): UnifiClient | undefined {
		return this.clients.get(siteId)?.get(clientId);
	}

	public getClients(siteId: string): UnifiClient[] {
		return [...(this.clients.get(siteId)?.values() ?? [])];
	}

	public getDeviceStats(siteId: string, deviceId: string): UnifiDeviceStats | undefined {
		return this.stats.get(siteId)?.get(deviceId);
	}

	public getProtectEntity(collection: ProtectCollection, id: string): ProtectEntity | undefined {
		return this.protect[collection].get(id);
	}

	public getProtectEntities(collection: ProtectCollection): ProtectEntity[] {
		return [...this.protect[collection].values()];
	}

	public getEvent(eventKind: string, eventId: string): ProtectEvent | undefined {
		return this.events.get(eventKind)?.get(eventId);
	}

	public getEvents(eventKind: string): ProtectEvent[] {
		return [...(this.events.get(eventKind)?.values() ?? [])];
	}

	// ----- Writes (coordinator only) -----

	/** Replace the site map; sites that disappeared take their nested maps with them. */
	public replaceSites(sites: readonly UnifiSite[]): void {
		const next = byId(sites);
		for (const siteId of this.sites.keys()) {
			if (!next.has(siteId)) {
				this.devices.delete(siteId);
				this.clients.delete(siteId);
				this.stats.delete(siteId);
			}
		}
		this.sites = next;
	}

	/** Swap one site's devices, clients and stats together. */
	public replaceSiteSubtree(siteId: string, subtree: SiteSubtree): void {
		this.devices.set(siteId, byId(subtree.devices));
		this.clients.set(siteId, byId(subtree.clients));
		this.stats.set(siteId, byId(subtree.stats));
	}

	public putProtectEntity(collection: ProtectCollection, entity: ProtectEntity): void {
		this.protect[collection].set(entity.id, entity);
	}

	/**
	 * Copy-on-write field patch of an existing entity. Returns false, and
	 * stores nothing, when the entity is unknown.
	 */
	public patchProtectEntity(collection: ProtectCollection, id: string, patch: UnifiRecord): boolean {
		const current = this.protect[collection].get(id);
		if (!current) {
			return false;
		}
		this.protect[collection].set(id, { ...current, ...patch, id });
		return true;
	}

	public putEvent(eventKind: string, event: ProtectEvent): void {
		let bucket = this.events.get(eventKind);
		if (!bucket) {
			bucket = new Map();
			this.events.set(eventKind, bucket);
		}

		// Re-insert so an updated event counts as the newest.
		bucket.delete(event.id);
		bucket.set(event.id, event);

		while (bucket.size > this.eventHistorySize) {
			const oldest = bucket.keys().next();
			if (oldest.done) {
				break;
			}
			bucket.delete(oldest.value);
		}
	}

	public markAvailable(at: Date): void {
		this.isAvailable = true;
		this.updatedAt = at;
	}

	public markUnavailable(): void {
		this.isAvailable = false;
	}
}

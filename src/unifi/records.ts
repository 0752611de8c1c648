// src/unifi/records.ts
// Open record shapes returned by the UniFi integration APIs, plus narrow
// readers so callers never have to cast a loose payload.

export type UnifiRecord = Record<string, unknown>;

/** Every record the snapshot stores carries a string `id`. */
export interface UnifiEntity {
	id: string;
	[key: string]: unknown;
}

export type UnifiSite = UnifiEntity;
export type UnifiDevice = UnifiEntity;
export type UnifiClient = UnifiEntity;

export interface UnifiDeviceStats extends UnifiEntity {
	/** Clients whose uplinkDeviceId is this device, recomputed every cycle. */
	clients: UnifiClient[];
}

export type ProtectEntity = UnifiEntity;
export type ProtectEvent = UnifiEntity;

export function isRecord(value: unknown): value is UnifiRecord {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(record: UnifiRecord, key: string): string | undefined {
	const value = record[key];
	return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function readNumber(record: UnifiRecord, key: string): number | undefined {
	const value = record[key];
	return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function readBoolean(record: UnifiRecord, key: string): boolean | undefined {
	const value = record[key];
	return typeof value === 'boolean' ? value : undefined;
}

export function readStringArray(record: UnifiRecord, key: string): string[] | undefined {
	const value = record[key];
	if (!Array.isArray(value)) {
		return undefined;
	}
	return value.filter((item): item is string => typeof item === 'string');
}

export function readRecord(record: UnifiRecord, key: string): UnifiRecord | undefined {
	const value = record[key];
	return isRecord(value) ? value : undefined;
}

/**
 * Accept a payload as an entity when it is an object with a usable id.
 * Numeric ids (some Protect payloads) are normalized to strings.
 */
export function toEntity(value: unknown): UnifiEntity | undefined {
	if (!isRecord(value)) {
		return undefined;
	}

	const rawId = value.id;
	if (typeof rawId === 'string' && rawId.length > 0) {
		return { ...value, id: rawId };
	}
	if (typeof rawId === 'number' && Number.isFinite(rawId)) {
		return { ...value, id: String(rawId) };
	}
	return undefined;
}

export function toEntities(values: unknown[]): { entities: UnifiEntity[]; dropped: number } {
	const entities: UnifiEntity[] = [];
	let dropped = 0;
	for (const value of values) {
		const entity = toEntity(value);
		if (entity) {
			entities.push(entity);
		} else {
			dropped += 1;
		}
	}
	return { entities, dropped };
}

// src/unifi/protect-payload.ts
// Decoding at the Protect boundary: model kinds, the shapes a list endpoint
// may answer with, and the push messages from the subscribe sockets.

import {
	type UnifiEntity,
	type UnifiRecord,
	isRecord,
	readString,
	toEntities,
	toEntity,
} from './records.js';

export const PROTECT_MODEL_KINDS = ['camera', 'light', 'sensor', 'nvr', 'viewer', 'chime'] as const;

export type ProtectModelKind = (typeof PROTECT_MODEL_KINDS)[number];

export type ProtectCollection = 'cameras' | 'lights' | 'sensors' | 'nvrs' | 'viewers' | 'chimes';

export const PROTECT_COLLECTIONS: Record<ProtectModelKind, ProtectCollection> = {
	camera: 'cameras',
	light: 'lights',
	sensor: 'sensors',
	nvr: 'nvrs',
	viewer: 'viewers',
	chime: 'chimes',
};

/** Kinds pulled in bulk on every full refresh. Viewers only arrive by push. */
export const PROTECT_BULK_COLLECTIONS: readonly ProtectCollection[] = [
	'cameras',
	'lights',
	'sensors',
	'nvrs',
	'chimes',
];

export function parseProtectModelKind(value: string): ProtectModelKind | undefined {
	return PROTECT_MODEL_KINDS.find((kind) => kind === value);
}

export function collectionForModelKind(value: string): ProtectCollection | undefined {
	const kind = parseProtectModelKind(value);
	return kind ? PROTECT_COLLECTIONS[kind] : undefined;
}

// ----- List responses -----

export type ProtectListResponse =
	| { shape: 'list'; items: UnifiEntity[]; dropped: number }
	| { shape: 'wrapped'; key: string; items: UnifiEntity[]; dropped: number }
	| { shape: 'single-object'; item: UnifiEntity }
	| { shape: 'single-id'; id: string }
	| { shape: 'malformed'; reason: string };

/**
 * Classify a list endpoint body. Observed answers are a plain array, an
 * object wrapping the array under `data` or the collection name, a single
 * object (the NVR endpoint), or a bare id string that needs a detail fetch.
 */
export function decodeListResponse(body: unknown, collection: ProtectCollection): ProtectListResponse {
	if (Array.isArray(body)) {
		const { entities, dropped } = toEntities(body);
		return { shape: 'list', items: entities, dropped };
	}

	if (typeof body === 'string') {
		const id = body.trim();
		return id.length > 0
			? { shape: 'single-id', id }
			: { shape: 'malformed', reason: 'empty string body' };
	}

	if (isRecord(body)) {
		for (const key of ['data', collection]) {
			const wrapped = body[key];
			if (Array.isArray(wrapped)) {
				const { entities, dropped } = toEntities(wrapped);
				return { shape: 'wrapped', key, items: entities, dropped };
			}
		}

		const item = toEntity(body);
		if (item) {
			return { shape: 'single-object', item };
		}
		return { shape: 'malformed', reason: `object without id (keys: ${Object.keys(body).join(', ')})` };
	}

	return { shape: 'malformed', reason: body === null ? 'null body' : `unexpected ${typeof body} body` };
}

// ----- Push messages -----

export type PushChannel = 'devices' | 'events';

export type PushAction = 'add' | 'update' | 'remove';

export interface PushMessage {
	action: PushAction;
	/** modelKey for device messages, event type for event messages. */
	kind: string;
	item: UnifiRecord;
}

function parsePushAction(value: string | undefined): PushAction | undefined {
	return value === 'add' || value === 'update' || value === 'remove' ? value : undefined;
}

/**
 * Decode one frame from a subscribe socket:
 *   { "type": "add" | "update" | "remove", "item": { ... } }
 * Device frames are keyed by item.modelKey, event frames by item.type.
 */
export function decodePushMessage(channel: PushChannel, text: string): PushMessage | undefined {
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch {
		return undefined;
	}

	if (!isRecord(parsed)) {
		return undefined;
	}

	const action = parsePushAction(readString(parsed, 'type'));
	const item = parsed.item;
	if (!action || !isRecord(item)) {
		return undefined;
	}

	const kind = readString(item, channel === 'devices' ? 'modelKey' : 'type');
	if (!kind) {
		return undefined;
	}

	return { action, kind, item };
}

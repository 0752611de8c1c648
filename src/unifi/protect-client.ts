// src/unifi/protect-client.ts
// UniFi Protect Integration API client: bulk lists, commands, and the two
// subscribe sockets (devices + events) that push live updates.

import WebSocket from 'ws';

import { describeError } from './errors.js';
import { type FetchLike, UnifiHttp, normalizeHost } from './http.js';
import { type UnifiLogger, createConsoleLogger } from './logger.js';
import {
	type ProtectCollection,
	type PushChannel,
	decodePushMessage,
} from './protect-payload.js';
import type { UnifiRecord } from './records.js';

const PROTECT_BASE_PATH = '/proxy/protect/integration';
const PUSH_CHANNELS: readonly PushChannel[] = ['devices', 'events'];
const RECONNECT_INITIAL_MS = 1_000;
const RECONNECT_MAX_MS = 60_000;

export type ProtectDeviceUpdateCallback = (modelKind: string, item: UnifiRecord) => void;
export type ProtectEventUpdateCallback = (eventKind: string, item: UnifiRecord) => void;

export type ProtectHdrMode = 'auto' | 'on' | 'off';
export type ProtectVideoMode = 'default' | 'highFps' | 'sport' | 'slowShutter';
export type ProtectLightMode = 'always' | 'motion' | 'off';
export type ProtectRecordingMode = 'always' | 'motion' | 'never' | 'schedule';

export interface ProtectChimeRingSettings {
	cameraId?: string;
	volume?: number;
	repeatTimes?: number;
	ringtoneId?: string;
}

export interface UnifiProtectClientOptions {
	host: string;
	apiKey: string;
	requestTimeoutMs?: number;
	logger?: UnifiLogger;
	fetchImpl?: FetchLike;
}

/** What the coordinator needs from the Protect side. */
export interface ProtectEventClient {
	onDeviceUpdate(cb: ProtectDeviceUpdateCallback): void;
	onEventUpdate(cb: ProtectEventUpdateCallback): void;
	startPushConnection(): void;
	stopPushConnection(): void;
	listResource(collection: ProtectCollection): Promise<unknown>;
	getResource(collection: ProtectCollection, id: string): Promise<unknown>;
}

function rawDataToText(data: WebSocket.RawData): string {
	if (Array.isArray(data)) {
		return Buffer.concat(data).toString('utf8');
	}
	if (Buffer.isBuffer(data)) {
		return data.toString('utf8');
	}
	return Buffer.from(data).toString('utf8');
}

export class UnifiProtectClient implements ProtectEventClient {
	private readonly log: UnifiLogger;
	private readonly http: UnifiHttp;
	private readonly host: string;
	private readonly apiKey: string;

	private deviceUpdateCb: ProtectDeviceUpdateCallback | null = null;
	private eventUpdateCb: ProtectEventUpdateCallback | null = null;

	private pushActive = false;
	private readonly sockets = new Map<PushChannel, WebSocket>();
	private readonly reconnectTimers = new Map<PushChannel, NodeJS.Timeout>();
	private readonly reconnectDelays = new Map<PushChannel, number>();

	public constructor(options: UnifiProtectClientOptions) {
		this.log = options.logger ?? createConsoleLogger('unifi-protect');
		this.host = normalizeHost(options.host);
		this.apiKey = options.apiKey;
		this.http = new UnifiHttp({
			host: options.host,
			apiKey: options.apiKey,
			basePath: PROTECT_BASE_PATH,
			requestTimeoutMs: options.requestTimeoutMs ?? 10_000,
			logger: this.log,
			fetchImpl: options.fetchImpl,
			label: 'UnifiProtectClient',
		});
	}

	// ----- Bulk reads -----

	/** Raw body of a list endpoint; callers decode the shape. */
	public listResource(collection: ProtectCollection): Promise<unknown> {
		return this.http.request('GET', `/v1/${collection}`);
	}

	public getResource(collection: ProtectCollection, id: string): Promise<unknown> {
		return this.http.request('GET', `/v1/${collection}/${encodeURIComponent(id)}`);
	}

	// ----- Commands -----

	public async setRecordingMode(cameraId: string, mode: ProtectRecordingMode): Promise<void> {
		await this.patch('cameras', cameraId, { recordingSettings: { mode } });
	}

	public async setHdrMode(cameraId: string, mode: ProtectHdrMode): Promise<void> {
		await this.patch('cameras', cameraId, { hdrType: mode });
	}

	public async setVideoMode(cameraId: string, mode: ProtectVideoMode): Promise<void> {
		await this.patch('cameras', cameraId, { videoMode: mode });
	}

	public async setMicVolume(cameraId: string, volume: number): Promise<void> {
		await this.patch('cameras', cameraId, { micVolume: volume });
	}

	public async setLightMode(lightId: string, mode: ProtectLightMode): Promise<void> {
		await this.patch('lights', lightId, { lightModeSettings: { mode } });
	}

	public async setLightLevel(lightId: string, level: number): Promise<void> {
		await this.patch('lights', lightId, { lightDeviceSettings: { ledLevel: level } });
	}

	public async ptzGotoPreset(cameraId: string, slot: number): Promise<void> {
		await this.http.request('POST', `${this.cameraPath(cameraId)}/ptz/goto/${slot}`);
	}

	public async ptzPatrolStart(cameraId: string, slot: number): Promise<void> {
		await this.http.request('POST', `${this.cameraPath(cameraId)}/ptz/patrol/start/${slot}`);
	}

	public async ptzPatrolStop(cameraId: string): Promise<void> {
		await this.http.request('POST', `${this.cameraPath(cameraId)}/ptz/patrol/stop`);
	}

	public async setChimeRingSettings(chimeId: string, settings: ProtectChimeRingSettings): Promise<void> {
		await this.patch('chimes', chimeId, { ringSettings: [settings] });
	}

	public setChimeVolume(chimeId: string, volume: number, cameraId?: string): Promise<void> {
		return this.setChimeRingSettings(chimeId, { cameraId, volume });
	}

	public setChimeRingtone(chimeId: string, ringtoneId: string, cameraId?: string): Promise<void> {
		return this.setChimeRingSettings(chimeId, { cameraId, ringtoneId });
	}

	public setChimeRepeatTimes(chimeId: string, repeatTimes: number, cameraId?: string): Promise<void> {
		return this.setChimeRingSettings(chimeId, { cameraId, repeatTimes });
	}

	public async playChimeRingtone(chimeId: string, ringtoneId?: string): Promise<void> {
		await this.http.request(
			'POST',
			`/v1/chimes/${encodeURIComponent(chimeId)}/play`,
			ringtoneId === undefined ? {} : { ringtoneId },
		);
	}

	private cameraPath(cameraId: string): string {
		return `/v1/cameras/${encodeURIComponent(cameraId)}`;
	}

	private async patch(collection: ProtectCollection, id: string, body: UnifiRecord): Promise<void> {
		this.log.debug('UnifiProtectClient: PATCH %s/%s keys=%o', collection, id, Object.keys(body));
		await this.http.request('PATCH', `/v1/${collection}/${encodeURIComponent(id)}`, body);
	}

	// ----- Push connection -----

	public onDeviceUpdate(cb: ProtectDeviceUpdateCallback): void {
		this.log.debug('UnifiProtectClient: device update subscriber registered.');
		this.deviceUpdateCb = cb;
	}

	public onEventUpdate(cb: ProtectEventUpdateCallback): void {
		this.log.debug('UnifiProtectClient: event update subscriber registered.');
		this.eventUpdateCb = cb;
	}

	public isPushConnected(): boolean {
		return PUSH_CHANNELS.every(
			(channel) => this.sockets.get(channel)?.readyState === WebSocket.OPEN,
		);
	}

	/** Open both subscribe sockets. Calling it again while active is a no-op. */
	public startPushConnection(): void {
		if (this.pushActive) {
			return;
		}
		this.pushActive = true;
		this.log.info('UnifiProtectClient: starting push connection…');

		for (const channel of PUSH_CHANNELS) {
			this.openSocket(channel);
		}
	}

	public stopPushConnection(): void {
		this.pushActive = false;

		for (const timer of this.reconnectTimers.values()) {
			clearTimeout(timer);
		}
		this.reconnectTimers.clear();

		for (const socket of this.sockets.values()) {
			socket.removeAllListeners();
			socket.on('error', () => undefined);
			socket.terminate();
		}
		this.sockets.clear();
		this.log.info('UnifiProtectClient: push connection stopped.');
	}

	private subscribeUrl(channel: PushChannel): string {
		return `${this.host.replace(/^http/i, 'ws')}${PROTECT_BASE_PATH}/v1/subscribe/${channel}`;
	}

	private openSocket(channel: PushChannel): void {
		const url = this.subscribeUrl(channel);
		this.log.debug('UnifiProtectClient: connecting %s socket to %s', channel, url);

		let socket: WebSocket;
		try {
			socket = new WebSocket(url, { headers: { 'X-API-Key': this.apiKey } });
		} catch (err) {
			this.log.error(
				'UnifiProtectClient: cannot create %s socket: %s',
				channel,
				describeError(err),
			);
			this.scheduleReconnect(channel);
			return;
		}

		this.sockets.set(channel, socket);

		socket.on('open', () => {
			this.reconnectDelays.delete(channel);
			this.log.info('UnifiProtectClient: %s subscription open.', channel);
		});

		socket.on('message', (data: WebSocket.RawData) => {
			this.handleFrame(channel, rawDataToText(data));
		});

		socket.on('close', (code: number) => {
			this.log.warn('UnifiProtectClient: %s subscription closed (code=%d).', channel, code);
			if (this.sockets.get(channel) === socket) {
				this.sockets.delete(channel);
			}
			this.scheduleReconnect(channel);
		});

		socket.on('error', (err: Error) => {
			this.log.warn('UnifiProtectClient: %s socket error: %s', channel, err.message);
		});
	}

	private scheduleReconnect(channel: PushChannel): void {
		if (!this.pushActive || this.reconnectTimers.has(channel)) {
			return;
		}

		const delay = this.reconnectDelays.get(channel) ?? RECONNECT_INITIAL_MS;
		this.reconnectDelays.set(channel, Math.min(delay * 2, RECONNECT_MAX_MS));

		this.log.debug('UnifiProtectClient: reconnecting %s socket in %d ms', channel, delay);

		const timer = setTimeout(() => {
			this.reconnectTimers.delete(channel);
			if (this.pushActive) {
				this.openSocket(channel);
			}
		}, delay);
		this.reconnectTimers.set(channel, timer);
	}

	private handleFrame(channel: PushChannel, text: string): void {
		const message = decodePushMessage(channel, text);
		if (!message) {
			this.log.debug('UnifiProtectClient: ignoring undecodable %s frame (%d bytes)', channel, text.length);
			return;
		}

		if (message.action === 'remove') {
			this.log.debug('UnifiProtectClient: ignoring remove for %s on %s channel', message.kind, channel);
			return;
		}

		try {
			if (channel === 'devices') {
				this.deviceUpdateCb?.(message.kind, message.item);
			} else {
				this.eventUpdateCb?.(message.kind, message.item);
			}
		} catch (err) {
			this.log.error(
				'UnifiProtectClient: %s update handler failed for %s: %s',
				channel,
				message.kind,
				describeError(err),
			);
		}
	}
}

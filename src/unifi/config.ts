// src/unifi/config.ts
// Platform config from config.json, narrowed field by field.

import type { UnifiLogger } from './logger.js';

export interface UnifiPlatformSettings {
	host: string;
	apiKey: string;
	refreshIntervalMs: number;
	requestTimeoutMs: number;
	enableProtect: boolean;
	eventHistorySize: number;
	motionResetMs: number;
	exposeNetworkDevices: boolean;
	exposeCameras: boolean;
}

export const DEFAULT_REFRESH_INTERVAL_SEC = 30;
export const MIN_REFRESH_INTERVAL_SEC = 10;
export const DEFAULT_REQUEST_TIMEOUT_SEC = 10;
export const DEFAULT_EVENT_HISTORY_SIZE = 100;
export const DEFAULT_MOTION_RESET_SEC = 30;

function readText(raw: Record<string, unknown>, key: string): string {
	const value = raw[key];
	return typeof value === 'string' ? value.trim() : '';
}

function readPositive(raw: Record<string, unknown>, key: string, fallback: number): number {
	const value = raw[key];
	const num = typeof value === 'string' ? Number(value) : value;
	if (typeof num !== 'number' || !Number.isFinite(num) || num <= 0) {
		return fallback;
	}
	return num;
}

function readFlag(raw: Record<string, unknown>, key: string, fallback: boolean): boolean {
	const value = raw[key];
	return typeof value === 'boolean' ? value : fallback;
}

/**
 * Returns null when host or apiKey is missing; the platform then stays idle.
 */
export function parsePlatformConfig(
	raw: Record<string, unknown>,
	log: UnifiLogger,
): UnifiPlatformSettings | null {
	const host = readText(raw, 'host');
	const apiKey = readText(raw, 'apiKey');

	if (!host || !apiKey) {
		log.warn('UniFi: host or apiKey missing in config.json; skipping console sync.');
		return null;
	}

	if (!/^https?:\/\//i.test(host)) {
		log.warn('UniFi: host "%s" has no scheme; assuming https://', host);
	}

	const refreshSec = readPositive(raw, 'refreshInterval', DEFAULT_REFRESH_INTERVAL_SEC);
	if (refreshSec < MIN_REFRESH_INTERVAL_SEC) {
		log.warn(
			'UniFi: refreshInterval %d s is below the minimum; using %d s',
			refreshSec,
			MIN_REFRESH_INTERVAL_SEC,
		);
	}

	return {
		host: /^https?:\/\//i.test(host) ? host : `https://${host}`,
		apiKey,
		refreshIntervalMs: Math.max(refreshSec, MIN_REFRESH_INTERVAL_SEC) * 1000,
		requestTimeoutMs: readPositive(raw, 'requestTimeout', DEFAULT_REQUEST_TIMEOUT_SEC) * 1000,
		enableProtect: readFlag(raw, 'enableProtect', true),
		eventHistorySize: Math.floor(readPositive(raw, 'eventHistorySize', DEFAULT_EVENT_HISTORY_SIZE)),
		motionResetMs: readPositive(raw, 'motionResetSeconds', DEFAULT_MOTION_RESET_SEC) * 1000,
		exposeNetworkDevices: readFlag(raw, 'exposeNetworkDevices', true),
		exposeCameras: readFlag(raw, 'exposeCameras', true),
	};
}

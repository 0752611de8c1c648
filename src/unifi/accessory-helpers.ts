// src/unifi/accessory-helpers.ts
import type {
	API,
	Logger,
	PlatformAccessory,
} from 'homebridge';

import type { UnifiCoordinator } from './coordinator.js';
import { lookupDeviceModel } from './device-catalog.js';
import { type UnifiEntity, readString } from './records.js';

// Context stored on the accessory
export type UnifiAccessoryContext = {
	unifi?:
		| { kind: 'network-device'; siteId: string; deviceId: string }
		| { kind: 'protect-camera'; cameraId: string };
	[key: string]: unknown;
};

// Minimal runtime “env” that accessory modules need from the platform
export interface UnifiAccessoryEnv {
	log: Logger;
	api: API;
	coordinator: UnifiCoordinator;
	motionResetMs: number;
}

/**
 * Populate the standard Accessory Information service from a UniFi record.
 * Works for both Network devices and Protect entities.
 */
export function applyAccessoryInformation(
	api: API,
	accessory: PlatformAccessory,
	record: UnifiEntity,
	displayName: string,
): void {
	const infoService = accessory.getService(api.hap.Service.AccessoryInformation);
	if (!infoService) {
		return;
	}

	const Characteristic = api.hap.Characteristic;

	infoService.updateCharacteristic(Characteristic.Name, displayName || accessory.displayName);
	infoService.updateCharacteristic(Characteristic.Manufacturer, 'Ubiquiti');

	// Model: prefer catalog name, then marketName (Protect), then the raw code
	const rawModel = readString(record, 'model') ?? readString(record, 'type');
	const model =
		(rawModel ? lookupDeviceModel(rawModel)?.modelName : undefined) ??
		readString(record, 'marketName') ??
		rawModel ??
		'UniFi Device';
	infoService.updateCharacteristic(Characteristic.Model, model);

	const serial = readString(record, 'macAddress') ?? readString(record, 'mac') ?? record.id;
	infoService.updateCharacteristic(Characteristic.SerialNumber, serial);

	const firmware = readString(record, 'firmwareVersion');
	if (firmware) {
		infoService.updateCharacteristic(Characteristic.FirmwareRevision, firmware);
	}
}

export function displayNameFor(record: UnifiEntity, fallbackPrefix: string): string {
	return readString(record, 'name') ?? `${fallbackPrefix} ${record.id}`;
}

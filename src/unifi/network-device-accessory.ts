// src/unifi/network-device-accessory.ts
import type { PlatformAccessory } from 'homebridge';

import type { UnifiAccessoryContext, UnifiAccessoryEnv } from './accessory-helpers.js';
import { applyAccessoryInformation } from './accessory-helpers.js';
import { describeError } from './errors.js';
import { type UnifiDevice, readString } from './records.js';

const RESTART_SWITCH_RESET_MS = 1_000;

export interface NetworkDeviceStatus {
	/** The console reports the device as ONLINE. */
	online: boolean;
	/** The last refresh failed, so the snapshot may be stale. */
	fault: boolean;
}

export function networkDeviceStatus(device: UnifiDevice | undefined, coordinatorAvailable: boolean): NetworkDeviceStatus {
	return {
		online: device !== undefined && readString(device, 'state') === 'ONLINE',
		fault: !coordinatorAvailable,
	};
}

function applyStatus(env: UnifiAccessoryEnv, accessory: PlatformAccessory, status: NetworkDeviceStatus): void {
	const Characteristic = env.api.hap.Characteristic;
	const service = accessory.getService(env.api.hap.Service.ContactSensor);
	if (!service) {
		return;
	}

	service.updateCharacteristic(
		Characteristic.ContactSensorState,
		status.online
			? Characteristic.ContactSensorState.CONTACT_DETECTED
			: Characteristic.ContactSensorState.CONTACT_NOT_DETECTED,
	);
	service.updateCharacteristic(Characteristic.StatusActive, status.online);
	service.updateCharacteristic(
		Characteristic.StatusFault,
		status.fault ? Characteristic.StatusFault.GENERAL_FAULT : Characteristic.StatusFault.NO_FAULT,
	);
}

/**
 * One accessory per (site, device): a momentary "Restart" switch and an
 * "Online" contact sensor (closed while the console reports the device
 * ONLINE, faulted while refreshes fail).
 */
export function configureNetworkDeviceAccessory(
	env: UnifiAccessoryEnv,
	siteId: string,
	device: UnifiDevice,
	accessory: PlatformAccessory,
	deviceName: string,
): void {
	const Service = env.api.hap.Service;
	const Characteristic = env.api.hap.Characteristic;
	const deviceId = device.id;

	const service =
		accessory.getService(Service.Switch) ||
		accessory.addService(Service.Switch, `${deviceName} Restart`);

	const statusService =
		accessory.getService(Service.ContactSensor) ||
		accessory.addService(Service.ContactSensor, `${deviceName} Online`);

	applyAccessoryInformation(env.api, accessory, device, deviceName);

	const ctx = accessory.context as UnifiAccessoryContext;
	ctx.unifi = { kind: 'network-device', siteId, deviceId };

	const currentStatus = (): NetworkDeviceStatus =>
		networkDeviceStatus(env.coordinator.store.getDevice(siteId, deviceId), env.coordinator.available);

	statusService
		.getCharacteristic(Characteristic.ContactSensorState)
		.onGet(() =>
			currentStatus().online
				? Characteristic.ContactSensorState.CONTACT_DETECTED
				: Characteristic.ContactSensorState.CONTACT_NOT_DETECTED,
		);
	statusService
		.getCharacteristic(Characteristic.StatusActive)
		.onGet(() => currentStatus().online);
	statusService
		.getCharacteristic(Characteristic.StatusFault)
		.onGet(() =>
			currentStatus().fault
				? Characteristic.StatusFault.GENERAL_FAULT
				: Characteristic.StatusFault.NO_FAULT,
		);

	applyStatus(env, accessory, currentStatus());

	service
		.getCharacteristic(Characteristic.On)
		.onGet(() => false)
		.onSet(async (value) => {
			if (value !== true && value !== 1) {
				return;
			}

			env.log.info('UniFi: Restart requested for %s (site=%s, deviceId=%s)', deviceName, siteId, deviceId);

			let accepted = false;
			try {
				accepted = await env.coordinator.restartDevice(siteId, deviceId);
			} catch (err) {
				env.log.warn(
					'UniFi: Restart failed for %s (deviceId=%s): %s',
					deviceName,
					deviceId,
					describeError(err),
				);
				throw new env.api.hap.HapStatusError(
					env.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE,
				);
			} finally {
				setTimeout(() => {
					service.updateCharacteristic(Characteristic.On, false);
				}, RESTART_SWITCH_RESET_MS);
			}

			if (!accepted) {
				env.log.warn('UniFi: console rejected restart for %s (deviceId=%s)', deviceName, deviceId);
			}
		});
}

/** Refresh characteristics that follow the snapshot (firmware, name, online state). */
export function updateNetworkDeviceAccessory(
	env: UnifiAccessoryEnv,
	device: UnifiDevice,
	accessory: PlatformAccessory,
	deviceName: string,
): void {
	applyAccessoryInformation(env.api, accessory, device, deviceName);
	applyStatus(env, accessory, networkDeviceStatus(device, env.coordinator.available));
}

// src/unifi/camera-accessory.ts
import type { Service as HapService, PlatformAccessory } from 'homebridge';

import type { UnifiAccessoryContext, UnifiAccessoryEnv } from './accessory-helpers.js';
import { applyAccessoryInformation } from './accessory-helpers.js';
import {
	type ProtectEntity,
	readBoolean,
	readNumber,
	readRecord,
	readStringArray,
} from './records.js';

export interface CameraAccessoryHandle {
	update(camera: ProtectEntity): void;
	dispose(): void;
}

/** Doorbells report a lastRing timestamp or advertise a chime. */
export function isDoorbellCamera(camera: ProtectEntity): boolean {
	if (readNumber(camera, 'lastRing') !== undefined) {
		return true;
	}
	const flags = readRecord(camera, 'featureFlags');
	return flags !== undefined && readBoolean(flags, 'hasChime') === true;
}

/**
 * Protect camera: MotionSensor driven by lastMotion, plus a Doorbell service
 * for doorbells driven by lastRing. Only timestamps that advance after
 * configuration fire, so a restart does not replay old motion.
 */
export function configureCameraAccessory(
	env: UnifiAccessoryEnv,
	camera: ProtectEntity,
	accessory: PlatformAccessory,
	cameraName: string,
): CameraAccessoryHandle {
	const Service = env.api.hap.Service;
	const Characteristic = env.api.hap.Characteristic;
	const cameraId = camera.id;

	const motionService =
		accessory.getService(Service.MotionSensor) ||
		accessory.addService(Service.MotionSensor, cameraName);

	let doorbellService: HapService | undefined = accessory.getService(Service.Doorbell);
	if (!doorbellService && isDoorbellCamera(camera)) {
		env.log.info('UniFi: adding Doorbell service to %s (cameraId=%s)', cameraName, cameraId);
		doorbellService = accessory.addService(Service.Doorbell, `${cameraName} Doorbell`);
	}

	applyAccessoryInformation(env.api, accessory, camera, cameraName);

	const ctx = accessory.context as UnifiAccessoryContext;
	ctx.unifi = { kind: 'protect-camera', cameraId };

	let motionDetected = false;
	let lastMotion = readNumber(camera, 'lastMotion');
	let lastRing = readNumber(camera, 'lastRing');
	let resetTimer: NodeJS.Timeout | null = null;

	motionService
		.getCharacteristic(Characteristic.MotionDetected)
		.onGet(() => motionDetected);

	const setMotion = (detected: boolean): void => {
		motionDetected = detected;
		motionService.updateCharacteristic(Characteristic.MotionDetected, detected);
	};

	return {
		update(next: ProtectEntity): void {
			applyAccessoryInformation(env.api, accessory, next, cameraName);

			const nextMotion = readNumber(next, 'lastMotion');
			if (nextMotion !== undefined && (lastMotion === undefined || nextMotion > lastMotion)) {
				lastMotion = nextMotion;

				const smartTypes = readStringArray(next, 'lastSmartDetectTypes') ?? [];
				env.log.info(
					'UniFi: motion on %s%s',
					cameraName,
					smartTypes.length > 0 ? ` (${smartTypes.join(', ')})` : '',
				);

				setMotion(true);
				if (resetTimer) {
					clearTimeout(resetTimer);
				}
				resetTimer = setTimeout(() => {
					resetTimer = null;
					setMotion(false);
				}, env.motionResetMs);
			}

			const nextRing = readNumber(next, 'lastRing');
			if (nextRing !== undefined && (lastRing === undefined || nextRing > lastRing)) {
				lastRing = nextRing;
				if (doorbellService) {
					env.log.info('UniFi: doorbell ring on %s', cameraName);
					doorbellService.updateCharacteristic(
						Characteristic.ProgrammableSwitchEvent,
						Characteristic.ProgrammableSwitchEvent.SINGLE_PRESS,
					);
				}
			}
		},

		dispose(): void {
			if (resetTimer) {
				clearTimeout(resetTimer);
				resetTimer = null;
			}
		},
	};
}

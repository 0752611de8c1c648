// src/platform.ts
import type {
	API,
	DynamicPlatformPlugin,
	Logger,
	PlatformAccessory,
	PlatformConfig,
} from 'homebridge';

import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import { type UnifiAccessoryEnv, displayNameFor } from './unifi/accessory-helpers.js';
import { type CameraAccessoryHandle, configureCameraAccessory } from './unifi/camera-accessory.js';
import { parsePlatformConfig } from './unifi/config.js';
import type { UnifiPlatformSettings } from './unifi/config.js';
import { UnifiCoordinator } from './unifi/coordinator.js';
import { describeError } from './unifi/errors.js';
import type { UnifiLogger } from './unifi/logger.js';
import {
	configureNetworkDeviceAccessory,
	updateNetworkDeviceAccessory,
} from './unifi/network-device-accessory.js';
import { UnifiNetworkClient } from './unifi/network-client.js';
import { UnifiProtectClient } from './unifi/protect-client.js';
import { SnapshotStore } from './unifi/snapshot-store.js';

const toUnifiLogger = (log: Logger): UnifiLogger => ({
	debug: log.debug.bind(log),
	info: log.info.bind(log),
	warn: log.warn.bind(log),
	error: log.error.bind(log),
});

export class UnifiInsightsPlatform implements DynamicPlatformPlugin {
	public readonly accessories: PlatformAccessory[] = [];
	public configureAccessory(accessory: PlatformAccessory): void {
		this.log.info('Restoring cached accessory', accessory.displayName);
		this.accessories.push(accessory);
	}
	private readonly log: Logger;
	private readonly api: API;
	private readonly config: PlatformConfig;
	private readonly settings: UnifiPlatformSettings | null;
	private readonly coordinator: UnifiCoordinator | null = null;
	private readonly accessoryEnv: UnifiAccessoryEnv | null = null;

	// accessory UUID -> configured
	private readonly configuredDevices = new Set<string>();
	private readonly cameraHandles = new Map<string, CameraAccessoryHandle>();
	private unsubscribe: (() => void) | null = null;

	constructor(log: Logger, config: PlatformConfig, api: API) {
		this.log = log;
		this.config = config;
		this.api = api;

		const unifiLogger = toUnifiLogger(this.log);
		this.settings = parsePlatformConfig(this.config, unifiLogger);

		if (this.settings) {
			const { host, apiKey, requestTimeoutMs } = this.settings;

			const network = new UnifiNetworkClient({ host, apiKey, requestTimeoutMs, logger: unifiLogger });
			const protect = this.settings.enableProtect
				? new UnifiProtectClient({ host, apiKey, requestTimeoutMs, logger: unifiLogger })
				: null;

			this.coordinator = new UnifiCoordinator(network, protect, {
				refreshIntervalMs: this.settings.refreshIntervalMs,
				logger: unifiLogger,
				store: new SnapshotStore({ eventHistorySize: this.settings.eventHistorySize }),
			});

			this.accessoryEnv = {
				log: this.log,
				api: this.api,
				coordinator: this.coordinator,
				motionResetMs: this.settings.motionResetMs,
			};
		}

		this.log.info(this.config.name ?? PLATFORM_NAME, 'initialized');

		this.api.on('didFinishLaunching', () => {
			this.log.info(PLATFORM_NAME, 'didFinishLaunching');
			void this.startSync();
		});

		this.api.on('shutdown', () => {
			this.unsubscribe?.();
			this.coordinator?.stop();
			for (const handle of this.cameraHandles.values()) {
				handle.dispose();
			}
		});
	}

	private async startSync(): Promise<void> {
		const coordinator = this.coordinator;
		if (!coordinator) {
			return;
		}

		try {
			const outcome = await coordinator.refresh();

			if (outcome.status === 'auth-failed') {
				this.log.error(
					'UniFi: the console rejected the API key (%s). Create a new key, update config.json and restart Homebridge.',
					outcome.error.message,
				);
				return;
			}

			if (outcome.status === 'retryable') {
				this.log.warn(
					'UniFi: initial refresh failed (%s); cached accessories stay until the next successful refresh.',
					outcome.error.message,
				);
			}

			this.syncAccessories();
			this.unsubscribe = coordinator.addListener(() => this.syncAccessories());
			coordinator.start();
		} catch (err) {
			this.log.error('UniFi: startup failed: %s', describeError(err));
		}
	}

	private findOrRegisterAccessory(displayName: string, uuidSeed: string): PlatformAccessory {
		const uuid = this.api.hap.uuid.generate(uuidSeed);

		let accessory = this.accessories.find(acc => acc.UUID === uuid);
		if (!accessory) {
			this.log.info('UniFi: registering new accessory for %s (%s)', displayName, uuidSeed);
			accessory = new this.api.platformAccessory(displayName, uuid);
			this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
			this.accessories.push(accessory);
		}
		return accessory;
	}

	/** Project the snapshot onto accessories; runs after every coordinator mutation. */
	private syncAccessories(): void {
		const env = this.accessoryEnv;
		const coordinator = this.coordinator;
		if (!env || !coordinator || !this.settings) {
			return;
		}

		const store = coordinator.store;

		if (this.settings.exposeNetworkDevices) {
			for (const site of store.getSites()) {
				for (const device of store.getDevices(site.id)) {
					const deviceName = displayNameFor(device, 'UniFi Device');
					const uuidSeed = `unifi-${site.id}-${device.id}`;
					const accessory = this.findOrRegisterAccessory(deviceName, uuidSeed);

					if (!this.configuredDevices.has(accessory.UUID)) {
						configureNetworkDeviceAccessory(env, site.id, device, accessory, deviceName);
						this.configuredDevices.add(accessory.UUID);
					} else {
						updateNetworkDeviceAccessory(env, device, accessory, deviceName);
					}
				}
			}
		}

		if (this.settings.exposeCameras) {
			for (const camera of store.getProtectEntities('cameras')) {
				const cameraName = displayNameFor(camera, 'UniFi Camera');
				const accessory = this.findOrRegisterAccessory(cameraName, `unifi-protect-${camera.id}`);

				const handle = this.cameraHandles.get(accessory.UUID);
				if (handle) {
					handle.update(camera);
				} else {
					this.cameraHandles.set(
						accessory.UUID,
						configureCameraAccessory(env, camera, accessory, cameraName),
					);
				}
			}
		}
	}
}

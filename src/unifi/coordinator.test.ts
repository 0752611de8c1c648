import assert from 'node:assert/strict';
import { beforeEach, describe, it } from 'node:test';

import { UnifiCoordinator } from './coordinator.js';
import { UnifiAuthError, UnifiConnectionError } from './errors.js';
import { silentLogger } from './logger.js';
import type { NetworkResourceClient, UnifiDeviceAction } from './network-client.js';
import type {
	ProtectDeviceUpdateCallback,
	ProtectEventClient,
	ProtectEventUpdateCallback,
} from './protect-client.js';
import type { ProtectCollection } from './protect-payload.js';
import type { UnifiClient, UnifiDevice, UnifiRecord, UnifiSite } from './records.js';

const NOW = new Date('2026-01-01T00:00:00Z');

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

class FakeNetwork implements NetworkResourceClient {
	public sites: UnifiSite[] = [];
	public devices = new Map<string, UnifiDevice[]>();
	public clients = new Map<string, UnifiClient[]>();
	public info = new Map<string, UnifiRecord>();
	public stats = new Map<string, UnifiRecord>();
	/** Keys like "sites", "devices:s1", "info:d1" that should reject. */
	public failures = new Map<string, Error>();
	public calls: string[] = [];
	public commands: string[] = [];
	/** When set, the next listSites call waits for it. */
	public hold: Promise<void> | null = null;
	/** Called as each cycle starts; every cycle lists sites exactly once. */
	public onListSites: (() => void) | null = null;

	public async listSites(): Promise<UnifiSite[]> {
		this.calls.push('sites');
		this.onListSites?.();
		const hold = this.hold;
		this.hold = null;
		if (hold) {
			await hold;
		}
		this.fail('sites');
		return [...this.sites];
	}

	public async listDevices(siteId: string): Promise<UnifiDevice[]> {
		this.calls.push(`devices:${siteId}`);
		this.fail(`devices:${siteId}`);
		return [...(this.devices.get(siteId) ?? [])];
	}

	public async listClients(siteId: string): Promise<UnifiClient[]> {
		this.calls.push(`clients:${siteId}`);
		this.fail(`clients:${siteId}`);
		return [...(this.clients.get(siteId) ?? [])];
	}

	public async getDeviceInfo(_siteId: string, deviceId: string): Promise<UnifiRecord> {
		this.calls.push(`info:${deviceId}`);
		this.fail(`info:${deviceId}`);
		return this.info.get(deviceId) ?? {};
	}

	public async getDeviceStats(_siteId: string, deviceId: string): Promise<UnifiRecord> {
		this.calls.push(`stats:${deviceId}`);
		this.fail(`stats:${deviceId}`);
		return this.stats.get(deviceId) ?? {};
	}

	public async sendDeviceCommand(siteId: string, deviceId: string, action: UnifiDeviceAction): Promise<boolean> {
		this.commands.push(`${action}:${siteId}/${deviceId}`);
		return true;
	}

	private fail(key: string): void {
		const err = this.failures.get(key);
		if (err) {
			throw err;
		}
	}
}

class FakeProtect implements ProtectEventClient {
	public responses = new Map<ProtectCollection, unknown>();
	public listFailures = new Map<ProtectCollection, Error>();
	public details = new Map<string, unknown>();
	public listCalls: ProtectCollection[] = [];
	public pushStarts = 0;
	public pushStops = 0;
	public deviceCb: ProtectDeviceUpdateCallback | null = null;
	public eventCb: ProtectEventUpdateCallback | null = null;

	public onDeviceUpdate(cb: ProtectDeviceUpdateCallback): void {
		this.deviceCb = cb;
	}

	public onEventUpdate(cb: ProtectEventUpdateCallback): void {
		this.eventCb = cb;
	}

	public startPushConnection(): void {
		this.pushStarts += 1;
	}

	public stopPushConnection(): void {
		this.pushStops += 1;
	}

	public async listResource(collection: ProtectCollection): Promise<unknown> {
		this.listCalls.push(collection);
		const err = this.listFailures.get(collection);
		if (err) {
			throw err;
		}
		return this.responses.has(collection) ? this.responses.get(collection) : [];
	}

	public async getResource(collection: ProtectCollection, id: string): Promise<unknown> {
		return this.details.get(`${collection}/${id}`) ?? null;
	}
}

function seedHomeSite(network: FakeNetwork): void {
	network.sites = [{ id: 's1', name: 'Home' }];
	network.devices.set('s1', [
		{ id: 'd1', name: 'Gateway', model: 'UDMPRO' },
		{ id: 'd2', name: 'Office AP', model: 'U6LR' },
	]);
	network.clients.set('s1', [
		{ id: 'c1', name: 'Laptop', uplinkDeviceId: 'd2' },
		{ id: 'c2', name: 'Phone', uplinkDeviceId: 'd2' },
		{ id: 'c3', name: 'NAS', uplinkDeviceId: 'd1' },
		{ id: 'c4', name: 'Printer' },
	]);
	network.info.set('d1', { id: 'd1', firmwareVersion: '4.0.6' });
	network.info.set('d2', { id: 'd2', firmwareVersion: '6.6.55' });
	network.stats.set('d1', { uptimeSec: 100, cpuUtilizationPct: 12 });
	network.stats.set('d2', { uptimeSec: 50 });
}

describe('UnifiCoordinator', () => {
	let network: FakeNetwork;
	let protect: FakeProtect;
	let coordinator: UnifiCoordinator;

	beforeEach(() => {
		network = new FakeNetwork();
		protect = new FakeProtect();
		coordinator = new UnifiCoordinator(network, protect, {
			refreshIntervalMs: 30_000,
			logger: silentLogger,
			now: () => NOW,
		});
	});

	describe('scheduled refresh', () => {
		it('populates sites, devices, clients and per-device stats', async () => {
			seedHomeSite(network);

			const outcome = await coordinator.refresh();

			assert.deepEqual(outcome, { status: 'success', updatedAt: NOW });
			assert.equal(coordinator.available, true);
			assert.equal(coordinator.store.lastUpdate, NOW);

			const { store } = coordinator;
			assert.deepEqual(store.getSites(), [{ id: 's1', name: 'Home' }]);
			assert.deepEqual(store.getDevice('s1', 'd1'), {
				id: 'd1',
				name: 'Gateway',
				model: 'UDMPRO',
				firmwareVersion: '4.0.6',
			});
			assert.equal(store.getClients('s1').length, 4);
			assert.deepEqual(store.getDeviceStats('s1', 'd1'), {
				id: 'd1',
				uptimeSec: 100,
				cpuUtilizationPct: 12,
				clients: [{ id: 'c3', name: 'NAS', uplinkDeviceId: 'd1' }],
			});
			assert.deepEqual(store.getDeviceStats('s1', 'd2'), {
				id: 'd2',
				uptimeSec: 50,
				clients: [
					{ id: 'c1', name: 'Laptop', uplinkDeviceId: 'd2' },
					{ id: 'c2', name: 'Phone', uplinkDeviceId: 'd2' },
				],
			});
		});

		it('keeps base device fields when the info call fails', async () => {
			seedHomeSite(network);
			network.failures.set('info:d1', new UnifiConnectionError('info down'));

			await coordinator.refresh();

			assert.deepEqual(coordinator.store.getDevice('s1', 'd1'), { id: 'd1', name: 'Gateway', model: 'UDMPRO' });
			assert.equal(coordinator.store.getDeviceStats('s1', 'd1')?.uptimeSec, 100);
		});

		it('overwrites stats with an empty entry when the stats call fails', async () => {
			seedHomeSite(network);
			await coordinator.refresh();

			network.failures.set('stats:d1', new UnifiConnectionError('stats down'));
			const outcome = await coordinator.refresh();

			assert.equal(outcome.status, 'success');
			assert.deepEqual(coordinator.store.getDeviceStats('s1', 'd1'), { id: 'd1', clients: [] });
			assert.equal(coordinator.store.getDevice('s1', 'd1')?.firmwareVersion, '4.0.6');
			assert.equal(coordinator.store.getDeviceStats('s1', 'd2')?.clients.length, 2);
		});

		it('keeps the previous nested maps of a site whose listing fails', async () => {
			seedHomeSite(network);
			await coordinator.refresh();
			const previousStats = coordinator.store.getDeviceStats('s1', 'd1');

			network.devices.set('s1', [{ id: 'd9', name: 'New' }]);
			network.failures.set('clients:s1', new UnifiConnectionError('clients down'));
			const outcome = await coordinator.refresh();

			assert.equal(outcome.status, 'success');
			assert.equal(coordinator.available, true);
			assert.equal(coordinator.store.getDevice('s1', 'd9'), undefined);
			assert.equal(coordinator.store.getDevice('s1', 'd1')?.firmwareVersion, '4.0.6');
			assert.equal(coordinator.store.getDeviceStats('s1', 'd1'), previousStats);
			assert.equal(coordinator.store.getClients('s1').length, 4);
		});

		it('keeps healthy sites when another site fails', async () => {
			network.sites = [{ id: 's1' }, { id: 's2' }];
			network.devices.set('s2', [{ id: 'd5' }]);
			network.failures.set('devices:s1', new UnifiConnectionError('devices down'));

			await coordinator.refresh();

			assert.deepEqual(coordinator.store.getDevices('s1'), []);
			assert.deepEqual(coordinator.store.getDevices('s2'), [{ id: 'd5' }]);
			assert.deepEqual(coordinator.store.getDeviceStats('s2', 'd5'), { id: 'd5', clients: [] });
		});

		it('drops sites that disappear from the listing', async () => {
			seedHomeSite(network);
			await coordinator.refresh();

			network.sites = [];
			await coordinator.refresh();

			assert.deepEqual(coordinator.store.getSites(), []);
			assert.equal(coordinator.store.getDevice('s1', 'd1'), undefined);
			assert.equal(coordinator.store.getDeviceStats('s1', 'd1'), undefined);
		});

		it('reports auth failure and recovers on the next good cycle', async () => {
			seedHomeSite(network);
			network.failures.set('sites', new UnifiAuthError('Invalid API key'));

			const failed = await coordinator.refresh();
			assert.equal(failed.status, 'auth-failed');
			assert.equal(coordinator.available, false);

			network.failures.delete('sites');
			const recovered = await coordinator.refresh();
			assert.equal(recovered.status, 'success');
			assert.equal(coordinator.available, true);
		});

		it('keeps prior data when the site listing fails to connect', async () => {
			seedHomeSite(network);
			await coordinator.refresh();

			const err = new UnifiConnectionError('Timeout connecting to console');
			network.failures.set('sites', err);
			const outcome = await coordinator.refresh();

			assert.deepEqual(outcome, { status: 'retryable', error: err });
			assert.equal(coordinator.available, false);
			assert.equal(coordinator.store.lastUpdate, NOW);
			assert.equal(coordinator.store.getDevice('s1', 'd2')?.name, 'Office AP');
		});

		it('treats unexpected errors as retryable', async () => {
			network.failures.set('sites', new Error('boom'));

			const outcome = await coordinator.refresh();

			assert.equal(outcome.status, 'retryable');
			assert.equal(outcome.status === 'retryable' ? outcome.error.message : '', 'boom');
		});

		it('refreshes only the requested site and skips the Protect pass', async () => {
			network.sites = [{ id: 's1' }, { id: 's2' }];

			const outcome = await coordinator.refresh('s2');

			assert.equal(outcome.status, 'success');
			assert.deepEqual(network.calls, ['sites', 'devices:s2', 'clients:s2']);
			assert.deepEqual(protect.listCalls, []);
			assert.equal(protect.pushStarts, 0);
		});

		it('reports a scoped refresh of an unknown site as not found', async () => {
			network.sites = [{ id: 's1' }];

			const outcome = await coordinator.refresh('nope');

			assert.equal(outcome.status, 'not-found');
			assert.equal(coordinator.available, true);
			assert.deepEqual(network.calls, ['sites']);
		});

		it('never interleaves cycles and coalesces requests made during one', async () => {
			seedHomeSite(network);
			network.devices.set('s1', [{ id: 'd1' }]);

			let release = (): void => undefined;
			network.hold = new Promise<void>((resolve) => {
				release = resolve;
			});

			const seenAtNotify: number[] = [];
			coordinator.addListener(() => seenAtNotify.push(network.calls.length));

			const first = coordinator.refresh();
			const second = coordinator.refresh('s1');
			const third = coordinator.refresh();

			assert.equal(second, third);

			release();
			const outcomes = await Promise.all([first, second]);

			const cycle = ['sites', 'devices:s1', 'clients:s1', 'info:d1', 'stats:d1'];
			assert.deepEqual(outcomes.map((outcome) => outcome.status), ['success', 'success']);
			assert.deepEqual(network.calls, [...cycle, ...cycle]);
			assert.deepEqual(seenAtNotify, [5, 10]);
			// The widened follow-up cycle is a full one, so it runs the Protect pass too.
			assert.equal(protect.pushStarts, 2);
		});

		it('joins the queued cycle when a caller refreshes as the running one settles', async () => {
			seedHomeSite(network);

			let active = 0;
			let maxActive = 0;
			network.onListSites = () => {
				active += 1;
				maxActive = Math.max(maxActive, active);
			};
			coordinator.addListener(() => {
				active -= 1;
			});

			let release = (): void => undefined;
			network.hold = new Promise<void>((resolve) => {
				release = resolve;
			});

			const first = coordinator.refresh();
			const chained = first.then(() => coordinator.refresh());
			const second = coordinator.refresh();

			release();
			const [, chainedOutcome, secondOutcome] = await Promise.all([first, chained, second]);

			assert.equal(maxActive, 1);
			assert.equal(network.calls.filter((call) => call === 'sites').length, 2);
			assert.equal(chainedOutcome, secondOutcome);
		});

		it('starts a fresh cycle once the previous one has finished', async () => {
			seedHomeSite(network);
			await coordinator.refresh();
			await coordinator.refresh();

			assert.equal(network.calls.filter((call) => call === 'sites').length, 2);
		});
	});

	describe('schedule', () => {
		const scheduledCoordinator = (): UnifiCoordinator =>
			new UnifiCoordinator(network, null, {
				refreshIntervalMs: 5,
				logger: silentLogger,
				now: () => NOW,
			});

		it('skips scheduled ticks while a cycle is in flight', async () => {
			const scheduled = scheduledCoordinator();

			let release = (): void => undefined;
			network.hold = new Promise<void>((resolve) => {
				release = resolve;
			});

			const manual = scheduled.refresh();
			scheduled.start();
			await sleep(40);

			assert.deepEqual(network.calls, ['sites']);

			scheduled.stop();
			release();
			assert.equal((await manual).status, 'success');
		});

		it('refreshes on each tick and stops when asked', async () => {
			const scheduled = scheduledCoordinator();

			scheduled.start();
			await sleep(40);
			scheduled.stop();

			const cycles = network.calls.length;
			assert.ok(cycles >= 2, `expected at least two scheduled cycles, saw ${cycles}`);

			await sleep(20);
			assert.equal(network.calls.length, cycles);
		});
	});

	describe('Protect bulk pass', () => {
		it('decodes every response shape and keeps going past failures', async () => {
			protect.responses.set('cameras', [{ id: 'cam1', name: 'Porch' }, { name: 'no id' }]);
			protect.responses.set('lights', { data: [{ id: 'l1' }] });
			protect.listFailures.set('sensors', new UnifiConnectionError('sensors down'));
			protect.responses.set('nvrs', 'nvr-1');
			protect.details.set('nvrs/nvr-1', { id: 'nvr-1', name: 'NVR' });
			protect.responses.set('chimes', { unexpected: true });

			const outcome = await coordinator.refresh();

			const { store } = coordinator;
			assert.equal(outcome.status, 'success');
			assert.deepEqual(store.getProtectEntities('cameras'), [{ id: 'cam1', name: 'Porch' }]);
			assert.deepEqual(store.getProtectEntities('lights'), [{ id: 'l1' }]);
			assert.deepEqual(store.getProtectEntities('sensors'), []);
			assert.deepEqual(store.getProtectEntities('nvrs'), [{ id: 'nvr-1', name: 'NVR' }]);
			assert.deepEqual(store.getProtectEntities('chimes'), []);
			assert.deepEqual(
				[...protect.listCalls].sort(),
				['cameras', 'chimes', 'lights', 'nvrs', 'sensors'],
			);
			assert.equal(protect.pushStarts, 1);
		});

		it('stores a single-object response as one entity', async () => {
			protect.responses.set('nvrs', { id: 'nvr-2', version: '4.0' });

			await coordinator.refresh();

			assert.deepEqual(coordinator.store.getProtectEntities('nvrs'), [{ id: 'nvr-2', version: '4.0' }]);
		});

		it('keeps entities learned from push that the bulk list omits', async () => {
			coordinator.handleDeviceUpdate('camera', { id: 'cam9', name: 'Garage' });
			protect.responses.set('cameras', [{ id: 'cam1' }]);

			await coordinator.refresh();

			assert.deepEqual(
				coordinator.store.getProtectEntities('cameras').map((camera) => camera.id),
				['cam9', 'cam1'],
			);
		});

		it('skips Protect entirely without a Protect client', async () => {
			const networkOnly = new UnifiCoordinator(network, null, {
				refreshIntervalMs: 30_000,
				logger: silentLogger,
				now: () => NOW,
			});

			const outcome = await networkOnly.refresh();

			assert.equal(outcome.status, 'success');
			assert.deepEqual(protect.listCalls, []);
		});
	});

	describe('push merge', () => {
		it('replaces a Protect entity wholesale', () => {
			coordinator.handleDeviceUpdate('camera', { id: 'cam1', name: 'Porch', micVolume: 50 });
			coordinator.handleDeviceUpdate('camera', { id: 'cam1', name: 'Front Porch' });

			assert.deepEqual(coordinator.store.getProtectEntities('cameras'), [{ id: 'cam1', name: 'Front Porch' }]);
		});

		it('is idempotent when the same update arrives twice', () => {
			const update = { id: 'l1', modelKey: 'light', isDark: true };
			coordinator.handleDeviceUpdate('light', update);
			coordinator.handleDeviceUpdate('light', update);

			assert.deepEqual(coordinator.store.getProtectEntities('lights'), [update]);
		});

		it('ignores unknown model kinds and payloads without an id', () => {
			let notified = 0;
			coordinator.addListener(() => {
				notified += 1;
			});

			coordinator.handleDeviceUpdate('doorlock', { id: 'x1' });
			coordinator.handleDeviceUpdate('camera', { name: 'no id' });

			assert.equal(notified, 0);
			for (const collection of ['cameras', 'lights', 'sensors', 'nvrs', 'viewers', 'chimes'] as const) {
				assert.deepEqual(coordinator.store.getProtectEntities(collection), []);
			}
		});

		it('routes socket callbacks into the snapshot', () => {
			protect.deviceCb?.('sensor', { id: 'sen1', modelKey: 'sensor' });
			protect.eventCb?.('ring', { id: 'e1', type: 'ring', device: 'nowhere', start: 10 });

			assert.deepEqual(coordinator.store.getProtectEntity('sensors', 'sen1'), { id: 'sen1', modelKey: 'sensor' });
			assert.deepEqual(coordinator.store.getEvent('ring', 'e1'), {
				id: 'e1',
				type: 'ring',
				device: 'nowhere',
				start: 10,
			});
		});

		it('lets plain motion clear an earlier smart detection', () => {
			coordinator.handleDeviceUpdate('camera', { id: 'camX', name: 'Drive' });

			coordinator.handleEventUpdate('smartDetectZone', {
				id: 'e1',
				device: 'camX',
				start: 1000,
				smartDetectTypes: ['person'],
			});
			assert.deepEqual(coordinator.store.getProtectEntity('cameras', 'camX'), {
				id: 'camX',
				name: 'Drive',
				lastMotion: 1000,
				lastSmartDetectTypes: ['person'],
			});

			coordinator.handleEventUpdate('motion', { id: 'e2', device: 'camX', start: 2000 });
			assert.deepEqual(coordinator.store.getProtectEntity('cameras', 'camX'), {
				id: 'camX',
				name: 'Drive',
				lastMotion: 2000,
				lastSmartDetectTypes: [],
			});
		});

		it('defaults smart detection fields it does not receive', () => {
			coordinator.handleDeviceUpdate('camera', { id: 'camX' });
			coordinator.handleEventUpdate('smartDetectZone', { id: 'e1', device: 'camX' });

			assert.deepEqual(coordinator.store.getProtectEntity('cameras', 'camX'), {
				id: 'camX',
				lastMotion: 0,
				lastSmartDetectTypes: [],
			});
		});

		it('applies motion to lights and rings to cameras', () => {
			coordinator.handleDeviceUpdate('light', { id: 'l1' });
			coordinator.handleDeviceUpdate('camera', { id: 'bell' });

			coordinator.handleEventUpdate('motion', { id: 'e1', device: 'l1', start: 500 });
			coordinator.handleEventUpdate('ring', { id: 'e2', device: 'bell', start: 600 });

			assert.deepEqual(coordinator.store.getProtectEntity('lights', 'l1'), { id: 'l1', lastMotion: 500 });
			assert.deepEqual(coordinator.store.getProtectEntity('cameras', 'bell'), { id: 'bell', lastRing: 600 });
		});

		it('stores events for unknown devices without creating entities', () => {
			coordinator.handleEventUpdate('motion', { id: 'e1', device: 'ghost', start: 1 });

			assert.deepEqual(coordinator.store.getEvent('motion', 'e1'), { id: 'e1', device: 'ghost', start: 1 });
			assert.equal(coordinator.store.getProtectEntity('cameras', 'ghost'), undefined);
			assert.equal(coordinator.store.getProtectEntity('lights', 'ghost'), undefined);
		});

		it('drops events without an id', () => {
			let notified = 0;
			coordinator.addListener(() => {
				notified += 1;
			});

			coordinator.handleEventUpdate('motion', { device: 'camX', start: 1 });

			assert.deepEqual(coordinator.store.getEvents('motion'), []);
			assert.equal(notified, 0);
		});
	});

	describe('listeners', () => {
		it('notifies once per cycle, including failed ones', async () => {
			let notified = 0;
			coordinator.addListener(() => {
				notified += 1;
			});

			await coordinator.refresh();
			network.failures.set('sites', new UnifiConnectionError('down'));
			await coordinator.refresh();

			assert.equal(notified, 2);
		});

		it('keeps notifying after a listener throws', () => {
			const calls: string[] = [];
			coordinator.addListener(() => {
				calls.push('first');
				throw new Error('listener bug');
			});
			coordinator.addListener(() => {
				calls.push('second');
			});

			coordinator.handleDeviceUpdate('camera', { id: 'cam1' });

			assert.deepEqual(calls, ['first', 'second']);
		});

		it('stops notifying after unsubscribe', () => {
			let notified = 0;
			const unsubscribe = coordinator.addListener(() => {
				notified += 1;
			});

			coordinator.handleDeviceUpdate('camera', { id: 'cam1' });
			unsubscribe();
			coordinator.handleDeviceUpdate('camera', { id: 'cam2' });

			assert.equal(notified, 1);
		});
	});

	describe('commands', () => {
		it('forwards restart to the Network client', async () => {
			assert.equal(await coordinator.restartDevice('s1', 'd1'), true);
			assert.deepEqual(network.commands, ['RESTART:s1/d1']);
		});

		it('stops the push connection on stop', () => {
			coordinator.stop();
			assert.equal(protect.pushStops, 1);
		});
	});
});

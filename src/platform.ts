// src/platform.ts
import type {
	API,
	DynamicPlatformPlugin,
	Logger,
	PlatformAccessory,
	PlatformConfig,
} from 'homebridge';

import { ConfigError, parsePlatformConfig } from './config.js';
import type { CloudHomeConfig } from './config.js';
import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import type { AccessoryEnv, AccessoryUpdater } from './cloudhome/accessory-helpers.js';
import { CloudAuthClient } from './cloudhome/auth-client.js';
import { configureCoverAccessory } from './cloudhome/cover-accessory.js';
import { describeError } from './cloudhome/errors.js';
import { configureFanAccessory } from './cloudhome/fan-accessory.js';
import { configureLightAccessory } from './cloudhome/light-accessory.js';
import { createMqttConnectionFactory } from './cloudhome/mqtt-connection.js';
import { ProtocolClient } from './cloudhome/protocol-client.js';
import { configureSceneAccessory } from './cloudhome/scene-accessory.js';
import { configureSwitchAccessory } from './cloudhome/switch-accessory.js';
import { SyncEngine } from './cloudhome/sync-engine.js';
import { TokenStore } from './cloudhome/token-store.js';
import { TransportSession } from './cloudhome/transport-session.js';
import type { DeviceView, HomeLogger } from './cloudhome/types.js';

const toHomeLogger = (log: Logger): HomeLogger => ({
	debug: log.debug.bind(log),
	info: log.info.bind(log),
	warn: log.warn.bind(log),
	error: log.error.bind(log),
});

export class CloudHomePlatform implements DynamicPlatformPlugin {
	public readonly accessories: PlatformAccessory[] = [];
	private readonly log: Logger;
	private readonly api: API;
	private readonly homeLog: HomeLogger;
	private readonly settings: CloudHomeConfig | null = null;
	private readonly updaters = new Map<string, AccessoryUpdater>();
	private engine: SyncEngine | null = null;

	constructor(log: Logger, config: PlatformConfig, api: API) {
		this.log = log;
		this.api = api;
		this.homeLog = toHomeLogger(log);

		try {
			this.settings = parsePlatformConfig(config);
		} catch (err) {
			if (!(err instanceof ConfigError)) {
				throw err;
			}
			for (const problem of err.problems) {
				this.log.error('Config: %s', problem);
			}
			this.log.warn('%s is not configured; skipping cloud login.', PLATFORM_NAME);
		}

		this.log.info(this.settings?.name ?? PLATFORM_NAME, 'initialized');

		this.api.on('didFinishLaunching', () => {
			this.log.debug(PLATFORM_NAME, 'didFinishLaunching');
			void this.startSync();
		});

		this.api.on('shutdown', () => {
			const engine = this.engine;
			this.engine = null;
			engine?.close().catch((err: unknown) => {
				this.log.warn('Error while closing the cloud session: %s', describeError(err));
			});
		});
	}

	public configureAccessory(accessory: PlatformAccessory): void {
		this.log.info('Restoring cached accessory', accessory.displayName);
		this.accessories.push(accessory);
	}

	private buildEngine(settings: CloudHomeConfig): SyncEngine {
		const log = this.homeLog;

		const credentials = new CloudAuthClient({
			username: settings.username,
			password: settings.password,
			loginUrl: `${settings.apiUrl}/login`,
			tokenUrl: settings.tokenUrl,
			clientId: settings.clientId,
			timeoutMs: settings.requestTimeoutMs,
			tokenStore: new TokenStore(this.api.user.storagePath(), log),
			logger: log,
		});

		const protocol = new ProtocolClient({
			endpoint: `${settings.apiUrl}/smarthome`,
			credentials,
			timeoutMs: settings.requestTimeoutMs,
			logger: log,
		});

		const mqttClientId = `cloudhome-${this.api.hap.uuid.generate(settings.username).slice(0, 8)}`;
		const transport = new TransportSession({
			credentials,
			connectionFactory: createMqttConnectionFactory({
				host: settings.mqttHost,
				port: settings.mqttPort,
				username: settings.username,
				clientId: mqttClientId,
				authorizerName: settings.authorizerName,
			}, log),
			backoffInitialMs: settings.backoffInitialMs,
			backoffMaxMs: settings.backoffMaxMs,
			logger: log,
		});

		return new SyncEngine({
			protocol,
			transport,
			topicPrefix: settings.topicPrefix,
			stalenessWindowMs: settings.stalenessWindowMs,
			rediscoverIntervalMs: settings.rediscoverIntervalMinutes * 60_000,
			backoffInitialMs: settings.backoffInitialMs,
			backoffMaxMs: settings.backoffMaxMs,
			logger: log,
		});
	}

	private async startSync(): Promise<void> {
		const settings = this.settings;
		if (!settings) {
			return;
		}

		const engine = this.buildEngine(settings);
		this.engine = engine;

		const env: AccessoryEnv = {
			log: this.homeLog,
			api: this.api,
			controller: engine,
			coverSnapToEnds: settings.coverSnapToEnds,
		};

		engine.onDeviceDiscovered((view) => this.configureDevice(env, view));
		engine.onDeviceRemoved((deviceId) => this.unregisterDevice(deviceId));
		engine.onStateChanged((change) => {
			const view = engine.getDevice(change.deviceId);
			const update = this.updaters.get(change.deviceId);
			if (view && update) {
				update(view);
			}
		});
		engine.onUnavailable((err) => {
			this.log.error(
				'%s: cloud session ended (%s). Check username/password and restart Homebridge.',
				PLATFORM_NAME,
				err.message,
			);
		});

		try {
			await engine.start();
		} catch (err) {
			this.log.error('Cloud sync failed to start: %s', describeError(err));
			await engine.close();
			if (this.engine === engine) {
				this.engine = null;
			}
			return;
		}

		// Shut down before discovery finished.
		if (this.engine !== engine) {
			return;
		}
		this.pruneCachedAccessories(engine);
	}

	private accessoryUuid(deviceId: string): string {
		return this.api.hap.uuid.generate(`cloudhome-${deviceId}`);
	}

	private configureDevice(env: AccessoryEnv, view: DeviceView): void {
		const { device } = view;
		const uuid = this.accessoryUuid(device.id);

		let accessory = this.accessories.find((acc) => acc.UUID === uuid);
		if (accessory) {
			this.log.info('Using cached accessory for %s (%s)', device.name, device.id);
		} else {
			this.log.info('Registering new accessory for %s (%s)', device.name, device.id);
			accessory = new this.api.platformAccessory(device.name, uuid);
			this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
			this.accessories.push(accessory);
		}

		accessory.context.deviceId = device.id;
		accessory.context.deviceClass = device.deviceClass;

		this.log.info('Configuring %s as %s (capabilities: %s)', device.name, device.deviceClass, device.capabilities.join(', '));

		let update: AccessoryUpdater;
		switch (device.deviceClass) {
		case 'light':
			update = configureLightAccessory(env, accessory, device);
			break;
		case 'switch':
			update = configureSwitchAccessory(env, accessory, device);
			break;
		case 'fan':
			update = configureFanAccessory(env, accessory, device);
			break;
		case 'cover':
			update = configureCoverAccessory(env, accessory, device);
			break;
		case 'scene':
			update = configureSceneAccessory(env, accessory, device);
			break;
		}

		this.updaters.set(device.id, update);
		this.api.updatePlatformAccessories([accessory]);
		update(view);
	}

	private unregisterDevice(deviceId: string): void {
		const uuid = this.accessoryUuid(deviceId);
		const index = this.accessories.findIndex((acc) => acc.UUID === uuid);
		this.updaters.delete(deviceId);
		if (index < 0) {
			return;
		}
		const [accessory] = this.accessories.splice(index, 1);
		this.log.info('Removing accessory %s; the device is no longer in the account.', accessory.displayName);
		this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
	}

	/** Cached accessories whose device did not come back from SYNC. */
	private pruneCachedAccessories(engine: SyncEngine): void {
		const known = new Set(engine.listDevices().map((view) => this.accessoryUuid(view.device.id)));
		const stale = this.accessories.filter((acc) => !known.has(acc.UUID));
		if (stale.length === 0) {
			return;
		}

		for (const accessory of stale) {
			this.log.info('Removing cached accessory %s; no matching device.', accessory.displayName);
		}
		this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
		this.accessories.splice(0, this.accessories.length, ...this.accessories.filter((acc) => known.has(acc.UUID)));
	}
}

// src/cloudhome/sync-engine.ts
//
// Wires the protocol client, push transport, reconciler and command
// serializer together for one account session.

import { v4 as uuidv4 } from 'uuid';

import { CommandSerializer } from './command-serializer.js';
import { DeviceRegistry } from './device-registry.js';
import { AuthError, ExecuteError, describeError } from './errors.js';
import type { SessionUnavailableError } from './errors.js';
import { ListenerSet } from './listener-set.js';
import type { DeviceProtocol } from './protocol-client.js';
import { decodePush, deviceTopic } from './push-codec.js';
import { Reconciler } from './reconciler.js';
import type { DiscoveryResult } from './reconciler.js';
import { DEFAULT_BACKOFF_INITIAL_MS, DEFAULT_BACKOFF_MAX_MS } from './transport-session.js';
import type { PushTransport } from './transport-session.js';
import { CAPABILITY_NAMES, createConsoleLogger, hasCapability } from './types.js';
import type {
	Command,
	DeviceView,
	HomeLogger,
	StateChange,
	StateSnapshot,
	StateValues,
} from './types.js';

export const DEFAULT_STALENESS_WINDOW_MS = 30_000;

export interface SyncEngineOptions {
	protocol: DeviceProtocol;
	transport: PushTransport;
	topicPrefix: string;
	stalenessWindowMs?: number;
	/** 0 disables periodic rediscovery. */
	rediscoverIntervalMs?: number;
	/** Retry delays for a failed first SYNC. */
	backoffInitialMs?: number;
	backoffMaxMs?: number;
	now?: () => number;
	newToken?: () => string;
	logger?: HomeLogger;
}

export class SyncEngine {
	public readonly registry: DeviceRegistry;
	public readonly reconciler: Reconciler;

	private readonly log: HomeLogger;
	private readonly now: () => number;
	private readonly newToken: () => string;
	private readonly stalenessWindowMs: number;
	private readonly backoffInitialMs: number;
	private readonly backoffMaxMs: number;
	private readonly serializer: CommandSerializer;
	private readonly unavailable: ListenerSet<[SessionUnavailableError]>;
	private readonly subscribed = new Set<string>();
	private readonly detach: Array<() => void> = [];

	private rediscoverTimer: ReturnType<typeof setInterval> | null = null;
	private retryTimer: ReturnType<typeof setTimeout> | null = null;
	private wakeRetry: (() => void) | null = null;
	private started = false;
	private closed = false;

	public constructor(private readonly options: SyncEngineOptions) {
		this.log = options.logger ?? createConsoleLogger('cloudhome-engine');
		this.now = options.now ?? Date.now;
		this.newToken = options.newToken ?? (() => uuidv4());
		this.stalenessWindowMs = options.stalenessWindowMs ?? DEFAULT_STALENESS_WINDOW_MS;
		this.backoffInitialMs = options.backoffInitialMs ?? DEFAULT_BACKOFF_INITIAL_MS;
		this.backoffMaxMs = options.backoffMaxMs ?? DEFAULT_BACKOFF_MAX_MS;

		this.registry = new DeviceRegistry(this.log);
		this.reconciler = new Reconciler(this.registry, this.log);
		this.serializer = new CommandSerializer({
			protocol: options.protocol,
			reconciler: this.reconciler,
			beforeDispatch: (command) => this.refreshIfStale(command.deviceId),
			logger: this.log,
		});
		this.unavailable = new ListenerSet<[SessionUnavailableError]>(this.log, 'unavailable');
	}

	public onDeviceDiscovered(listener: (view: DeviceView) => void): () => void {
		return this.registry.onDeviceDiscovered(listener);
	}

	public onDeviceRemoved(listener: (deviceId: string) => void): () => void {
		return this.registry.onDeviceRemoved(listener);
	}

	public onStateChanged(listener: (change: StateChange) => void): () => void {
		return this.registry.onStateChanged(listener);
	}

	public onUnavailable(listener: (err: SessionUnavailableError) => void): () => void {
		return this.unavailable.add(listener);
	}

	public getDevice(deviceId: string): DeviceView | undefined {
		return this.registry.get(deviceId);
	}

	public listDevices(): DeviceView[] {
		return this.registry.list();
	}

	/**
	 * SYNC, backfill state with QUERY, subscribe every device topic, then
	 * open the push session. A failed SYNC is retried with backoff until it
	 * succeeds; only an AuthError rejects. Stops early if close() runs.
	 */
	public async start(): Promise<void> {
		if (this.started || this.closed) {
			return;
		}
		this.started = true;

		const { transport } = this.options;
		this.detach.push(
			transport.onDisconnected(() => this.handleDisconnected()),
			transport.onReconnected(() => this.handleReconnected()),
			transport.onUnavailable((err) => this.handleUnavailable(err)),
		);

		const result = await this.discoverUntilListed();
		if (!result || this.closed) {
			return;
		}
		this.log.info('Discovered %d device(s).', result.added.length);

		await this.refresh();
		if (this.closed) {
			return;
		}
		await transport.start();
		if (this.closed) {
			return;
		}

		const interval = this.options.rediscoverIntervalMs ?? 0;
		if (interval > 0) {
			this.rediscoverTimer = setInterval(() => {
				this.rediscover(true).catch((err: unknown) => {
					this.log.warn('Periodic rediscovery failed: %s', describeError(err));
				});
			}, interval);
		}
	}

	/** SYNC again; new devices are subscribed and queried. */
	public async rediscover(prune = true): Promise<DiscoveryResult> {
		const at = this.now();
		const devices = await this.options.protocol.discover();
		const result = this.reconciler.applyDiscovery(devices, at, prune);

		for (const id of result.removed) {
			await this.unsubscribeDevice(id);
		}
		for (const id of this.registry.ids()) {
			await this.subscribeDevice(id);
		}

		if (this.started && prune && result.added.length > 0) {
			await this.refresh(result.added);
		}
		return result;
	}

	/**
	 * QUERY the given devices (default: every device that reports state) and
	 * merge the results. Failures are logged; the devices keep their state.
	 */
	public async refresh(deviceIds?: readonly string[]): Promise<void> {
		const ids = (deviceIds ?? this.registry.ids()).filter((id) => this.registry.get(id)?.device.reportsState);
		if (ids.length === 0) {
			return;
		}

		const order = { at: this.now() };
		let snapshots: Map<string, StateSnapshot>;
		try {
			snapshots = await this.options.protocol.query(ids);
		} catch (err) {
			this.log.warn('QUERY for %d device(s) failed: %s', ids.length, describeError(err));
			return;
		}

		for (const [id, snapshot] of snapshots) {
			this.reconciler.applyFullSnapshot(id, snapshot, order, 'query');
		}
	}

	/**
	 * Validate and queue a command. Rejects with ExecuteError('rejected') for
	 * unknown devices or capabilities the device does not declare.
	 */
	public submitCommand(deviceId: string, changes: StateValues): Promise<StateSnapshot> {
		if (this.closed) {
			return Promise.reject(new ExecuteError('session-closed', 'session is closed'));
		}

		const view = this.registry.get(deviceId);
		if (!view) {
			return Promise.reject(new ExecuteError('rejected', `unknown device ${deviceId}`));
		}

		const requested = CAPABILITY_NAMES.filter((name) => changes[name] !== undefined);
		if (requested.length === 0) {
			return Promise.reject(new ExecuteError('rejected', `command for ${deviceId} changes nothing`));
		}
		const unsupported = requested.filter((name) => !hasCapability(view.device, name));
		if (unsupported.length > 0) {
			return Promise.reject(new ExecuteError(
				'rejected',
				`${view.device.name} does not support ${unsupported.join(', ')}`,
			));
		}
		const command: Command = {
			deviceId,
			changes: { ...changes },
			token: this.newToken(),
			issuedAt: this.now(),
		};
		return this.serializer.submit(command);
	}

	/** Tear the session down; pending commands fail with session-closed. */
	public async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;

		if (this.rediscoverTimer) {
			clearInterval(this.rediscoverTimer);
			this.rediscoverTimer = null;
		}
		if (this.retryTimer) {
			clearTimeout(this.retryTimer);
			this.retryTimer = null;
		}
		this.wakeRetry?.();
		this.wakeRetry = null;
		this.serializer.close();
		for (const detach of this.detach.splice(0)) {
			detach();
		}
		await this.options.transport.disconnect();
		this.unavailable.clear();
		this.registry.removeAllListeners();
		this.log.info('Sync engine closed.');
	}

	private async discoverUntilListed(): Promise<DiscoveryResult | null> {
		for (let attempt = 0; ; attempt++) {
			try {
				return await this.rediscover(false);
			} catch (err) {
				if (this.closed) {
					return null;
				}
				if (err instanceof AuthError) {
					throw err;
				}
				const delay = Math.min(this.backoffInitialMs * 2 ** attempt, this.backoffMaxMs);
				this.log.warn('Initial SYNC failed: %s; retrying in %d ms.', describeError(err), delay);
				await this.pause(delay);
				if (this.closed) {
					return null;
				}
			}
		}
	}

	private pause(ms: number): Promise<void> {
		return new Promise<void>((resolve) => {
			this.wakeRetry = resolve;
			this.retryTimer = setTimeout(() => {
				this.retryTimer = null;
				this.wakeRetry = null;
				resolve();
			}, ms);
		});
	}

	private async subscribeDevice(deviceId: string): Promise<void> {
		if (this.subscribed.has(deviceId)) {
			return;
		}
		this.subscribed.add(deviceId);

		const topic = deviceTopic(this.options.topicPrefix, deviceId);
		try {
			await this.options.transport.subscribe(topic, (incoming, payload) => this.handlePush(incoming, payload));
		} catch (err) {
			this.subscribed.delete(deviceId);
			this.log.warn('Failed to subscribe to %s: %s', topic, describeError(err));
		}
	}

	private async unsubscribeDevice(deviceId: string): Promise<void> {
		if (!this.subscribed.delete(deviceId)) {
			return;
		}
		const topic = deviceTopic(this.options.topicPrefix, deviceId);
		try {
			await this.options.transport.unsubscribe(topic);
		} catch (err) {
			this.log.warn('Failed to unsubscribe from %s: %s', topic, describeError(err));
		}
	}

	private handlePush(topic: string, payload: Buffer): void {
		const delta = decodePush(topic, payload, {
			topicPrefix: this.options.topicPrefix,
			logger: this.log,
			now: this.now,
		});
		if (delta) {
			this.reconciler.applyPushDelta(delta);
		}
	}

	private handleDisconnected(): void {
		this.log.warn('Push channel lost; device state is stale until it reconnects.');
		this.reconciler.markStale(this.now());
	}

	private handleReconnected(): void {
		const stale = this.registry.list()
			.filter((view) => view.staleSince !== null)
			.map((view) => view.device.id);
		this.log.info('Push channel restored; refreshing %d stale device(s).', stale.length);

		this.refresh(stale).catch((err: unknown) => {
			this.log.warn('Refresh after reconnect failed: %s', describeError(err));
		});
	}

	private handleUnavailable(err: SessionUnavailableError): void {
		this.log.error('Cloud session unavailable: %s', err.message);
		this.serializer.close();
		this.unavailable.emit(err);
	}

	private async refreshIfStale(deviceId: string): Promise<void> {
		const view = this.registry.get(deviceId);
		if (!view || view.staleSince === null) {
			return;
		}
		if (this.now() - view.staleSince < this.stalenessWindowMs) {
			return;
		}
		this.log.debug('%s has been stale for over %d ms; refreshing before the command.', deviceId, this.stalenessWindowMs);
		await this.refresh([deviceId]);
	}
}

// src/cloudhome/reconciler.ts
//
// The only writer of the DeviceRegistry. Merges discovery, query results,
// execute results and push deltas under one ordering rule:
//
//   - discovery sets the capability set and never overwrites a value;
//   - query / execute-result replace the device's state, except for a
//     capability where a strictly later push has already been merged;
//   - a push updates only the capabilities it mentions, and is discarded
//     for a capability whose last merged event is newer.
//
// Merges are synchronous and never throw.

import { copyCapability, defaultValue, validateDevice, writeCapability } from './device-catalog.js';
import type { DeviceRegistry, RegistryEntry } from './device-registry.js';
import { MergeDrop } from './errors.js';
import { capabilitiesOf, compareOrder, createConsoleLogger } from './types.js';
import type {
	CapabilityName,
	Command,
	Device,
	EventOrder,
	HomeLogger,
	PushDelta,
	StateChange,
	StateSnapshot,
	StateValues,
} from './types.js';

export type SnapshotSource = 'query' | 'execute-result';

export interface DiscoveryResult {
	added: string[];
	updated: string[];
	removed: string[];
	rejected: MergeDrop[];
}

function initialValues(device: Device): StateValues {
	const values: StateValues = {};
	for (const capability of capabilitiesOf(device)) {
		writeCapability(values, capability, defaultValue(capability));
	}
	return values;
}

function laterOf(a: EventOrder | undefined, b: EventOrder): EventOrder {
	return a && compareOrder(a, b) > 0 ? a : b;
}

export class Reconciler {
	private readonly log: HomeLogger;

	public constructor(
		private readonly registry: DeviceRegistry,
		logger?: HomeLogger,
	) {
		this.log = logger ?? createConsoleLogger('cloudhome-reconciler');
	}

	/**
	 * Merge a SYNC result. With `prune`, devices no longer listed are removed.
	 */
	public applyDiscovery(devices: readonly Device[], at: number, prune = false): DiscoveryResult {
		const result: DiscoveryResult = { added: [], updated: [], removed: [], rejected: [] };
		const listed = new Set<string>();

		for (const device of devices) {
			try {
				validateDevice(device);
			} catch (err) {
				if (err instanceof MergeDrop) {
					this.log.warn('Reconciler: dropping device %s: %s', err.deviceId, err.message);
					result.rejected.push(err);
					continue;
				}
				throw err;
			}

			listed.add(device.id);
			const outcome = this.registry.putDevice(device, at, initialValues);
			if (outcome === 'added') {
				result.added.push(device.id);
			} else if (outcome === 'updated') {
				result.updated.push(device.id);
			}
		}

		if (prune) {
			for (const id of this.registry.ids()) {
				if (!listed.has(id) && this.registry.remove(id)) {
					result.removed.push(id);
				}
			}
		}

		return result;
	}

	/**
	 * Merge a full snapshot from QUERY or EXECUTE. `order` is when the snapshot
	 * was requested (or the command issued).
	 */
	public applyFullSnapshot(
		deviceId: string,
		snapshot: StateSnapshot,
		order: EventOrder,
		source: SnapshotSource,
	): StateChange | null {
		if (!this.registry.has(deviceId)) {
			this.drop(new MergeDrop('unknown-device', deviceId, `${source} for unknown device ${deviceId}`));
			return null;
		}

		return this.registry.update(deviceId, source === 'query' ? 'query' : 'command', order.at, (entry) => {
			this.mergeSnapshot(entry, snapshot, order);
			return true;
		});
	}

	public applyPushDelta(delta: PushDelta): StateChange | null {
		if (!this.registry.has(delta.deviceId)) {
			this.drop(new MergeDrop('unknown-device', delta.deviceId, `push for unknown device ${delta.deviceId}`));
			return null;
		}

		return this.registry.update(delta.deviceId, 'push', delta.order.at, (entry) => {
			let merged = false;
			let discarded = 0;
			const mentioned: CapabilityName[] = [];

			for (const capability of capabilitiesOf(entry.device)) {
				const value = delta.values[capability];
				if (value === undefined) {
					continue;
				}
				mentioned.push(capability);

				const clock = entry.clocks[capability];
				if (clock && compareOrder(delta.order, clock) < 0) {
					discarded++;
					continue;
				}

				copyCapability(entry.confirmed, delta.values, capability);
				entry.clocks[capability] = laterOf(clock, delta.order);
				entry.pushClocks[capability] = laterOf(entry.pushClocks[capability], delta.order);
				merged = true;

				// A push at or after the command's issue time supersedes its optimistic value.
				if (entry.pendingIssuedAt !== null && delta.order.at >= entry.pendingIssuedAt) {
					delete entry.pending[capability];
				}
			}

			if (mentioned.length > 0 && discarded === mentioned.length) {
				this.drop(new MergeDrop(
					'stale-event',
					delta.deviceId,
					`push at ${delta.order.at} is older than state already merged`,
				));
				return false;
			}

			// A push carrying values comes from a reachable device unless it says otherwise.
			const online = delta.online ?? (merged ? true : undefined);
			if (online !== undefined && online !== entry.online) {
				entry.online = online;
				merged = true;
			}

			if (entry.staleSince !== null) {
				entry.staleSince = null;
				merged = true;
			}

			return merged;
		});
	}

	/** Overlay a command's changes as pending before it is dispatched. */
	public applyOptimistic(command: Command): StateChange | null {
		return this.registry.update(command.deviceId, 'command-pending', command.issuedAt, (entry) => {
			entry.pendingToken = command.token;
			entry.pendingIssuedAt = command.issuedAt;
			entry.pending = {};
			for (const capability of capabilitiesOf(entry.device)) {
				if (command.changes[capability] !== undefined) {
					copyCapability(entry.pending, command.changes, capability);
				}
			}
			return true;
		});
	}

	/**
	 * Replace the optimistic overlay with the authoritative result in a single
	 * merge, so subscribers see one notification. The device answered, so it
	 * is online unless the result says otherwise.
	 */
	public confirmCommand(command: Command, snapshot: StateSnapshot): StateChange | null {
		return this.registry.update(command.deviceId, 'command', command.issuedAt, (entry) => {
			this.clearPending(entry, command.token);
			this.mergeSnapshot(entry, snapshot, { at: command.issuedAt });
			entry.online = snapshot.online ?? true;
			return true;
		});
	}

	/** Discard the optimistic overlay; visible state returns to the confirmed values. */
	public rollbackCommand(command: Command): StateChange | null {
		return this.registry.update(command.deviceId, 'command', command.issuedAt, (entry) => {
			return this.clearPending(entry, command.token);
		});
	}

	public markOffline(deviceId: string, at: number): StateChange | null {
		return this.registry.update(deviceId, 'query', at, (entry) => {
			if (!entry.online) {
				return false;
			}
			entry.online = false;
			return true;
		});
	}

	/** Transport dropped: every device is stale until a push or query refreshes it. */
	public markStale(at: number): void {
		for (const id of this.registry.ids()) {
			this.registry.update(id, 'push', at, (entry) => {
				if (entry.staleSince === null) {
					entry.staleSince = at;
				}
				return false;
			});
		}
	}

	private clearPending(entry: RegistryEntry, token: string): boolean {
		if (entry.pendingToken !== token) {
			return false;
		}
		entry.pending = {};
		entry.pendingToken = null;
		entry.pendingIssuedAt = null;
		return true;
	}

	private mergeSnapshot(entry: RegistryEntry, snapshot: StateSnapshot, order: EventOrder): void {
		for (const capability of capabilitiesOf(entry.device)) {
			if (snapshot.values[capability] === undefined) {
				continue;
			}
			const pushClock = entry.pushClocks[capability];
			if (pushClock && compareOrder(pushClock, order) > 0) {
				continue;
			}
			copyCapability(entry.confirmed, snapshot.values, capability);
			entry.clocks[capability] = laterOf(entry.clocks[capability], order);
		}

		if (snapshot.online !== undefined) {
			entry.online = snapshot.online;
		}
		entry.everSynced = true;
		entry.staleSince = null;
	}

	private drop(drop: MergeDrop): void {
		if (drop.reason === 'stale-event') {
			this.log.debug('Reconciler: %s (%s)', drop.message, drop.reason);
		} else {
			this.log.warn('Reconciler: %s (%s)', drop.message, drop.reason);
		}
	}
}

// src/cloudhome/device-registry.ts
//
// Local mirror of every device's state. Readers get copies; all writes go
// through update(), which is only called by the Reconciler.

import { copyCapability } from './device-catalog.js';
import { ListenerSet } from './listener-set.js';
import { capabilitiesOf, createConsoleLogger } from './types.js';
import type {
	Authority,
	CapabilityName,
	Device,
	DeviceLifecycle,
	DeviceView,
	EventOrder,
	HomeLogger,
	StateChange,
	StateValues,
	UpdateSource,
} from './types.js';

export interface RegistryEntry {
	device: Device;
	confirmed: StateValues;
	/** Optimistic values of the command in flight. */
	pending: StateValues;
	pendingToken: string | null;
	pendingIssuedAt: number | null;
	/** Order of the last event merged into each capability. */
	clocks: Partial<Record<CapabilityName, EventOrder>>;
	/** Order of the last push merged into each capability. */
	pushClocks: Partial<Record<CapabilityName, EventOrder>>;
	online: boolean;
	lastUpdated: number;
	lastSource: UpdateSource;
	staleSince: number | null;
	everSynced: boolean;
}

export type LifecycleListener = (deviceId: string, from: DeviceLifecycle, to: DeviceLifecycle) => void;

interface VisibleState {
	values: StateValues;
	authority: Partial<Record<CapabilityName, Authority>>;
	lifecycle: DeviceLifecycle;
	online: boolean;
}

export function lifecycleOf(entry: RegistryEntry): DeviceLifecycle {
	if (entry.pendingToken !== null) {
		return 'command-pending';
	}
	if (entry.staleSince !== null) {
		return 'stale';
	}
	return entry.everSynced ? 'synced' : 'discovered';
}

function visibleValues(entry: RegistryEntry): StateValues {
	const values: StateValues = {};
	for (const capability of capabilitiesOf(entry.device)) {
		copyCapability(values, entry.confirmed, capability);
		if (entry.pending[capability] !== undefined) {
			copyCapability(values, entry.pending, capability);
		}
	}
	return values;
}

function authorityOf(entry: RegistryEntry): Partial<Record<CapabilityName, Authority>> {
	const authority: Partial<Record<CapabilityName, Authority>> = {};
	for (const capability of capabilitiesOf(entry.device)) {
		if (entry.pending[capability] !== undefined) {
			authority[capability] = 'pending';
		} else if (entry.confirmed[capability] !== undefined) {
			authority[capability] = 'confirmed';
		}
	}
	return authority;
}

function visibleState(entry: RegistryEntry): VisibleState {
	return {
		values: visibleValues(entry),
		authority: authorityOf(entry),
		lifecycle: lifecycleOf(entry),
		online: entry.online,
	};
}

export class DeviceRegistry {
	private readonly log: HomeLogger;
	private readonly entries = new Map<string, RegistryEntry>();

	private readonly discovered: ListenerSet<[DeviceView]>;
	private readonly removed: ListenerSet<[string]>;
	private readonly stateChanged: ListenerSet<[StateChange]>;
	private readonly lifecycleChanged: ListenerSet<Parameters<LifecycleListener>>;

	public constructor(logger?: HomeLogger) {
		this.log = logger ?? createConsoleLogger('cloudhome-registry');
		this.discovered = new ListenerSet<[DeviceView]>(this.log, 'deviceDiscovered');
		this.removed = new ListenerSet<[string]>(this.log, 'deviceRemoved');
		this.stateChanged = new ListenerSet<[StateChange]>(this.log, 'stateChanged');
		this.lifecycleChanged = new ListenerSet<Parameters<LifecycleListener>>(this.log, 'lifecycleChanged');
	}

	public onDeviceDiscovered(listener: (view: DeviceView) => void): () => void {
		return this.discovered.add(listener);
	}

	public onDeviceRemoved(listener: (deviceId: string) => void): () => void {
		return this.removed.add(listener);
	}

	public onStateChanged(listener: (change: StateChange) => void): () => void {
		return this.stateChanged.add(listener);
	}

	public onLifecycleChanged(listener: LifecycleListener): () => void {
		return this.lifecycleChanged.add(listener);
	}

	public has(deviceId: string): boolean {
		return this.entries.has(deviceId);
	}

	public get size(): number {
		return this.entries.size;
	}

	public ids(): string[] {
		return [...this.entries.keys()];
	}

	public get(deviceId: string): DeviceView | undefined {
		const entry = this.entries.get(deviceId);
		return entry ? this.toView(entry) : undefined;
	}

	public list(): DeviceView[] {
		return [...this.entries.values()].map((entry) => this.toView(entry));
	}

	/**
	 * Insert a new device, or replace the descriptor of a known one. Existing
	 * state is kept. Notifies discovery listeners when the device is new or its
	 * descriptor changed.
	 */
	public putDevice(
		device: Device,
		at: number,
		initialValues: (device: Device) => StateValues,
	): 'added' | 'updated' | 'unchanged' {
		const existing = this.entries.get(device.id);

		if (!existing) {
			const entry: RegistryEntry = {
				device,
				confirmed: initialValues(device),
				pending: {},
				pendingToken: null,
				pendingIssuedAt: null,
				clocks: {},
				pushClocks: {},
				online: true,
				lastUpdated: at,
				lastSource: 'discovery',
				staleSince: null,
				everSynced: false,
			};
			this.entries.set(device.id, entry);
			this.log.debug('Registry: added %s (%s) "%s".', device.id, device.deviceClass, device.name);
			this.discovered.emit(this.toView(entry));
			return 'added';
		}

		if (JSON.stringify(existing.device) === JSON.stringify(device)) {
			return 'unchanged';
		}

		this.update(device.id, 'discovery', at, (entry) => {
			entry.device = device;
			const defaults = initialValues(device);
			const kept: StateValues = {};
			for (const capability of capabilitiesOf(device)) {
				copyCapability(kept, entry.confirmed[capability] !== undefined ? entry.confirmed : defaults, capability);
			}
			entry.confirmed = kept;

			const pending: StateValues = {};
			for (const capability of capabilitiesOf(device)) {
				copyCapability(pending, entry.pending, capability);
			}
			entry.pending = pending;
			return true;
		});

		const updated = this.entries.get(device.id);
		if (updated) {
			this.discovered.emit(this.toView(updated));
		}
		return 'updated';
	}

	public remove(deviceId: string): boolean {
		if (!this.entries.delete(deviceId)) {
			return false;
		}
		this.log.debug('Registry: removed %s.', deviceId);
		this.removed.emit(deviceId);
		return true;
	}

	/**
	 * Apply one merge. The mutator returns false when the event turned out to
	 * be a no-op (nothing merged); lastUpdated/lastSource are then left alone.
	 * Subscribers hear only about capabilities whose visible value or
	 * authority changed.
	 */
	public update(
		deviceId: string,
		source: UpdateSource,
		at: number,
		mutator: (entry: RegistryEntry) => boolean,
	): StateChange | null {
		const entry = this.entries.get(deviceId);
		if (!entry) {
			return null;
		}

		const before = visibleState(entry);
		const merged = mutator(entry);
		if (merged) {
			entry.lastUpdated = Math.max(entry.lastUpdated, at);
			entry.lastSource = source;
		}
		const after = visibleState(entry);

		if (before.lifecycle !== after.lifecycle) {
			this.log.debug('Registry: %s %s -> %s', deviceId, before.lifecycle, after.lifecycle);
			this.lifecycleChanged.emit(deviceId, before.lifecycle, after.lifecycle);
		}

		const changed = capabilitiesOf(entry.device).filter(
			(capability) =>
				before.values[capability] !== after.values[capability] ||
				before.authority[capability] !== after.authority[capability],
		);
		const onlineChanged = before.online !== after.online;

		if (changed.length === 0 && !onlineChanged) {
			return null;
		}

		const change: StateChange = {
			deviceId,
			changed,
			values: after.values,
			authority: after.authority,
			online: after.online,
			onlineChanged,
			source,
			at,
		};
		this.stateChanged.emit(change);
		return change;
	}

	public clear(): void {
		this.entries.clear();
	}

	/** Drop every listener; used on teardown. */
	public removeAllListeners(): void {
		this.discovered.clear();
		this.removed.clear();
		this.stateChanged.clear();
		this.lifecycleChanged.clear();
	}

	private toView(entry: RegistryEntry): DeviceView {
		return {
			device: entry.device,
			values: visibleValues(entry),
			confirmed: { ...entry.confirmed },
			pending: { ...entry.pending },
			authority: authorityOf(entry),
			lifecycle: lifecycleOf(entry),
			online: entry.online,
			lastUpdated: entry.lastUpdated,
			lastSource: entry.lastSource,
			staleSince: entry.staleSince,
		};
	}
}

// src/cloudhome/types.ts

export const DEVICE_CLASSES = ['light', 'switch', 'fan', 'cover', 'scene'] as const;
export type DeviceClass = typeof DEVICE_CLASSES[number];

/**
 * Value type carried by each capability. Percent-style capabilities are
 * nominally 0–100; color_temperature is in Kelvin.
 */
export interface CapabilityValueMap {
	on_off: boolean;
	brightness: number;
	color_temperature: number;
	speed_percent: number;
	position: number;
	activatable: boolean;
}

export type CapabilityName = keyof CapabilityValueMap;
export type CapabilityValue = CapabilityValueMap[CapabilityName];

export const CAPABILITY_NAMES: readonly CapabilityName[] = [
	'on_off',
	'brightness',
	'color_temperature',
	'speed_percent',
	'position',
	'activatable',
];

/** Capabilities each device class may declare. */
export interface ClassCapabilities {
	light: 'on_off' | 'brightness' | 'color_temperature';
	switch: 'on_off';
	fan: 'on_off' | 'speed_percent';
	cover: 'position';
	scene: 'activatable';
}

export type StateValues = { [K in CapabilityName]?: CapabilityValueMap[K] };

export interface DeviceInfo {
	room?: string;
	manufacturer?: string;
	model?: string;
	firmwareRevision?: string;
	hardwareRevision?: string;
}

interface DeviceBase {
	/** Opaque identifier assigned by the cloud service. */
	readonly id: string;
	readonly name: string;
	readonly info: DeviceInfo;
	/** False for devices (scenes) that never report state and are not queried. */
	readonly reportsState: boolean;
}

export type Device = {
	[C in DeviceClass]: DeviceBase & {
		readonly deviceClass: C;
		readonly capabilities: readonly ClassCapabilities[C][];
	};
}[DeviceClass];

/**
 * Full state as returned by QUERY or EXECUTE. Capabilities missing from
 * `values` are left untouched by the merge.
 */
export interface StateSnapshot {
	values: StateValues;
	online?: boolean;
}

/** Ordering key of a merge event: timestamp first, transport sequence as tiebreaker. */
export interface EventOrder {
	at: number;
	seq?: number;
}

export interface PushDelta {
	deviceId: string;
	values: StateValues;
	order: EventOrder;
	online?: boolean;
}

export interface Command {
	deviceId: string;
	changes: StateValues;
	/** Correlation token, unique per command. */
	token: string;
	issuedAt: number;
}

export type UpdateSource = 'discovery' | 'query' | 'command' | 'command-pending' | 'push';

export type Authority = 'confirmed' | 'pending';

export type DeviceLifecycle = 'discovered' | 'synced' | 'command-pending' | 'stale';

/** Copy-on-read view of one registry entry. */
export interface DeviceView {
	device: Device;
	/** Confirmed values overlaid with any optimistic (pending) values. */
	values: StateValues;
	confirmed: StateValues;
	pending: StateValues;
	authority: Partial<Record<CapabilityName, Authority>>;
	lifecycle: DeviceLifecycle;
	online: boolean;
	lastUpdated: number;
	lastSource: UpdateSource;
	staleSince: number | null;
}

export interface StateChange {
	deviceId: string;
	changed: CapabilityName[];
	values: StateValues;
	authority: Partial<Record<CapabilityName, Authority>>;
	online: boolean;
	onlineChanged: boolean;
	source: UpdateSource;
	at: number;
}

/** Opaque to the engine apart from expiry. */
export interface SessionCredential {
	accessToken: string;
	refreshToken?: string;
	/** Epoch milliseconds. */
	expiresAt: number;
}

/**
 * Issues credentials for both the push session and protocol calls.
 * Both methods throw AuthError when the account needs to sign in again.
 */
export interface CredentialProvider {
	/** A credential that is not about to expire, refreshing if needed. */
	current(): Promise<SessionCredential>;
	/** Always obtains a new credential; concurrent callers share one refresh. */
	refresh(): Promise<SessionCredential>;
}

/**
 * Very small logger interface so we can accept either the Homebridge log
 * object or console.* functions in tests.
 */
export interface HomeLogger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export function createConsoleLogger(prefix: string): HomeLogger {
	return {
		debug: (message: string, ...args: unknown[]) => console.debug(`[${prefix}] ${message}`, ...args),
		info: (message: string, ...args: unknown[]) => console.info(`[${prefix}] ${message}`, ...args),
		warn: (message: string, ...args: unknown[]) => console.warn(`[${prefix}] ${message}`, ...args),
		error: (message: string, ...args: unknown[]) => console.error(`[${prefix}] ${message}`, ...args),
	};
}

export function capabilitiesOf(device: Device): readonly CapabilityName[] {
	return device.capabilities;
}

export function hasCapability(device: Device, capability: CapabilityName): boolean {
	return capabilitiesOf(device).includes(capability);
}

export function compareOrder(a: EventOrder, b: EventOrder): number {
	if (a.at !== b.at) {
		return a.at < b.at ? -1 : 1;
	}
	if (a.seq !== undefined && b.seq !== undefined && a.seq !== b.seq) {
		return a.seq < b.seq ? -1 : 1;
	}
	return 0;
}

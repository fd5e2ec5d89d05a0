// src/cloudhome/device-catalog.ts

import { MergeDrop } from './errors.js';
import {
	DEVICE_CLASSES,
	capabilitiesOf,
} from './types.js';
import type {
	CapabilityName,
	CapabilityValue,
	ClassCapabilities,
	Device,
	DeviceClass,
	DeviceInfo,
	StateValues,
} from './types.js';

const LIGHT_CAPABILITIES: readonly ClassCapabilities['light'][] = ['on_off', 'brightness', 'color_temperature'];
const SWITCH_CAPABILITIES: readonly ClassCapabilities['switch'][] = ['on_off'];
const FAN_CAPABILITIES: readonly ClassCapabilities['fan'][] = ['on_off', 'speed_percent'];
const COVER_CAPABILITIES: readonly ClassCapabilities['cover'][] = ['position'];
const SCENE_CAPABILITIES: readonly ClassCapabilities['scene'][] = ['activatable'];

export const ALLOWED_CAPABILITIES: Record<DeviceClass, readonly CapabilityName[]> = {
	light: LIGHT_CAPABILITIES,
	switch: SWITCH_CAPABILITIES,
	fan: FAN_CAPABILITIES,
	cover: COVER_CAPABILITIES,
	scene: SCENE_CAPABILITIES,
};

/** Capability a device of the class cannot be controlled without. */
export const REQUIRED_CAPABILITY: Record<DeviceClass, CapabilityName> = {
	light: 'on_off',
	switch: 'on_off',
	fan: 'on_off',
	cover: 'position',
	scene: 'activatable',
};

/**
 * Device types as they appear in SYNC responses.
 * Extend this as the service adds types.
 */
const WIRE_TYPE_TO_CLASS: Record<string, DeviceClass> = {
	'action.devices.types.LIGHT': 'light',
	'action.devices.types.SWITCH': 'switch',
	'action.devices.types.OUTLET': 'switch',
	'action.devices.types.FAN': 'fan',
	'action.devices.types.CURTAIN': 'cover',
	'action.devices.types.BLINDS': 'cover',
	'action.devices.types.SCENE': 'scene',
};

const WIRE_TRAIT_TO_CAPABILITY: Record<string, CapabilityName> = {
	'action.devices.traits.OnOff': 'on_off',
	'action.devices.traits.Brightness': 'brightness',
	'action.devices.traits.ColorSetting': 'color_temperature',
	'action.devices.traits.FanSpeed': 'speed_percent',
	'action.devices.traits.OpenClose': 'position',
	'action.devices.traits.Scene': 'activatable',
};

// Fallback when a tunable-white light has never reported a temperature.
const DEFAULT_COLOR_TEMPERATURE_K = 3800;

export interface DeviceDescriptor {
	id: string;
	name: string;
	type: string;
	traits: readonly string[];
	info: DeviceInfo;
	reportsState: boolean;
}

export function resolveDeviceClass(type: string): DeviceClass | undefined {
	const mapped = WIRE_TYPE_TO_CLASS[type];
	if (mapped) {
		return mapped;
	}
	return DEVICE_CLASSES.find((deviceClass) => deviceClass === type);
}

export function resolveCapability(trait: string): CapabilityName | undefined {
	return WIRE_TRAIT_TO_CAPABILITY[trait];
}

function pick<T extends CapabilityName>(allowed: readonly T[], requested: readonly CapabilityName[]): T[] {
	return allowed.filter((capability) => requested.includes(capability));
}

function buildDevice(
	base: { id: string; name: string; info: DeviceInfo; reportsState: boolean },
	deviceClass: DeviceClass,
	capabilities: readonly CapabilityName[],
): Device {
	switch (deviceClass) {
	case 'light':
		return { ...base, deviceClass, capabilities: pick(LIGHT_CAPABILITIES, capabilities) };
	case 'switch':
		return { ...base, deviceClass, capabilities: pick(SWITCH_CAPABILITIES, capabilities) };
	case 'fan':
		return { ...base, deviceClass, capabilities: pick(FAN_CAPABILITIES, capabilities) };
	case 'cover':
		return { ...base, deviceClass, capabilities: pick(COVER_CAPABILITIES, capabilities) };
	case 'scene':
		return { ...base, deviceClass, capabilities: pick(SCENE_CAPABILITIES, capabilities) };
	}
}

function checkCapabilities(
	deviceId: string,
	deviceClass: DeviceClass,
	capabilities: readonly CapabilityName[],
): void {
	const allowed = ALLOWED_CAPABILITIES[deviceClass];
	const seen = new Set<CapabilityName>();

	for (const capability of capabilities) {
		if (!allowed.includes(capability)) {
			throw new MergeDrop(
				'invalid-device',
				deviceId,
				`capability ${capability} is not valid for a ${deviceClass}`,
			);
		}
		if (seen.has(capability)) {
			throw new MergeDrop('invalid-device', deviceId, `capability ${capability} declared twice`);
		}
		seen.add(capability);
	}

	const required = REQUIRED_CAPABILITY[deviceClass];
	if (!seen.has(required)) {
		throw new MergeDrop(
			'invalid-device',
			deviceId,
			`a ${deviceClass} must declare ${required}`,
		);
	}
}

/**
 * Translate a SYNC device into a typed Device.
 * Throws MergeDrop('invalid-device') for unsupported types or unknown traits.
 */
export function deviceFromDescriptor(descriptor: DeviceDescriptor): Device {
	const id = descriptor.id.trim();
	if (!id) {
		throw new MergeDrop('invalid-device', descriptor.id, 'device id is empty');
	}

	const deviceClass = resolveDeviceClass(descriptor.type);
	if (!deviceClass) {
		throw new MergeDrop('invalid-device', id, `unsupported device type ${descriptor.type}`);
	}

	const capabilities: CapabilityName[] = [];
	for (const trait of descriptor.traits) {
		const capability = resolveCapability(trait);
		if (!capability) {
			throw new MergeDrop('invalid-device', id, `unknown trait ${trait}`);
		}
		if (!capabilities.includes(capability)) {
			capabilities.push(capability);
		}
	}

	checkCapabilities(id, deviceClass, capabilities);

	const name = descriptor.name.trim() || `Device ${id}`;

	return buildDevice(
		{ id, name, info: descriptor.info, reportsState: descriptor.reportsState },
		deviceClass,
		capabilities,
	);
}

/** Re-check a device at merge time, whatever produced it. */
export function validateDevice(device: Device): void {
	if (!device.id) {
		throw new MergeDrop('invalid-device', device.id, 'device id is empty');
	}
	if (!DEVICE_CLASSES.includes(device.deviceClass)) {
		throw new MergeDrop('invalid-device', device.id, `unsupported device class ${String(device.deviceClass)}`);
	}
	checkCapabilities(device.id, device.deviceClass, capabilitiesOf(device));
}

export function defaultValue(capability: CapabilityName): CapabilityValue {
	switch (capability) {
	case 'on_off':
	case 'activatable':
		return false;
	case 'color_temperature':
		return DEFAULT_COLOR_TEMPERATURE_K;
	default:
		return 0;
	}
}

function toBoolean(raw: unknown): boolean | undefined {
	if (typeof raw === 'boolean') {
		return raw;
	}
	if (raw === 1 || raw === '1' || raw === 'true' || raw === 'on') {
		return true;
	}
	if (raw === 0 || raw === '0' || raw === 'false' || raw === 'off') {
		return false;
	}
	return undefined;
}

function toInteger(raw: unknown): number | undefined {
	const n = typeof raw === 'number'
		? raw
		: typeof raw === 'string' && raw.trim() !== ''
			? Number(raw.trim())
			: NaN;

	if (!Number.isFinite(n) || n < 0) {
		return undefined;
	}
	return Math.round(n);
}

/**
 * Coerce a raw value to the capability's type and store it.
 * Returns false (leaving target untouched) when the value does not fit.
 */
export function writeCapability(target: StateValues, capability: CapabilityName, raw: unknown): boolean {
	switch (capability) {
	case 'on_off':
	case 'activatable': {
		const value = toBoolean(raw);
		if (value === undefined) {
			return false;
		}
		target[capability] = value;
		return true;
	}
	default: {
		const value = toInteger(raw);
		if (value === undefined) {
			return false;
		}
		target[capability] = value;
		return true;
	}
	}
}

/** Copy one capability across without widening the value type. */
export function copyCapability(target: StateValues, source: StateValues, capability: CapabilityName): void {
	switch (capability) {
	case 'on_off':
	case 'activatable': {
		const value = source[capability];
		if (value === undefined) {
			delete target[capability];
		} else {
			target[capability] = value;
		}
		return;
	}
	default: {
		const value = source[capability];
		if (value === undefined) {
			delete target[capability];
		} else {
			target[capability] = value;
		}
	}
	}
}

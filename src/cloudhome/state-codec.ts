// src/cloudhome/state-codec.ts
//
// Wire state keys <-> capability values. Shared by QUERY, EXECUTE and push.

import { writeCapability } from './device-catalog.js';
import type { CapabilityName, StateSnapshot, StateValues } from './types.js';

const FLAT_KEYS: ReadonlyArray<[string, CapabilityName]> = [
	['on', 'on_off'],
	['brightness', 'brightness'],
	['currentFanSpeedPercent', 'speed_percent'],
	['openPercent', 'position'],
	['activate', 'activatable'],
];

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface DecodedState extends StateSnapshot {
	/** Wire keys that were present but carried a value of the wrong type. */
	invalid: string[];
}

export function decodeWireState(wire: Record<string, unknown>): DecodedState {
	const values: StateValues = {};
	const invalid: string[] = [];

	for (const [key, capability] of FLAT_KEYS) {
		if (!(key in wire)) {
			continue;
		}
		if (!writeCapability(values, capability, wire[key])) {
			invalid.push(key);
		}
	}

	const color = wire.color;
	if (isRecord(color) && 'temperatureK' in color) {
		if (!writeCapability(values, 'color_temperature', color.temperatureK)) {
			invalid.push('color.temperatureK');
		}
	} else if ('color.temperatureK' in wire) {
		if (!writeCapability(values, 'color_temperature', wire['color.temperatureK'])) {
			invalid.push('color.temperatureK');
		}
	}

	let online: boolean | undefined;
	if (typeof wire.online === 'boolean') {
		online = wire.online;
	} else if ('online' in wire) {
		invalid.push('online');
	}

	return online === undefined ? { values, invalid } : { values, online, invalid };
}

export function encodeChanges(changes: StateValues): Record<string, unknown> {
	const wire: Record<string, unknown> = {};

	if (changes.on_off !== undefined) {
		wire.on = changes.on_off;
	}
	if (changes.brightness !== undefined) {
		wire.brightness = changes.brightness;
	}
	if (changes.color_temperature !== undefined) {
		wire.color = { temperatureK: changes.color_temperature };
	}
	if (changes.speed_percent !== undefined) {
		wire.currentFanSpeedPercent = changes.speed_percent;
	}
	if (changes.position !== undefined) {
		wire.openPercent = changes.position;
	}
	if (changes.activatable !== undefined) {
		wire.activate = changes.activatable;
	}

	return wire;
}

export function capabilityForWireKey(key: string): CapabilityName | undefined {
	if (key === 'color' || key === 'color.temperatureK') {
		return 'color_temperature';
	}
	return FLAT_KEYS.find(([wireKey]) => wireKey === key)?.[1];
}

import { describe, expect, it } from 'vitest';

import {
	capabilityForWireKey,
	decodeWireState,
	encodeChanges,
} from '../../src/cloudhome/state-codec.js';

describe('decodeWireState', () => {
	it('reads flat keys, nested color and online', () => {
		expect(decodeWireState({
			on: true,
			brightness: '55',
			color: { temperatureK: 2700 },
			online: false,
		})).toEqual({
			values: { on_off: true, brightness: 55, color_temperature: 2700 },
			online: false,
			invalid: [],
		});
	});

	it('reads a flattened color key', () => {
		expect(decodeWireState({ 'color.temperatureK': 5000 }).values).toEqual({ color_temperature: 5000 });
	});

	it('reports keys with the wrong type', () => {
		const decoded = decodeWireState({ on: 'maybe', openPercent: 30, online: 'yes' });
		expect(decoded.values).toEqual({ position: 30 });
		expect(decoded.invalid).toEqual(['on', 'online']);
		expect(decoded.online).toBeUndefined();
	});

	it('ignores keys it does not know', () => {
		expect(decodeWireState({ thermostatMode: 'heat' })).toEqual({ values: {}, invalid: [] });
	});
});

describe('encodeChanges', () => {
	it('writes wire keys for each capability present', () => {
		expect(encodeChanges({ on_off: false, color_temperature: 3000, position: 20 })).toEqual({
			on: false,
			color: { temperatureK: 3000 },
			openPercent: 20,
		});
	});

	it('encodes fan speed and scene activation', () => {
		expect(encodeChanges({ speed_percent: 75, activatable: true })).toEqual({
			currentFanSpeedPercent: 75,
			activate: true,
		});
	});
});

describe('wire keys', () => {
	it('maps wire keys to capabilities', () => {
		expect(capabilityForWireKey('openPercent')).toBe('position');
		expect(capabilityForWireKey('color.temperatureK')).toBe('color_temperature');
		expect(capabilityForWireKey('nope')).toBeUndefined();
	});
});

import { describe, expect, it } from 'vitest';

import {
	defaultValue,
	deviceFromDescriptor,
	resolveDeviceClass,
	validateDevice,
	writeCapability,
} from '../../src/cloudhome/device-catalog.js';
import type { DeviceDescriptor } from '../../src/cloudhome/device-catalog.js';
import { MergeDrop } from '../../src/cloudhome/errors.js';
import type { StateValues } from '../../src/cloudhome/types.js';

function descriptor(overrides: Partial<DeviceDescriptor> = {}): DeviceDescriptor {
	return {
		id: 'light-1',
		name: 'Kitchen',
		type: 'action.devices.types.LIGHT',
		traits: ['action.devices.traits.OnOff', 'action.devices.traits.Brightness'],
		info: {},
		reportsState: true,
		...overrides,
	};
}

function dropReason(fn: () => unknown): string {
	try {
		fn();
	} catch (err) {
		if (err instanceof MergeDrop) {
			return `${err.reason}: ${err.message}`;
		}
		throw err;
	}
	throw new Error('expected a MergeDrop');
}

describe('deviceFromDescriptor', () => {
	it('maps wire type and traits to a typed device', () => {
		expect(deviceFromDescriptor(descriptor({ id: ' light-1 ' }))).toEqual({
			id: 'light-1',
			name: 'Kitchen',
			info: {},
			reportsState: true,
			deviceClass: 'light',
			capabilities: ['on_off', 'brightness'],
		});
	});

	it('keeps the class capability order whatever the trait order', () => {
		const device = deviceFromDescriptor(descriptor({
			traits: ['action.devices.traits.ColorSetting', 'action.devices.traits.OnOff'],
		}));
		expect(device.capabilities).toEqual(['on_off', 'color_temperature']);
	});

	it('treats outlets as switches', () => {
		const device = deviceFromDescriptor(descriptor({
			type: 'action.devices.types.OUTLET',
			traits: ['action.devices.traits.OnOff'],
		}));
		expect(device.deviceClass).toBe('switch');
	});

	it('falls back to a generated name', () => {
		expect(deviceFromDescriptor(descriptor({ name: '  ' })).name).toBe('Device light-1');
	});

	it('rejects unknown traits', () => {
		expect(dropReason(() => deviceFromDescriptor(descriptor({ traits: ['action.devices.traits.Dock'] }))))
			.toBe('invalid-device: unknown trait action.devices.traits.Dock');
	});

	it('rejects unsupported types', () => {
		expect(dropReason(() => deviceFromDescriptor(descriptor({ type: 'action.devices.types.VACUUM' }))))
			.toBe('invalid-device: unsupported device type action.devices.types.VACUUM');
	});

	it('rejects capabilities outside the class', () => {
		expect(dropReason(() => deviceFromDescriptor(descriptor({
			traits: ['action.devices.traits.OnOff', 'action.devices.traits.FanSpeed'],
		})))).toBe('invalid-device: capability speed_percent is not valid for a light');
	});

	it('rejects a device without its required capability', () => {
		expect(dropReason(() => deviceFromDescriptor(descriptor({
			traits: ['action.devices.traits.Brightness'],
		})))).toBe('invalid-device: a light must declare on_off');
	});

	it('rejects an empty id', () => {
		expect(dropReason(() => deviceFromDescriptor(descriptor({ id: '' }))))
			.toBe('invalid-device: device id is empty');
	});
});

describe('resolveDeviceClass', () => {
	it('accepts wire types and plain class names', () => {
		expect(resolveDeviceClass('action.devices.types.BLINDS')).toBe('cover');
		expect(resolveDeviceClass('fan')).toBe('fan');
		expect(resolveDeviceClass('thermostat')).toBeUndefined();
	});
});

describe('validateDevice', () => {
	it('rejects duplicate capabilities', () => {
		expect(dropReason(() => validateDevice({
			id: 'switch-3',
			name: 'Porch',
			info: {},
			reportsState: true,
			deviceClass: 'switch',
			capabilities: ['on_off', 'on_off'],
		}))).toBe('invalid-device: capability on_off declared twice');
	});
});

describe('writeCapability', () => {
	it('coerces boolean spellings', () => {
		const values: StateValues = {};
		expect(writeCapability(values, 'on_off', 'on')).toBe(true);
		expect(writeCapability(values, 'activatable', 0)).toBe(true);
		expect(values).toEqual({ on_off: true, activatable: false });
	});

	it('rounds numeric strings', () => {
		const values: StateValues = {};
		expect(writeCapability(values, 'brightness', '42.6')).toBe(true);
		expect(values.brightness).toBe(43);
	});

	it('leaves the target alone when the value does not fit', () => {
		const values: StateValues = { brightness: 10, on_off: true };
		expect(writeCapability(values, 'brightness', -1)).toBe(false);
		expect(writeCapability(values, 'on_off', 'maybe')).toBe(false);
		expect(values).toEqual({ brightness: 10, on_off: true });
	});

	it('does not range-check percentages', () => {
		const values: StateValues = {};
		expect(writeCapability(values, 'brightness', 200)).toBe(true);
		expect(values.brightness).toBe(200);
	});
});

describe('defaults', () => {
	it('uses 3800K for color temperature', () => {
		expect(defaultValue('color_temperature')).toBe(3800);
		expect(defaultValue('on_off')).toBe(false);
		expect(defaultValue('position')).toBe(0);
	});
});

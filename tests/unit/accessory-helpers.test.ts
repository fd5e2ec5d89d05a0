import { describe, expect, it } from 'vitest';

import { clampNumber, kelvinToMired, miredToKelvin } from '../../src/cloudhome/accessory-helpers.js';
import { coverTarget } from '../../src/cloudhome/cover-accessory.js';
import { snapFanSpeed } from '../../src/cloudhome/fan-accessory.js';

describe('color temperature', () => {
	it('converts between mired and Kelvin', () => {
		expect(kelvinToMired(3800)).toBe(263);
		expect(miredToKelvin(153)).toBe(6536);
		expect(miredToKelvin(500)).toBe(2000);
	});
});

describe('fan speed', () => {
	it('snaps to quarter steps', () => {
		expect(snapFanSpeed(0)).toBe(0);
		expect(snapFanSpeed(12)).toBe(0);
		expect(snapFanSpeed(13)).toBe(25);
		expect(snapFanSpeed(62)).toBe(50);
		expect(snapFanSpeed(140)).toBe(100);
	});
});

describe('cover target', () => {
	it('passes positions through unless snapping', () => {
		expect(coverTarget(37.4, false)).toBe(37);
		expect(coverTarget(120, false)).toBe(100);
		expect(coverTarget(49, true)).toBe(0);
		expect(coverTarget(50, true)).toBe(100);
	});

	it('clamps numbers', () => {
		expect(clampNumber(-3, 0, 100)).toBe(0);
	});
});

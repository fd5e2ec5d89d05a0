// src/cloudhome/fan-accessory.ts
import type { CharacteristicValue, PlatformAccessory } from 'homebridge';

import type { AccessoryEnv, AccessoryUpdater, DeviceOfClass } from './accessory-helpers.js';
import {
	applyAccessoryInformation,
	clampNumber,
	communicationFailure,
	readView,
	removeStaleServices,
	sendCommand,
} from './accessory-helpers.js';
import { hasCapability } from './types.js';

// The cloud fan controller has four speeds.
export const FAN_SPEED_STEP = 25;

export function snapFanSpeed(percent: number): number {
	return clampNumber(Math.round(percent / FAN_SPEED_STEP) * FAN_SPEED_STEP, 0, 100);
}

export function configureFanAccessory(
	env: AccessoryEnv,
	accessory: PlatformAccessory,
	device: DeviceOfClass<'fan'>,
): AccessoryUpdater {
	const { Service, Characteristic, Categories } = env.api.hap;

	removeStaleServices(env, accessory, Service.Fanv2);

	const service =
		accessory.getService(Service.Fanv2) ||
		accessory.addService(Service.Fanv2, device.name);

	if (accessory.category !== Categories.FAN) {
		accessory.category = Categories.FAN;
	}

	applyAccessoryInformation(env.api, accessory, device);

	const { ACTIVE, INACTIVE } = Characteristic.Active;

	service
		.getCharacteristic(Characteristic.Active)
		.onGet(() => (readView(env, device.id).values.on_off ? ACTIVE : INACTIVE))
		.onSet(async (value: CharacteristicValue) => {
			await sendCommand(env, device, { on_off: value === ACTIVE }, 'Fan Active');
		});

	const supportsSpeed = hasCapability(device, 'speed_percent');
	if (supportsSpeed) {
		service
			.getCharacteristic(Characteristic.RotationSpeed)
			.setProps({ minValue: 0, maxValue: 100, minStep: FAN_SPEED_STEP })
			.onGet(() => snapFanSpeed(readView(env, device.id).values.speed_percent ?? 0))
			.onSet(async (value: CharacteristicValue) => {
				const speed = snapFanSpeed(Number(value));
				await sendCommand(env, device, { speed_percent: speed }, 'Fan RotationSpeed');
			});
	}

	return (view) => {
		if (!view.online) {
			service.updateCharacteristic(Characteristic.Active, communicationFailure(env.api));
			return;
		}
		service.updateCharacteristic(Characteristic.Active, view.values.on_off ? ACTIVE : INACTIVE);
		if (supportsSpeed) {
			service.updateCharacteristic(Characteristic.RotationSpeed, snapFanSpeed(view.values.speed_percent ?? 0));
		}
	};
}

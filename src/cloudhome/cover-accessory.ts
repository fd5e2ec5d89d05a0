// src/cloudhome/cover-accessory.ts
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

/**
 * Covers that only open or close fully report 0 or 100; anything below
 * half-open is treated as closed.
 */
export function coverTarget(requested: number, snapToEnds: boolean): number {
	const position = clampNumber(Math.round(requested), 0, 100);
	if (!snapToEnds) {
		return position;
	}
	return position < 50 ? 0 : 100;
}

export function configureCoverAccessory(
	env: AccessoryEnv,
	accessory: PlatformAccessory,
	device: DeviceOfClass<'cover'>,
): AccessoryUpdater {
	const { Service, Characteristic, Categories } = env.api.hap;

	removeStaleServices(env, accessory, Service.WindowCovering);

	const service =
		accessory.getService(Service.WindowCovering) ||
		accessory.addService(Service.WindowCovering, device.name);

	if (accessory.category !== Categories.WINDOW_COVERING) {
		accessory.category = Categories.WINDOW_COVERING;
	}

	applyAccessoryInformation(env.api, accessory, device);

	const positionOf = (): number => clampNumber(readView(env, device.id).values.position ?? 0, 0, 100);

	service.getCharacteristic(Characteristic.CurrentPosition).onGet(positionOf);
	service.getCharacteristic(Characteristic.PositionState).onGet(() => Characteristic.PositionState.STOPPED);
	service
		.getCharacteristic(Characteristic.TargetPosition)
		.onGet(positionOf)
		.onSet(async (value: CharacteristicValue) => {
			const position = coverTarget(Number(value), env.coverSnapToEnds);
			await sendCommand(env, device, { position }, 'Cover TargetPosition');
		});

	return (view) => {
		if (!view.online) {
			service.updateCharacteristic(Characteristic.CurrentPosition, communicationFailure(env.api));
			return;
		}
		const position = clampNumber(view.values.position ?? 0, 0, 100);
		service.updateCharacteristic(Characteristic.CurrentPosition, position);
		service.updateCharacteristic(Characteristic.TargetPosition, position);
		service.updateCharacteristic(Characteristic.PositionState, Characteristic.PositionState.STOPPED);
	};
}

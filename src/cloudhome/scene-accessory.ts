// src/cloudhome/scene-accessory.ts
import type { CharacteristicValue, PlatformAccessory } from 'homebridge';

import type { AccessoryEnv, AccessoryUpdater, DeviceOfClass } from './accessory-helpers.js';
import {
	applyAccessoryInformation,
	removeStaleServices,
	sendCommand,
} from './accessory-helpers.js';

// Scenes are momentary: the switch flips back off after this long.
const SCENE_RESET_MS = 1_000;

export function configureSceneAccessory(
	env: AccessoryEnv,
	accessory: PlatformAccessory,
	device: DeviceOfClass<'scene'>,
): AccessoryUpdater {
	const { Service, Characteristic } = env.api.hap;

	removeStaleServices(env, accessory, Service.Switch);

	const service =
		accessory.getService(Service.Switch) ||
		accessory.addService(Service.Switch, device.name);

	applyAccessoryInformation(env.api, accessory, device);

	service
		.getCharacteristic(Characteristic.On)
		.onGet(() => false)
		.onSet(async (value: CharacteristicValue) => {
			if (value !== true && value !== 1) {
				return;
			}
			try {
				await sendCommand(env, device, { activatable: true }, 'Scene');
			} finally {
				setTimeout(() => service.updateCharacteristic(Characteristic.On, false), SCENE_RESET_MS);
			}
		});

	// Scenes carry no state to mirror.
	return () => undefined;
}

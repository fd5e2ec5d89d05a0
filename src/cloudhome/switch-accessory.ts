// src/cloudhome/switch-accessory.ts
import type { CharacteristicValue, PlatformAccessory } from 'homebridge';

import type { AccessoryEnv, AccessoryUpdater, DeviceOfClass } from './accessory-helpers.js';
import {
	applyAccessoryInformation,
	communicationFailure,
	readView,
	removeStaleServices,
	sendCommand,
} from './accessory-helpers.js';

export function configureSwitchAccessory(
	env: AccessoryEnv,
	accessory: PlatformAccessory,
	device: DeviceOfClass<'switch'>,
): AccessoryUpdater {
	const { Service, Characteristic } = env.api.hap;

	removeStaleServices(env, accessory, Service.Switch);

	const service =
		accessory.getService(Service.Switch) ||
		accessory.addService(Service.Switch, device.name);

	applyAccessoryInformation(env.api, accessory, device);

	service
		.getCharacteristic(Characteristic.On)
		.onGet(() => readView(env, device.id).values.on_off ?? false)
		.onSet(async (value: CharacteristicValue) => {
			await sendCommand(env, device, { on_off: value === true || value === 1 }, 'Switch On');
		});

	return (view) => {
		service.updateCharacteristic(
			Characteristic.On,
			view.online ? view.values.on_off ?? false : communicationFailure(env.api),
		);
	};
}
